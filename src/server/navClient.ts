import type { LidarScan } from '../lib/lidarScan'
import type { OccupancyGrid } from '../lib/occupancyMap'
import type { RobotState } from '../lib/robotState'
import type { GlobalPlan, GoalResult, NavGoal } from '../lib/route'

export type Unsubscribe = () => void

/**
 * What the route manager and the telemetry hub need from the robot's
 * navigation stack. The gRPC bridge client is the production implementation.
 */
export type NavClient = {
  /** Rejects when the server is not ready within `timeoutMs`, or once `signal` aborts. */
  waitForServer: (timeoutMs: number, signal?: AbortSignal) => Promise<void>
  fetchMap: () => Promise<OccupancyGrid>
  /** Resolves with the goal id assigned by the action server. */
  sendGoal: (goal: NavGoal) => Promise<string>
  /** Rejects with PlanTimeoutError when the planner publishes nothing in time. */
  waitForGlobalPlan: (goalId: string, timeoutMs: number, signal?: AbortSignal) => Promise<GlobalPlan>
  waitForResult: (goalId: string, signal?: AbortSignal) => Promise<GoalResult>
  cancelGoal: (goalId: string) => Promise<void>
  /** Listener receives null when the stream drops or goes stale. */
  subscribeRobotState: (listener: (state: RobotState | null) => void) => Unsubscribe
  subscribeScan: (listener: (scan: LidarScan | null) => void) => Unsubscribe
  close: () => void
}
