import type { Pose3D } from './pose'

export const ROUTE_MODES = ['inorder', 'random', 'dynamic'] as const

export type RouteMode = (typeof ROUTE_MODES)[number]

export const GOAL_FRAME_ID = 'map'

export const DEFAULT_ROUTE_RATE_HZ = 1
export const DEFAULT_PLAN_TIMEOUT_MS = 5000
export const DEFAULT_MAX_BAD_GOALS = 10
export const GOAL_SEARCH_ATTEMPTS = 100

export type NavGoal = {
  stampUnixMs: number
  frameId: string
  pose: Pose3D
}

export type GoalStatus =
  | 'pending'
  | 'active'
  | 'succeeded'
  | 'aborted'
  | 'rejected'
  | 'preempted'
  | 'lost'

export type GoalResult = {
  /** false when the server could not report a terminal state */
  finished: boolean
  status: GoalStatus
}

export type GlobalPlan = {
  goalId: string
  poses: Pose3D[]
}

export type RouteStopReason = 'shutdown' | 'too-many-bad-goals' | 'no-valid-goal'

export type RouteState = {
  mode: RouteMode
  badGoals: number
  goalsSent: number
  goalsReached: number
  currentGoal: NavGoal | null
  stopReason: RouteStopReason | null
}

export function isRouteMode(value: string): value is RouteMode {
  return ROUTE_MODES.some((mode) => mode === value)
}
