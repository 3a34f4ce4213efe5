import type { Pose3D } from './pose'

export type RobotState = {
  timestampUnixMs: number
  seq: string
  pose: Pose3D
  /** Body-frame linear velocity, m/s */
  linearX: number
  linearY: number
  /** rad/s about +Z */
  angularZ: number
}

export function speedOf(state: RobotState): number {
  return Math.hypot(state.linearX, state.linearY)
}
