import type { Pose3D } from './pose'

export const CELL_FREE = 0
export const CELL_OCCUPIED = 100
export const CELL_UNKNOWN = -1

export type OccupancyGrid = {
  timestampUnixMs: number
  frameId: string
  resolutionMPerPx: number
  width: number
  height: number
  origin: Pose3D
  /** Row-major cells: 0=free, 100=occupied, -1=unknown. */
  data: Int8Array
}
