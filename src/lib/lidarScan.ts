export type LidarScan = {
  timestampUnixMs: number
  seq: string
  frameId: string
  angleMin: number
  angleIncrement: number
  rangeMin: number
  rangeMax: number
  /** Range data in meters. Invalid readings are Inf or outside [rangeMin, rangeMax]. */
  ranges: number[]
}

/** Closest valid return, or null when the scan has none. */
export function nearestRange(scan: LidarScan): number | null {
  let nearest: number | null = null
  for (const r of scan.ranges) {
    if (!Number.isFinite(r)) continue
    if (r < scan.rangeMin || r > scan.rangeMax) continue
    if (nearest == null || r < nearest) nearest = r
  }
  return nearest
}
