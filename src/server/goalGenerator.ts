import { CELL_FREE, type OccupancyGrid } from '../lib/occupancyMap'
import { createPose, type Pose3D } from '../lib/pose'
import { GOAL_FRAME_ID, GOAL_SEARCH_ATTEMPTS } from '../lib/route'

import { createLogger, type Logger } from './logger'

export type RandomSource = () => number

export type GoalGenerator = {
  ravelIndex: (x: number, y: number) => number
  gridToWorld2d: (x: number, y: number) => [number, number]
  checkNoise: (x: number, y: number) => boolean
  getNext: () => Pose3D | null
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1))
}

/**
 * Picks random free cells of a static occupancy map and turns them into goal poses.
 *
 * The grid-to-world transform is assumed to be an x-y translation plus a yaw
 * rotation, which is all a map origin carries.
 */
export function createGoalGenerator(
  map: OccupancyGrid,
  options: { random?: RandomSource; logger?: Logger } = {},
): GoalGenerator {
  const random = options.random ?? Math.random
  const logger = options.logger ?? createLogger('[goal-generator]')

  const { width, height, data, resolutionMPerPx: resolution } = map
  const mapYaw = map.origin.yawZ
  const x0 = map.origin.x
  const y0 = map.origin.y

  function ravelIndex(x: number, y: number): number {
    return y * width + x
  }

  function gridToWorld2d(x: number, y: number): [number, number] {
    const xWorld = x0 + (Math.cos(mapYaw) * (resolution * x) - Math.sin(mapYaw) * (resolution * y))
    const yWorld = y0 + (Math.sin(mapYaw) * (resolution * x) + Math.cos(mapYaw) * (resolution * y))
    return [xWorld, yWorld]
  }

  // Low resolution or noisy sensor data leaves isolated free specks inside
  // obstacles; a goal must sit in a window that is free all around.
  function checkNoise(x: number, y: number): boolean {
    const deltaX = Math.max(2, Math.floor(width / 50))
    const deltaY = Math.max(2, Math.floor(height / 50))

    const left = Math.max(0, x - deltaX)
    const right = Math.min(width - 1, x + deltaX)
    const top = Math.max(0, y - deltaY)
    const bottom = Math.min(height - 1, y + deltaY)

    for (let gx = left; gx < right; gx++) {
      for (let gy = top; gy < bottom; gy++) {
        if (data[ravelIndex(gx, gy)] !== CELL_FREE) return false
      }
    }
    return true
  }

  function getNext(): Pose3D | null {
    logger.info('Searching for a valid goal')

    for (let attempt = 0; attempt < GOAL_SEARCH_ATTEMPTS; attempt++) {
      const gx = randomInt(random, 0, width - 1)
      const gy = randomInt(random, 0, height - 1)
      if (data[ravelIndex(gx, gy)] !== CELL_FREE) continue
      if (!checkNoise(gx, gy)) continue

      const [xWorld, yWorld] = gridToWorld2d(gx, gy)
      logger.info('Valid goal found!')
      return createPose(GOAL_FRAME_ID, xWorld, yWorld, 0, 0, 0, 0)
    }

    logger.error(
      'Could not find a valid goal in the world. Check that your occupancy map has trinary value representation and is not visually noisy/incorrect',
    )
    return null
  }

  return { ravelIndex, gridToWorld2d, checkNoise, getNext }
}
