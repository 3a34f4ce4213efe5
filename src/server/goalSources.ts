import type { OccupancyGrid } from '../lib/occupancyMap'
import type { Pose3D } from '../lib/pose'
import type { RouteMode } from '../lib/route'

import { createGoalGenerator, randomInt, type RandomSource } from './goalGenerator'
import type { Logger } from './logger'

/** Yields the next goal pose, or null when none can be produced. */
export type GoalSource = {
  next: () => Pose3D | null
}

export type GoalSourceContext = {
  fetchMap: () => Promise<OccupancyGrid>
  random: RandomSource
  logger?: Logger
}

type GoalSourceFactory = (
  poses: Pose3D[],
  ctx: GoalSourceContext,
) => GoalSource | Promise<GoalSource>

export function cycleGoals(poses: Pose3D[]): GoalSource {
  let index = 0
  return {
    next() {
      if (!poses.length) return null
      const pose = poses[index % poses.length] ?? null
      index = (index + 1) % poses.length
      return pose
    },
  }
}

export function randomGoals(poses: Pose3D[], random: RandomSource): GoalSource {
  return {
    next() {
      if (!poses.length) return null
      return poses[randomInt(random, 0, poses.length - 1)] ?? null
    },
  }
}

export const routeModes: Record<RouteMode, GoalSourceFactory> = {
  inorder: (poses) => cycleGoals(poses),
  random: (poses, ctx) => randomGoals(poses, ctx.random),
  dynamic: async (_poses, ctx) => {
    // The map is read once; it must stay static while routing.
    const map = await ctx.fetchMap()
    const generator = createGoalGenerator(map, { random: ctx.random, logger: ctx.logger })
    return { next: () => generator.getNext() }
  },
}
