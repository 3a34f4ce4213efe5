import type { Pose3D } from '../lib/pose'
import {
  DEFAULT_MAX_BAD_GOALS,
  DEFAULT_PLAN_TIMEOUT_MS,
  DEFAULT_ROUTE_RATE_HZ,
  GOAL_FRAME_ID,
  type GoalResult,
  isRouteMode,
  type NavGoal,
  type RouteMode,
  type RouteState,
  type RouteStopReason,
} from '../lib/route'

import { InvalidGoalError, PlanTimeoutError, UnknownRouteModeError } from './errors'
import type { RandomSource } from './goalGenerator'
import { routeModes } from './goalSources'
import { createLogger, type Logger } from './logger'
import type { NavClient } from './navClient'
import { abortableSleep, createRate, type Sleep } from './rate'
import { createRetryLogger, type RetryLogger } from './retryLogger'

export type RouteManagerOptions = {
  navClient: NavClient
  mode: string
  poses: Pose3D[]
  planTimeoutMs?: number
  maxBadGoals?: number
  rateHz?: number
  serverTimeoutMs?: number
  /** Pause between attempts to reach the navigation server. */
  serverRetryMs?: number
  /** Aborting while the server is still unreachable ends start-up with no manager. */
  signal?: AbortSignal
  random?: RandomSource
  logger?: Logger
  retryLog?: RetryLogger
  now?: () => number
  sleep?: Sleep
}

export type RouteManager = {
  mode: RouteMode
  toMoveGoal: (pose: Pose3D | null) => NavGoal
  /** Routes until aborted or until no usable goal is left. */
  routeForever: (signal: AbortSignal) => Promise<RouteStopReason>
  getCurrentGoal: () => NavGoal | null
  getState: () => RouteState
}

const DEFAULT_SERVER_TIMEOUT_MS = 30_000
const DEFAULT_SERVER_RETRY_MS = 1000

export function formatGoal(goal: NavGoal): string {
  const p = goal.pose
  return `frame=${goal.frameId} x=${p.x.toFixed(3)} y=${p.y.toFixed(3)} yawZ=${p.yawZ.toFixed(3)}`
}

/**
 * Resolves with null when `signal` aborts before the navigation server
 * answers; the server is retried until then.
 */
export async function createRouteManager(options: RouteManagerOptions): Promise<RouteManager | null> {
  const {
    navClient,
    poses,
    planTimeoutMs = DEFAULT_PLAN_TIMEOUT_MS,
    maxBadGoals = DEFAULT_MAX_BAD_GOALS,
    rateHz = DEFAULT_ROUTE_RATE_HZ,
    serverTimeoutMs = DEFAULT_SERVER_TIMEOUT_MS,
    serverRetryMs = DEFAULT_SERVER_RETRY_MS,
    signal = new AbortController().signal,
    random = Math.random,
    now = Date.now,
    sleep = abortableSleep,
  } = options
  const logger = options.logger ?? createLogger('[route]')
  const retryLog = options.retryLog ?? createRetryLogger('[route]', { logger })

  async function waitForMoveServer(): Promise<boolean> {
    logger.info('Waiting for move server')
    while (!signal.aborted) {
      try {
        await navClient.waitForServer(serverTimeoutMs, signal)
        retryLog.markSuccess()
        return true
      } catch (err) {
        if (signal.aborted) break
        retryLog.logFailure('move server unreachable', err)
        await sleep(serverRetryMs, signal)
      }
    }
    return false
  }

  if (!(await waitForMoveServer())) {
    logger.info('Shutdown requested before the move server was ready')
    return null
  }

  if (!isRouteMode(options.mode)) {
    logger.error(`Route mode ${options.mode} unknown, exiting route manager`)
    throw new UnknownRouteModeError(options.mode)
  }
  const mode = options.mode

  if (!poses.length && mode !== 'dynamic') {
    logger.info('Route manager initialized no goals, unable to route')
  }

  const goals = await routeModes[mode](poses, {
    fetchMap: () => navClient.fetchMap(),
    random,
    logger,
  })
  if (signal.aborted) return null
  logger.info(`Route manager initialized in ${mode} mode`)

  let badGoals = 0
  let goalsSent = 0
  let goalsReached = 0
  let currentGoal: NavGoal | null = null
  let stopReason: RouteStopReason | null = null

  function toMoveGoal(pose: Pose3D | null): NavGoal {
    if (pose == null) throw new InvalidGoalError('Goal position cannot be NULL')
    return { stampUnixMs: now(), frameId: GOAL_FRAME_ID, pose }
  }

  async function cancelQuietly(goalId: string) {
    try {
      await navClient.cancelGoal(goalId)
    } catch (err) {
      logger.warn(`cancel goal ${goalId} failed`, err)
    }
  }

  async function routeForever(signal: AbortSignal): Promise<RouteStopReason> {
    const rate = createRate(rateHz, { now, sleep })
    const stop = (reason: RouteStopReason) => {
      stopReason = reason
      return reason
    }

    while (!signal.aborted) {
      if (badGoals > maxBadGoals) {
        logger.info(
          'Stopping route manager due to too many bad goals. Check that your occupancy map has trinary value representation and is not visually noisy/incorrect',
        )
        return stop('too-many-bad-goals')
      }

      logger.info(`Route mode is ${mode}, getting next goal`)
      let goal: NavGoal
      try {
        goal = toMoveGoal(goals.next())
      } catch (err) {
        if (!(err instanceof InvalidGoalError)) throw err
        logger.info(
          `No valid goal was found in the map, stopping route manager due to following exception,\n${err.message}`,
        )
        return stop('no-valid-goal')
      }

      logger.info(`Sending target goal: ${formatGoal(goal)}`)
      const goalId = await navClient.sendGoal(goal)
      currentGoal = goal
      goalsSent += 1

      try {
        // Give the planner a few seconds; a goal it cannot plan for is a bad goal.
        await navClient.waitForGlobalPlan(goalId, planTimeoutMs, signal)
      } catch (err) {
        if (signal.aborted) {
          await cancelQuietly(goalId)
          break
        }
        if (!(err instanceof PlanTimeoutError)) throw err
        badGoals += 1
        logger.warn('No plan found for goal. Scanning for a new goal...')
        continue
      }

      let result: GoalResult
      try {
        result = await navClient.waitForResult(goalId, signal)
      } catch (err) {
        if (signal.aborted) {
          await cancelQuietly(goalId)
          break
        }
        throw err
      }

      if (!result.finished) {
        logger.error('Move server not ready, will try again...')
      } else if (result.status === 'succeeded') {
        goalsReached += 1
        logger.info(`Goal done: ${formatGoal(goal)}`)
      } else {
        logger.warn(`Goal ended ${result.status}: ${formatGoal(goal)}`)
      }

      await rate.sleep(signal)
    }

    return stop('shutdown')
  }

  return {
    mode,
    toMoveGoal,
    routeForever,
    getCurrentGoal: () => currentGoal,
    getState: () => ({
      mode,
      badGoals,
      goalsSent,
      goalsReached,
      currentGoal,
      stopReason,
    }),
  }
}
