import { type LidarScan, nearestRange } from '../lib/lidarScan'
import { planarDistance } from '../lib/pose'
import { type RobotState, speedOf } from '../lib/robotState'
import type { NavGoal } from '../lib/route'
import type { TelemetrySample } from '../lib/telemetry'

import { createHostStatsSampler, type HostStatsSampler } from './hostStats'
import { createLogger, type Logger } from './logger'
import type { NavClient, Unsubscribe } from './navClient'

export type TelemetryListener = (sample: TelemetrySample | null) => void

export type TelemetryHubOptions = {
  navClient: Pick<NavClient, 'subscribeRobotState' | 'subscribeScan'>
  getGoal: () => NavGoal | null
  periodMs: number
  /** Robot state and scans received longer ago than this count as missing. */
  staleMs: number
  hostStats?: HostStatsSampler
  now?: () => number
  logger?: Logger
}

export type TelemetryHub = {
  start: () => void
  stop: () => void
  /** Builds and publishes a sample from whatever is current. */
  sampleNow: () => TelemetrySample
  getSnapshot: () => TelemetrySample | null
  subscribe: (listener: TelemetryListener) => Unsubscribe
}

type Received<T> = { value: T; receivedAt: number }

function formatMetric(value: number | null, digits: number): string {
  return value == null ? '-' : value.toFixed(digits)
}

export function createTelemetryHub(options: TelemetryHubOptions): TelemetryHub {
  const now = options.now ?? Date.now
  const hostStats = options.hostStats ?? createHostStatsSampler()
  const logger = options.logger ?? createLogger('[telemetry]')

  let latestState: Received<RobotState> | null = null
  let latestScan: Received<LidarScan> | null = null
  let latestSample: TelemetrySample | null = null
  let seq = 0

  const subscribers = new Set<TelemetryListener>()
  let sampleTimer: NodeJS.Timeout | null = null
  let unsubscribeInputs: Unsubscribe[] = []

  function fresh<T>(entry: Received<T> | null): T | null {
    if (!entry) return null
    return now() - entry.receivedAt <= options.staleMs ? entry.value : null
  }

  function publish(sample: TelemetrySample | null) {
    latestSample = sample
    for (const listener of subscribers) listener(sample)
  }

  function sampleNow(): TelemetrySample {
    const state = fresh(latestState)
    const scan = fresh(latestScan)
    const goal = options.getGoal()
    const { cpuPercent, ramPercent } = hostStats.sample()

    seq += 1
    const sample: TelemetrySample = {
      timestampUnixMs: now(),
      seq: String(seq),
      speedMps: state ? speedOf(state) : null,
      obstacleDistanceM: scan ? nearestRange(scan) : null,
      goalDistanceM: state && goal ? planarDistance(state.pose, goal.pose) : null,
      cpuPercent,
      ramPercent,
    }

    logger.debug(
      `seq=${sample.seq} speed=${formatMetric(sample.speedMps, 3)} obstacle=${formatMetric(sample.obstacleDistanceM, 3)} goal=${formatMetric(sample.goalDistanceM, 3)} cpu=${formatMetric(sample.cpuPercent, 1)} ram=${formatMetric(sample.ramPercent, 1)}`,
    )
    publish(sample)
    return sample
  }

  function start() {
    if (sampleTimer) return
    unsubscribeInputs = [
      options.navClient.subscribeRobotState((state) => {
        latestState = state ? { value: state, receivedAt: now() } : null
      }),
      options.navClient.subscribeScan((scan) => {
        latestScan = scan ? { value: scan, receivedAt: now() } : null
      }),
    ]
    sampleTimer = setInterval(sampleNow, options.periodMs)
  }

  function stop() {
    if (sampleTimer) clearInterval(sampleTimer)
    sampleTimer = null
    for (const unsubscribe of unsubscribeInputs) unsubscribe()
    unsubscribeInputs = []
    latestState = null
    latestScan = null
    publish(null)
  }

  return {
    start,
    stop,
    sampleNow,
    getSnapshot: () => latestSample,
    subscribe(listener) {
      subscribers.add(listener)
      if (latestSample) listener(latestSample)
      return () => {
        subscribers.delete(listener)
      }
    },
  }
}
