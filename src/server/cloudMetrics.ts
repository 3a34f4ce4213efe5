import {
  CloudWatchClient,
  type MetricDatum,
  PutMetricDataCommand,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch'

import type { TelemetryMetricKey, TelemetrySample } from '../lib/telemetry'

import { createLogger, type Logger } from './logger'
import { createRetryLogger, type RetryLogger } from './retryLogger'

export const MAX_DATUMS_PER_REQUEST = 1000
const DEFAULT_MAX_BUFFERED = 20_000

export type MetricsSink = {
  putMetricData: (namespace: string, data: MetricDatum[]) => Promise<void>
}

const METRICS: { key: TelemetryMetricKey; name: string; unit: StandardUnit }[] = [
  { key: 'speedMps', name: 'speed', unit: StandardUnit.None },
  { key: 'obstacleDistanceM', name: 'distance_to_obstacle', unit: StandardUnit.None },
  { key: 'goalDistanceM', name: 'distance_to_goal', unit: StandardUnit.None },
  { key: 'cpuPercent', name: 'cpu', unit: StandardUnit.Percent },
  { key: 'ramPercent', name: 'memory', unit: StandardUnit.Percent },
]

export function createCloudWatchMetricsSink(client = new CloudWatchClient({})): MetricsSink {
  return {
    async putMetricData(namespace, data) {
      await client.send(new PutMetricDataCommand({ Namespace: namespace, MetricData: data }))
    },
  }
}

/** Unknown metrics (null) are left out rather than reported as zero. */
export function sampleToMetricData(sample: TelemetrySample, robotId: string): MetricDatum[] {
  const timestamp = new Date(sample.timestampUnixMs)
  const data: MetricDatum[] = []
  for (const metric of METRICS) {
    const value = sample[metric.key]
    if (value == null || !Number.isFinite(value)) continue
    data.push({
      MetricName: metric.name,
      Dimensions: [{ Name: 'RobotId', Value: robotId }],
      Timestamp: timestamp,
      Unit: metric.unit,
      Value: value,
    })
  }
  return data
}

export type MetricsPublisherOptions = {
  sink: MetricsSink
  namespace: string
  robotId: string
  flushIntervalMs: number
  maxBuffered?: number
  logger?: Logger
  retryLog?: RetryLogger
}

export type MetricsPublisher = {
  enqueue: (sample: TelemetrySample | null) => void
  flush: () => Promise<void>
  pending: () => number
  start: () => void
  /** Stops the timer and makes a last flush attempt. */
  stop: () => Promise<void>
}

export function createMetricsPublisher(options: MetricsPublisherOptions): MetricsPublisher {
  const maxBuffered = options.maxBuffered ?? DEFAULT_MAX_BUFFERED
  const logger = options.logger ?? createLogger('[metrics]')
  const retryLog = options.retryLog ?? createRetryLogger('[metrics]', { logger })

  let buffer: MetricDatum[] = []
  let flushing: Promise<void> | null = null
  let flushTimer: NodeJS.Timeout | null = null

  function trim() {
    const overflow = buffer.length - maxBuffered
    if (overflow <= 0) return
    buffer.splice(0, overflow)
    logger.warn(`buffer full, dropped ${overflow} oldest datums`)
  }

  async function drain() {
    while (buffer.length) {
      const batch = buffer.splice(0, MAX_DATUMS_PER_REQUEST)
      try {
        await options.sink.putMetricData(options.namespace, batch)
        retryLog.markSuccess()
        logger.debug(`put ${batch.length} datums`)
      } catch (err) {
        buffer = [...batch, ...buffer]
        trim()
        retryLog.logFailure('put metric data', err)
        return
      }
    }
  }

  function flush(): Promise<void> {
    if (!flushing) {
      flushing = drain().finally(() => {
        flushing = null
      })
    }
    return flushing
  }

  return {
    enqueue(sample) {
      if (!sample) return
      buffer.push(...sampleToMetricData(sample, options.robotId))
      trim()
      if (buffer.length >= MAX_DATUMS_PER_REQUEST) void flush()
    },
    flush,
    pending: () => buffer.length,
    start() {
      if (flushTimer) return
      flushTimer = setInterval(() => void flush(), options.flushIntervalMs)
    },
    async stop() {
      if (flushTimer) clearInterval(flushTimer)
      flushTimer = null
      await flush()
    },
  }
}
