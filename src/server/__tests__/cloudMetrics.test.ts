import type { MetricDatum } from '@aws-sdk/client-cloudwatch'
import { describe, expect, it, vi } from 'vitest'

import type { TelemetrySample } from '../../lib/telemetry'
import { createMetricsPublisher, type MetricsSink, sampleToMetricData } from '../cloudMetrics'

import { createFakeLogger, createFakeRetryLogger } from './helpers'

function makeSample(overrides: Partial<TelemetrySample> = {}): TelemetrySample {
  return {
    timestampUnixMs: 1_700_000_000_000,
    seq: '1',
    speedMps: 0.5,
    obstacleDistanceM: 1.25,
    goalDistanceM: 5,
    cpuPercent: 20,
    ramPercent: 75,
    ...overrides,
  }
}

function createFakeSink() {
  const batches: MetricDatum[][] = []
  const sink = {
    putMetricData: vi.fn(async (_namespace: string, data: MetricDatum[]) => {
      batches.push(data)
    }),
  } satisfies MetricsSink
  return { sink, batches }
}

describe('sampleToMetricData', () => {
  it('maps known metrics with units and the robot dimension', () => {
    const data = sampleToMetricData(makeSample({ obstacleDistanceM: null }), 'robot-1')

    expect(data.map((d) => [d.MetricName, d.Unit, d.Value])).toEqual([
      ['speed', 'None', 0.5],
      ['distance_to_goal', 'None', 5],
      ['cpu', 'Percent', 20],
      ['memory', 'Percent', 75],
    ])
    expect(data[0]).toEqual({
      MetricName: 'speed',
      Dimensions: [{ Name: 'RobotId', Value: 'robot-1' }],
      Timestamp: new Date(1_700_000_000_000),
      Unit: 'None',
      Value: 0.5,
    })
  })
})

describe('createMetricsPublisher', () => {
  function makePublisher(sink: MetricsSink, maxBuffered?: number) {
    const logger = createFakeLogger()
    const retryLog = createFakeRetryLogger()
    const publisher = createMetricsPublisher({
      sink,
      namespace: 'robot_monitoring',
      robotId: 'robot-1',
      flushIntervalMs: 10_000,
      maxBuffered,
      logger,
      retryLog,
    })
    return { publisher, logger, retryLog }
  }

  it('ignores cleared samples', () => {
    const { sink } = createFakeSink()
    const { publisher } = makePublisher(sink)

    publisher.enqueue(null)

    expect(publisher.pending()).toBe(0)
  })

  it('flushes in requests of at most 1000 datums', async () => {
    const { sink, batches } = createFakeSink()
    const { publisher } = makePublisher(sink)

    for (let i = 0; i < 300; i++) publisher.enqueue(makeSample({ seq: String(i) }))
    await publisher.flush()

    expect(batches.map((batch) => batch.length)).toEqual([1000, 500])
    expect(sink.putMetricData).toHaveBeenCalledWith('robot_monitoring', batches[0])
    expect(publisher.pending()).toBe(0)
  })

  it('keeps a failed batch for the next flush', async () => {
    const { sink, batches } = createFakeSink()
    const err = new Error('throttled')
    sink.putMetricData.mockRejectedValueOnce(err)
    const { publisher, retryLog } = makePublisher(sink)

    publisher.enqueue(makeSample())
    await publisher.flush()

    expect(retryLog.logFailure).toHaveBeenCalledWith('put metric data', err)
    expect(publisher.pending()).toBe(5)

    await publisher.flush()

    expect(batches).toHaveLength(1)
    expect(batches[0]).toHaveLength(5)
    expect(retryLog.markSuccess).toHaveBeenCalledTimes(1)
    expect(publisher.pending()).toBe(0)
  })

  it('drops the oldest datums once the buffer is full', () => {
    const { sink } = createFakeSink()
    const { publisher, logger } = makePublisher(sink, 7)

    publisher.enqueue(makeSample())
    publisher.enqueue(makeSample())

    expect(publisher.pending()).toBe(7)
    expect(logger.warn).toHaveBeenCalledWith('buffer full, dropped 3 oldest datums')
  })

  it('flushes what is left when stopped', async () => {
    const { sink, batches } = createFakeSink()
    const { publisher } = makePublisher(sink)

    publisher.start()
    publisher.enqueue(makeSample())
    await publisher.stop()

    expect(batches).toHaveLength(1)
  })
})
