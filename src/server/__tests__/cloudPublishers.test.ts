import type { InputLogEvent } from '@aws-sdk/client-cloudwatch-logs'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { LogsSink } from '../cloudLogs'
import type { MetricsSink } from '../cloudMetrics'
import { type CloudPublishers, startCloudPublishers } from '../cloudPublishers'
import type { AppConfig } from '../config'
import { createLogger } from '../logger'

const cloud: AppConfig['cloud'] = {
  enabled: true,
  metricsNamespace: 'robot_monitoring',
  logGroup: 'robot_application',
  logStream: 'robot-1',
  metricsFlushMs: 10_000,
  logsFlushMs: 5000,
  debug: false,
}

function createFakeLogsSink() {
  const batches: InputLogEvent[][] = []
  const sink = {
    ensureStream: vi.fn(async (_group: string, _stream: string) => undefined),
    putLogEvents: vi.fn(async (_group: string, _stream: string, events: InputLogEvent[]) => {
      batches.push(events)
    }),
  } satisfies LogsSink
  return { sink, batches }
}

describe('startCloudPublishers', () => {
  let publishers: CloudPublishers | null

  beforeEach(() => {
    publishers = null
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(async () => {
    await publishers?.stop()
    vi.restoreAllMocks()
  })

  it('ships metrics publisher warnings to the log stream', async () => {
    const logs = createFakeLogsSink()
    const metricsSink = {
      putMetricData: vi.fn(async (_namespace: string) => {
        throw new Error('denied')
      }),
    } satisfies MetricsSink
    const started = startCloudPublishers({ robotId: 'robot-1', cloud, logsSink: logs.sink, metricsSink })
    publishers = started

    started.metrics.enqueue({
      timestampUnixMs: 1000,
      seq: '1',
      speedMps: 0.5,
      obstacleDistanceM: null,
      goalDistanceM: null,
      cpuPercent: null,
      ramPercent: null,
    })
    await started.metrics.flush()
    await started.logs.flush()

    expect(logs.batches.flat().map((event) => event.message)).toEqual([
      'WARN [metrics] put metric data: denied hidden=0 over=0s',
    ])
  })

  it('keeps the log publisher failures out of its own queue', async () => {
    const logs = createFakeLogsSink()
    logs.sink.ensureStream.mockRejectedValueOnce(new Error('denied'))
    const started = startCloudPublishers({
      robotId: 'robot-1',
      cloud,
      logsSink: logs.sink,
      metricsSink: { putMetricData: async () => undefined },
    })
    publishers = started

    createLogger('[route]').info('Goal done')
    await started.logs.flush()

    expect(started.logs.pending()).toBe(1)
    expect(process.stderr.write).toHaveBeenCalledWith(
      '[cloud-logs] create log stream: denied hidden=0 over=0s\n',
    )
  })
})
