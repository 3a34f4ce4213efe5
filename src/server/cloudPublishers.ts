import {
  createCloudWatchLogsSink,
  createLogPublisher,
  type LogPublisher,
  type LogsSink,
} from './cloudLogs'
import {
  createCloudWatchMetricsSink,
  createMetricsPublisher,
  type MetricsPublisher,
  type MetricsSink,
} from './cloudMetrics'
import type { AppConfig } from './config'
import { addLogSink, createLogger } from './logger'

export type CloudPublishers = {
  logs: LogPublisher
  metrics: MetricsPublisher
  /** Detaches the log sink and makes a last flush of both publishers. */
  stop: () => Promise<void>
}

export type CloudPublishersOptions = Pick<AppConfig, 'robotId' | 'cloud'> & {
  logsSink?: LogsSink
  metricsSink?: MetricsSink
}

/**
 * Starts both CloudWatch publishers and routes every forwarded log line into
 * the log publisher. Metrics warnings are forwarded like any other line; the
 * log publisher's own are kept out of it.
 */
export function startCloudPublishers(options: CloudPublishersOptions): CloudPublishers {
  const { cloud, robotId } = options

  const logs = createLogPublisher({
    sink: options.logsSink ?? createCloudWatchLogsSink(),
    logGroup: cloud.logGroup,
    logStream: cloud.logStream,
    flushIntervalMs: cloud.logsFlushMs,
    logger: createLogger('[cloud-logs]', { debug: cloud.debug, forward: false }),
  })
  const detachLogSink = addLogSink(logs.handle)
  logs.start()

  const metrics = createMetricsPublisher({
    sink: options.metricsSink ?? createCloudWatchMetricsSink(),
    namespace: cloud.metricsNamespace,
    robotId,
    flushIntervalMs: cloud.metricsFlushMs,
    logger: createLogger('[metrics]', { debug: cloud.debug }),
  })
  metrics.start()

  return {
    logs,
    metrics,
    async stop() {
      await metrics.stop()
      detachLogSink()
      await logs.stop()
    },
  }
}
