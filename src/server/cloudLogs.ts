import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  type InputLogEvent,
  PutLogEventsCommand,
  ResourceAlreadyExistsException,
} from '@aws-sdk/client-cloudwatch-logs'

import { createLogger, type LogRecord, type Logger } from './logger'
import { createRetryLogger, type RetryLogger } from './retryLogger'

// PutLogEvents limits.
export const MAX_EVENTS_PER_BATCH = 10_000
export const MAX_BATCH_BYTES = 1_048_576
export const EVENT_OVERHEAD_BYTES = 26
export const MAX_EVENT_BYTES = 262_144

const DEFAULT_MAX_QUEUED = 50_000

export type LogsSink = {
  ensureStream: (logGroup: string, logStream: string) => Promise<void>
  putLogEvents: (logGroup: string, logStream: string, events: InputLogEvent[]) => Promise<void>
}

export type QueuedLogEvent = {
  timestamp: number
  message: string
}

async function createIgnoringExisting(send: () => Promise<unknown>) {
  try {
    await send()
  } catch (err) {
    if (err instanceof ResourceAlreadyExistsException) return
    throw err
  }
}

export function createCloudWatchLogsSink(client = new CloudWatchLogsClient({})): LogsSink {
  return {
    async ensureStream(logGroup, logStream) {
      await createIgnoringExisting(() =>
        client.send(new CreateLogGroupCommand({ logGroupName: logGroup })),
      )
      await createIgnoringExisting(() =>
        client.send(new CreateLogStreamCommand({ logGroupName: logGroup, logStreamName: logStream })),
      )
    },
    async putLogEvents(logGroup, logStream, events) {
      await client.send(
        new PutLogEventsCommand({ logGroupName: logGroup, logStreamName: logStream, logEvents: events }),
      )
    },
  }
}

export function eventBytes(message: string): number {
  return Buffer.byteLength(message, 'utf8') + EVENT_OVERHEAD_BYTES
}

export function truncateUtf8(message: string, maxBytes: number): string {
  if (Buffer.byteLength(message, 'utf8') <= maxBytes) return message
  // A cut multi-byte sequence decodes to one 3-byte replacement character.
  return Buffer.from(message, 'utf8').subarray(0, maxBytes - 3).toString('utf8')
}

export function formatLogRecord(record: LogRecord): string {
  return `${record.level.toUpperCase()} ${record.prefix} ${record.message}`
}

/** Removes the longest head of `queue` that fits in one request, ordered by time. */
export function takeBatch(queue: QueuedLogEvent[]): QueuedLogEvent[] {
  let count = 0
  let bytes = 0
  while (count < queue.length && count < MAX_EVENTS_PER_BATCH) {
    const event = queue[count]
    if (!event) break
    const size = eventBytes(event.message)
    if (bytes + size > MAX_BATCH_BYTES) break
    bytes += size
    count += 1
  }
  return queue.splice(0, count).sort((a, b) => a.timestamp - b.timestamp)
}

export type LogPublisherOptions = {
  sink: LogsSink
  logGroup: string
  logStream: string
  flushIntervalMs: number
  maxQueued?: number
  logger?: Logger
  retryLog?: RetryLogger
}

export type LogPublisher = {
  /** Register with addLogSink. */
  handle: (record: LogRecord) => void
  flush: () => Promise<void>
  pending: () => number
  start: () => void
  stop: () => Promise<void>
}

export function createLogPublisher(options: LogPublisherOptions): LogPublisher {
  const maxQueued = options.maxQueued ?? DEFAULT_MAX_QUEUED
  // Failures stay local; routing them back into the queue would feed on itself.
  const logger = options.logger ?? createLogger('[cloud-logs]', { forward: false })
  const retryLog = options.retryLog ?? createRetryLogger('[cloud-logs]', { logger })

  let queue: QueuedLogEvent[] = []
  let streamReady = false
  let flushing: Promise<void> | null = null
  let flushTimer: NodeJS.Timeout | null = null
  let dropped = 0

  function trim() {
    const overflow = queue.length - maxQueued
    if (overflow <= 0) return
    queue.splice(0, overflow)
    dropped += overflow
  }

  async function drain() {
    if (!queue.length) return
    try {
      if (!streamReady) {
        await options.sink.ensureStream(options.logGroup, options.logStream)
        streamReady = true
      }
    } catch (err) {
      retryLog.logFailure('create log stream', err)
      return
    }

    while (queue.length) {
      const batch = takeBatch(queue)
      if (!batch.length) return
      try {
        await options.sink.putLogEvents(options.logGroup, options.logStream, batch)
        retryLog.markSuccess()
      } catch (err) {
        queue = [...batch, ...queue]
        trim()
        retryLog.logFailure('put log events', err)
        return
      }
    }

    if (dropped) {
      logger.warn(`queue full, dropped ${dropped} records`)
      dropped = 0
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
    handle(record) {
      const message = truncateUtf8(formatLogRecord(record), MAX_EVENT_BYTES - EVENT_OVERHEAD_BYTES)
      queue.push({ timestamp: record.timestampUnixMs, message })
      trim()
    },
    flush,
    pending: () => queue.length,
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
