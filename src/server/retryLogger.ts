import * as grpc from '@grpc/grpc-js'

import { createLogger, type Logger } from './logger'

const ONE_MIN_MS = 60_000
const FIVE_MIN_MS = 300_000
const MAX_LEN = 120

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

function isGrpcStatusError(err: Error): err is Error & { code: number; details: string } {
  return 'code' in err && typeof err.code === 'number' && 'details' in err && typeof err.details === 'string'
}

function describeError(err: unknown): string {
  if (!(err instanceof Error)) return oneLine(String(err))

  if (isGrpcStatusError(err)) {
    const status = grpc.status[err.code] ?? String(err.code)
    // Drop the resolver's retry noise that grpc-js appends to UNAVAILABLE details.
    const details = oneLine(err.details.replace(/\s*Last error:.*$/s, ''))
    return details ? `${status}: ${details}` : status
  }

  if (err.name && err.name !== 'Error') return `${err.name}: ${oneLine(err.message)}`
  return oneLine(err.message)
}

/**
 * Short single-line form of a failure: gRPC errors as `STATUS: details`,
 * named SDK exceptions as `Name: message`.
 */
export function formatError(err: unknown): string {
  if (err == null) return 'unknown error'

  const text = describeError(err)
  if (text.length <= MAX_LEN) return text
  return `${text.slice(0, MAX_LEN - 3)}...`
}

export type RetryLogger = {
  logFailure: (context: string, err?: unknown) => void
  markSuccess: () => void
}

export function createRetryLogger(
  prefix: string,
  options: { logger?: Logger; now?: () => number } = {},
): RetryLogger {
  const logger = options.logger ?? createLogger(prefix)
  const now = options.now ?? Date.now

  let lastLoggedAt: number | null = null
  let nextWindowMs = ONE_MIN_MS
  let suppressed = 0
  let windowStart = now()

  function reset() {
    lastLoggedAt = null
    nextWindowMs = ONE_MIN_MS
    suppressed = 0
    windowStart = now()
  }

  function logFailure(context: string, err?: unknown) {
    const at = now()

    // first failure: log immediately
    if (lastLoggedAt === null) {
      logger.warn(`${context}: ${formatError(err)} hidden=0 over=0s`)
      lastLoggedAt = at
      nextWindowMs = ONE_MIN_MS
      suppressed = 0
      windowStart = at
      return
    }

    const withinWindow = at - lastLoggedAt < nextWindowMs
    if (withinWindow) {
      suppressed += 1
      return
    }

    const hidden = suppressed
    const overMs = at - windowStart
    logger.warn(
      `${context}: ${formatError(err)} hidden=${hidden} over=${Math.round(overMs / 1000)}s`,
    )

    suppressed = 0
    windowStart = at
    lastLoggedAt = at
    nextWindowMs = FIVE_MIN_MS
  }

  function markSuccess() {
    reset()
  }

  return { logFailure, markSuccess }
}
