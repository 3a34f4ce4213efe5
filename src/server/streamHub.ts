import { createLogger, type Logger } from './logger'
import { createRetryLogger, type RetryLogger } from './retryLogger'

/** The part of a server-streaming gRPC call a hub touches. */
export type StreamCall = {
  on(event: 'data', listener: (raw: unknown) => void): unknown
  on(event: 'error', listener: (err: Error) => void): unknown
  on(event: 'end', listener: () => void): unknown
  removeAllListeners(): unknown
  cancel(): void
}

export type StreamHubListener<T> = (value: T | null) => void

export type StreamHub<T> = {
  getSnapshot: () => T | null
  subscribe: (listener: StreamHubListener<T>) => () => void
  stop: () => void
}

export type StreamHubOptions<T> = {
  name: string
  open: () => StreamCall
  normalize: (raw: unknown) => T | null
  reconnectMs: number
  /** Latest value is cleared when nothing arrives for this long. */
  staleMs: number
  describe?: (value: T) => string
  logger?: Logger
  retryLog?: RetryLogger
}

export function getReconnectDelayMs(attempt: number, baseMs: number): number {
  if (attempt <= 5) return baseMs
  if (attempt <= 10) return 60_000
  return 300_000
}

/**
 * Keeps one server stream open while anybody listens, fans its messages out,
 * and reconnects with back-off when it drops.
 */
export function createStreamHub<T>(options: StreamHubOptions<T>): StreamHub<T> {
  const logger = options.logger ?? createLogger(`[${options.name}]`)
  const retryLog = options.retryLog ?? createRetryLogger(`[${options.name}]`)

  let started = false
  let latest: T | null = null
  let staleTimer: NodeJS.Timeout | null = null
  const subscribers = new Set<StreamHubListener<T>>()

  let reconnectTimer: NodeJS.Timeout | null = null
  let activeCall: StreamCall | null = null

  let reconnectAttempt = 0
  let gotDataSinceConnect = false

  function ensureStarted() {
    if (started) return
    started = true
    startLoop()
  }

  function publish(value: T | null) {
    latest = value
    for (const listener of subscribers) listener(value)
  }

  function clearAsStale() {
    staleTimer = null
    if (latest === null) return
    publish(null)
  }

  function scheduleStaleClear() {
    if (staleTimer) clearTimeout(staleTimer)
    staleTimer = setTimeout(clearAsStale, options.staleMs)
  }

  function scheduleReconnect() {
    if (reconnectTimer || !started) return

    const nextAttempt = reconnectAttempt + 1
    const delayMs = getReconnectDelayMs(nextAttempt, options.reconnectMs)
    reconnectAttempt = nextAttempt

    logger.debug(`reconn ${delayMs}ms #${reconnectAttempt}`)
    reconnectTimer = setTimeout(() => {
      reconnectTimer = null
      startLoop()
    }, delayMs)
  }

  function dropCall() {
    const call = activeCall
    activeCall = null
    if (!call) return
    call.removeAllListeners()
    // cancel() surfaces as a CANCELLED error event; nobody is listening anymore.
    call.on('error', () => undefined)
    call.cancel()
  }

  function startLoop() {
    if (activeCall) return
    if (reconnectTimer) {
      clearTimeout(reconnectTimer)
      reconnectTimer = null
    }

    try {
      const call = options.open()
      activeCall = call
      gotDataSinceConnect = false

      call.on('data', (raw: unknown) => {
        if (!gotDataSinceConnect) {
          gotDataSinceConnect = true
          reconnectAttempt = 0
          retryLog.markSuccess()
        }
        const normalized = options.normalize(raw)
        if (!normalized) return

        if (options.describe) logger.debug(options.describe(normalized))
        publish(normalized)
        scheduleStaleClear()
      })

      const onDisconnect = (err?: unknown) => {
        if (err) retryLog.logFailure('down', err)
        else logger.debug('end')

        dropCall()
        // Clear on disconnect for staleness policy
        clearAsStale()
        scheduleReconnect()
      }

      call.on('error', (err: Error) => onDisconnect(err))
      call.on('end', () => onDisconnect())
    } catch (err) {
      retryLog.logFailure('start fail', err)
      dropCall()
      scheduleReconnect()
    }
  }

  return {
    getSnapshot() {
      ensureStarted()
      return latest
    },
    subscribe(listener) {
      ensureStarted()
      subscribers.add(listener)
      if (latest) listener(latest)
      return () => {
        subscribers.delete(listener)
      }
    },
    stop() {
      started = false
      if (reconnectTimer) clearTimeout(reconnectTimer)
      reconnectTimer = null
      if (staleTimer) clearTimeout(staleTimer)
      staleTimer = null
      dropCall()
      latest = null
    },
  }
}
