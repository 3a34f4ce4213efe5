export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogRecord = {
  timestampUnixMs: number
  level: LogLevel
  prefix: string
  message: string
}

export type LogSink = (record: LogRecord) => void

export type Logger = {
  debug: (line: string) => void
  info: (line: string) => void
  warn: (line: string, err?: unknown) => void
  error: (line: string, err?: unknown) => void
}

export type LoggerOptions = {
  /** Debug lines are dropped unless set (usually from a DEBUG_* flag). */
  debug?: boolean
  /** Set false to keep lines out of the registered sinks. */
  forward?: boolean
  now?: () => number
}

const sinks = new Set<LogSink>()

export function addLogSink(sink: LogSink): () => void {
  sinks.add(sink)
  return () => sinks.delete(sink)
}

function errorSuffix(err: unknown): string {
  if (err === undefined || err === null) return ''
  return ` ${err instanceof Error ? err.message : String(err)}`
}

export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const now = options.now ?? Date.now

  function emit(level: LogLevel, message: string) {
    const stream = level === 'warn' || level === 'error' ? process.stderr : process.stdout
    stream.write(`${prefix} ${message}\n`)

    if (options.forward === false || !sinks.size) return
    const record: LogRecord = { timestampUnixMs: now(), level, prefix, message }
    for (const sink of sinks) sink(record)
  }

  return {
    debug(line) {
      if (!options.debug) return
      emit('debug', line)
    },
    info(line) {
      emit('info', line)
    },
    warn(line, err) {
      emit('warn', `${line}${errorSuffix(err)}`)
    },
    error(line, err) {
      emit('error', `${line}${errorSuffix(err)}`)
    },
  }
}
