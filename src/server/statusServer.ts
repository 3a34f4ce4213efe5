import http from 'node:http'

import type { RouteState } from '../lib/route'

import { createLogger, type Logger } from './logger'
import { SSE_PING, sseEvent, sseRetry } from './sse'
import type { TelemetryHub } from './telemetryHub'

export type StatusRequest = {
  method?: string
  url?: string
  once(event: 'close', listener: () => void): unknown
}

export type StatusResponse = {
  writeHead(statusCode: number, headers: Record<string, string>): unknown
  write(chunk: string): unknown
  end(body?: string): unknown
}

export type StatusHandlerOptions = {
  telemetry: Pick<TelemetryHub, 'getSnapshot' | 'subscribe'>
  getRouteState: () => RouteState | null
  sseRetryMs: number
  keepAliveMs?: number
}

const JSON_HEADERS = {
  'Content-Type': 'application/json; charset=utf-8',
  'Cache-Control': 'no-store',
}

function sendJson(res: StatusResponse, statusCode: number, body: unknown) {
  res.writeHead(statusCode, JSON_HEADERS)
  res.end(JSON.stringify(body))
}

function openTelemetryStream(req: StatusRequest, res: StatusResponse, options: StatusHandlerOptions) {
  res.writeHead(200, {
    'Content-Type': 'text/event-stream; charset=utf-8',
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  })
  res.write(sseRetry(options.sseRetryMs))

  const unsubscribe = options.telemetry.subscribe((sample) => {
    res.write(sample ? sseEvent('sample', sample) : sseEvent('clear'))
  })

  const keepAliveTimer = setInterval(() => {
    res.write(SSE_PING)
  }, options.keepAliveMs ?? 15_000)

  req.once('close', () => {
    clearInterval(keepAliveTimer)
    unsubscribe()
  })
}

export function createStatusHandler(options: StatusHandlerOptions) {
  return (req: StatusRequest, res: StatusResponse) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname

    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'method not allowed' })
      return
    }

    switch (pathname) {
      case '/api/telemetry':
        sendJson(res, 200, { telemetry: options.telemetry.getSnapshot() })
        return
      case '/api/telemetry/stream':
        openTelemetryStream(req, res, options)
        return
      case '/api/route':
        sendJson(res, 200, { route: options.getRouteState() })
        return
      default:
        sendJson(res, 404, { error: 'not found' })
    }
  }
}

export function startStatusServer(
  options: StatusHandlerOptions & { host: string; port: number; logger?: Logger },
): Promise<http.Server> {
  const logger = options.logger ?? createLogger('[status]')
  const handler = createStatusHandler(options)
  const server = http.createServer((req, res) => handler(req, res))

  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(options.port, options.host, () => {
      server.off('error', reject)
      server.on('error', (err) => logger.error('server error', err))
      logger.info(`listening on http://${options.host}:${options.port}`)
      resolve(server)
    })
  })
}
