import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { RouteState } from '../../lib/route'
import type { TelemetrySample } from '../../lib/telemetry'
import { sseEvent, sseRetry } from '../sse'
import { createStatusHandler, type StatusRequest, type StatusResponse } from '../statusServer'
import type { TelemetryListener } from '../telemetryHub'

const sample: TelemetrySample = {
  timestampUnixMs: 1000,
  seq: '1',
  speedMps: 0.5,
  obstacleDistanceM: null,
  goalDistanceM: 5,
  cpuPercent: 20,
  ramPercent: 75,
}

const routeState: RouteState = {
  mode: 'inorder',
  badGoals: 0,
  goalsSent: 2,
  goalsReached: 1,
  currentGoal: null,
  stopReason: null,
}

class FakeResponse implements StatusResponse {
  statusCode: number | null = null
  headers: Record<string, string> = {}
  chunks: string[] = []
  ended = false

  writeHead(statusCode: number, headers: Record<string, string>) {
    this.statusCode = statusCode
    this.headers = headers
  }

  write(chunk: string) {
    this.chunks.push(chunk)
  }

  end(body?: string) {
    if (body !== undefined) this.chunks.push(body)
    this.ended = true
  }
}

function makeRequest(method: string, url: string) {
  const closeListeners: Array<() => void> = []
  const req: StatusRequest = {
    method,
    url,
    once(_event, listener) {
      closeListeners.push(listener)
    },
  }
  return { req, close: () => closeListeners.forEach((listener) => listener()) }
}

describe('sse helpers', () => {
  it('frames events and multi-line data', () => {
    expect(sseEvent('clear')).toBe('event: clear\n\n')
    expect(sseEvent('note', 'a\nb')).toBe('event: note\ndata: a\ndata: b\n\n')
    expect(sseEvent('sample', { seq: '1' })).toBe('event: sample\ndata: {"seq":"1"}\n\n')
    expect(sseRetry(2000)).toBe('retry: 2000\n\n')
  })
})

describe('createStatusHandler', () => {
  let listeners: Set<TelemetryListener>
  let snapshot: TelemetrySample | null
  let handler: ReturnType<typeof createStatusHandler>

  beforeEach(() => {
    vi.useFakeTimers()
    listeners = new Set()
    snapshot = sample
    handler = createStatusHandler({
      telemetry: {
        getSnapshot: () => snapshot,
        subscribe(listener) {
          listeners.add(listener)
          return () => {
            listeners.delete(listener)
          }
        },
      },
      getRouteState: () => routeState,
      sseRetryMs: 2000,
    })
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('serves the latest telemetry sample', () => {
    const res = new FakeResponse()
    handler(makeRequest('GET', '/api/telemetry').req, res)

    expect(res.statusCode).toBe(200)
    expect(res.headers).toEqual({
      'Content-Type': 'application/json; charset=utf-8',
      'Cache-Control': 'no-store',
    })
    expect(JSON.parse(res.chunks.join(''))).toEqual({ telemetry: sample })
  })

  it('serves null before the first sample', () => {
    snapshot = null
    const res = new FakeResponse()
    handler(makeRequest('GET', '/api/telemetry?x=1').req, res)

    expect(res.chunks).toEqual(['{"telemetry":null}'])
  })

  it('serves the route state', () => {
    const res = new FakeResponse()
    handler(makeRequest('GET', '/api/route').req, res)

    expect(JSON.parse(res.chunks.join(''))).toEqual({ route: routeState })
  })

  it('rejects other methods and unknown paths', () => {
    const post = new FakeResponse()
    handler(makeRequest('POST', '/api/telemetry').req, post)
    const missing = new FakeResponse()
    handler(makeRequest('GET', '/nope').req, missing)

    expect(post.statusCode).toBe(405)
    expect(post.chunks).toEqual(['{"error":"method not allowed"}'])
    expect(missing.statusCode).toBe(404)
    expect(missing.chunks).toEqual(['{"error":"not found"}'])
  })

  it('streams samples, clears, and pings until the client leaves', () => {
    const res = new FakeResponse()
    const { req, close } = makeRequest('GET', '/api/telemetry/stream')
    handler(req, res)

    expect(res.statusCode).toBe(200)
    expect(res.headers['Content-Type']).toBe('text/event-stream; charset=utf-8')
    expect(res.chunks).toEqual(['retry: 2000\n\n'])
    expect(listeners.size).toBe(1)

    for (const listener of listeners) listener(sample)
    for (const listener of listeners) listener(null)
    vi.advanceTimersByTime(15_000)

    expect(res.chunks.slice(1)).toEqual([
      `event: sample\ndata: ${JSON.stringify(sample)}\n\n`,
      'event: clear\n\n',
      ': ping\n\n',
    ])

    close()
    vi.advanceTimersByTime(15_000)

    expect(listeners.size).toBe(0)
    expect(res.chunks).toHaveLength(4)
    expect(res.ended).toBe(false)
  })
})
