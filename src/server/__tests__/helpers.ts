import { vi } from 'vitest'

import type { OccupancyGrid } from '../../lib/occupancyMap'
import { createPose } from '../../lib/pose'
import type { Logger } from '../logger'
import type { RetryLogger } from '../retryLogger'

export function createFakeLogger() {
  return {
    debug: vi.fn<[string], void>(),
    info: vi.fn<[string], void>(),
    warn: vi.fn<[string, unknown?], void>(),
    error: vi.fn<[string, unknown?], void>(),
  } satisfies Logger
}

export function createFakeRetryLogger() {
  return {
    logFailure: vi.fn<[string, unknown?], void>(),
    markSuccess: vi.fn<[], void>(),
  } satisfies RetryLogger
}

/** Sequence of values for an injected random source; repeats the last one. */
export function sequenceRandom(values: number[]): () => number {
  let index = 0
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0
    index += 1
    return value
  }
}

export function createGrid(options: {
  width: number
  height: number
  resolution?: number
  originX?: number
  originY?: number
  originYaw?: number
  fill?: number
}): OccupancyGrid {
  const { width, height } = options
  const data = new Int8Array(width * height)
  data.fill(options.fill ?? 0)
  return {
    timestampUnixMs: 0,
    frameId: 'map',
    resolutionMPerPx: options.resolution ?? 1,
    width,
    height,
    origin: createPose('map', options.originX ?? 0, options.originY ?? 0, 0, 0, 0, options.originYaw ?? 0),
    data,
  }
}
