import { describe, expect, it } from 'vitest'

import { createRetryLogger, formatError } from '../retryLogger'

import { createFakeLogger } from './helpers'

describe('formatError', () => {
  it('names the gRPC status and drops resolver noise from the details', () => {
    const err = Object.assign(
      new Error('14 UNAVAILABLE: No connection established. Last error: Error: connect ECONNREFUSED'),
      {
        code: 14,
        details: 'No connection established. Last error: Error: connect ECONNREFUSED 127.0.0.1:50061',
      },
    )

    expect(formatError(err)).toBe('UNAVAILABLE: No connection established.')
  })

  it('keeps the name of SDK exceptions', () => {
    const err = new Error('Rate exceeded\n  for PutMetricData')
    err.name = 'ThrottlingException'

    expect(formatError(err)).toBe('ThrottlingException: Rate exceeded for PutMetricData')
  })

  it('caps long messages', () => {
    const formatted = formatError(new Error('x'.repeat(200)))

    expect(formatted).toBe(`${'x'.repeat(117)}...`)
  })

  it('handles non-errors', () => {
    expect(formatError(null)).toBe('unknown error')
    expect(formatError('plain')).toBe('plain')
  })
})

describe('createRetryLogger', () => {
  it('logs the first failure and then one line per window', () => {
    let t = 0
    const logger = createFakeLogger()
    const retry = createRetryLogger('[x]', { logger, now: () => t })
    const boom = new Error('boom')

    retry.logFailure('ctx', boom)
    t = 30_000
    retry.logFailure('ctx', boom)
    t = 61_000
    retry.logFailure('ctx', boom)
    t = 360_000
    retry.logFailure('ctx', boom)
    t = 361_000
    retry.logFailure('ctx', boom)

    expect(logger.warn.mock.calls).toEqual([
      ['ctx: boom hidden=0 over=0s'],
      ['ctx: boom hidden=1 over=61s'],
      ['ctx: boom hidden=1 over=300s'],
    ])
  })

  it('starts over after a success', () => {
    let t = 0
    const logger = createFakeLogger()
    const retry = createRetryLogger('[x]', { logger, now: () => t })

    retry.logFailure('down', new Error('boom'))
    retry.markSuccess()
    t = 1000
    retry.logFailure('down', new Error('again'))

    expect(logger.warn).toHaveBeenLastCalledWith('down: again hidden=0 over=0s')
    expect(logger.warn).toHaveBeenCalledTimes(2)
  })
})
