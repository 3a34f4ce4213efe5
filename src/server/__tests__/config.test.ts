import { describe, expect, it } from 'vitest'

import { loadAppConfig } from '../config'
import { isEnvTrue, numberFromEnv, stringFromEnv } from '../env'

describe('env helpers', () => {
  it('accepts 1 and true as flags', () => {
    expect(isEnvTrue('FLAG', { FLAG: ' TRUE ' })).toBe(true)
    expect(isEnvTrue('FLAG', { FLAG: '1' })).toBe(true)
    expect(isEnvTrue('FLAG', { FLAG: 'yes' })).toBe(false)
    expect(isEnvTrue('FLAG', {})).toBe(false)
  })

  it('reads the first non-empty number and falls back on junk', () => {
    expect(numberFromEnv({ A: '', B: '7' }, ['A', 'B'], 1)).toBe(7)
    expect(numberFromEnv({ A: '0' }, ['A'], 3)).toBe(3)
    expect(numberFromEnv({ A: 'abc' }, ['A'], 3)).toBe(3)
    expect(numberFromEnv({}, ['A'], 3)).toBe(3)
  })

  it('skips blank strings', () => {
    expect(stringFromEnv({ A: '  ', B: ' b ' }, ['A', 'B'], 'x')).toBe('b')
    expect(stringFromEnv({}, ['A'], 'x')).toBe('x')
  })
})

describe('loadAppConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadAppConfig({ ROBOT_ID: 'robot-1' })).toEqual({
      robotId: 'robot-1',
      navBridge: {
        grpcAddr: '127.0.0.1:50061',
        reconnectMs: 2000,
        staleMs: 7000,
        deadlineMs: 5000,
        serverTimeoutMs: 30_000,
        debug: false,
      },
      route: { planTimeoutMs: 5000, maxBadGoals: 10, rateHz: 1, debug: false },
      telemetry: { periodMs: 1000, staleMs: 7000, debug: false },
      cloud: {
        enabled: false,
        metricsNamespace: 'robot_monitoring',
        logGroup: 'robot_application',
        logStream: 'robot-1',
        metricsFlushMs: 10_000,
        logsFlushMs: 5000,
        debug: false,
      },
      status: { enabled: true, host: '127.0.0.1', port: 8080, sseRetryMs: 2000 },
    })
  })

  it('applies overrides and shared fallbacks', () => {
    const config = loadAppConfig({
      ROBOT_ID: 'robot-2',
      NAV_BRIDGE_GRPC_RECONNECT_MS: '500',
      BRIDGE_STALE_MS: '3000',
      ROUTE_RATE_HZ: 'abc',
      CLOUDWATCH_ENABLED: 'true',
      CLOUDWATCH_LOG_STREAM: 'custom',
      STATUS_HTTP_DISABLED: '1',
    })

    expect(config.status.sseRetryMs).toBe(500)
    expect(config.telemetry.staleMs).toBe(3000)
    expect(config.navBridge.staleMs).toBe(3000)
    expect(config.route.rateHz).toBe(1)
    expect(config.cloud.enabled).toBe(true)
    expect(config.cloud.logStream).toBe('custom')
    expect(config.status.enabled).toBe(false)
  })
})
