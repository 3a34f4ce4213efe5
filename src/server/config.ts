import os from 'node:os'

import { DEFAULT_MAX_BAD_GOALS, DEFAULT_PLAN_TIMEOUT_MS, DEFAULT_ROUTE_RATE_HZ } from '../lib/route'
import {
  DEFAULT_BRIDGE_STALE_MS,
  DEFAULT_GRPC_RECONNECT_MS,
  DEFAULT_LOG_GROUP,
  DEFAULT_METRICS_NAMESPACE,
  DEFAULT_NAV_BRIDGE_GRPC_ADDR,
  DEFAULT_TELEMETRY_PERIOD_MS,
} from '../lib/telemetry'

import { type Env, isEnvTrue, numberFromEnv, stringFromEnv } from './env'

export type AppConfig = {
  robotId: string
  navBridge: {
    grpcAddr: string
    reconnectMs: number
    staleMs: number
    deadlineMs: number
    serverTimeoutMs: number
    debug: boolean
  }
  route: {
    planTimeoutMs: number
    maxBadGoals: number
    rateHz: number
    debug: boolean
  }
  telemetry: {
    periodMs: number
    staleMs: number
    debug: boolean
  }
  cloud: {
    enabled: boolean
    metricsNamespace: string
    logGroup: string
    logStream: string
    metricsFlushMs: number
    logsFlushMs: number
    debug: boolean
  }
  status: {
    enabled: boolean
    host: string
    port: number
    sseRetryMs: number
  }
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const robotId = stringFromEnv(env, ['ROBOT_ID'], os.hostname())
  const reconnectMs = numberFromEnv(env, ['NAV_BRIDGE_GRPC_RECONNECT_MS'], DEFAULT_GRPC_RECONNECT_MS)
  const staleMs = numberFromEnv(env, ['BRIDGE_STALE_MS'], DEFAULT_BRIDGE_STALE_MS)

  return {
    robotId,
    navBridge: {
      grpcAddr: stringFromEnv(env, ['NAV_BRIDGE_GRPC_ADDR'], DEFAULT_NAV_BRIDGE_GRPC_ADDR),
      reconnectMs,
      staleMs,
      deadlineMs: numberFromEnv(env, ['NAV_BRIDGE_GRPC_DEADLINE_MS'], 5000),
      serverTimeoutMs: numberFromEnv(env, ['NAV_BRIDGE_SERVER_TIMEOUT_MS'], 30_000),
      debug: isEnvTrue('DEBUG_NAV', env),
    },
    route: {
      planTimeoutMs: numberFromEnv(env, ['ROUTE_PLAN_TIMEOUT_MS'], DEFAULT_PLAN_TIMEOUT_MS),
      maxBadGoals: numberFromEnv(env, ['ROUTE_MAX_BAD_GOALS'], DEFAULT_MAX_BAD_GOALS),
      rateHz: numberFromEnv(env, ['ROUTE_RATE_HZ'], DEFAULT_ROUTE_RATE_HZ),
      debug: isEnvTrue('DEBUG_ROUTE', env),
    },
    telemetry: {
      periodMs: numberFromEnv(env, ['TELEMETRY_PERIOD_MS'], DEFAULT_TELEMETRY_PERIOD_MS),
      staleMs: numberFromEnv(env, ['TELEMETRY_STALE_MS', 'BRIDGE_STALE_MS'], DEFAULT_BRIDGE_STALE_MS),
      debug: isEnvTrue('DEBUG_TELEMETRY', env),
    },
    cloud: {
      enabled: isEnvTrue('CLOUDWATCH_ENABLED', env),
      metricsNamespace: stringFromEnv(env, ['CLOUDWATCH_METRICS_NAMESPACE'], DEFAULT_METRICS_NAMESPACE),
      logGroup: stringFromEnv(env, ['CLOUDWATCH_LOG_GROUP'], DEFAULT_LOG_GROUP),
      logStream: stringFromEnv(env, ['CLOUDWATCH_LOG_STREAM'], robotId),
      metricsFlushMs: numberFromEnv(env, ['CLOUDWATCH_METRICS_FLUSH_MS'], 10_000),
      logsFlushMs: numberFromEnv(env, ['CLOUDWATCH_LOGS_FLUSH_MS'], 5000),
      debug: isEnvTrue('DEBUG_CLOUD', env),
    },
    status: {
      enabled: !isEnvTrue('STATUS_HTTP_DISABLED', env),
      host: stringFromEnv(env, ['STATUS_HTTP_HOST'], '127.0.0.1'),
      port: numberFromEnv(env, ['STATUS_HTTP_PORT'], 8080),
      sseRetryMs: numberFromEnv(env, ['STATUS_SSE_RETRY_MS', 'NAV_BRIDGE_GRPC_RECONNECT_MS'], reconnectMs),
    },
  }
}
