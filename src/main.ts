import type http from 'node:http'

import { type CloudPublishers, startCloudPublishers } from './server/cloudPublishers'
import { loadAppConfig } from './server/config'
import { loadRootEnvOnce } from './server/env'
import { createLogger } from './server/logger'
import { createNavBridgeClient } from './server/navBridgeClient'
import type { NavClient } from './server/navClient'
import { loadRouteConfig } from './server/routeConfig'
import { createRouteManager, type RouteManager } from './server/routeManager'
import { startStatusServer } from './server/statusServer'
import { createTelemetryHub, type TelemetryHub } from './server/telemetryHub'

loadRootEnvOnce()

const logger = createLogger('[main]')

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve())
    // SSE clients would otherwise hold close() open.
    server.closeAllConnections()
  })
}

async function main() {
  const config = loadAppConfig()
  const routeConfig = loadRouteConfig()

  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down`)
    controller.abort()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  let cloud: CloudPublishers | null = null
  let navClient: NavClient | null = null
  let telemetry: TelemetryHub | null = null
  let server: http.Server | null = null
  let routeManager: RouteManager | null = null

  try {
    if (config.cloud.enabled) {
      cloud = startCloudPublishers(config)
      logger.info(
        `cloudwatch on: namespace=${config.cloud.metricsNamespace} logs=${config.cloud.logGroup}/${config.cloud.logStream}`,
      )
    }

    const nav = createNavBridgeClient(config.navBridge)
    navClient = nav

    telemetry = createTelemetryHub({
      navClient: nav,
      getGoal: () => routeManager?.getCurrentGoal() ?? null,
      periodMs: config.telemetry.periodMs,
      staleMs: config.telemetry.staleMs,
      logger: createLogger('[telemetry]', { debug: config.telemetry.debug }),
    })
    const metrics = cloud?.metrics
    if (metrics) telemetry.subscribe((sample) => metrics.enqueue(sample))
    telemetry.start()

    if (config.status.enabled) {
      server = await startStatusServer({
        telemetry,
        getRouteState: () => routeManager?.getState() ?? null,
        sseRetryMs: config.status.sseRetryMs,
        host: config.status.host,
        port: config.status.port,
      })
    }

    routeManager = await createRouteManager({
      navClient: nav,
      mode: routeConfig.mode,
      poses: routeConfig.poses,
      planTimeoutMs: config.route.planTimeoutMs,
      maxBadGoals: config.route.maxBadGoals,
      rateHz: config.route.rateHz,
      serverTimeoutMs: config.navBridge.serverTimeoutMs,
      signal: controller.signal,
      logger: createLogger('[route]', { debug: config.route.debug }),
    })

    const reason = routeManager ? await routeManager.routeForever(controller.signal) : 'shutdown'
    logger.info(`route manager stopped: ${reason}`)
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    telemetry?.stop()
    if (server) await closeServer(server)
    navClient?.close()
    await cloud?.stop()
  }
}

main().catch((err: unknown) => {
  logger.error('fatal', err)
  process.exitCode = 1
})
