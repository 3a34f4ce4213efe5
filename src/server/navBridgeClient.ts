import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import * as grpc from '@grpc/grpc-js'
import * as protoLoader from '@grpc/proto-loader'

import type { LidarScan } from '../lib/lidarScan'
import { nearestRange } from '../lib/lidarScan'
import type { OccupancyGrid } from '../lib/occupancyMap'
import type { RobotState } from '../lib/robotState'
import type { GlobalPlan, GoalResult, NavGoal } from '../lib/route'

import { PlanTimeoutError } from './errors'
import { createLogger } from './logger'
import type { NavClient } from './navClient'
import {
  normalizeGlobalPlan,
  normalizeGoalResult,
  normalizeLaserScan,
  normalizeOccupancyGrid,
  normalizeRobotState,
  type RawNavGoal,
  toRawNavGoal,
} from './navMessages'
import { createRetryLogger } from './retryLogger'
import { createStreamHub, type StreamCall } from './streamHub'

const LOG_PREFIX = '[nav-bridge]'
const SERVICE_PATH = ['robonav', 'nav_bridge', 'v1', 'NavBridge']

type UnaryCallback = (err: grpc.ServiceError | null, res?: unknown) => void

type UnaryMethod<TReq> = (
  req: TReq,
  options: grpc.CallOptions,
  cb: UnaryCallback,
) => grpc.ClientUnaryCall

type NavBridgeGrpcClient = grpc.Client & {
  GetMap: UnaryMethod<Record<string, never>>
  SendGoal: UnaryMethod<RawNavGoal>
  CancelGoal: UnaryMethod<{ goal_id: string }>
  WaitForResult: UnaryMethod<{ goal_id: string }>
  StreamGlobalPlan: (req: { goal_id: string }) => grpc.ClientReadableStream<unknown>
  StreamRobotState: (req: Record<string, never>) => grpc.ClientReadableStream<unknown>
  StreamScan: (req: Record<string, never>) => grpc.ClientReadableStream<unknown>
}

export type NavBridgeClientOptions = {
  grpcAddr: string
  reconnectMs: number
  staleMs: number
  /** Deadline for short unary calls (map, goal send, cancel). */
  deadlineMs: number
  debug?: boolean
}

let cachedClientCtor: grpc.ServiceClientConstructor | null = null

function resolveProtoPath() {
  const candidates = [
    path.resolve(process.cwd(), 'proto', 'nav_bridge.proto'),
    fileURLToPath(new URL('../../proto/nav_bridge.proto', import.meta.url)),
  ]

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate
  }

  throw new Error('Unable to locate nav_bridge.proto')
}

type GrpcNode = grpc.GrpcObject[string] | undefined

function lookupServiceCtor(root: grpc.GrpcObject, segments: string[]): grpc.ServiceClientConstructor | null {
  let node: GrpcNode = root
  for (const segment of segments) {
    if (!node || typeof node === 'function' || 'format' in node) return null
    node = node[segment]
  }
  return typeof node === 'function' ? node : null
}

function getNavBridgeClientCtor(): grpc.ServiceClientConstructor {
  if (cachedClientCtor) return cachedClientCtor

  const packageDef = protoLoader.loadSync(resolveProtoPath(), {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: false,
    oneofs: true,
  })

  const ctor = lookupServiceCtor(grpc.loadPackageDefinition(packageDef), SERVICE_PATH)
  if (!ctor) {
    throw new Error(`Failed to load NavBridge from proto; expected ${SERVICE_PATH.join('.')}`)
  }

  cachedClientCtor = ctor
  return ctor
}

function unary<TReq>(
  method: UnaryMethod<TReq>,
  req: TReq,
  options: { deadlineMs?: number; signal?: AbortSignal } = {},
): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const { deadlineMs, signal } = options
    if (signal?.aborted) {
      reject(new Error('aborted'))
      return
    }

    const callOptions: grpc.CallOptions = deadlineMs
      ? { deadline: new Date(Date.now() + deadlineMs) }
      : {}
    const onAbort = () => call.cancel()

    const call = method(req, callOptions, (err, res) => {
      signal?.removeEventListener('abort', onAbort)
      if (err) reject(err)
      else resolve(res ?? {})
    })
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Resolves with the first plan published on `call`. The call is cancelled
 * once anything settles the promise; a stream that ends first counts as a timeout.
 */
export function awaitGlobalPlan(
  call: StreamCall,
  goalId: string,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<GlobalPlan> {
  return new Promise((resolve, reject) => {
    let settled = false

    const finish = (settle: () => void) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      call.removeAllListeners()
      // cancel() surfaces as a CANCELLED error event; nobody is listening anymore.
      call.on('error', () => undefined)
      call.cancel()
      settle()
    }

    const timer = setTimeout(
      () => finish(() => reject(new PlanTimeoutError(goalId, timeoutMs))),
      timeoutMs,
    )
    const onAbort = () => finish(() => reject(new Error('aborted')))
    if (signal?.aborted) {
      onAbort()
      return
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    call.on('data', (raw: unknown) => finish(() => resolve(normalizeGlobalPlan(raw, goalId))))
    call.on('error', (err: Error) => finish(() => reject(err)))
    call.on('end', () => finish(() => reject(new PlanTimeoutError(goalId, timeoutMs))))
  })
}

export function createNavBridgeClient(options: NavBridgeClientOptions): NavClient {
  const logger = createLogger(LOG_PREFIX, { debug: options.debug })
  const retryLog = createRetryLogger(LOG_PREFIX, { logger })

  const Ctor = getNavBridgeClientCtor()
  // Methods are attached from the proto at run time.
  const client = new Ctor(options.grpcAddr, grpc.credentials.createInsecure()) as unknown as NavBridgeGrpcClient
  logger.debug(`connect ${options.grpcAddr}`)

  const stateHub = createStreamHub<RobotState>({
    name: 'robot-state',
    open: (): StreamCall => client.StreamRobotState({}),
    normalize: normalizeRobotState,
    reconnectMs: options.reconnectMs,
    staleMs: options.staleMs,
    describe: (s) =>
      `seq=${s.seq} pose x=${s.pose.x.toFixed(3)} y=${s.pose.y.toFixed(3)} yawZ=${s.pose.yawZ.toFixed(3)} vx=${s.linearX.toFixed(3)}`,
    logger,
    retryLog,
  })

  const scanHub = createStreamHub<LidarScan>({
    name: 'scan',
    open: (): StreamCall => client.StreamScan({}),
    normalize: normalizeLaserScan,
    reconnectMs: options.reconnectMs,
    staleMs: options.staleMs,
    describe: (s) => `seq=${s.seq} points=${s.ranges.length} nearest=${nearestRange(s) ?? 'none'}`,
    logger,
    retryLog,
  })

  function waitForServer(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error('aborted'))
        return
      }

      // waitForReady cannot be cancelled; an abort settles early and its callback is ignored.
      let settled = false
      const onAbort = () => {
        if (settled) return
        settled = true
        reject(new Error('aborted'))
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      client.waitForReady(Date.now() + timeoutMs, (err) => {
        signal?.removeEventListener('abort', onAbort)
        if (settled) return
        settled = true
        if (err) {
          reject(err)
          return
        }
        logger.debug('ready')
        resolve()
      })
    })
  }

  async function fetchMap(): Promise<OccupancyGrid> {
    const raw = await unary((r, o, cb) => client.GetMap(r, o, cb), {}, {
      deadlineMs: options.deadlineMs,
    })
    const map = normalizeOccupancyGrid(raw)
    if (!map) throw new Error('Bridge returned an invalid occupancy grid')
    logger.debug(`map ${map.width}x${map.height} res=${map.resolutionMPerPx}`)
    return map
  }

  async function sendGoal(goal: NavGoal): Promise<string> {
    const raw = await unary((r, o, cb) => client.SendGoal(r, o, cb), toRawNavGoal(goal), {
      deadlineMs: options.deadlineMs,
    })
    const goalId =
      typeof raw === 'object' && raw !== null && 'goal_id' in raw && typeof raw.goal_id === 'string'
        ? raw.goal_id
        : ''
    if (!goalId) throw new Error('Bridge accepted a goal without returning its id')
    return goalId
  }

  async function cancelGoal(goalId: string): Promise<void> {
    await unary((r, o, cb) => client.CancelGoal(r, o, cb), { goal_id: goalId }, {
      deadlineMs: options.deadlineMs,
    })
  }

  async function waitForResult(goalId: string, signal?: AbortSignal): Promise<GoalResult> {
    const raw = await unary((r, o, cb) => client.WaitForResult(r, o, cb), { goal_id: goalId }, {
      signal,
    })
    return normalizeGoalResult(raw)
  }

  return {
    waitForServer,
    fetchMap,
    sendGoal,
    waitForGlobalPlan: (goalId, timeoutMs, signal) =>
      awaitGlobalPlan(client.StreamGlobalPlan({ goal_id: goalId }), goalId, timeoutMs, signal),
    waitForResult,
    cancelGoal,
    subscribeRobotState: (listener) => stateHub.subscribe(listener),
    subscribeScan: (listener) => scanHub.subscribe(listener),
    close() {
      stateHub.stop()
      scanHub.stop()
      client.close()
    },
  }
}
