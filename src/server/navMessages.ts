import type { LidarScan } from '../lib/lidarScan'
import type { OccupancyGrid } from '../lib/occupancyMap'
import { type Pose3D, yawFromQuaternionZUp } from '../lib/pose'
import type { RobotState } from '../lib/robotState'
import type { GlobalPlan, GoalResult, GoalStatus, NavGoal } from '../lib/route'

type RawMessage = Record<string, unknown>

type RawPose3D = {
  frame_id?: unknown
  x?: unknown
  y?: unknown
  z?: unknown
  qx?: unknown
  qy?: unknown
  qz?: unknown
  qw?: unknown
}

type RawOccupancyGrid = {
  timestamp_unix_ms?: unknown
  frame_id?: unknown
  resolution_m_per_px?: unknown
  width?: unknown
  height?: unknown
  origin?: unknown
  data?: unknown
}

type RawRobotState = {
  timestamp_unix_ms?: unknown
  seq?: unknown
  pose?: unknown
  linear_x?: unknown
  linear_y?: unknown
  angular_z?: unknown
}

type RawLaserScan = {
  timestamp_unix_ms?: unknown
  seq?: unknown
  frame_id?: unknown
  angle_min?: unknown
  angle_increment?: unknown
  range_min?: unknown
  range_max?: unknown
  ranges?: unknown
}

type RawGoalResult = {
  goal_id?: unknown
  finished?: unknown
  status?: unknown
}

type RawGlobalPlan = {
  goal_id?: unknown
  poses?: unknown
}

export type RawNavGoal = {
  stamp_unix_ms: string
  frame_id: string
  pose: {
    frame_id: string
    x: number
    y: number
    z: number
    qx: number
    qy: number
    qz: number
    qw: number
  }
}

function isRecord(value: unknown): value is RawMessage {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function numberOrDefault(value: unknown, defaultValue: number): number | null {
  if (value == null) return defaultValue
  const n = Number(value)
  return Number.isFinite(n) ? n : null
}

function numberRequired(value: unknown): number | null {
  if (value == null) return null
  const n = Number(value)
  return Number.isFinite(n) ? n : null
}

export function normalizeSeq(seqRaw: unknown): string {
  return typeof seqRaw === 'string'
    ? seqRaw
    : typeof seqRaw === 'number'
      ? String(seqRaw)
      : seqRaw != null
        ? String(seqRaw)
        : '0'
}

export function normalizePose3D(raw: unknown): Pose3D | null {
  const p: RawPose3D = isRecord(raw) ? raw : {}
  const frameId = typeof p.frame_id === 'string' ? p.frame_id : ''

  // With proto-loader `defaults: false`, proto3 scalar fields that are 0 may be omitted.
  // Treat missing scalars as proto3 defaults so we don't drop valid frames.
  const x = numberOrDefault(p.x, 0)
  const y = numberOrDefault(p.y, 0)
  const z = numberOrDefault(p.z, 0)
  const qx = numberOrDefault(p.qx, 0)
  const qy = numberOrDefault(p.qy, 0)
  const qz = numberOrDefault(p.qz, 0)
  const qw = numberOrDefault(p.qw, 1)

  if (x == null || y == null || z == null || qx == null || qy == null || qz == null || qw == null) {
    return null
  }

  return {
    frameId,
    x,
    y,
    z,
    qx,
    qy,
    qz,
    qw,
    yawZ: yawFromQuaternionZUp(qx, qy, qz, qw),
  }
}

function normalizeCells(data: unknown): Int8Array | null {
  let bytes: Uint8Array | null = null
  if (data instanceof Uint8Array) bytes = data
  else if (typeof data === 'string' && data.trim()) bytes = Buffer.from(data.trim(), 'base64')
  if (!bytes) return null

  // Copy out of the (possibly pooled) buffer and reinterpret as signed cells.
  const cells = new Int8Array(bytes.byteLength)
  cells.set(new Int8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength))
  return cells
}

export function normalizeOccupancyGrid(raw: unknown): OccupancyGrid | null {
  const m: RawOccupancyGrid = isRecord(raw) ? raw : {}

  const timestampUnixMs = numberOrDefault(m.timestamp_unix_ms, 0)
  if (timestampUnixMs == null) return null

  const frameId = typeof m.frame_id === 'string' ? m.frame_id : ''

  const resolutionMPerPx = numberRequired(m.resolution_m_per_px)
  if (resolutionMPerPx == null || resolutionMPerPx <= 0) return null

  const width = numberRequired(m.width)
  if (width == null || width <= 0 || !Number.isInteger(width)) return null

  const height = numberRequired(m.height)
  if (height == null || height <= 0 || !Number.isInteger(height)) return null

  const origin = normalizePose3D(m.origin)
  if (!origin) return null

  const data = normalizeCells(m.data)
  if (!data || data.length !== width * height) return null

  return { timestampUnixMs, frameId, resolutionMPerPx, width, height, origin, data }
}

export function normalizeRobotState(raw: unknown): RobotState | null {
  const m: RawRobotState = isRecord(raw) ? raw : {}

  const timestampUnixMs = numberRequired(m.timestamp_unix_ms)
  if (timestampUnixMs == null) return null

  const pose = normalizePose3D(m.pose)
  if (!pose) return null

  const linearX = numberOrDefault(m.linear_x, 0)
  const linearY = numberOrDefault(m.linear_y, 0)
  const angularZ = numberOrDefault(m.angular_z, 0)
  if (linearX == null || linearY == null || angularZ == null) return null

  return {
    timestampUnixMs,
    seq: normalizeSeq(m.seq),
    pose,
    linearX,
    linearY,
    angularZ,
  }
}

export function normalizeLaserScan(raw: unknown): LidarScan | null {
  const m: RawLaserScan = isRecord(raw) ? raw : {}

  const timestampUnixMs = numberRequired(m.timestamp_unix_ms)
  if (timestampUnixMs == null) return null

  const frameId = typeof m.frame_id === 'string' ? m.frame_id : ''

  // proto3 scalar fields with default values may be omitted by proto-loader when
  // `defaults: false` (ex: angle_min=0). Treat missing as 0.
  const angleMin = numberOrDefault(m.angle_min, 0)
  if (angleMin == null) return null

  const angleIncrement = numberRequired(m.angle_increment)
  if (angleIncrement == null) return null

  const rangeMin = numberOrDefault(m.range_min, 0)
  if (rangeMin == null) return null

  const rangeMax = numberRequired(m.range_max)
  if (rangeMax == null) return null

  if (!Array.isArray(m.ranges)) return null

  // Keep Inf/NaN as-is (they represent invalid readings per ROS LaserScan)
  const ranges = m.ranges.map((r) => Number(r))

  return {
    timestampUnixMs,
    seq: normalizeSeq(m.seq),
    frameId,
    angleMin,
    angleIncrement,
    rangeMin,
    rangeMax,
    ranges,
  }
}

const GOAL_STATUS_BY_WIRE: Record<string, GoalStatus> = {
  PENDING: 'pending',
  ACTIVE: 'active',
  SUCCEEDED: 'succeeded',
  ABORTED: 'aborted',
  REJECTED: 'rejected',
  PREEMPTED: 'preempted',
  LOST: 'lost',
}

export function normalizeGoalResult(raw: unknown): GoalResult {
  const m: RawGoalResult = isRecord(raw) ? raw : {}
  const status = typeof m.status === 'string' ? GOAL_STATUS_BY_WIRE[m.status] : undefined
  return {
    finished: m.finished === true,
    status: status ?? 'lost',
  }
}

export function normalizeGlobalPlan(raw: unknown, goalId: string): GlobalPlan {
  const m: RawGlobalPlan = isRecord(raw) ? raw : {}
  const poses: Pose3D[] = []
  if (Array.isArray(m.poses)) {
    for (const rawPose of m.poses) {
      const pose = normalizePose3D(rawPose)
      if (pose) poses.push(pose)
    }
  }
  return {
    goalId: typeof m.goal_id === 'string' && m.goal_id ? m.goal_id : goalId,
    poses,
  }
}

export function toRawNavGoal(goal: NavGoal): RawNavGoal {
  const p = goal.pose
  return {
    stamp_unix_ms: String(goal.stampUnixMs),
    frame_id: goal.frameId,
    pose: {
      frame_id: goal.frameId,
      x: p.x,
      y: p.y,
      z: p.z,
      qx: p.qx,
      qy: p.qy,
      qz: p.qz,
      qw: p.qw,
    },
  }
}
