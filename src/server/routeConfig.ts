import fs from 'node:fs'
import path from 'node:path'

import { createPose, type Pose3D, yawFromQuaternionZUp } from '../lib/pose'
import { GOAL_FRAME_ID } from '../lib/route'

import { type Env, loadRootEnvOnce } from './env'

export class RouteConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RouteConfigError'
  }
}

export type RouteConfig = {
  /** Validated by the route manager, which owns the list of modes. */
  mode: string
  poses: Pose3D[]
}

type RawPoseEntry = Record<string, string>

const POSE_KEYS = new Set(['x', 'y', 'z', 'yaw', 'qx', 'qy', 'qz', 'qw'])

function stripInlineComment(line: string): string {
  const hashIdx = line.indexOf('#')
  return hashIdx === -1 ? line : line.slice(0, hashIdx)
}

function stripYamlQuotes(raw: string): string {
  const trimmed = raw.trim()
  if (
    (trimmed.startsWith('"') && trimmed.endsWith('"')) ||
    (trimmed.startsWith("'") && trimmed.endsWith("'"))
  ) {
    return trimmed.slice(1, -1)
  }
  return trimmed
}

function parseYamlRoute(yaml: string): { mode: string | null; entries: RawPoseEntry[] } {
  const lines = yaml.split(/\r?\n/)
  const entries: RawPoseEntry[] = []
  let mode: string | null = null

  let inRoute = false
  let routeIndent: number | null = null

  let inPoses = false
  let posesIndent: number | null = null

  let activeItemIndent: number | null = null
  let active: RawPoseEntry | null = null

  const flushActive = () => {
    if (active) entries.push(active)
    active = null
    activeItemIndent = null
  }

  const assignKey = (entry: RawPoseEntry, text: string) => {
    const kvMatch = text.match(/^([a-zA-Z_][a-zA-Z0-9_]*)\s*:\s*(.+?)\s*$/)
    if (!kvMatch) {
      throw new RouteConfigError(`Invalid config: route.poses item has malformed line "${text}"`)
    }
    const key = kvMatch[1] ?? ''
    if (!POSE_KEYS.has(key)) {
      throw new RouteConfigError(`Invalid config: route.poses item has unknown key "${key}"`)
    }
    entry[key] = stripYamlQuotes(kvMatch[2] ?? '')
  }

  for (const rawLine of lines) {
    const line = stripInlineComment(rawLine)
    if (!line.trim()) continue

    const indent = line.match(/^\s*/)?.[0].length ?? 0

    if (!inRoute) {
      if (!/^\s*route\s*:\s*$/.test(line)) continue
      inRoute = true
      routeIndent = indent
      continue
    }

    if (routeIndent == null) break
    if (indent <= routeIndent) break

    const isItem = /^\s*-/.test(line)
    if (inPoses && posesIndent != null && indent <= posesIndent && !(isItem && indent === posesIndent)) {
      flushActive()
      inPoses = false
      posesIndent = null
    }

    if (!inPoses) {
      const modeMatch = line.match(/^\s*mode\s*:\s*(.+?)\s*$/)
      if (modeMatch) {
        mode = stripYamlQuotes(modeMatch[1] ?? '') || null
        continue
      }
      if (/^\s*poses\s*:\s*\[\s*\]\s*$/.test(line)) continue
      if (/^\s*poses\s*:\s*$/.test(line)) {
        inPoses = true
        posesIndent = indent
      }
      continue
    }

    const itemMatch = isItem ? line.match(/^\s*-\s*(.*?)\s*$/) : null
    if (itemMatch) {
      flushActive()
      activeItemIndent = indent
      const entry: RawPoseEntry = {}
      active = entry
      const rest = itemMatch[1] ?? ''
      if (rest) assignKey(entry, rest)
      continue
    }

    if (!active || activeItemIndent == null || indent <= activeItemIndent) continue
    assignKey(active, line.trim())
  }

  flushActive()
  return { mode, entries }
}

function parseCoordinate(entry: RawPoseEntry, key: string, index: number): number | null {
  const raw = entry[key]
  if (raw == null) return null
  const n = Number(raw)
  if (!Number.isFinite(n)) {
    throw new RouteConfigError(`Invalid config: route.poses[${index}].${key} is not a number ("${raw}")`)
  }
  return n
}

function poseFromEntry(entry: RawPoseEntry, index: number): Pose3D {
  const x = parseCoordinate(entry, 'x', index)
  const y = parseCoordinate(entry, 'y', index)
  if (x == null || y == null) {
    throw new RouteConfigError(`Invalid config: route.poses[${index}] needs both x and y`)
  }
  const z = parseCoordinate(entry, 'z', index) ?? 0

  const yaw = parseCoordinate(entry, 'yaw', index)
  const hasQuaternion = ['qx', 'qy', 'qz', 'qw'].some((key) => entry[key] != null)
  if (yaw != null && hasQuaternion) {
    throw new RouteConfigError(`Invalid config: route.poses[${index}] sets both yaw and a quaternion`)
  }
  if (!hasQuaternion) return createPose(GOAL_FRAME_ID, x, y, z, 0, 0, yaw ?? 0)

  const qx = parseCoordinate(entry, 'qx', index) ?? 0
  const qy = parseCoordinate(entry, 'qy', index) ?? 0
  const qz = parseCoordinate(entry, 'qz', index) ?? 0
  const qw = parseCoordinate(entry, 'qw', index) ?? 1
  const norm = Math.hypot(qx, qy, qz, qw)
  if (norm === 0) {
    throw new RouteConfigError(`Invalid config: route.poses[${index}] has a zero quaternion`)
  }

  return {
    frameId: GOAL_FRAME_ID,
    x,
    y,
    z,
    qx: qx / norm,
    qy: qy / norm,
    qz: qz / norm,
    qw: qw / norm,
    yawZ: yawFromQuaternionZUp(qx / norm, qy / norm, qz / norm, qw / norm),
  }
}

export function parseRouteConfig(text: string, source: string): RouteConfig {
  let parsed: ReturnType<typeof parseYamlRoute>
  try {
    parsed = parseYamlRoute(text)
  } catch (err) {
    if (err instanceof RouteConfigError) {
      throw new RouteConfigError(`${err.message} (in "${source}")`)
    }
    throw err
  }

  if (!parsed.mode) {
    throw new RouteConfigError(`Invalid route config at "${source}": route.mode is required`)
  }

  const poses: Pose3D[] = []
  parsed.entries.forEach((entry, index) => {
    try {
      poses.push(poseFromEntry(entry, index))
    } catch (err) {
      if (err instanceof RouteConfigError) {
        throw new RouteConfigError(`${err.message} (in "${source}")`)
      }
      throw err
    }
  })

  return { mode: parsed.mode, poses }
}

export function resolveRouteConfigPath(env: Env = process.env): string {
  const raw = env.ROUTE_CONFIG ?? env.ROUTE_CONFIG_PATH ?? ''

  if (raw.trim()) {
    const trimmed = raw.trim()
    return path.isAbsolute(trimmed) ? trimmed : path.resolve(process.cwd(), trimmed)
  }

  return path.resolve(process.cwd(), 'config', 'route.yaml')
}

export function loadRouteConfig(env: Env = process.env): RouteConfig {
  loadRootEnvOnce()
  const configPath = resolveRouteConfigPath(env)

  let text: string
  try {
    text = fs.readFileSync(configPath, 'utf8')
  } catch (err) {
    const suffix = err instanceof Error ? `: ${err.message}` : ''
    throw new RouteConfigError(`Route config missing or unreadable at "${configPath}"${suffix}`)
  }

  return parseRouteConfig(text, configPath)
}
