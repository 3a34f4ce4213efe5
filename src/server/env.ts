import path from 'node:path'

import * as dotenv from 'dotenv'

export type Env = Record<string, string | undefined>

let envLoaded = false

export function loadRootEnvOnce() {
  if (envLoaded) return
  envLoaded = true

  // tsx does not load .env on its own; every entry point goes through here.
  dotenv.config({ path: path.resolve(process.cwd(), '.env') })
}

export function isEnvTrue(name: string, env: Env = process.env): boolean {
  const raw = env[name]
  if (!raw) return false
  const normalized = raw.trim().toLowerCase()
  return normalized === '1' || normalized === 'true'
}

/** First set variable among `names`, or `fallback` when unset, zero or not a number. */
export function numberFromEnv(env: Env, names: string[], fallback: number): number {
  for (const name of names) {
    const raw = env[name]
    if (raw == null || raw.trim() === '') continue
    return Number(raw) || fallback
  }
  return fallback
}

export function stringFromEnv(env: Env, names: string[], fallback: string): string {
  for (const name of names) {
    const raw = env[name]?.trim()
    if (raw) return raw
  }
  return fallback
}
