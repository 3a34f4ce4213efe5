import { setTimeout as delay } from 'node:timers/promises'

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
export const abortableSleep: Sleep = async (ms, signal) => {
  if (signal.aborted) return
  try {
    await delay(ms, undefined, { signal })
  } catch (err) {
    if (signal.aborted) return
    throw err
  }
}

export type Rate = {
  sleep: (signal: AbortSignal) => Promise<void>
}

/** Keeps a loop at `hz` by sleeping whatever is left of the current period. */
export function createRate(
  hz: number,
  options: { now?: () => number; sleep?: Sleep } = {},
): Rate {
  const now = options.now ?? Date.now
  const sleep = options.sleep ?? abortableSleep
  const periodMs = 1000 / hz
  let periodStart = now()

  return {
    async sleep(signal) {
      const remaining = periodMs - (now() - periodStart)
      if (remaining > 0) await sleep(remaining, signal)
      periodStart = now()
    },
  }
}
