import os, { type CpuInfo } from 'node:os'

export type HostStatsSource = {
  cpus: () => CpuInfo[]
  totalmem: () => number
  freemem: () => number
}

export type HostStats = {
  cpuPercent: number | null
  ramPercent: number | null
}

export type HostStatsSampler = {
  sample: () => HostStats
}

type CpuTimes = { idle: number; total: number }

function readCpuTimes(cpus: CpuInfo[]): CpuTimes {
  let idle = 0
  let total = 0
  for (const cpu of cpus) {
    const t = cpu.times
    idle += t.idle
    total += t.user + t.nice + t.sys + t.idle + t.irq
  }
  return { idle, total }
}

function roundTenth(value: number): number {
  return Math.round(value * 10) / 10
}

/** CPU is utilization since the previous sample (since boot for the first one). */
export function createHostStatsSampler(source: HostStatsSource = os): HostStatsSampler {
  let previous: CpuTimes = { idle: 0, total: 0 }

  return {
    sample() {
      const current = readCpuTimes(source.cpus())
      const totalDelta = current.total - previous.total
      const idleDelta = current.idle - previous.idle
      previous = current

      const cpuPercent = totalDelta > 0 ? roundTenth((1 - idleDelta / totalDelta) * 100) : null

      const totalMem = source.totalmem()
      const ramPercent =
        totalMem > 0 ? roundTenth(((totalMem - source.freemem()) / totalMem) * 100) : null

      return { cpuPercent, ramPercent }
    },
  }
}
