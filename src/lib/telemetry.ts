export const DEFAULT_NAV_BRIDGE_GRPC_ADDR = '127.0.0.1:50061'
export const DEFAULT_GRPC_RECONNECT_MS = 2000
export const DEFAULT_BRIDGE_STALE_MS = 7000

export const DEFAULT_TELEMETRY_PERIOD_MS = 1000
export const DEFAULT_METRICS_NAMESPACE = 'robot_monitoring'
export const DEFAULT_LOG_GROUP = 'robot_application'

export type TelemetrySample = {
  timestampUnixMs: number
  seq: string
  speedMps: number | null
  obstacleDistanceM: number | null
  goalDistanceM: number | null
  cpuPercent: number | null
  ramPercent: number | null
}

export type TelemetryMetricKey = Exclude<keyof TelemetrySample, 'timestampUnixMs' | 'seq'>
