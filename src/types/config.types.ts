export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  baseUrl: string
  port: number
  dbPath: string
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  // Grafana Config
  grafanaUrl: string
  /** Bearer token, or JSON `{"username": "...", "password": "..."}` for basic auth */
  grafanaCredentials: string
  grafanaSsoProvider: string
  grafanaTimeoutMs: number
  // Reconciliation Config
  reconcileIntervalSeconds: number
  reconcileConcurrency: number
}
