import type { TenantMapping } from './tenant.types.js'

/**
 * Settings object of a Grafana SSO provider. Keys other than `orgMapping`
 * are provider specific and carried through untouched.
 */
export type SsoSettings = Record<string, unknown>

export type GrafanaCredentials =
  | { type: 'basic'; username: string; password: string }
  | { type: 'bearer'; token: string }
  | { type: 'none' }

export interface GrafanaSsoServiceOptions {
  url: string
  credentials: string
  provider: string
  timeoutMs: number
}

/**
 * Access to the SSO settings document that holds the org mapping
 */
export interface SsoSettingsClient {
  fetchSettings(): Promise<SsoSettings>
  replaceSettings(settings: SsoSettings): Promise<void>
  syncMapping(tenants: readonly TenantMapping[]): Promise<void>
}
