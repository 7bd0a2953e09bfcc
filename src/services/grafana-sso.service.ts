/**
 * Grafana SSO Settings Service
 *
 * Reads and writes the settings object of a Grafana SSO provider through
 * `/api/v1/sso-settings/{provider}`. The settings object is treated as opaque:
 * only the `orgMapping` key is ever changed and every other key is written
 * back exactly as it was read.
 */

import {
  ExternalAPIError,
  NotFoundError,
  errorMessage,
} from '@root/types/errors.js'
import type {
  GrafanaCredentials,
  GrafanaSsoServiceOptions,
  SsoSettings,
  SsoSettingsClient,
} from '@root/types/grafana.types.js'
import type { TenantMapping } from '@root/types/tenant.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { encodeOrgMapping } from './tenant-reconciler/mapping/org-mapping.js'

export const ORG_MAPPING_KEY = 'orgMapping'

/**
 * Ensures an API base path ends with `/api`
 *
 * @param path - Path component of the configured Grafana URL
 */
export function normalizeApiBasePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '')
  if (trimmed === '') {
    return '/api'
  }
  if (trimmed.endsWith('/api')) {
    return trimmed
  }
  return `${trimmed}/api`
}

/**
 * Interprets raw credentials. JSON with a non-empty username and password
 * selects basic auth; anything else is a bearer token.
 *
 * @param raw - Credential string as configured
 */
export function parseGrafanaCredentials(raw: string): GrafanaCredentials {
  const token = raw.trim()
  if (token === '') {
    return { type: 'none' }
  }

  if (token.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(token)
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'username' in parsed &&
        'password' in parsed &&
        typeof parsed.username === 'string' &&
        typeof parsed.password === 'string' &&
        parsed.username !== '' &&
        parsed.password !== ''
      ) {
        return {
          type: 'basic',
          username: parsed.username,
          password: parsed.password,
        }
      }
    } catch (error) {
      // Not JSON after all: fall through to bearer token
      if (!(error instanceof SyntaxError)) throw error
    }
  }

  return { type: 'bearer', token }
}

function authorizationHeader(credentials: GrafanaCredentials): string | null {
  switch (credentials.type) {
    case 'basic':
      return `Basic ${Buffer.from(
        `${credentials.username}:${credentials.password}`,
      ).toString('base64')}`
    case 'bearer':
      return `Bearer ${credentials.token}`
    case 'none':
      return null
  }
}

function isSettingsObject(value: unknown): value is SsoSettings {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Extracts a readable detail from a Grafana error response body
 */
async function readErrorDetail(response: Response): Promise<string> {
  const body = await response.text()
  if (!body) {
    return response.statusText
  }
  try {
    const data: unknown = JSON.parse(body)
    if (isSettingsObject(data) && typeof data.message === 'string') {
      return data.message
    }
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error
  }
  return body
}

export class GrafanaSsoService implements SsoSettingsClient {
  private readonly log: FastifyBaseLogger
  private readonly settingsUrl: string
  private readonly authorization: string | null
  private readonly provider: string
  private readonly timeoutMs: number

  /**
   * Creates a new GrafanaSsoService instance
   *
   * @param baseLog - Fastify logger instance
   * @param options - Grafana URL, credentials, provider key and timeout
   * @throws ExternalAPIError when the Grafana URL cannot be parsed
   */
  constructor(baseLog: FastifyBaseLogger, options: GrafanaSsoServiceOptions) {
    this.log = createServiceLogger(baseLog, 'GRAFANA_SSO')

    let url: URL
    try {
      url = new URL(options.url)
    } catch (error) {
      throw new ExternalAPIError(
        `cannot parse grafana URL: ${options.url}`,
        undefined,
        { cause: error },
      )
    }

    this.provider = options.provider
    this.timeoutMs = options.timeoutMs
    this.settingsUrl = `${url.origin}${normalizeApiBasePath(url.pathname)}/v1/sso-settings/${encodeURIComponent(options.provider)}`
    this.authorization = authorizationHeader(
      parseGrafanaCredentials(options.credentials),
    )
  }

  private headers(withBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (withBody) {
      headers['Content-Type'] = 'application/json'
    }
    if (this.authorization) {
      headers.Authorization = this.authorization
    }
    return headers
  }

  /**
   * Retrieves the current settings object of the provider
   *
   * @throws NotFoundError when the provider has never been configured
   * @throws ExternalAPIError on any other failure
   */
  async fetchSettings(): Promise<SsoSettings> {
    let response: Response
    try {
      response = await fetch(this.settingsUrl, {
        method: 'GET',
        headers: this.headers(false),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      throw new ExternalAPIError(
        `Grafana request failed: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      )
    }

    if (response.status === 404) {
      throw new NotFoundError(
        `SSO provider ${this.provider} is not configured in Grafana`,
      )
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response)
      if (response.status === 401 || response.status === 403) {
        throw new ExternalAPIError(
          `Grafana authentication failed: ${detail}`,
          response.status,
        )
      }
      throw new ExternalAPIError(`Grafana API error: ${detail}`, response.status)
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (error) {
      throw new ExternalAPIError(
        'Grafana returned an unreadable SSO settings response',
        response.status,
        { cause: error },
      )
    }

    if (!isSettingsObject(payload)) {
      throw new ExternalAPIError('SSO settings response is not an object')
    }
    const settings = payload.settings
    if (!isSettingsObject(settings)) {
      throw new ExternalAPIError('SSO settings is not a map')
    }

    return settings
  }

  /**
   * Writes back the whole settings object of the provider
   *
   * @param settings - Complete settings, including keys this service does not manage
   * @throws ExternalAPIError when Grafana rejects the request
   */
  async replaceSettings(settings: SsoSettings): Promise<void> {
    let response: Response
    try {
      response = await fetch(this.settingsUrl, {
        method: 'PUT',
        headers: this.headers(true),
        body: JSON.stringify({ provider: this.provider, settings }),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      throw new ExternalAPIError(
        `Grafana request failed: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      )
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response)
      throw new ExternalAPIError(
        `Grafana rejected SSO settings update: ${detail}`,
        response.status,
      )
    }
  }

  /**
   * Reads the current settings, replaces the org mapping with one computed
   * from the given tenants and writes the settings back.
   *
   * @param tenants - The complete tenant set, in mapping order
   * @throws ExternalAPIError if reading (other than not-found) or writing fails
   */
  async syncMapping(tenants: readonly TenantMapping[]): Promise<void> {
    const current = await this.getOrInitSettings()
    const orgMapping = encodeOrgMapping(tenants)

    this.log.debug(
      { orgMapping, tenantCount: tenants.length },
      'Syncing Grafana org mapping',
    )

    try {
      await this.replaceSettings({ ...current, [ORG_MAPPING_KEY]: orgMapping })
    } catch (error) {
      throw new ExternalAPIError(
        `cannot update SSO settings: ${errorMessage(error)}`,
        error instanceof ExternalAPIError ? error.status : undefined,
        { cause: error },
      )
    }
  }

  private async getOrInitSettings(): Promise<SsoSettings> {
    try {
      return await this.fetchSettings()
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.log.info(
          `SSO provider ${this.provider} not configured yet, starting from empty settings`,
        )
        return {}
      }
      throw new ExternalAPIError(
        `cannot get SSO settings: ${errorMessage(error)}`,
        error instanceof ExternalAPIError ? error.status : undefined,
        { cause: error },
      )
    }
  }
}
