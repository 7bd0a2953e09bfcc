/**
 * Tenant External Client
 *
 * The four reconciler hooks for a tenant resource: observe, create, update
 * and delete. Every hook converges Grafana's org mapping on the full tenant
 * set; none of them writes to the tenant store.
 */

import {
  ExternalAPIError,
  NotFoundError,
  TypeMismatchError,
  errorMessage,
} from '@root/types/errors.js'
import type { SsoSettingsClient } from '@root/types/grafana.types.js'
import type {
  ManagedResource,
  Tenant,
  TenantMapping,
  TenantObservation,
  TenantState,
} from '@root/types/tenant.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { ORG_MAPPING_KEY } from '@services/grafana-sso.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { validateUniqueTenantId } from '../guards/unique-tenant.js'
import { orgMappingContains } from '../mapping/org-mapping.js'
import {
  buildObservation,
  isUpToDate,
} from '../observation/tenant-observation.js'

export type TenantStore = Pick<
  DatabaseService,
  | 'listTenants'
  | 'getTenant'
  | 'setTenantObservation'
  | 'setTenantConditions'
  | 'removeTenant'
>

export interface TenantExternalClientDeps {
  store: TenantStore
  sso: SsoSettingsClient
  logger: FastifyBaseLogger
  now?: () => Date
}

export const NOT_A_TENANT_MESSAGE = 'managed resource is not a Tenant custom resource'

function isTenant(resource: ManagedResource): resource is Tenant {
  return (
    resource.kind === 'Tenant' && 'spec' in resource && 'status' in resource
  )
}

/**
 * Narrows a managed resource to a Tenant
 *
 * @throws TypeMismatchError for any other kind of resource
 */
export function asTenant(resource: ManagedResource): Tenant {
  if (!isTenant(resource)) {
    throw new TypeMismatchError(NOT_A_TENANT_MESSAGE)
  }
  return resource
}

function toMapping(tenant: Tenant): TenantMapping {
  return {
    orgId: tenant.spec.orgId,
    viewerGroups: tenant.spec.viewerGroups,
    editorGroups: tenant.spec.editorGroups,
    adminGroups: tenant.spec.adminGroups,
  }
}

/**
 * Builds the mapping input for a sync triggered by `tenant`.
 *
 * The in-flight resource replaces its stored counterpart; a deleting tenant
 * is left out entirely.
 */
function mappingTenants(
  tenant: Tenant,
  stored: readonly Tenant[],
  deleting: boolean,
): TenantMapping[] {
  const mappings: TenantMapping[] = []
  let seen = false
  for (const other of stored) {
    if (other.uid === tenant.uid) {
      seen = true
      if (!deleting) {
        mappings.push(toMapping(tenant))
      }
      continue
    }
    mappings.push(toMapping(other))
  }
  if (!seen && !deleting) {
    mappings.push(toMapping(tenant))
  }
  return mappings
}

/**
 * Creates the reconciler hooks for tenant resources
 */
export class TenantExternalClient {
  private readonly store: TenantStore
  private readonly sso: SsoSettingsClient
  private readonly log: FastifyBaseLogger
  private readonly now: () => Date

  constructor(deps: TenantExternalClientDeps) {
    this.store = deps.store
    this.sso = deps.sso
    this.log = deps.logger
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Classifies a tenant without changing anything, except that a tenant
   * marked for deletion is removed from the org mapping on the spot.
   *
   * @param resource - The resource being reconciled
   * @returns Absent, ExistsNotSynced or Synced
   * @throws TypeMismatchError if the resource is not a Tenant
   */
  async observe(resource: ManagedResource): Promise<TenantState> {
    const tenant = asTenant(resource)
    const observation = tenant.status.atProvider

    if (!observation) {
      return 'Absent'
    }

    if (tenant.deletionRequestedAt) {
      try {
        await this.syncMapping(tenant, true)
      } catch (error) {
        this.log.warn(
          { error, tenant: tenant.name },
          'Failed to remove deleting tenant from Grafana org mapping',
        )
      }
      return 'Absent'
    }

    if (!isUpToDate(tenant.spec, observation)) {
      return 'ExistsNotSynced'
    }

    try {
      if (await this.isGrafanaDrifted(tenant)) {
        this.log.info(
          { tenant: tenant.name, orgId: tenant.spec.orgId },
          'Grafana org mapping drifted from tenant',
        )
        return 'ExistsNotSynced'
      }
    } catch (error) {
      this.log.debug(
        { error, tenant: tenant.name },
        'Could not verify Grafana org mapping',
      )
    }

    return 'Synced'
  }

  /**
   * Validates uniqueness and pushes the full tenant set to Grafana.
   * The returned observation must only be recorded once this resolves.
   *
   * @throws TypeMismatchError, ConflictError, StoreError or ExternalAPIError
   */
  async create(resource: ManagedResource): Promise<TenantObservation> {
    const tenant = asTenant(resource)
    const tenants = await this.store.listTenants()

    validateUniqueTenantId(tenant, tenants)

    const observation = buildObservation(tenant.spec, this.now())
    await this.sso.syncMapping(mappingTenants(tenant, tenants, false))

    this.log.info(
      { tenant: tenant.name, tenantId: tenant.spec.tenantId },
      'Tenant created in Grafana org mapping',
    )
    return observation
  }

  /**
   * Refreshes the observation and re-syncs the org mapping. A sync failure
   * is logged; the next observe will see the drift again.
   *
   * @throws TypeMismatchError if the resource is not a Tenant
   */
  async update(resource: ManagedResource): Promise<TenantObservation> {
    const tenant = asTenant(resource)
    const observation = buildObservation(tenant.spec, this.now())

    try {
      await this.syncMapping(tenant, false)
    } catch (error) {
      this.log.warn(
        { error, tenant: tenant.name },
        'Failed to sync Grafana org mapping',
      )
    }

    return observation
  }

  /**
   * Removes the tenant from the org mapping. Failures are logged.
   *
   * @throws TypeMismatchError if the resource is not a Tenant
   */
  async delete(resource: ManagedResource): Promise<void> {
    const tenant = asTenant(resource)

    try {
      await this.syncMapping(tenant, true)
    } catch (error) {
      this.log.warn(
        { error, tenant: tenant.name },
        'Failed to remove tenant from Grafana org mapping',
      )
    }
  }

  private async syncMapping(tenant: Tenant, deleting: boolean): Promise<void> {
    const tenants = await this.store.listTenants()
    await this.sso.syncMapping(mappingTenants(tenant, tenants, deleting))
  }

  /**
   * Checks the live org mapping for this tenant's presence marker.
   * Tenants without viewer or editor groups are never considered drifted.
   */
  private async isGrafanaDrifted(tenant: Tenant): Promise<boolean> {
    const hasGroups =
      (tenant.spec.viewerGroups?.length ?? 0) > 0 ||
      (tenant.spec.editorGroups?.length ?? 0) > 0
    if (!hasGroups) {
      return false
    }

    let orgMapping = ''
    try {
      const settings = await this.sso.fetchSettings()
      const value = settings[ORG_MAPPING_KEY]
      if (typeof value === 'string') {
        orgMapping = value
      }
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error instanceof ExternalAPIError
          ? error
          : new ExternalAPIError(errorMessage(error), undefined, {
              cause: error,
            })
      }
    }

    return !orgMappingContains(orgMapping, tenant.spec.orgId)
  }
}
