/**
 * Tenant Reconciler Service
 *
 * Keeps Grafana's SSO org mapping converged on the full set of stored
 * tenants. Exposed as `fastify.tenantReconciler`.
 *
 * Key Features:
 * - Per-tenant reconcile cycles (observe, create, update, delete, finalize)
 * - Periodic sweep over every tenant with bounded concurrency
 * - Exponential per-tenant backoff after failed cycles
 * - Preview of the mapping document the current tenant set produces
 */

import type {
  MappingEntry,
  ReconcileSweepResult,
  TenantReconcileResult,
} from '@root/types/tenant.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  encodeOrgMapping,
  parseOrgMappingEntry,
  splitOrgMapping,
} from './tenant-reconciler/mapping/org-mapping.js'
import { TenantExternalClient } from './tenant-reconciler/operations/external-client.js'
import { ReconcileBackoff } from './tenant-reconciler/orchestration/reconcile-backoff.js'
import {
  reconcileAllTenants,
  reconcileTenant,
} from './tenant-reconciler/orchestration/reconcile-cycle.js'

export interface OrgMappingPreview {
  orgMapping: string
  entries: MappingEntry[]
  tenantCount: number
}

export class TenantReconcilerService {
  private readonly log: FastifyBaseLogger
  private readonly client: TenantExternalClient
  private readonly backoff: ReconcileBackoff

  /**
   * Creates a new TenantReconcilerService instance
   *
   * @param baseLog - Fastify logger instance
   * @param fastify - Fastify instance for accessing services and config
   */
  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'TENANT_RECONCILER')
    this.client = new TenantExternalClient({
      store: this.db,
      sso: this.fastify.grafanaSso,
      logger: this.log,
    })
    this.backoff = new ReconcileBackoff(
      Math.max(1, this.fastify.config.reconcileIntervalSeconds) * 1000,
    )
  }

  /**
   * Access to database service
   */
  private get db() {
    return this.fastify.db
  }

  /**
   * Runs one reconcile cycle for a tenant, outside the periodic sweep.
   * A successful cycle clears any pending backoff for the tenant.
   *
   * @param uid - Tenant resource identity
   * @returns The outcome, or null if the tenant does not exist
   */
  async reconcileTenant(uid: string): Promise<TenantReconcileResult | null> {
    const result = await reconcileTenant(uid, {
      store: this.db,
      client: this.client,
      logger: this.log,
    })
    this.backoff.recordSuccess(uid)
    return result
  }

  /**
   * Runs a cycle for every tenant not currently backing off
   */
  async reconcileAll(): Promise<ReconcileSweepResult> {
    return reconcileAllTenants({
      store: this.db,
      client: this.client,
      logger: this.log,
      concurrency: this.fastify.config.reconcileConcurrency,
      backoff: this.backoff,
    })
  }

  /**
   * Computes the mapping document the current tenant set would produce,
   * without touching Grafana.
   */
  async previewOrgMapping(): Promise<OrgMappingPreview> {
    const tenants = await this.db.listTenants()
    const orgMapping = encodeOrgMapping(tenants.map((tenant) => tenant.spec))
    const entries: MappingEntry[] = []
    for (const raw of splitOrgMapping(orgMapping)) {
      const entry = parseOrgMappingEntry(raw)
      if (entry) {
        entries.push(entry)
      }
    }
    return { orgMapping, entries, tenantCount: tenants.length }
  }
}
