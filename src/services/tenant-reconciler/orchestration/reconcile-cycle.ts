/**
 * Reconcile Cycle Orchestration
 *
 * Drives one observe → create/update/delete pass per tenant and persists the
 * outcome. The sweep runs a cycle for every tenant, bounded by p-limit.
 */

import { errorMessage } from '@root/types/errors.js'
import type {
  ReconcileSweepResult,
  Tenant,
  TenantConditions,
  TenantReconcileResult,
} from '@root/types/tenant.types.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'
import { formatTimestamp } from '../observation/tenant-observation.js'
import type {
  TenantExternalClient,
  TenantStore,
} from '../operations/external-client.js'
import type { ReconcileBackoff } from './reconcile-backoff.js'

export interface ReconcileCycleDeps {
  store: TenantStore
  client: TenantExternalClient
  logger: FastifyBaseLogger
  now?: () => Date
}

export interface ReconcileSweepDeps extends ReconcileCycleDeps {
  concurrency: number
  backoff?: ReconcileBackoff
}

function availableConditions(now: Date): TenantConditions {
  return {
    ready: 'Available',
    message: null,
    lastReconciledAt: formatTimestamp(now),
  }
}

async function runCycle(
  tenant: Tenant,
  deps: ReconcileCycleDeps,
  now: () => Date,
): Promise<TenantReconcileResult> {
  const { store, client } = deps
  const base = { uid: tenant.uid, name: tenant.name }

  const state = await client.observe(tenant)

  if (state === 'Absent' && tenant.deletionRequestedAt) {
    if (tenant.status.atProvider) {
      await client.delete(tenant)
    }
    await store.removeTenant(tenant.uid)
    deps.logger.info({ tenant: tenant.name }, 'Tenant finalized and removed')
    return { ...base, state, action: 'deleted' }
  }

  if (state === 'Absent') {
    const observation = await client.create(tenant)
    await store.setTenantObservation(tenant.uid, observation)
    await store.setTenantConditions(tenant.uid, availableConditions(now()))
    return { ...base, state, action: 'created' }
  }

  if (state === 'ExistsNotSynced') {
    const observation = await client.update(tenant)
    await store.setTenantObservation(tenant.uid, observation)
    await store.setTenantConditions(tenant.uid, availableConditions(now()))
    return { ...base, state, action: 'updated' }
  }

  if (tenant.status.conditions.ready !== 'Available') {
    await store.setTenantConditions(tenant.uid, availableConditions(now()))
  }
  return { ...base, state, action: 'none' }
}

/**
 * Runs one reconciliation cycle for a tenant.
 *
 * On failure the `ReconcileError` condition is recorded (when the record
 * still exists) and the original error is rethrown.
 *
 * @param uid - Tenant resource identity
 * @param deps - Store, external client and logger
 * @returns The outcome, or null when the tenant does not exist
 */
export async function reconcileTenant(
  uid: string,
  deps: ReconcileCycleDeps,
): Promise<TenantReconcileResult | null> {
  const now = deps.now ?? (() => new Date())
  const tenant = await deps.store.getTenant(uid)
  if (!tenant) {
    return null
  }

  try {
    const result = await runCycle(tenant, deps, now)
    deps.logger.debug(
      { tenant: tenant.name, state: result.state, action: result.action },
      'Tenant reconciled',
    )
    return result
  } catch (error) {
    try {
      await deps.store.setTenantConditions(uid, {
        ready: 'ReconcileError',
        message: errorMessage(error),
        lastReconciledAt: formatTimestamp(now()),
      })
    } catch (conditionError) {
      deps.logger.error(
        { error: conditionError, tenant: tenant.name },
        'Failed to record reconcile error condition',
      )
    }
    throw error
  }
}

/**
 * Runs a cycle for every stored tenant. Tenants still backing off from a
 * previous failure are skipped; failures are counted, never thrown.
 *
 * @param deps - Cycle dependencies plus concurrency and optional backoff
 * @throws StoreError if the tenant list cannot be read
 */
export async function reconcileAllTenants(
  deps: ReconcileSweepDeps,
): Promise<ReconcileSweepResult> {
  const { logger, backoff } = deps
  const tenants = await deps.store.listTenants()
  backoff?.retain(tenants.map((tenant) => tenant.uid))

  const result: ReconcileSweepResult = {
    processed: 0,
    created: 0,
    updated: 0,
    deleted: 0,
    unchanged: 0,
    skipped: 0,
    failed: 0,
  }

  const limit = pLimit(Math.max(1, deps.concurrency))

  await Promise.all(
    tenants.map((tenant) =>
      limit(async () => {
        if (backoff && !backoff.shouldAttempt(tenant.uid)) {
          result.skipped++
          return
        }

        try {
          const outcome = await reconcileTenant(tenant.uid, deps)
          backoff?.recordSuccess(tenant.uid)
          if (!outcome) {
            result.skipped++
            return
          }
          result.processed++
          switch (outcome.action) {
            case 'created':
              result.created++
              break
            case 'updated':
              result.updated++
              break
            case 'deleted':
              result.deleted++
              break
            default:
              result.unchanged++
          }
        } catch (error) {
          result.processed++
          result.failed++
          const retryInMs = backoff?.recordFailure(tenant.uid)
          logger.warn(
            { error, tenant: tenant.name, retryInMs },
            'Tenant reconciliation failed',
          )
        }
      }),
    ),
  )

  logger.info(result, 'Reconciliation sweep completed')
  return result
}
