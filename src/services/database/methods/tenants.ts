import { randomUUID } from 'node:crypto'
import {
  StoredTenantParametersSchema,
  TenantConditionsSchema,
  TenantObservationSchema,
} from '@schemas/tenants/tenants.schema.js'
import { StoreError } from '@root/types/errors.js'
import type {
  Tenant,
  TenantConditions,
  TenantCreate,
  TenantObservation,
  TenantParameters,
} from '@root/types/tenant.types.js'
import type { DatabaseService } from '@services/database.service.js'

export interface TenantRow {
  uid: string
  name: string
  tenant_id: string
  spec: string
  observation: string | null
  ready: string
  message: string | null
  last_reconciled_at: string | null
  deletion_requested_at: string | null
  created_at: string
  updated_at: string
}

/**
 * Maps a raw `tenants` row to a Tenant resource, validating the JSON columns
 */
function mapTenantRow(row: TenantRow): Tenant {
  const observation =
    row.observation === null
      ? null
      : TenantObservationSchema.parse(JSON.parse(row.observation))

  return {
    kind: 'Tenant',
    uid: row.uid,
    name: row.name,
    spec: StoredTenantParametersSchema.parse(JSON.parse(row.spec)),
    status: {
      atProvider: observation,
      conditions: {
        ready: TenantConditionsSchema.shape.ready.parse(row.ready),
        message: row.message,
        lastReconciledAt: row.last_reconciled_at,
      },
    },
    deletionRequestedAt: row.deletion_requested_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

/**
 * Runs a store operation, wrapping any failure in a StoreError
 */
async function withStoreError<T>(
  message: string,
  operation: () => Promise<T>,
): Promise<T> {
  try {
    return await operation()
  } catch (error) {
    if (error instanceof StoreError) {
      throw error
    }
    throw new StoreError(message, { cause: error })
  }
}

/**
 * Lists every tenant resource, including those marked for deletion.
 *
 * Tenants are ordered by tenantId, then uid, so the org mapping built from
 * the list is stable across reconciliations.
 *
 * @returns All tenant resources
 */
export async function listTenants(this: DatabaseService): Promise<Tenant[]> {
  return withStoreError('cannot list Tenants', async () => {
    const rows = await this.knex<TenantRow>('tenants')
      .select('*')
      .orderBy([
        { column: 'tenant_id', order: 'asc' },
        { column: 'uid', order: 'asc' },
      ])
    return rows.map(mapTenantRow)
  })
}

/**
 * Retrieves a tenant by its uid
 *
 * @param uid - Resource identity
 * @returns The tenant, or undefined if it does not exist
 */
export async function getTenant(
  this: DatabaseService,
  uid: string,
): Promise<Tenant | undefined> {
  return withStoreError(`cannot get Tenant ${uid}`, async () => {
    const row = await this.knex<TenantRow>('tenants').where({ uid }).first()
    return row ? mapTenantRow(row) : undefined
  })
}

/**
 * Retrieves a tenant by its unique name
 */
export async function getTenantByName(
  this: DatabaseService,
  name: string,
): Promise<Tenant | undefined> {
  return withStoreError(`cannot get Tenant ${name}`, async () => {
    const row = await this.knex<TenantRow>('tenants').where({ name }).first()
    return row ? mapTenantRow(row) : undefined
  })
}

/**
 * Stores a new tenant record. The record starts without an observation and
 * in the `Creating` condition until the reconciler picks it up.
 *
 * @param data - Name and desired state
 * @returns The stored tenant
 */
export async function createTenant(
  this: DatabaseService,
  data: TenantCreate,
): Promise<Tenant> {
  return withStoreError(`cannot create Tenant ${data.name}`, async () => {
    const now = this.timestamp
    const row: TenantRow = {
      uid: randomUUID(),
      name: data.name,
      tenant_id: data.spec.tenantId,
      spec: JSON.stringify(data.spec),
      observation: null,
      ready: 'Creating',
      message: null,
      last_reconciled_at: null,
      deletion_requested_at: null,
      created_at: now,
      updated_at: now,
    }
    await this.knex<TenantRow>('tenants').insert(row)
    return mapTenantRow(row)
  })
}

/**
 * Replaces a tenant's desired state
 *
 * @param uid - Resource identity
 * @param spec - New desired state
 * @returns True if the tenant exists and was updated
 */
export async function updateTenantSpec(
  this: DatabaseService,
  uid: string,
  spec: TenantParameters,
): Promise<boolean> {
  return withStoreError(`cannot update Tenant ${uid}`, async () => {
    const updated = await this.knex<TenantRow>('tenants')
      .where({ uid })
      .update({
        tenant_id: spec.tenantId,
        spec: JSON.stringify(spec),
        updated_at: this.timestamp,
      })
    return updated > 0
  })
}

/**
 * Sets the deletion marker on a tenant. The reconciler finalizes the removal.
 *
 * @returns True if the tenant exists
 */
export async function markTenantForDeletion(
  this: DatabaseService,
  uid: string,
): Promise<boolean> {
  return withStoreError(`cannot mark Tenant ${uid} for deletion`, async () => {
    const updated = await this.knex<TenantRow>('tenants')
      .where({ uid })
      .whereNull('deletion_requested_at')
      .update({
        deletion_requested_at: this.timestamp,
        ready: 'Deleting',
        updated_at: this.timestamp,
      })
    if (updated > 0) {
      return true
    }
    const existing = await this.knex<TenantRow>('tenants').where({ uid }).first()
    return existing !== undefined
  })
}

/**
 * Persists the reconciler's observation of a tenant
 */
export async function setTenantObservation(
  this: DatabaseService,
  uid: string,
  observation: TenantObservation,
): Promise<boolean> {
  return withStoreError(`cannot set observation of Tenant ${uid}`, async () => {
    const updated = await this.knex<TenantRow>('tenants')
      .where({ uid })
      .update({ observation: JSON.stringify(observation) })
    return updated > 0
  })
}

/**
 * Persists the outcome of the latest reconciliation of a tenant
 */
export async function setTenantConditions(
  this: DatabaseService,
  uid: string,
  conditions: TenantConditions,
): Promise<boolean> {
  return withStoreError(`cannot set conditions of Tenant ${uid}`, async () => {
    const updated = await this.knex<TenantRow>('tenants')
      .where({ uid })
      .update({
        ready: conditions.ready,
        message: conditions.message,
        last_reconciled_at: conditions.lastReconciledAt,
      })
    return updated > 0
  })
}

/**
 * Removes a tenant record permanently
 *
 * @returns True if a record was removed
 */
export async function removeTenant(
  this: DatabaseService,
  uid: string,
): Promise<boolean> {
  return withStoreError(`cannot remove Tenant ${uid}`, async () => {
    const deleted = await this.knex<TenantRow>('tenants').where({ uid }).delete()
    return deleted > 0
  })
}
