import { StoreError } from '@root/types/errors.js'
import type { TenantObservation } from '@root/types/tenant.types.js'
import { beforeEach, describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'
import {
  getTestDatabase,
  initializeTestDatabase,
  resetDatabase,
} from '../../helpers/database.js'

const acmeSpec = {
  tenantId: 'acme',
  orgId: 'org-1',
  viewerGroups: ['team-a'],
  retention: { logs: '30d' },
}

const observation: TenantObservation = {
  tenantId: 'acme',
  orgId: 'org-1',
  admins: [],
  viewerGroups: ['team-a'],
  editorGroups: [],
  adminGroups: [],
  retention: { logs: '30d' },
  lastUpdated: '2025-01-01T00:00:00Z',
}

describe('DatabaseService tenant methods', () => {
  beforeEach(async () => {
    await initializeTestDatabase()
    await resetDatabase()
  })

  it('should store a new tenant without observation in the Creating condition', async (ctx) => {
    const app = await build(ctx)

    const created = await app.db.createTenant({ name: 'acme', spec: acmeSpec })
    const loaded = await app.db.getTenant(created.uid)

    expect(loaded).toEqual(created)
    expect(loaded?.kind).toBe('Tenant')
    expect(loaded?.spec).toEqual(acmeSpec)
    expect(loaded?.status).toEqual({
      atProvider: null,
      conditions: { ready: 'Creating', message: null, lastReconciledAt: null },
    })
    expect(loaded?.deletionRequestedAt).toBeNull()
    expect((await app.db.getTenantByName('acme'))?.uid).toBe(created.uid)
  })

  it('should return undefined for unknown tenants', async (ctx) => {
    const app = await build(ctx)

    expect(await app.db.getTenant('missing')).toBeUndefined()
    expect(await app.db.getTenantByName('missing')).toBeUndefined()
  })

  it('should list tenants ordered by tenantId', async (ctx) => {
    const app = await build(ctx)
    await app.db.createTenant({
      name: 'zeta',
      spec: { ...acmeSpec, tenantId: 'zeta' },
    })
    await app.db.createTenant({
      name: 'alpha',
      spec: { ...acmeSpec, tenantId: 'alpha' },
    })
    await app.db.createTenant({
      name: 'mid',
      spec: { ...acmeSpec, tenantId: 'mid' },
    })

    const tenants = await app.db.listTenants()

    expect(tenants.map((tenant) => tenant.spec.tenantId)).toEqual([
      'alpha',
      'mid',
      'zeta',
    ])
  })

  it('should persist observations and conditions', async (ctx) => {
    const app = await build(ctx)
    const { uid } = await app.db.createTenant({ name: 'acme', spec: acmeSpec })

    expect(await app.db.setTenantObservation(uid, observation)).toBe(true)
    expect(
      await app.db.setTenantConditions(uid, {
        ready: 'Available',
        message: null,
        lastReconciledAt: '2025-01-01T00:00:00Z',
      }),
    ).toBe(true)

    const loaded = await app.db.getTenant(uid)
    expect(loaded?.status.atProvider).toEqual(observation)
    expect(loaded?.status.conditions).toEqual({
      ready: 'Available',
      message: null,
      lastReconciledAt: '2025-01-01T00:00:00Z',
    })
  })

  it('should read observations stored without adminGroups as empty', async (ctx) => {
    const app = await build(ctx)
    const { uid } = await app.db.createTenant({ name: 'acme', spec: acmeSpec })
    const { adminGroups: _omitted, ...legacy } = observation
    await getTestDatabase()('tenants')
      .where({ uid })
      .update({ observation: JSON.stringify(legacy) })

    const loaded = await app.db.getTenant(uid)

    expect(loaded?.status.atProvider?.adminGroups).toEqual([])
  })

  it('should replace the desired state', async (ctx) => {
    const app = await build(ctx)
    const { uid } = await app.db.createTenant({ name: 'acme', spec: acmeSpec })

    const updated = await app.db.updateTenantSpec(uid, {
      ...acmeSpec,
      orgId: 'org-2',
    })

    expect(updated).toBe(true)
    expect((await app.db.getTenant(uid))?.spec.orgId).toBe('org-2')
    expect(await app.db.updateTenantSpec('missing', acmeSpec)).toBe(false)
  })

  it('should set the deletion marker once', async (ctx) => {
    const app = await build(ctx)
    const { uid } = await app.db.createTenant({ name: 'acme', spec: acmeSpec })

    expect(await app.db.markTenantForDeletion(uid)).toBe(true)
    const marked = await app.db.getTenant(uid)
    expect(marked?.deletionRequestedAt).not.toBeNull()
    expect(marked?.status.conditions.ready).toBe('Deleting')

    expect(await app.db.markTenantForDeletion(uid)).toBe(true)
    expect((await app.db.getTenant(uid))?.deletionRequestedAt).toBe(
      marked?.deletionRequestedAt,
    )
    expect(await app.db.markTenantForDeletion('missing')).toBe(false)
  })

  it('should remove tenants permanently', async (ctx) => {
    const app = await build(ctx)
    const { uid } = await app.db.createTenant({ name: 'acme', spec: acmeSpec })

    expect(await app.db.removeTenant(uid)).toBe(true)
    expect(await app.db.getTenant(uid)).toBeUndefined()
    expect(await app.db.removeTenant(uid)).toBe(false)
  })

  it('should raise a StoreError for an unreadable record', async (ctx) => {
    const app = await build(ctx)
    const { uid } = await app.db.createTenant({ name: 'acme', spec: acmeSpec })
    await getTestDatabase()('tenants').where({ uid }).update({ spec: '{broken' })

    await expect(app.db.getTenant(uid)).rejects.toThrow(StoreError)
    await expect(app.db.listTenants()).rejects.toThrow('cannot list Tenants')
  })
})
