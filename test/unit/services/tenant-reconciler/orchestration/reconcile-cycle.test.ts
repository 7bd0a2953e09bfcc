/**
 * Unit tests for the reconcile cycle driver and sweep
 */

import { ExternalAPIError } from '@root/types/errors.js'
import { encodeOrgMapping } from '@services/tenant-reconciler/mapping/org-mapping.js'
import { TenantExternalClient } from '@services/tenant-reconciler/operations/external-client.js'
import { ReconcileBackoff } from '@services/tenant-reconciler/orchestration/reconcile-backoff.js'
import {
  type ReconcileCycleDeps,
  reconcileAllTenants,
  reconcileTenant,
} from '@services/tenant-reconciler/orchestration/reconcile-cycle.js'
import { beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'
import {
  FakeSsoClient,
  FakeTenantStore,
  createTestTenant,
  observationFor,
} from '../../../../mocks/tenants.js'

const NOW = new Date('2025-05-06T07:08:09.000Z')

describe('reconcile-cycle', () => {
  let logger: ReturnType<typeof createMockLogger>
  let store: FakeTenantStore
  let sso: FakeSsoClient

  const deps = (): ReconcileCycleDeps => ({
    store,
    client: new TenantExternalClient({ store, sso, logger, now: () => NOW }),
    logger,
    now: () => NOW,
  })

  beforeEach(() => {
    logger = createMockLogger()
    store = new FakeTenantStore()
    sso = new FakeSsoClient()
  })

  describe('reconcileTenant', () => {
    it('should return null for an unknown tenant', async () => {
      expect(await reconcileTenant('uid-missing', deps())).toBeNull()
    })

    it('should create a new tenant and persist its observation', async () => {
      store = new FakeTenantStore([
        createTestTenant({ spec: { viewerGroups: ['team-a'] } }),
      ])

      const result = await reconcileTenant('uid-acme', deps())

      expect(result).toEqual({
        uid: 'uid-acme',
        name: 'acme',
        state: 'Absent',
        action: 'created',
      })
      expect(sso.orgMapping).toBe('team-a:org-1:Viewer')
      const stored = store.tenants.get('uid-acme')
      expect(stored?.status.atProvider?.tenantId).toBe('acme')
      expect(stored?.status.atProvider?.lastUpdated).toBe('2025-05-06T07:08:09Z')
      expect(stored?.status.conditions).toEqual({
        ready: 'Available',
        message: null,
        lastReconciledAt: '2025-05-06T07:08:09Z',
      })
    })

    it('should leave the observation empty and record the error when create fails', async () => {
      store = new FakeTenantStore([createTestTenant()])
      sso.failSync = new ExternalAPIError('cannot update SSO settings: 500')

      await expect(reconcileTenant('uid-acme', deps())).rejects.toThrow(
        'cannot update SSO settings: 500',
      )

      const stored = store.tenants.get('uid-acme')
      expect(stored?.status.atProvider).toBeNull()
      expect(stored?.status.conditions).toEqual({
        ready: 'ReconcileError',
        message: 'cannot update SSO settings: 500',
        lastReconciledAt: '2025-05-06T07:08:09Z',
      })
    })

    it('should record a conflict for a duplicate tenantId', async () => {
      const first = createTestTenant({ uid: 'uid-first' })
      first.status.atProvider = observationFor(first.spec)
      store = new FakeTenantStore([first, createTestTenant({ uid: 'uid-second' })])

      await expect(reconcileTenant('uid-second', deps())).rejects.toThrow(
        'tenant with this tenantId already exists: acme',
      )
      expect(sso.syncCalls).toHaveLength(0)
      expect(store.tenants.get('uid-second')?.status.conditions.ready).toBe(
        'ReconcileError',
      )
    })

    it('should update a changed tenant', async () => {
      const tenant = createTestTenant({
        spec: { orgId: 'org-2', viewerGroups: ['team-a'] },
      })
      tenant.status.atProvider = {
        ...observationFor(tenant.spec),
        orgId: 'org-1',
      }
      store = new FakeTenantStore([tenant])
      sso.settings = { orgMapping: 'team-a:org-1:Viewer' }

      const result = await reconcileTenant('uid-acme', deps())

      expect(result?.action).toBe('updated')
      expect(result?.state).toBe('ExistsNotSynced')
      expect(store.tenants.get('uid-acme')?.status.atProvider?.orgId).toBe(
        'org-2',
      )
      expect(sso.orgMapping).toBe('team-a:org-2:Viewer')
    })

    it('should record the new orgId even when Grafana is unavailable', async () => {
      const tenant = createTestTenant({ spec: { orgId: 'org-2' } })
      tenant.status.atProvider = {
        ...observationFor(tenant.spec),
        orgId: 'org-1',
      }
      store = new FakeTenantStore([tenant])
      sso.failSync = new ExternalAPIError('Grafana request failed: refused')

      const result = await reconcileTenant('uid-acme', deps())

      expect(result?.action).toBe('updated')
      expect(store.tenants.get('uid-acme')?.status.atProvider?.orgId).toBe(
        'org-2',
      )
    })

    it('should not write to Grafana for a synced tenant', async () => {
      const tenant = createTestTenant({ spec: { viewerGroups: ['org-1'] } })
      tenant.status.atProvider = observationFor(tenant.spec)
      store = new FakeTenantStore([tenant])
      sso.settings = { orgMapping: encodeOrgMapping([tenant.spec]) }

      const result = await reconcileTenant('uid-acme', deps())

      expect(result).toEqual({
        uid: 'uid-acme',
        name: 'acme',
        state: 'Synced',
        action: 'none',
      })
      expect(sso.replaceCount).toBe(0)
      expect(store.tenants.get('uid-acme')?.status.conditions.ready).toBe(
        'Available',
      )
    })

    it('should remove a deleted tenant from the mapping and finalize it', async () => {
      const tenant = createTestTenant({
        spec: { viewerGroups: ['team-a'] },
        deletionRequestedAt: '2025-05-01T00:00:00Z',
      })
      tenant.status.atProvider = observationFor(tenant.spec)
      const other = createTestTenant({
        uid: 'uid-globex',
        spec: { tenantId: 'globex', orgId: 'org-2', viewerGroups: ['team-g'] },
      })
      store = new FakeTenantStore([tenant, other])
      sso.settings = { orgMapping: 'team-a:org-1:Viewer,team-g:org-2:Viewer' }

      const result = await reconcileTenant('uid-acme', deps())

      expect(result?.action).toBe('deleted')
      expect(sso.orgMapping).toBe('team-g:org-2:Viewer')
      expect(store.tenants.has('uid-acme')).toBe(false)
    })

    it('should finalize a deleted tenant that was never created without syncing', async () => {
      store = new FakeTenantStore([
        createTestTenant({ deletionRequestedAt: '2025-05-01T00:00:00Z' }),
      ])

      const result = await reconcileTenant('uid-acme', deps())

      expect(result?.action).toBe('deleted')
      expect(sso.syncCalls).toHaveLength(0)
      expect(store.tenants.size).toBe(0)
    })

    it('should finalize a deleted tenant even when Grafana is unavailable', async () => {
      const tenant = createTestTenant({
        deletionRequestedAt: '2025-05-01T00:00:00Z',
      })
      tenant.status.atProvider = observationFor(tenant.spec)
      store = new FakeTenantStore([tenant])
      sso.failSync = new ExternalAPIError('Grafana request failed: refused')

      const result = await reconcileTenant('uid-acme', deps())

      expect(result?.action).toBe('deleted')
      expect(store.tenants.size).toBe(0)
    })
  })

  describe('convergence', () => {
    it('should converge on the full tenant set after a lost race', async () => {
      const acme = createTestTenant({ spec: { viewerGroups: ['team-a'] } })
      const globex = createTestTenant({
        uid: 'uid-globex',
        spec: { tenantId: 'globex', orgId: 'org-2', viewerGroups: ['team-g'] },
      })
      store = new FakeTenantStore([acme, globex])

      // globex's replace lands last, built from a snapshot without acme
      const client = new TenantExternalClient({
        store,
        sso,
        logger,
        now: () => NOW,
      })
      await client.create(acme)
      await sso.syncMapping([globex.spec])
      expect(sso.orgMapping).toBe('team-g:org-2:Viewer')

      // acme was recorded as created; its next periodic cycle finds the
      // self-referential viewer entry missing and resyncs
      await store.setTenantObservation(acme.uid, observationFor(acme.spec))
      await reconcileTenant('uid-acme', deps())
      await reconcileTenant('uid-globex', deps())

      const current = await store.listTenants()
      expect(sso.orgMapping).toBe(
        encodeOrgMapping(current.map((tenant) => tenant.spec)),
      )
      expect(sso.orgMapping).toBe('team-a:org-1:Viewer,team-g:org-2:Viewer')
    })
  })

  describe('reconcileAllTenants', () => {
    it('should reconcile every tenant and count the outcomes', async () => {
      const synced = createTestTenant({
        uid: 'uid-synced',
        spec: { tenantId: 'synced' },
      })
      synced.status.atProvider = observationFor(synced.spec)
      store = new FakeTenantStore([
        createTestTenant({ spec: { viewerGroups: ['team-a'] } }),
        synced,
        createTestTenant({
          uid: 'uid-gone',
          spec: { tenantId: 'gone' },
          deletionRequestedAt: '2025-05-01T00:00:00Z',
        }),
      ])

      const result = await reconcileAllTenants({ ...deps(), concurrency: 2 })

      expect(result).toEqual({
        processed: 3,
        created: 1,
        updated: 0,
        deleted: 1,
        unchanged: 1,
        skipped: 0,
        failed: 0,
      })
    })

    it('should count failures without throwing and back off the tenant', async () => {
      store = new FakeTenantStore([createTestTenant()])
      sso.failSync = new ExternalAPIError('cannot get SSO settings: 503')
      const backoff = new ReconcileBackoff(60_000)

      const first = await reconcileAllTenants({
        ...deps(),
        concurrency: 1,
        backoff,
      })
      const second = await reconcileAllTenants({
        ...deps(),
        concurrency: 1,
        backoff,
      })

      expect(first.failed).toBe(1)
      expect(second.skipped).toBe(1)
      expect(second.processed).toBe(0)
      expect(backoff.failureCount('uid-acme')).toBe(1)
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ tenant: 'acme', retryInMs: 60_000 }),
        'Tenant reconciliation failed',
      )
    })

    it('should propagate a failed tenant listing', async () => {
      store.failList = true

      await expect(
        reconcileAllTenants({ ...deps(), concurrency: 1 }),
      ).rejects.toThrow('store unavailable')
    })
  })
})
