/**
 * Tenant Reconciler Plugin
 *
 * Registers TenantReconcilerService and the periodic sweep that reconciles
 * every tenant. A `reconcileIntervalSeconds` of 0 leaves the sweep off;
 * tenants are then only reconciled through the API.
 */

import { TenantReconcilerService } from '@services/tenant-reconciler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

export const TENANT_RECONCILE_JOB = 'tenant-reconcile'

declare module 'fastify' {
  interface FastifyInstance {
    tenantReconciler: TenantReconcilerService
  }
}

export default fp(
  async function tenantReconciler(fastify: FastifyInstance) {
    const service = new TenantReconcilerService(fastify.log, fastify)
    fastify.decorate('tenantReconciler', service)

    fastify.addHook('onReady', async () => {
      const seconds = fastify.config.reconcileIntervalSeconds
      if (seconds <= 0) {
        fastify.log.info('Periodic tenant reconciliation is disabled')
        return
      }

      await fastify.scheduler.scheduleJob(
        TENANT_RECONCILE_JOB,
        { seconds, runImmediately: true },
        async () => {
          await fastify.tenantReconciler.reconcileAll()
        },
      )
    })
  },
  {
    name: 'tenant-reconciler',
    dependencies: ['database', 'grafana', 'scheduler'],
  },
)
