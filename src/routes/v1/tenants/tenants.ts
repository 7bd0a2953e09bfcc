import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  CreateTenantSchema,
  GetTenantsResponseSchema,
  TenantMutationResponseSchema,
  TenantNameParamsSchema,
  TenantResponseSchema,
  UpdateTenantSchema,
} from '@schemas/tenants/tenants.schema.js'
import { ConflictError, errorMessage } from '@root/types/errors.js'
import type {
  Tenant,
  TenantReconcileResult,
} from '@root/types/tenant.types.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyRequest } from 'fastify'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  /**
   * Runs one cycle right after a write. Failures are logged and recorded on
   * the tenant's conditions; the periodic sweep retries.
   */
  const reconcileAfterWrite = async (
    request: FastifyRequest,
    tenant: Tenant,
  ): Promise<TenantReconcileResult | null> => {
    try {
      return await fastify.tenantReconciler.reconcileTenant(tenant.uid)
    } catch (error) {
      logRouteError(fastify.log, request, error, {
        message: 'Tenant stored but reconciliation failed',
        level: 'warn',
        tenant: tenant.name,
      })
      return null
    }
  }

  // List tenants
  fastify.get(
    '/tenants',
    {
      schema: {
        summary: 'List tenants',
        operationId: 'getTenants',
        description:
          'List every tenant with its desired state and reconciliation status',
        response: {
          200: GetTenantsResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Tenants'],
      },
    },
    async (request, reply) => {
      try {
        const tenants = await fastify.db.listTenants()
        return {
          success: true,
          message: 'Tenants retrieved successfully',
          tenants,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to list tenants',
        })
        return reply.internalServerError('Failed to list tenants')
      }
    },
  )

  // Get tenant
  fastify.get(
    '/tenants/:name',
    {
      schema: {
        summary: 'Get tenant',
        operationId: 'getTenant',
        description: 'Retrieve a tenant by name',
        params: TenantNameParamsSchema,
        response: {
          200: TenantResponseSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Tenants'],
      },
    },
    async (request, reply) => {
      try {
        const tenant = await fastify.db.getTenantByName(request.params.name)
        if (!tenant) {
          return reply.notFound('Tenant not found')
        }
        return tenant
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to get tenant',
        })
        return reply.internalServerError('Failed to get tenant')
      }
    },
  )

  // Create tenant
  fastify.post(
    '/tenants',
    {
      schema: {
        summary: 'Create tenant',
        operationId: 'createTenant',
        description:
          'Store a new tenant and reconcile it into the Grafana org mapping',
        body: CreateTenantSchema,
        response: {
          201: TenantMutationResponseSchema,
          409: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Tenants'],
      },
    },
    async (request, reply) => {
      try {
        if (await fastify.db.getTenantByName(request.body.name)) {
          return reply.conflict(
            `Tenant with name "${request.body.name}" already exists`,
          )
        }

        const stored = await fastify.db.createTenant(request.body)
        const result = await reconcileAfterWrite(request, stored)
        const tenant = (await fastify.db.getTenant(stored.uid)) ?? null

        reply.status(201)
        return {
          success: true,
          message: result
            ? 'Tenant created and reconciled'
            : `Tenant created; reconciliation failed: ${tenant?.status.conditions.message ?? 'unknown error'}`,
          tenant,
          state: result?.state ?? null,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to create tenant',
        })
        return reply.internalServerError('Failed to create tenant')
      }
    },
  )

  // Update tenant
  fastify.put(
    '/tenants/:name',
    {
      schema: {
        summary: 'Update tenant',
        operationId: 'updateTenant',
        description:
          'Replace the desired state of a tenant and reconcile the change',
        params: TenantNameParamsSchema,
        body: UpdateTenantSchema,
        response: {
          200: TenantMutationResponseSchema,
          404: ErrorSchema,
          409: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Tenants'],
      },
    },
    async (request, reply) => {
      try {
        const existing = await fastify.db.getTenantByName(request.params.name)
        if (!existing) {
          return reply.notFound('Tenant not found')
        }
        if (existing.deletionRequestedAt) {
          return reply.conflict('Tenant is being deleted')
        }

        await fastify.db.updateTenantSpec(existing.uid, request.body.spec)
        const result = await reconcileAfterWrite(request, existing)
        const tenant = (await fastify.db.getTenant(existing.uid)) ?? null

        return {
          success: true,
          message: result
            ? 'Tenant updated and reconciled'
            : `Tenant updated; reconciliation failed: ${tenant?.status.conditions.message ?? 'unknown error'}`,
          tenant,
          state: result?.state ?? null,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to update tenant',
        })
        return reply.internalServerError('Failed to update tenant')
      }
    },
  )

  // Delete tenant
  fastify.delete(
    '/tenants/:name',
    {
      schema: {
        summary: 'Delete tenant',
        operationId: 'deleteTenant',
        description:
          'Mark a tenant for deletion; it is removed from the org mapping and then finalized',
        params: TenantNameParamsSchema,
        response: {
          202: TenantMutationResponseSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Tenants'],
      },
    },
    async (request, reply) => {
      try {
        const existing = await fastify.db.getTenantByName(request.params.name)
        if (!existing) {
          return reply.notFound('Tenant not found')
        }

        await fastify.db.markTenantForDeletion(existing.uid)
        const result = await reconcileAfterWrite(request, existing)
        const tenant = (await fastify.db.getTenant(existing.uid)) ?? null

        reply.status(202)
        return {
          success: true,
          message: tenant
            ? 'Tenant marked for deletion'
            : 'Tenant deleted',
          tenant,
          state: result?.state ?? null,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to delete tenant',
        })
        return reply.internalServerError('Failed to delete tenant')
      }
    },
  )

  // Reconcile tenant
  fastify.post(
    '/tenants/:name/reconcile',
    {
      schema: {
        summary: 'Reconcile tenant',
        operationId: 'reconcileTenant',
        description: 'Run one reconciliation cycle for a tenant now',
        params: TenantNameParamsSchema,
        response: {
          200: TenantMutationResponseSchema,
          404: ErrorSchema,
          409: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Tenants'],
      },
    },
    async (request, reply) => {
      try {
        const existing = await fastify.db.getTenantByName(request.params.name)
        if (!existing) {
          return reply.notFound('Tenant not found')
        }

        const result = await fastify.tenantReconciler.reconcileTenant(
          existing.uid,
        )
        const tenant = (await fastify.db.getTenant(existing.uid)) ?? null

        return {
          success: true,
          message: `Tenant reconciled: ${result?.action ?? 'none'}`,
          tenant,
          state: result?.state ?? null,
        }
      } catch (error) {
        if (error instanceof ConflictError) {
          return reply.conflict(error.message)
        }
        logRouteError(fastify.log, request, error, {
          message: 'Failed to reconcile tenant',
        })
        return reply.internalServerError(
          `Failed to reconcile tenant: ${errorMessage(error)}`,
        )
      }
    },
  )
}

export default plugin
