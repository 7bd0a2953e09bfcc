import errorHandler from '@plugins/custom/error-handler.js'
import database from '@plugins/custom/database.js'
import grafana from '@plugins/custom/grafana.js'
import notFound from '@plugins/custom/not-found.js'
import scheduler from '@plugins/custom/scheduler.js'
import tenantReconciler from '@plugins/custom/tenant-reconciler.js'
import env from '@plugins/external/env.js'
import helmet from '@plugins/external/helmet.js'
import rateLimit from '@plugins/external/rate-limit.js'
import sensible from '@plugins/external/sensible.js'
import swagger from '@plugins/external/swagger.js'
import healthRoutes from '@root/routes/health.js'
import orgMappingRoutes from '@root/routes/v1/org-mapping/org-mapping.js'
import tenantRoutes from '@root/routes/v1/tenants/tenants.js'
import type { FastifyInstance } from 'fastify'

/**
 * Registers plugins in dependency order, then the routes.
 *
 * External plugins (config, HTTP hardening, OpenAPI) come first, then the
 * services (database, Grafana client, scheduler, reconciler), then the
 * error and not-found handlers and finally the API routes.
 */
export default async function serviceApp(fastify: FastifyInstance) {
  // External plugins
  await fastify.register(env)
  await fastify.register(sensible)
  await fastify.register(helmet)
  await fastify.register(rateLimit)
  await fastify.register(swagger)

  // Custom plugins
  await fastify.register(database)
  await fastify.register(grafana)
  await fastify.register(scheduler)
  await fastify.register(tenantReconciler)
  await fastify.register(errorHandler)
  await fastify.register(notFound)

  // Routes
  await fastify.register(healthRoutes)
  await fastify.register(tenantRoutes, { prefix: '/v1' })
  await fastify.register(orgMappingRoutes, { prefix: '/v1' })
}
