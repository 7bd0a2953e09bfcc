import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports database connectivity. Grafana reachability is not checked; reconciliation failures show up on tenant conditions.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      let dbStatus: 'ok' | 'failed' = 'ok'

      try {
        await fastify.db.knex.raw('SELECT 1')
      } catch (error) {
        fastify.log.error(
          { error },
          'Health check failed: database connectivity error',
        )
        dbStatus = 'failed'
      }

      const isHealthy = dbStatus === 'ok'
      return reply.status(isHealthy ? 200 : 503).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: {
          database: dbStatus,
        },
      })
    },
  )
}

export default plugin
