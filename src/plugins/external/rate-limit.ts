import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import fp from 'fastify-plugin'

const createRateLimitConfig = (fastify: FastifyInstance) => {
  return {
    max: fastify.config.rateLimitMax,
    timeWindow: '1 minute',
    // Orchestrator probes are never limited
    allowList: (req: FastifyRequest) => req.url.split('?')[0] === '/health',
  }
}

/**
 * Low overhead rate limiter for routes.
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, createRateLimitConfig(fastify))
  },
  {
    dependencies: ['config'],
  },
)
