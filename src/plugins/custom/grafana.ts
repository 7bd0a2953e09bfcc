/**
 * Grafana Plugin
 *
 * Registers the Grafana SSO settings client used to read and replace the
 * org mapping.
 */
import { GrafanaSsoService } from '@services/grafana-sso.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    grafanaSso: GrafanaSsoService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const grafanaSso = new GrafanaSsoService(fastify.log, {
      url: fastify.config.grafanaUrl,
      credentials: fastify.config.grafanaCredentials,
      provider: fastify.config.grafanaSsoProvider,
      timeoutMs: fastify.config.grafanaTimeoutMs,
    })
    fastify.decorate('grafanaSso', grafanaSso)
  },
  {
    name: 'grafana',
    dependencies: ['config'],
  },
)
