import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: ['port', 'grafanaUrl'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 3010,
    },
    dbPath: {
      type: 'string',
      default: './data/db/orgmapper.db',
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    grafanaUrl: {
      type: 'string',
      default: 'http://localhost:3000',
    },
    grafanaCredentials: {
      type: 'string',
      default: '',
    },
    grafanaSsoProvider: {
      type: 'string',
      default: 'generic_oauth',
    },
    grafanaTimeoutMs: {
      type: 'number',
      default: 10000,
    },
    reconcileIntervalSeconds: {
      type: 'number',
      minimum: 0,
      default: 60,
    },
    reconcileConcurrency: {
      type: 'number',
      minimum: 1,
      default: 4,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    if (!fastify.config.grafanaCredentials.trim()) {
      fastify.log.warn(
        'grafanaCredentials is empty; Grafana requests will be sent without authentication',
      )
    }
  },
  { name: 'config' },
)
