import fp from 'fastify-plugin'
import fastifySwagger from '@fastify/swagger'
import {
  serializerCompiler,
  validatorCompiler,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'
import type { FastifyInstance } from 'fastify'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  fastify.log.debug(
    `Configuring Swagger with base URL: ${fastify.config.baseUrl}`,
  )

  return {
    openapi: {
      info: {
        title: 'orgmapper API',
        description:
          'Tenant records and the Grafana SSO org mapping reconciled from them',
        version: 'V1',
      },
      servers: [
        {
          url: `${fastify.config.baseUrl}:${fastify.config.port}`,
          description: 'Primary Server',
        },
      ],
      tags: [
        {
          name: 'Tenants',
          description: 'Tenant records and their reconciliation status',
        },
        {
          name: 'Org Mapping',
          description: 'Computed Grafana org mapping',
        },
        {
          name: 'System',
          description: 'Health and diagnostics',
        },
      ],
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * Register Swagger; the document is served by the /api/openapi.json route
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    fastify.get('/api/openapi.json', { schema: { hide: true } }, async () =>
      fastify.swagger(),
    )
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
