import { ErrorSchema } from '@schemas/common/error.schema.js'
import { OrgMappingResponseSchema } from '@schemas/org-mapping/org-mapping.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/org-mapping',
    {
      schema: {
        summary: 'Preview org mapping',
        operationId: 'getOrgMapping',
        description:
          'The org mapping computed from the current tenant set, as it would be written to Grafana',
        response: {
          200: OrgMappingResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Org Mapping'],
      },
    },
    async (request, reply) => {
      try {
        const preview = await fastify.tenantReconciler.previewOrgMapping()
        return { success: true, ...preview }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to compute org mapping',
        })
        return reply.internalServerError('Failed to compute org mapping')
      }
    },
  )
}

export default plugin
