import { STATUS_CODES } from 'node:http'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { OrgMapperError } from '@root/types/errors.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

function clientErrorName(err: FastifyError | OrgMapperError, statusCode: number) {
  if ('error' in err && typeof err.error === 'string') {
    return err.error
  }
  return STATUS_CODES[statusCode] ?? 'Client Error'
}

/**
 * Global error handler plugin.
 * Provides consistent error responses and appropriate logging.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler(
    (err: FastifyError | OrgMapperError, request, reply) => {
      const statusCode = err.statusCode ?? 500
      // Avoid logging query/params to prevent leaking tokens/PII
      const logData = {
        err,
        request: {
          id: request.id,
          method: request.method,
          path: request.url.split('?')[0],
          route: request.routeOptions?.url,
        },
      }

      if (statusCode >= 500) {
        request.log.error(logData, 'Internal server error occurred')
      } else {
        request.log.warn(logData, 'Client error occurred')
      }
      reply.code(statusCode)
      const isServerError = statusCode >= 500
      const payload: ErrorResponse = {
        statusCode,
        code: err.code || 'GENERIC_ERROR',
        error: isServerError
          ? 'Internal Server Error'
          : clientErrorName(err, statusCode),
        message: isServerError
          ? 'Internal Server Error'
          : err.message || 'An error occurred',
      }
      return payload
    },
  )
}

export default fp(errorHandler, {
  name: 'error-handler',
})
