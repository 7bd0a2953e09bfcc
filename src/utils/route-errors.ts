import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

export interface RouteErrorOptions {
  /** Log message; defaults to `Error in route <METHOD> <route>` */
  message?: string
  level?: 'error' | 'warn' | 'info'
  /** Extra fields merged into the log entry */
  context?: Record<string, unknown>
  [key: string]: unknown
}

/**
 * Logs a route failure with the method and route pattern attached
 *
 * @param logger - Logger to write to
 * @param request - The failing request
 * @param error - Whatever the handler caught
 * @param options - Message, level and extra context
 */
export function logRouteError(
  logger: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...fields } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  logger[level](
    {
      error,
      route,
      ...fields,
      ...context,
    },
    message ?? `Error in route ${route}`,
  )
}
