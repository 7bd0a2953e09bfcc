/**
 * Base class for errors raised by the reconciler and its collaborators.
 * `statusCode` is picked up by the Fastify error handler.
 */
export class OrgMapperError extends Error {
  readonly code: string
  readonly statusCode: number

  constructor(
    message: string,
    code: string,
    statusCode: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.statusCode = statusCode
  }
}

/**
 * The SSO provider has never been configured in Grafana
 */
export class NotFoundError extends OrgMapperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', 404, options)
  }
}

/**
 * Transport, authentication or validation failure talking to Grafana
 */
export class ExternalAPIError extends OrgMapperError {
  readonly status: number | undefined

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, 'EXTERNAL_API_ERROR', 502, options)
    this.status = status
  }
}

/**
 * Another tenant already claims the same tenantId
 */
export class ConflictError extends OrgMapperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFLICT', 409, options)
  }
}

/**
 * The reconciler was handed a resource that is not a Tenant
 */
export class TypeMismatchError extends OrgMapperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TYPE_MISMATCH', 500, options)
  }
}

/**
 * Reading or writing tenant records failed
 */
export class StoreError extends OrgMapperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORE_ERROR', 500, options)
  }
}

/**
 * Formats an unknown thrown value for log messages and status conditions
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
