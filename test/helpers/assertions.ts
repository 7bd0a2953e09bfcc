import type { LightMyRequestResponse } from 'fastify'
import { expect } from 'vitest'

/**
 * Asserts an error body produced by the global error handler
 *
 * @param response - Injected response
 * @param statusCode - Expected HTTP status
 * @param expectedMessage - Substring of the error message
 */
export function expectErrorResponse(
  response: LightMyRequestResponse,
  statusCode: number,
  expectedMessage: string,
) {
  expect(response.statusCode).toBe(statusCode)
  const body = response.json()
  expect(body.statusCode).toBe(statusCode)
  expect(body.message).toContain(expectedMessage)
}
