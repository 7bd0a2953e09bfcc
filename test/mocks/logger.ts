import type { FastifyBaseLogger } from 'fastify'
import { vi } from 'vitest'

/**
 * Create a mock Fastify logger for testing.
 * Every level method is a vi.fn(); child() hands back a fresh mock.
 *
 * @example
 * const logger = createMockLogger()
 * const client = new TenantExternalClient({ store, sso, logger })
 * expect(logger.warn).toHaveBeenCalledWith(...)
 */
export function createMockLogger(): FastifyBaseLogger {
  const mockLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    silent: vi.fn(),
    child: vi.fn(() => createMockLogger()),
    level: 'silent',
  } as unknown as FastifyBaseLogger

  return mockLogger
}
