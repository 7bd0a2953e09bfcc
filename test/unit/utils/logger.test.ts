import {
  ConflictError,
  ExternalAPIError,
  StoreError,
} from '@root/types/errors.js'
import {
  createErrorSerializer,
  createLoggerConfig,
  createServiceLogger,
} from '@utils/logger.js'
import { afterEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('logger', () => {
  describe('createErrorSerializer', () => {
    const serialize = createErrorSerializer()

    it('should wrap primitive values', () => {
      expect(serialize('boom')).toEqual({ message: 'boom', type: 'StringError' })
      expect(serialize(42)).toEqual({ message: '42', type: 'NumberError' })
    })

    it('should keep status details and the stack of server errors', () => {
      const error = new ExternalAPIError('Grafana API error: down', 503)

      expect(serialize(error)).toEqual({
        message: 'Grafana API error: down',
        name: 'ExternalAPIError',
        code: 'EXTERNAL_API_ERROR',
        status: 503,
        statusCode: 502,
        type: 'ExternalAPIError',
        stack: error.stack,
      })
    })

    it('should drop the stack of client errors', () => {
      const serialized = serialize(new ConflictError('taken'))

      expect(serialized).toEqual({
        message: 'taken',
        name: 'ConflictError',
        code: 'CONFLICT',
        statusCode: 409,
        type: 'ConflictError',
      })
    })

    it('should serialize the cause', () => {
      const error = new StoreError('cannot list Tenants', {
        cause: new Error('disk I/O error'),
      })

      expect(serialize(error)).toMatchObject({
        message: 'cannot list Tenants',
        cause: { message: 'disk I/O error', type: 'Error' },
      })
    })

    it('should redact credentials on plain objects', () => {
      expect(
        serialize({ message: 'login failed', password: 'test-secret' }),
      ).toEqual({
        message: 'login failed',
        type: 'UnknownError',
        password: '[REDACTED]',
      })
    })
  })

  describe('createLoggerConfig', () => {
    const original = {
      logLevel: process.env.logLevel,
      logDestination: process.env.logDestination,
    }

    afterEach(() => {
      for (const [key, value] of Object.entries(original)) {
        if (value === undefined) {
          delete process.env[key]
        } else {
          process.env[key] = value
        }
      }
    })

    it('should log pretty output to the terminal by default', () => {
      process.env.logLevel = 'debug'
      delete process.env.logDestination

      const config = createLoggerConfig()

      expect(config.level).toBe('debug')
      expect(config.transport).toMatchObject({ target: 'pino-pretty' })
    })

    it('should fall back to info for an unknown level', () => {
      process.env.logLevel = 'loud'
      delete process.env.logDestination

      expect(createLoggerConfig().level).toBe('info')
    })
  })

  describe('createServiceLogger', () => {
    it('should prefix messages with the service tag', () => {
      const base = createMockLogger()

      createServiceLogger(base, 'GRAFANA_SSO')

      expect(base.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[GRAFANA_SSO] ' },
      )
    })
  })
})
