import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp from './app.js'
import { createLoggerConfig, validLogLevels } from '@utils/logger.js'
import type { LevelWithSilent } from 'pino'

function isLogLevel(level: string): level is LevelWithSilent {
  return validLogLevels.some((valid) => valid === level)
}

/**
 * Starts the HTTP server and the reconciliation schedule, with graceful
 * shutdown on signals and uncaught errors.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    ajv: {
      customOptions: {
        coerceTypes: 'array',
        removeAdditional: 'all',
      },
    },
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  const configLogLevel = app.config.logLevel
  if (isLogLevel(configLogLevel)) {
    app.log.level = configLogLevel
  }

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: '0.0.0.0',
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

void init()
