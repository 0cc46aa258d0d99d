import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp, { options } from './app.js'
import { createLoggerConfig } from '@utils/logger.js'

/**
 * Starts the HTTP service and the Discord bot behind it, with graceful
 * shutdown on signals and uncaught errors.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    ...options,
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error({ error: err }, 'Shutting down after error')
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
    app.log.error({ error: err }, 'Failed to start server')
    process.exit(1)
  }
}

void init()
