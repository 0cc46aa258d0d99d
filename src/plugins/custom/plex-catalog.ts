/**
 * Plex Catalog Plugin
 *
 * Registers the PlexCatalogService used by playlist reconciliation
 */

import { PlexCatalogService } from '@services/plex-catalog/index.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    plexCatalog: PlexCatalogService
  }
}

export default fp(
  async function plexCatalog(fastify: FastifyInstance) {
    const service = new PlexCatalogService(fastify.log, fastify)

    fastify.decorate('plexCatalog', service)

    fastify.addHook('onReady', async () => {
      const initialized = await service.initialize()
      if (!initialized) {
        fastify.log.warn(
          'PlexCatalogService failed to initialize - playlist syncs will retry the connection',
        )
      }
    })

    fastify.addHook('onClose', async () => {
      service.clearCaches()
    })
  },
  {
    name: 'plex-catalog',
    dependencies: ['config'],
  },
)
