/**
 * Playlist Sync Plugin
 *
 * Registers the PlaylistSyncService with the Fastify application
 */

import { PlaylistSyncService } from '@services/playlist-sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    playlistSync: PlaylistSyncService
  }
}

export default fp(
  async function playlistSync(fastify: FastifyInstance) {
    fastify.decorate('playlistSync', new PlaylistSyncService(fastify.log, fastify))
  },
  {
    name: 'playlist-sync',
    dependencies: ['config', 'plex-catalog'],
  },
)
