import fp from 'fastify-plugin'
import apiReference from '@scalar/fastify-api-reference'
import fastifySwagger from '@fastify/swagger'
import { jsonSchemaTransform } from 'fastify-type-provider-zod'
import type { FastifyInstance } from 'fastify'
import { APP_VERSION } from '@utils/version.js'

const createOpenapiConfig = (fastify: FastifyInstance) => ({
  openapi: {
    info: {
      title: 'Plex Playlist Bot API',
      description:
        'Reconciles shared playlists across the home users of a Plex server',
      version: APP_VERSION,
    },
    servers: [
      {
        url: `http://localhost:${fastify.config.port}`,
        description: 'Localhost Access (with port)',
      },
    ],
    tags: [
      {
        name: 'Playlists',
        description: 'Playlist sync endpoints',
      },
    ],
  },
  hideUntagged: true,
  transform: jsonSchemaTransform,
})

export default fp(
  async (fastify: FastifyInstance) => {
    /**
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    await fastify.register(apiReference, {
      routePrefix: '/api/docs',
    })
  },
  {
    name: 'swagger',
    dependencies: ['config', 'zod-type-provider'],
  },
)
