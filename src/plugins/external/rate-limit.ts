import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Per-client rate limit on the API. Each sync walks every replica on the
 * Plex server, so the limit is kept low.
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, {
      max: fastify.config.rateLimitMax,
      timeWindow: '1 minute',
      // API docs are static
      allowList: (req) => req.url.split('?')[0].startsWith('/api/docs'),
    })
  },
  {
    name: 'rate-limit',
    dependencies: ['config'],
  },
)
