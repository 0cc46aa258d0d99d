import sensible from '@fastify/sensible'
import fp from 'fastify-plugin'

/**
 * Adds HTTP error helpers such as reply.internalServerError
 *
 * @see {@link https://github.com/fastify/fastify-sensible}
 */
export default fp(sensible, { name: '@fastify/sensible' })
