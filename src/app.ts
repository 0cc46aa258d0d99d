import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type {
  FastifyError,
  FastifyInstance,
  FastifyPluginOptions,
} from 'fastify'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export const options = {
  ajv: {
    customOptions: {
      coerceTypes: 'array',
      removeAdditional: 'all',
    },
  },
} as const

/**
 * Loads external and custom plugins, then the routes, and installs the
 * app-wide error and not-found handlers.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  await fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  fastify.setErrorHandler<FastifyError>((err, request, reply) => {
    const statusCode = err.statusCode ?? 500
    // Avoid logging query/params to prevent leaking tokens
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions.url,
      },
    }

    if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }
    reply.code(statusCode)
    // 503 keeps its message: it names the dependency that is down
    const isUnavailable = statusCode === 503
    const hideDetails = statusCode >= 500 && !isUnavailable
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isUnavailable
        ? 'Service Unavailable'
        : hideDetails
          ? 'Internal Server Error'
          : 'Client Error',
      message: hideDetails
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })

  fastify.setNotFoundHandler((request, reply) => {
    request.log.warn(
      {
        request: {
          id: request.id,
          method: request.method,
          path: request.url.split('?')[0],
        },
      },
      'Resource not found',
    )
    reply.code(404)
    const response: ErrorResponse = {
      statusCode: 404,
      code: 'NOT_FOUND',
      error: 'Not Found',
      message: 'Resource not found',
    }
    return response
  })
}
