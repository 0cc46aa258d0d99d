import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

/**
 * Logs a route failure with request context, leaving out query strings and
 * bodies so tokens and names are not written to the log.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  context: { message: string } & Record<string, unknown>,
): void {
  const { message, ...rest } = context
  log.error(
    {
      error,
      ...rest,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
      },
    },
    message,
  )
}
