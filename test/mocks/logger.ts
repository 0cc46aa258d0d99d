import type { FastifyBaseLogger } from 'fastify'
import { vi } from 'vitest'

/**
 * Mock Fastify logger for service tests.
 *
 * Child loggers share the parent's method mocks, so a call a service makes
 * through its `createServiceLogger` child is asserted on the logger the test
 * handed in:
 *
 * @example
 * const log = createMockLogger()
 * await new PlexCatalogService(log, fastify).initialize()
 * expect(log.warn).toHaveBeenCalled()
 */
export function createMockLogger(): FastifyBaseLogger {
  const methods = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    silent: vi.fn(),
  }

  const withChild = (): FastifyBaseLogger =>
    ({
      ...methods,
      level: 'info',
      child: vi.fn(() => withChild()),
    }) as unknown as FastifyBaseLogger

  return withChild()
}
