import { logRouteError } from '@utils/route-errors.js'
import type { FastifyRequest } from 'fastify'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('route-errors', () => {
  describe('logRouteError', () => {
    it('should log the error with the request path but not its query', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        id: 'req-1',
        method: 'POST',
        url: '/v1/playlists/jam-jar/sync?X-Plex-Token=test-token',
      } as unknown as FastifyRequest

      const error = new Error('Test error')

      logRouteError(mockLogger, mockRequest, error, {
        message: 'Failed to run Jam Jar sync',
      })

      expect(mockLogger.error).toHaveBeenCalledWith(
        {
          error,
          request: {
            id: 'req-1',
            method: 'POST',
            path: '/v1/playlists/jam-jar/sync',
          },
        },
        'Failed to run Jam Jar sync',
      )
    })

    it('should include extra context', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        id: 'req-2',
        method: 'POST',
        url: '/v1/playlists/staff-picks/sync',
      } as unknown as FastifyRequest

      logRouteError(mockLogger, mockRequest, 'boom', {
        message: 'Failed',
        policy: 'broadcast',
      })

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ error: 'boom', policy: 'broadcast' }),
        'Failed',
      )
    })
  })
})
