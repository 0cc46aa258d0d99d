import { CatalogError } from '@utils/catalog-errors.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

// Mock dependencies before importing the module
vi.mock('dotenv', () => ({
  config: vi.fn(),
}))

const { createErrorSerializer, createServiceLogger, filename, validLogLevels } =
  await import('@utils/logger.js')

describe('logger', () => {
  it('should export all valid pino log levels', () => {
    expect(validLogLevels).toEqual([
      'fatal',
      'error',
      'warn',
      'info',
      'debug',
      'trace',
      'silent',
    ])
  })

  describe('createServiceLogger', () => {
    it('should create a child logger with uppercased service prefix', () => {
      const mockParentLogger = createMockLogger()
      createServiceLogger(mockParentLogger, 'playlist_sync')

      expect(mockParentLogger.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[PLAYLIST_SYNC] ' },
      )
    })
  })

  describe('filename', () => {
    it('should name the active log file', () => {
      expect(filename(null)).toBe('playlist-bot-current.log')
    })

    it('should name rotated files by date and index', () => {
      const rotatedAt = new Date(2024, 2, 5, 13, 0, 0)

      expect(filename(rotatedAt)).toBe('playlist-bot-2024-03-05.log')
      expect(filename(rotatedAt.getTime(), 2)).toBe(
        'playlist-bot-2024-03-05-2.log',
      )
    })
  })

  describe('error serializer', () => {
    const serialize = createErrorSerializer()

    it('should wrap primitive values', () => {
      expect(serialize('string error')).toEqual({
        message: 'string error',
        type: 'StringError',
      })
      expect(serialize(404)).toEqual({ message: '404', type: 'NumberError' })
    })

    it('should pass null and undefined through', () => {
      expect(serialize(null)).toBeNull()
      expect(serialize(undefined)).toBeUndefined()
    })

    it('should keep the type and stack of errors', () => {
      const result = serialize(new TypeError('Type error'))

      expect(result).toMatchObject({
        message: 'Type error',
        name: 'TypeError',
        type: 'TypeError',
        stack: expect.any(String),
      })
    })

    it('should keep the replica of catalog errors and their causes', () => {
      const cause = Object.assign(new Error('Plex request failed: 500'), {
        statusCode: 500,
      })
      const error = new CatalogError('Failed to update', 'alice', { cause })

      expect(serialize(error)).toMatchObject({
        message: 'Failed to update',
        name: 'CatalogError',
        replicaId: 'alice',
        cause: {
          message: 'Plex request failed: 500',
          statusCode: 500,
          type: 'Error',
        },
      })
    })
  })
})
