import type { SyncResult } from '@root/types/playlist-sync.types.js'
import {
  CatalogUnavailableError,
  SyncAbortedError,
} from '@utils/catalog-errors.js'
import { describe, expect, it, vi } from 'vitest'
import { build } from '../../helpers/app.js'
import { expectValidationError } from '../../helpers/assertions.js'

const jamJarResult: SyncResult = {
  policy: 'full-replace',
  playlistName: 'Jam Jar',
  total: 1,
  added: 1,
  replicasUpdated: 1,
  tracks: [
    {
      title: 'Song',
      artist: 'Band',
      attributedReplica: 'alice',
      timestamp: '2024-01-02T00:00:00.000Z',
    },
  ],
  failures: [{ replicaId: 'bob', phase: 'write', message: 'Write rejected' }],
}

describe('Playlist sync routes', () => {
  it('should run a sync with the body overrides and return its result', async (ctx) => {
    const app = await build(ctx)
    const syncJamJar = vi
      .spyOn(app.playlistSync, 'syncJamJar')
      .mockResolvedValue(jamJarResult)

    const response = await app.inject({
      method: 'POST',
      url: '/v1/playlists/jam-jar/sync',
      payload: { members: ['alice', 'bob'] },
    })

    expect(response.statusCode).toBe(200)
    expect(response.json<SyncResult>()).toEqual(jamJarResult)
    expect(syncJamJar).toHaveBeenCalledWith({
      members: ['alice', 'bob'],
      signal: expect.any(AbortSignal),
    })
  })

  it('should accept a request without a body', async (ctx) => {
    const app = await build(ctx)
    const syncTopRated = vi
      .spyOn(app.playlistSync, 'syncTopRated')
      .mockResolvedValue({
        ...jamJarResult,
        policy: 'rating-snapshot',
        playlistName: 'Top Rated',
        failures: [],
      })

    const response = await app.inject({
      method: 'POST',
      url: '/v1/playlists/top-rated/sync',
    })

    expect(response.statusCode).toBe(200)
    expect(response.json<SyncResult>().policy).toBe('rating-snapshot')
    expect(syncTopRated).toHaveBeenCalledOnce()
  })

  it('should reject a malformed replica list', async (ctx) => {
    const app = await build(ctx)
    const syncStaffPicks = vi.spyOn(app.playlistSync, 'syncStaffPicks')

    const response = await app.inject({
      method: 'POST',
      url: '/v1/playlists/staff-picks/sync',
      payload: { curators: 'alice' },
    })

    expectValidationError(response, 'curators')
    expect(syncStaffPicks).not.toHaveBeenCalled()
  })

  it('should return 503 when the Plex server is unreachable', async (ctx) => {
    const app = await build(ctx)
    vi.spyOn(app.playlistSync, 'updateRecentRaves').mockRejectedValue(
      new CatalogUnavailableError('Plex server is unreachable'),
    )

    const response = await app.inject({
      method: 'POST',
      url: '/v1/playlists/recent-raves/sync',
      payload: { maxSongs: 10 },
    })

    expect(response.statusCode).toBe(503)
    expect(response.json()).toMatchObject({
      statusCode: 503,
      error: 'Service Unavailable',
      message: 'Plex server is unreachable',
    })
  })

  it('should hide the details of other failures', async (ctx) => {
    const app = await build(ctx)
    vi.spyOn(app.playlistSync, 'syncJamJar').mockRejectedValue(
      new SyncAbortedError(),
    )

    const response = await app.inject({
      method: 'POST',
      url: '/v1/playlists/jam-jar/sync',
    })

    expect(response.statusCode).toBe(500)
    expect(response.json()).toMatchObject({
      statusCode: 500,
      error: 'Internal Server Error',
      message: 'Internal Server Error',
    })
  })

  it('should answer unknown routes with a 404 error body', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({ method: 'GET', url: '/v1/nope' })

    expect(response.statusCode).toBe(404)
    expect(response.json()).toEqual({
      statusCode: 404,
      code: 'NOT_FOUND',
      error: 'Not Found',
      message: 'Resource not found',
    })
  })
})
