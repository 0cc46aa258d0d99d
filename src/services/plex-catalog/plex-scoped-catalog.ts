import type {
  CatalogItem,
  PlaylistEntry,
  PlaylistHandle,
  ScopedCatalog,
  SectionType,
} from '@root/types/catalog.types.js'
import { PlaylistReadError, PlaylistWriteError } from '@utils/catalog-errors.js'
import type { FastifyBaseLogger } from 'fastify'
import { getSectionKeys, searchTracksByRating } from './library-operations.js'
import {
  addPlaylistItems,
  createAudioPlaylist,
  findPlaylistByTitle,
  getPlaylistEntries,
  removePlaylistEntry,
} from './playlist-operations.js'

/** Everything needed to act as one replica on the server */
export interface PlexScopeContext {
  replicaId: string
  serverUrl: string
  machineId: string
  token: string
  log: FastifyBaseLogger
}

async function reading<T>(
  ctx: PlexScopeContext,
  what: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    throw new PlaylistReadError(
      `Failed to read ${what} for '${ctx.replicaId}'`,
      ctx.replicaId,
      { cause: error },
    )
  }
}

async function writing<T>(
  ctx: PlexScopeContext,
  what: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    throw new PlaylistWriteError(
      `Failed to ${what} for '${ctx.replicaId}'`,
      ctx.replicaId,
      { cause: error },
    )
  }
}

export class PlexPlaylistHandle implements PlaylistHandle {
  constructor(
    readonly id: string,
    readonly title: string,
    private readonly ctx: PlexScopeContext,
  ) {}

  items(): Promise<PlaylistEntry[]> {
    const { serverUrl, token } = this.ctx
    return reading(this.ctx, `items of "${this.title}"`, () =>
      getPlaylistEntries(this.id, serverUrl, token),
    )
  }

  addItems(items: readonly CatalogItem[]): Promise<void> {
    const { machineId, serverUrl, token } = this.ctx
    return writing(this.ctx, `add ${items.length} items to "${this.title}"`, () =>
      addPlaylistItems(this.id, items, machineId, serverUrl, token),
    )
  }

  /**
   * Plex removes one entry per request. A failure part-way leaves the
   * earlier removals in place.
   */
  removeItems(entries: readonly PlaylistEntry[]): Promise<void> {
    const { serverUrl, token } = this.ctx
    return writing(
      this.ctx,
      `remove ${entries.length} items from "${this.title}"`,
      async () => {
        for (const entry of entries) {
          await removePlaylistEntry(this.id, entry.entryId, serverUrl, token)
        }
      },
    )
  }
}

export class PlexScopedCatalog implements ScopedCatalog {
  constructor(private readonly ctx: PlexScopeContext) {}

  get replicaId(): string {
    return this.ctx.replicaId
  }

  async findPlaylist(name: string): Promise<PlaylistHandle | null> {
    const { serverUrl, token } = this.ctx
    const playlist = await reading(this.ctx, `playlist "${name}"`, () =>
      findPlaylistByTitle(name, serverUrl, token),
    )
    return playlist
      ? new PlexPlaylistHandle(playlist.ratingKey, playlist.title, this.ctx)
      : null
  }

  async createPlaylist(
    name: string,
    items: readonly CatalogItem[],
  ): Promise<PlaylistHandle> {
    const { machineId, serverUrl, token } = this.ctx
    const playlist = await writing(this.ctx, `create "${name}"`, () =>
      createAudioPlaylist(name, items, machineId, serverUrl, token),
    )
    return new PlexPlaylistHandle(playlist.ratingKey, playlist.title, this.ctx)
  }

  async searchByRating(
    sectionType: SectionType,
    minRating: number,
  ): Promise<CatalogItem[]> {
    const { serverUrl, token, log } = this.ctx
    return reading(this.ctx, 'rated tracks', async () => {
      const sectionKeys = await getSectionKeys(serverUrl, token, sectionType)
      const tracks: CatalogItem[] = []

      for (const sectionKey of sectionKeys) {
        const rated = await searchTracksByRating(
          serverUrl,
          token,
          sectionKey,
          minRating,
        )
        tracks.push(...rated)
      }

      log.debug(
        `Found ${tracks.length} tracks rated >= ${minRating} in ${sectionKeys.length} sections for '${this.ctx.replicaId}'`,
      )
      return tracks
    })
  }
}
