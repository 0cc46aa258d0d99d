/**
 * Playlist Operations Module
 *
 * Provides functions for reading and mutating audio playlists on a Plex
 * server. Every call acts as the user owning `token`.
 */

import type { CatalogItem, PlaylistEntry } from '@root/types/catalog.types.js'
import {
  type PlexPlaylist,
  PlexPlaylistContainerSchema,
  PlexTrackContainerSchema,
} from '@root/schemas/plex/plex-api.schema.js'
import { plexFetch, plexJson } from './plex-request.js'
import { toPlaylistEntry } from './track-mapper.js'

const PAGE_SIZE = 100 // Standard pagination limit for Plex

/**
 * Library URI Plex expects when adding items: one URI naming every key
 */
export function buildItemsUri(
  machineId: string,
  items: readonly Pick<CatalogItem, 'key'>[],
): string {
  const keys = items.map((item) => item.key).join(',')
  return `server://${machineId}/com.plexapp.plugins.library/library/metadata/${keys}`
}

/**
 * Locates an audio playlist by its exact title
 *
 * @returns The playlist, or null if none has that title
 */
export async function findPlaylistByTitle(
  title: string,
  serverUrl: string,
  token: string,
): Promise<PlexPlaylist | null> {
  const url = new URL('/playlists', serverUrl)
  url.searchParams.append('playlistType', 'audio')

  const data = await plexJson(url, token, PlexPlaylistContainerSchema)
  return (
    data.MediaContainer.Metadata.find((playlist) => playlist.title === title) ??
    null
  )
}

/**
 * Retrieves all entries of a playlist, in playlist order
 */
export async function getPlaylistEntries(
  playlistId: string,
  serverUrl: string,
  token: string,
): Promise<PlaylistEntry[]> {
  const entries: PlaylistEntry[] = []
  let offset = 0
  let hasMoreItems = true

  while (hasMoreItems) {
    const url = new URL(`/playlists/${playlistId}/items`, serverUrl)
    url.searchParams.append('X-Plex-Container-Start', offset.toString())
    url.searchParams.append('X-Plex-Container-Size', PAGE_SIZE.toString())

    const data = await plexJson(url, token, PlexTrackContainerSchema)
    const page = data.MediaContainer.Metadata

    for (const track of page) {
      const entry = toPlaylistEntry(track)
      if (entry) entries.push(entry)
    }

    offset += page.length
    const totalSize = data.MediaContainer.totalSize ?? offset
    hasMoreItems = page.length > 0 && offset < totalSize
  }

  return entries
}

/**
 * Appends items to the end of a playlist in one request
 */
export async function addPlaylistItems(
  playlistId: string,
  items: readonly CatalogItem[],
  machineId: string,
  serverUrl: string,
  token: string,
): Promise<void> {
  if (items.length === 0) return

  const url = new URL(`/playlists/${playlistId}/items`, serverUrl)
  url.searchParams.append('uri', buildItemsUri(machineId, items))

  await plexFetch(url, token, { method: 'PUT' })
}

/**
 * Removes one entry (a position, not every copy of the track)
 */
export async function removePlaylistEntry(
  playlistId: string,
  entryId: string,
  serverUrl: string,
  token: string,
): Promise<void> {
  const url = new URL(`/playlists/${playlistId}/items/${entryId}`, serverUrl)
  await plexFetch(url, token, { method: 'DELETE' })
}

/**
 * Creates a non-smart audio playlist seeded with items
 *
 * @returns The created playlist
 */
export async function createAudioPlaylist(
  title: string,
  items: readonly CatalogItem[],
  machineId: string,
  serverUrl: string,
  token: string,
): Promise<PlexPlaylist> {
  const url = new URL('/playlists', serverUrl)
  url.searchParams.append('type', 'audio')
  url.searchParams.append('title', title)
  url.searchParams.append('smart', '0')
  url.searchParams.append('uri', buildItemsUri(machineId, items))

  const data = await plexJson(url, token, PlexPlaylistContainerSchema, {
    method: 'POST',
  })

  const created = data.MediaContainer.Metadata[0]
  if (!created) {
    throw new Error(`Plex returned no playlist for "${title}"`)
  }
  return created
}
