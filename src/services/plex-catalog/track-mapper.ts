import type { PlexTrack } from '@root/schemas/plex/plex-api.schema.js'
import type {
  CatalogItem,
  PlaylistEntry,
} from '@root/types/catalog.types.js'

/**
 * Which Plex timestamp becomes the item's timestamp:
 * `lastRatedAt` for rating searches, `addedAt` for playlist membership.
 */
export type TimestampSource = 'rating' | 'membership'

export function artistOf(track: PlexTrack): string {
  return track.grandparentTitle || track.originalTitle || 'Unknown'
}

export function toCatalogItem(
  track: PlexTrack,
  source: TimestampSource,
): CatalogItem {
  const timestamp = source === 'rating' ? track.lastRatedAt : track.addedAt
  const item: CatalogItem = {
    key: track.ratingKey,
    title: track.title,
    artist: artistOf(track),
  }
  if (timestamp) item.timestamp = timestamp
  return item
}

/**
 * @returns null for rows without a playlist item id, which cannot be removed
 */
export function toPlaylistEntry(track: PlexTrack): PlaylistEntry | null {
  if (!track.playlistItemID) return null
  return {
    ...toCatalogItem(track, 'membership'),
    entryId: track.playlistItemID,
  }
}
