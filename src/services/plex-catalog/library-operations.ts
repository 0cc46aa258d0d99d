/**
 * Library Operations Module
 *
 * Reads library sections and rating-filtered tracks from a Plex server.
 */

import type { CatalogItem, SectionType } from '@root/types/catalog.types.js'
import {
  PlexSectionsSchema,
  PlexTrackContainerSchema,
} from '@root/schemas/plex/plex-api.schema.js'
import { plexJson } from './plex-request.js'
import { toCatalogItem } from './track-mapper.js'

/** Plex metadata type number for tracks */
const TRACK_TYPE = 10
const PAGE_SIZE = 200

export async function getSectionKeys(
  serverUrl: string,
  token: string,
  sectionType: SectionType,
): Promise<string[]> {
  const data = await plexJson(
    new URL('/library/sections', serverUrl),
    token,
    PlexSectionsSchema,
  )
  return data.MediaContainer.Directory.filter(
    (section) => section.type === sectionType,
  ).map((section) => section.key)
}

/**
 * Tracks of one section rated at or above `minRating` by the token's user.
 *
 * Plex's `userRating>>` filter is strictly greater, so the request asks for
 * slightly less and the exact bound is applied here.
 */
export async function searchTracksByRating(
  serverUrl: string,
  token: string,
  sectionKey: string,
  minRating: number,
): Promise<CatalogItem[]> {
  const tracks: CatalogItem[] = []
  let offset = 0
  let hasMoreItems = true

  while (hasMoreItems) {
    const url = new URL(`/library/sections/${sectionKey}/all`, serverUrl)
    url.searchParams.append('type', String(TRACK_TYPE))
    url.searchParams.append('userRating>>', (minRating - 0.1).toFixed(1))
    url.searchParams.append('X-Plex-Container-Start', String(offset))
    url.searchParams.append('X-Plex-Container-Size', String(PAGE_SIZE))

    const data = await plexJson(url, token, PlexTrackContainerSchema)
    const page = data.MediaContainer.Metadata

    for (const track of page) {
      if ((track.userRating ?? 0) >= minRating) {
        tracks.push(toCatalogItem(track, 'rating'))
      }
    }

    offset += page.length
    const totalSize = data.MediaContainer.totalSize ?? offset
    hasMoreItems = page.length > 0 && offset < totalSize
  }

  return tracks
}
