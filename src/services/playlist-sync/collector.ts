/**
 * Collector
 *
 * Gathers candidates from replicas without writing anything. Keys repeated
 * across replicas are kept; deduplication belongs to the merger.
 */

import type { ScopedCatalog, SectionType } from '@root/types/catalog.types.js'
import type {
  Candidate,
  CollectionResult,
} from '@root/types/playlist-sync.types.js'
import { type ReplicaRunnerDeps, runPerReplica } from './replica-runner.js'

/** Plex rates on a 10-point scale; 5 stars is 10 */
export const FIVE_STAR_THRESHOLD = 9.9

export interface RatingCollectionOptions {
  minRating: number
  sectionType?: SectionType
}

/**
 * Collects rated items from each replica's music sections.
 *
 * Items without a last-rated-at timestamp cannot be ordered and are dropped.
 */
export async function collectByRating(
  replicaIds: readonly string[],
  options: RatingCollectionOptions,
  deps: ReplicaRunnerDeps,
): Promise<CollectionResult> {
  const { logger } = deps
  const sectionType = options.sectionType ?? 'artist'
  const candidates: Candidate[] = []

  const outcomes = await runPerReplica(
    replicaIds,
    'read',
    async (scope) => {
      const rated = await scope.searchByRating(sectionType, options.minRating)
      let contributed = 0

      for (const item of rated) {
        if (!item.timestamp) continue
        candidates.push({
          item,
          replicaId: scope.replicaId,
          timestamp: item.timestamp,
        })
        contributed++
      }

      logger.info(
        `Fetched ${contributed} rated tracks (>= ${options.minRating}) for ${scope.replicaId}`,
      )
      return contributed
    },
    deps,
  )

  return { candidates, outcomes }
}

/**
 * Collects the members of a named playlist from each replica.
 *
 * A replica without the playlist contributes nothing and is not a failure.
 */
export async function collectByMembership(
  replicaIds: readonly string[],
  playlistName: string,
  deps: ReplicaRunnerDeps,
): Promise<CollectionResult> {
  const { logger } = deps
  const candidates: Candidate[] = []

  const outcomes = await runPerReplica(
    replicaIds,
    'read',
    async (scope) => {
      const playlist = await scope.findPlaylist(playlistName)
      if (!playlist) {
        logger.info(`No '${playlistName}' playlist found for ${scope.replicaId}`)
        return 0
      }

      const entries = await playlist.items()
      for (const entry of entries) {
        candidates.push({
          item: entry,
          replicaId: scope.replicaId,
          timestamp: entry.timestamp,
        })
      }

      logger.info(
        `Found ${entries.length} tracks in '${playlistName}' for ${scope.replicaId}`,
      )
      return entries.length
    },
    deps,
  )

  return { candidates, outcomes }
}

/**
 * Collects every item at or above the threshold from a single scope,
 * whether or not it carries a rating timestamp.
 */
export async function collectRatingSnapshot(
  scope: ScopedCatalog,
  minRating: number,
  deps: Omit<ReplicaRunnerDeps, 'rootScope'>,
): Promise<CollectionResult> {
  const candidates: Candidate[] = []

  const outcomes = await runPerReplica(
    [scope.replicaId],
    'read',
    async (current) => {
      const rated = await current.searchByRating('artist', minRating)
      for (const item of rated) {
        candidates.push({
          item,
          replicaId: current.replicaId,
          timestamp: item.timestamp,
        })
      }
      deps.logger.info(`Found ${rated.length} tracks with rating >= ${minRating}`)
      return rated.length
    },
    { ...deps, rootScope: scope },
  )

  return { candidates, outcomes }
}
