/**
 * Playlist Sync Service
 *
 * Entry point for playlist reconciliation. Each method runs one invocation of
 * a fan-out policy: check the catalog root, collect from the reading replicas,
 * merge, write to the targets and report.
 *
 * Responsible for:
 * - Recent Raves: newest 5-star ratings of contributors, appended to each
 *   contributor's playlist and capped
 * - Jam Jar: union of the members' playlists, written back to every member
 * - Staff Picks: union of the curators' playlists, written to the server owner
 *   and every home user
 * - Top Rated: every highly rated track, written to the server owner
 *
 * Nothing is kept between invocations; every call recomputes from the catalog.
 * Replica failures are reported in the result. Only an unreachable catalog
 * root or an aborted invocation throws.
 *
 * @example
 * const result = await fastify.playlistSync.syncJamJar()
 */

import type { CatalogClient } from '@root/types/catalog.types.js'
import type {
  SyncInvocationOptions,
  SyncResult,
} from '@root/types/playlist-sync.types.js'
import {
  buildSyncResult,
  collectByMembership,
  collectByRating,
  collectRatingSnapshot,
  createEmptyResult,
  executeBroadcast,
  executeFullReplace,
  executeIncrementalCapped,
  mergeEarliestWins,
  mergeLatestOccurrence,
  toFailures,
} from '@services/playlist-sync/index.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'

export interface RecentRavesOptions extends SyncInvocationOptions {
  contributors?: string[]
  maxSongs?: number
  minRating?: number
}

export interface JamJarOptions extends SyncInvocationOptions {
  members?: string[]
}

export interface StaffPicksOptions extends SyncInvocationOptions {
  curators?: string[]
}

export interface TopRatedOptions extends SyncInvocationOptions {
  minRating?: number
}

export class PlaylistSyncService {
  private readonly log: FastifyBaseLogger

  /**
   * @param baseLog - Fastify logger, tagged per service
   * @param fastify - Fastify instance for configuration and the catalog client
   */
  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'PLAYLIST_SYNC')
    this.log.info('Initializing Playlist Sync Service')
  }

  private get config() {
    return this.fastify.config
  }

  private get catalog(): CatalogClient {
    return this.fastify.plexCatalog
  }

  /**
   * Incremental-Capped sync of the contributors' newest top-rated tracks.
   */
  async updateRecentRaves(
    options: RecentRavesOptions = {},
  ): Promise<SyncResult> {
    const playlistName =
      options.playlistName ?? this.config.recentRavesPlaylistName
    const contributors =
      options.contributors ?? this.config.recentRavesContributors
    const cap = options.maxSongs ?? this.config.recentRavesMaxSongs
    const minRating = options.minRating ?? this.config.recentRavesMinRating
    const { signal } = options

    this.log.info(
      { contributors },
      `Updating '${playlistName}' from ${contributors.length} contributors`,
    )

    const rootScope = await this.catalog.rootScope()
    const deps = { catalog: this.catalog, logger: this.log, rootScope, signal }

    const { candidates, outcomes: readOutcomes } = await collectByRating(
      contributors,
      { minRating },
      deps,
    )
    const merged = mergeLatestOccurrence(candidates, cap)

    if (merged.length === 0) {
      this.log.warn('No rated tracks found across contributors')
      return createEmptyResult(
        'incremental-capped',
        playlistName,
        toFailures(readOutcomes),
      )
    }

    this.log.info(`Compiled top ${merged.length} unique rated tracks`)

    const writeOutcomes = await executeIncrementalCapped(merged, contributors, {
      ...deps,
      playlistName,
      cap,
    })

    return this.finish(
      buildSyncResult({
        policy: 'incremental-capped',
        playlistName,
        merged,
        readOutcomes,
        writeOutcomes,
      }),
    )
  }

  /**
   * Full-Replace sync of a collaborative playlist across its members.
   */
  async syncJamJar(options: JamJarOptions = {}): Promise<SyncResult> {
    const playlistName = options.playlistName ?? this.config.jamJarPlaylistName
    const members = options.members ?? this.config.jamJarMembers
    const { signal } = options

    this.log.info({ members }, `Syncing '${playlistName}' across members`)

    const rootScope = await this.catalog.rootScope()
    const deps = { catalog: this.catalog, logger: this.log, rootScope, signal }

    const { candidates, outcomes: readOutcomes } = await collectByMembership(
      members,
      playlistName,
      deps,
    )
    const merged = mergeEarliestWins(candidates)

    if (merged.length === 0) {
      this.log.info(`No tracks found in any '${playlistName}' playlist`)
      return createEmptyResult(
        'full-replace',
        playlistName,
        toFailures(readOutcomes),
      )
    }

    this.log.info(`Merged '${playlistName}' has ${merged.length} unique tracks`)

    const writeOutcomes = await executeFullReplace(merged, members, {
      ...deps,
      playlistName,
    })

    return this.finish(
      buildSyncResult({
        policy: 'full-replace',
        playlistName,
        merged,
        readOutcomes,
        writeOutcomes,
      }),
    )
  }

  /**
   * Broadcast of the curators' merged playlist to every replica.
   */
  async syncStaffPicks(options: StaffPicksOptions = {}): Promise<SyncResult> {
    const playlistName =
      options.playlistName ?? this.config.staffPicksPlaylistName
    const curators = options.curators ?? this.config.staffPicksCurators
    const { signal } = options

    this.log.info({ curators }, `Syncing '${playlistName}' from curators`)

    const rootScope = await this.catalog.rootScope()
    const deps = { catalog: this.catalog, logger: this.log, rootScope, signal }

    const { candidates, outcomes: readOutcomes } = await collectByMembership(
      curators,
      playlistName,
      deps,
    )
    const merged = mergeEarliestWins(candidates)

    if (merged.length === 0) {
      this.log.info(`No tracks found in any curator's '${playlistName}'`)
      return createEmptyResult(
        'broadcast',
        playlistName,
        toFailures(readOutcomes),
      )
    }

    this.log.info(`Merged '${playlistName}' has ${merged.length} unique tracks`)

    const writeOutcomes = await executeBroadcast(merged, {
      ...deps,
      playlistName,
    })

    return this.finish(
      buildSyncResult({
        policy: 'broadcast',
        playlistName,
        merged,
        readOutcomes,
        writeOutcomes,
      }),
    )
  }

  /**
   * Replaces the server owner's playlist with every track rated at or above
   * the threshold.
   */
  async syncTopRated(options: TopRatedOptions = {}): Promise<SyncResult> {
    const playlistName =
      options.playlistName ?? this.config.topRatedPlaylistName
    const minRating = options.minRating ?? this.config.topRatedMinRating
    const { signal } = options

    this.log.info(
      `Syncing '${playlistName}' with tracks rating >= ${minRating}`,
    )

    const rootScope = await this.catalog.rootScope()
    const deps = { catalog: this.catalog, logger: this.log, signal }

    const { candidates, outcomes: readOutcomes } = await collectRatingSnapshot(
      rootScope,
      minRating,
      deps,
    )
    // Folding dedupes tracks reached through more than one music section
    const merged = mergeEarliestWins(candidates)

    if (merged.length === 0) {
      return createEmptyResult(
        'rating-snapshot',
        playlistName,
        toFailures(readOutcomes),
      )
    }

    const writeOutcomes = await executeFullReplace(
      merged,
      [rootScope.replicaId],
      { ...deps, rootScope, playlistName },
    )

    return this.finish(
      buildSyncResult({
        policy: 'rating-snapshot',
        playlistName,
        merged,
        readOutcomes,
        writeOutcomes,
      }),
    )
  }

  private finish(result: SyncResult): SyncResult {
    const summary = {
      policy: result.policy,
      total: result.total,
      added: result.added,
      replicasUpdated: result.replicasUpdated,
      failures: result.failures.length,
    }
    if (result.failures.length > 0) {
      this.log.warn(
        summary,
        `'${result.playlistName}' sync completed with replica failures`,
      )
    } else {
      this.log.info(summary, `'${result.playlistName}' sync completed`)
    }
    return result
  }
}
