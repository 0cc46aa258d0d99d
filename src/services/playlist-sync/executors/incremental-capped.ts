import type { PlaylistEntry } from '@root/types/catalog.types.js'
import type {
  MergeRecord,
  ReplicaOutcome,
} from '@root/types/playlist-sync.types.js'
import { canonicalKey, differenceByKey, keySet } from '../identity.js'
import { type ReplicaRunnerDeps, runPerReplica } from '../replica-runner.js'

export interface IncrementalCappedDeps extends ReplicaRunnerDeps {
  playlistName: string
  cap: number
}

/**
 * Picks the entries to remove so a playlist holds at most `cap` entries.
 *
 * Walks from the tail, the oldest position. Entries whose key is in `keep`
 * are skipped unless they repeat a key seen closer to the head, so tracks of
 * the current merge are never evicted while anything else can go.
 */
export function selectEvictions(
  entries: readonly PlaylistEntry[],
  keep: ReadonlySet<string>,
  cap: number,
): PlaylistEntry[] {
  const overflow = entries.length - cap
  if (overflow <= 0) return []

  const firstIndex = new Map<string, number>()
  entries.forEach((entry, index) => {
    const key = canonicalKey(entry)
    if (!firstIndex.has(key)) firstIndex.set(key, index)
  })

  const evictable: PlaylistEntry[] = []
  const kept: PlaylistEntry[] = []
  for (let index = entries.length - 1; index >= 0; index--) {
    const entry = entries[index]
    const key = canonicalKey(entry)
    if (keep.has(key) && firstIndex.get(key) === index) {
      kept.push(entry)
    } else {
      evictable.push(entry)
    }
  }

  // Kept entries are taken only when `keep` alone exceeds the cap
  return [...evictable, ...kept].slice(0, overflow)
}

/**
 * Incremental-Capped: appends merged items a target does not already hold,
 * then evicts entries from the oldest positions until the playlist is back
 * within `cap`. Tracks of the current merge are evicted last.
 *
 * Rerunning with unchanged source data appends and removes nothing.
 */
export async function executeIncrementalCapped(
  merged: readonly MergeRecord[],
  targets: readonly string[],
  deps: IncrementalCappedDeps,
): Promise<ReplicaOutcome[]> {
  const { playlistName, cap, logger } = deps
  const items = merged.map((record) => record.item)
  const mergedKeys = keySet(items)

  return runPerReplica(
    targets,
    'write',
    async (scope) => {
      const playlist = await scope.findPlaylist(playlistName)

      if (!playlist) {
        logger.info(
          `Creating '${playlistName}' for ${scope.replicaId} with ${items.length} tracks`,
        )
        await scope.createPlaylist(playlistName, items)
        return items.length
      }

      const existing = await playlist.items()
      const newItems = differenceByKey(items, existing)

      if (newItems.length === 0) {
        logger.info(`No new tracks to add for ${scope.replicaId}`)
      } else {
        logger.info(
          `Adding ${newItems.length} new tracks to '${playlistName}' for ${scope.replicaId}`,
        )
        await playlist.addItems(newItems)
      }

      const current = newItems.length === 0 ? existing : await playlist.items()
      const evicted = selectEvictions(current, mergedKeys, cap)
      if (evicted.length > 0) {
        await playlist.removeItems(evicted)
        logger.info(
          `Trimmed '${playlistName}' to ${cap} tracks for ${scope.replicaId}`,
        )
      }

      return newItems.length
    },
    deps,
  )
}
