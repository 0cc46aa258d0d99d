/**
 * Merger
 *
 * Folds collected candidates into one ordered, deduplicated sequence keyed by
 * canonical item key. Two tie-break rules exist and they are not symmetric:
 *
 * - membership-merge (`mergeEarliestWins`) keeps the earliest timestamp per key
 *   and attributes the item to the replica holding it
 * - rating-merge (`mergeLatestOccurrence`) sorts all candidates newest first
 *   and keeps the first occurrence per key, then caps the result
 *
 * Both return records sorted by timestamp descending. Records without a
 * timestamp sort last; ties keep input order.
 */

import type { Candidate, MergeRecord } from '@root/types/playlist-sync.types.js'
import { canonicalKey } from './identity.js'

export const DEFAULT_MERGE_CAP = 50

function timeOf(timestamp: Date | undefined): number {
  return timestamp ? timestamp.getTime() : Number.NEGATIVE_INFINITY
}

/**
 * Stable newest-first ordering
 */
export function sortByTimestampDesc<T extends { timestamp?: Date }>(
  entries: readonly T[],
): T[] {
  return [...entries].sort((a, b) => {
    const diff = timeOf(b.timestamp) - timeOf(a.timestamp)
    // Both undefined yields NaN
    return Number.isNaN(diff) ? 0 : diff
  })
}

/**
 * Membership-merge: first to add wins attribution.
 *
 * A later candidate only moves a record when it carries a timestamp and the
 * record has none or a later one.
 */
export function mergeEarliestWins(
  candidates: readonly Candidate[],
): MergeRecord[] {
  const records = new Map<string, MergeRecord>()

  for (const candidate of candidates) {
    const key = canonicalKey(candidate.item)
    const existing = records.get(key)

    if (!existing) {
      records.set(key, {
        item: candidate.item,
        replicaId: candidate.replicaId,
        timestamp: candidate.timestamp,
      })
      continue
    }

    if (
      candidate.timestamp &&
      (!existing.timestamp ||
        candidate.timestamp.getTime() < existing.timestamp.getTime())
    ) {
      existing.timestamp = candidate.timestamp
      existing.replicaId = candidate.replicaId
    }
  }

  return sortByTimestampDesc([...records.values()])
}

/**
 * Rating-merge: most recent rating event wins, at most `cap` records.
 */
export function mergeLatestOccurrence(
  candidates: readonly Candidate[],
  cap: number = DEFAULT_MERGE_CAP,
): MergeRecord[] {
  const seen = new Set<string>()
  const merged: MergeRecord[] = []

  for (const candidate of sortByTimestampDesc(candidates)) {
    if (merged.length >= cap) break

    const key = canonicalKey(candidate.item)
    if (seen.has(key)) continue

    seen.add(key)
    merged.push({
      item: candidate.item,
      replicaId: candidate.replicaId,
      timestamp: candidate.timestamp,
    })
  }

  return merged
}
