import type {
  MergeRecord,
  ReplicaFailure,
  ReplicaOutcome,
  SyncPolicy,
  SyncResult,
  TrackSummary,
} from '@root/types/playlist-sync.types.js'
import { errorMessage } from '@utils/catalog-errors.js'

/**
 * Creates the zero-valued result returned when a merge yields nothing to write
 *
 * @param failures - Read failures that led to the empty merge, if any
 */
export function createEmptyResult(
  policy: SyncPolicy,
  playlistName: string,
  failures: ReplicaFailure[] = [],
): SyncResult {
  return {
    policy,
    playlistName,
    total: 0,
    added: 0,
    replicasUpdated: 0,
    tracks: [],
    failures,
  }
}

export function toTrackSummaries(
  merged: readonly MergeRecord[],
): TrackSummary[] {
  return merged.map((record) => ({
    title: record.item.title,
    artist: record.item.artist,
    attributedReplica: record.replicaId,
    timestamp: record.timestamp ? record.timestamp.toISOString() : null,
  }))
}

export function toFailures(
  outcomes: readonly ReplicaOutcome[],
): ReplicaFailure[] {
  const failures: ReplicaFailure[] = []
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push({
        replicaId: outcome.replicaId,
        phase: outcome.phase,
        message: errorMessage(outcome.error),
      })
    }
  }
  return failures
}

/**
 * Aggregates per-replica outcomes into the caller-facing result.
 * Counts only replicas whose write succeeded.
 */
export function buildSyncResult(params: {
  policy: SyncPolicy
  playlistName: string
  merged: readonly MergeRecord[]
  readOutcomes: readonly ReplicaOutcome[]
  writeOutcomes: readonly ReplicaOutcome[]
}): SyncResult {
  let added = 0
  let replicasUpdated = 0

  for (const outcome of params.writeOutcomes) {
    if (outcome.ok) {
      added += outcome.added
      replicasUpdated++
    }
  }

  return {
    policy: params.policy,
    playlistName: params.playlistName,
    total: params.merged.length,
    added,
    replicasUpdated,
    tracks: toTrackSummaries(params.merged),
    failures: [
      ...toFailures(params.readOutcomes),
      ...toFailures(params.writeOutcomes),
    ],
  }
}
