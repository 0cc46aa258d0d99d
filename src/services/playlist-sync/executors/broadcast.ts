import type { ScopedCatalog } from '@root/types/catalog.types.js'
import type {
  MergeRecord,
  ReplicaOutcome,
} from '@root/types/playlist-sync.types.js'
import type { FullReplaceDeps } from './full-replace.js'
import { executeFullReplace } from './full-replace.js'

export interface BroadcastDeps extends FullReplaceDeps {
  rootScope: ScopedCatalog
}

/**
 * Write targets for a broadcast: the root scope first, then every replica the
 * catalog knows about, each once.
 */
export async function resolveBroadcastTargets(
  deps: Pick<BroadcastDeps, 'catalog' | 'rootScope'>,
): Promise<string[]> {
  const replicaIds = await deps.catalog.listReplicaIds()
  return [...new Set([deps.rootScope.replicaId, ...replicaIds])]
}

/**
 * Broadcast: full-replaces the merged set onto every replica, whether or not
 * it contributed to the merge.
 */
export async function executeBroadcast(
  merged: readonly MergeRecord[],
  deps: BroadcastDeps,
): Promise<ReplicaOutcome[]> {
  const targets = await resolveBroadcastTargets(deps)

  deps.logger.info(
    `Broadcasting '${deps.playlistName}' to ${targets.length} replicas`,
  )

  return executeFullReplace(merged, targets, deps)
}
