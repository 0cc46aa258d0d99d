import type {
  CatalogItem,
  ScopedCatalog,
} from '@root/types/catalog.types.js'
import type {
  MergeRecord,
  ReplicaOutcome,
} from '@root/types/playlist-sync.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { type ReplicaRunnerDeps, runPerReplica } from '../replica-runner.js'

export interface FullReplaceDeps extends ReplicaRunnerDeps {
  playlistName: string
}

/**
 * Makes a scope's playlist hold exactly `items`, in order.
 *
 * An existing playlist is emptied and refilled; a missing one is created.
 * The remove and add are separate catalog calls, so a failure between them
 * can leave the playlist empty until the next run.
 *
 * @returns Number of items written
 */
export async function replacePlaylistContents(
  scope: ScopedCatalog,
  playlistName: string,
  items: readonly CatalogItem[],
  logger: FastifyBaseLogger,
): Promise<number> {
  const playlist = await scope.findPlaylist(playlistName)

  if (playlist) {
    const current = await playlist.items()
    if (current.length > 0) {
      await playlist.removeItems(current)
    }
    await playlist.addItems(items)
    logger.info(
      `Updated '${playlistName}' for ${scope.replicaId} with ${items.length} tracks`,
    )
  } else {
    await scope.createPlaylist(playlistName, items)
    logger.info(
      `Created '${playlistName}' for ${scope.replicaId} with ${items.length} tracks`,
    )
  }

  return items.length
}

/**
 * Full-Replace: every target ends with the merged set, in merged order.
 */
export async function executeFullReplace(
  merged: readonly MergeRecord[],
  targets: readonly string[],
  deps: FullReplaceDeps,
): Promise<ReplicaOutcome[]> {
  const items = merged.map((record) => record.item)

  return runPerReplica(
    targets,
    'write',
    (scope) =>
      replacePlaylistContents(scope, deps.playlistName, items, deps.logger),
    deps,
  )
}
