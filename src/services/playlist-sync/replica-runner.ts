import type {
  CatalogClient,
  ScopedCatalog,
} from '@root/types/catalog.types.js'
import type {
  ReplicaOutcome,
  ReplicaPhase,
} from '@root/types/playlist-sync.types.js'
import { SyncAbortedError } from '@utils/catalog-errors.js'
import type { FastifyBaseLogger } from 'fastify'

export interface ReplicaRunnerDeps {
  catalog: CatalogClient
  logger: FastifyBaseLogger
  /** Already-entered root scope, reused instead of switching into it again */
  rootScope?: ScopedCatalog
  signal?: AbortSignal
}

/**
 * Enters the scope of a replica, reusing the root scope when it is the target
 */
export async function scopeFor(
  replicaId: string,
  deps: Pick<ReplicaRunnerDeps, 'catalog' | 'rootScope'>,
): Promise<ScopedCatalog> {
  if (deps.rootScope && deps.rootScope.replicaId === replicaId) {
    return deps.rootScope
  }
  return deps.catalog.switchScope(replicaId)
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SyncAbortedError({ cause: signal.reason })
  }
}

/**
 * Runs a task against each replica in turn.
 *
 * Replicas are processed one at a time. A failing task is logged and recorded
 * as a failed outcome; the next replica still runs. The abort signal is only
 * checked between replicas so a started write is never cut short here.
 *
 * @param task - Returns the number of items the replica contributed or received
 * @returns One outcome per replica, in input order
 */
export async function runPerReplica(
  replicaIds: readonly string[],
  phase: ReplicaPhase,
  task: (scope: ScopedCatalog) => Promise<number>,
  deps: ReplicaRunnerDeps,
): Promise<ReplicaOutcome[]> {
  const { logger, signal } = deps
  const outcomes: ReplicaOutcome[] = []

  for (const replicaId of replicaIds) {
    throwIfAborted(signal)

    try {
      const scope = await scopeFor(replicaId, deps)
      const added = await task(scope)
      outcomes.push({ replicaId, phase, ok: true, added })
    } catch (error) {
      if (phase === 'read') {
        logger.warn({ error, replicaId }, `Could not read from '${replicaId}'`)
      } else {
        logger.error({ error, replicaId }, `Failed to update '${replicaId}'`)
      }
      outcomes.push({ replicaId, phase, ok: false, error })
    }
  }

  return outcomes
}
