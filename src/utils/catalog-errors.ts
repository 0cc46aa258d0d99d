/**
 * Error taxonomy for catalog access during playlist reconciliation.
 *
 * Only CatalogUnavailableError and SyncAbortedError escape an invocation;
 * the per-replica errors are caught and recorded as replica outcomes.
 */

export class CatalogError extends Error {
  constructor(
    message: string,
    readonly replicaId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The catalog root cannot be reached, nothing can be collected */
export class CatalogUnavailableError extends CatalogError {}

/** A replica's scope cannot be entered */
export class ScopeUnavailableError extends CatalogError {}

export class PlaylistReadError extends CatalogError {}

export class PlaylistWriteError extends CatalogError {}

/** The invocation's AbortSignal fired between two replicas */
export class SyncAbortedError extends CatalogError {
  constructor(options?: { cause?: unknown }) {
    super('Playlist sync aborted', undefined, options)
  }
}

/**
 * Extracts a displayable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Unknown error'
}
