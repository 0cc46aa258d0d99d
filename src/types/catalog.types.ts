/**
 * Catalog contract used by the playlist reconciliation engine.
 *
 * A catalog is reached through scopes: each ScopedCatalog is bound to one
 * replica (a Plex home user, or the server owner for the root scope) and every
 * read or write made through it applies to that replica alone.
 */

/**
 * A playable item identified by the catalog-assigned key.
 *
 * `timestamp` means "last rated at" for rating searches and "added at" for
 * playlist membership. Items without one are left without one.
 */
export interface CatalogItem {
  key: string
  title: string
  artist: string
  timestamp?: Date
}

/**
 * A catalog item at a specific position of a playlist.
 * `entryId` addresses that position for removal.
 */
export interface PlaylistEntry extends CatalogItem {
  entryId: string
}

/** Library section type holding music (artists, albums, tracks) */
export type SectionType = 'artist'

export interface PlaylistHandle {
  readonly id: string
  readonly title: string
  items(): Promise<PlaylistEntry[]>
  addItems(items: readonly CatalogItem[]): Promise<void>
  removeItems(entries: readonly PlaylistEntry[]): Promise<void>
}

export interface ScopedCatalog {
  readonly replicaId: string
  findPlaylist(name: string): Promise<PlaylistHandle | null>
  createPlaylist(
    name: string,
    items: readonly CatalogItem[],
  ): Promise<PlaylistHandle>
  searchByRating(
    sectionType: SectionType,
    minRating: number,
  ): Promise<CatalogItem[]>
}

export interface CatalogClient {
  /**
   * Scope of the server owner.
   * @throws CatalogUnavailableError when the server cannot be reached
   */
  rootScope(): Promise<ScopedCatalog>
  /**
   * @throws ScopeUnavailableError when the replica cannot be reached
   */
  switchScope(replicaId: string): Promise<ScopedCatalog>
  /**
   * Ids of every non-owner replica sharing the catalog
   * @throws CatalogUnavailableError when the replicas cannot be listed
   */
  listReplicaIds(): Promise<string[]>
}
