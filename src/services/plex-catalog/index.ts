/**
 * Plex Catalog Module
 *
 * Plex Media Server implementation of the playlist catalog contract.
 */

export {
  PlexCatalogService,
  ROOT_REPLICA_FALLBACK,
} from './plex-catalog.service.js'
export {
  PlexPlaylistHandle,
  PlexScopedCatalog,
  type PlexScopeContext,
} from './plex-scoped-catalog.js'
export { PlexHttpError } from './plex-request.js'
