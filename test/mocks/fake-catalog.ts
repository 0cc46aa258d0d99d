import type {
  CatalogClient,
  CatalogItem,
  PlaylistEntry,
  PlaylistHandle,
  ScopedCatalog,
  SectionType,
} from '@root/types/catalog.types.js'
import {
  CatalogUnavailableError,
  PlaylistReadError,
  PlaylistWriteError,
  ScopeUnavailableError,
} from '@utils/catalog-errors.js'

/**
 * In-memory catalog for engine tests.
 *
 * Each replica holds named playlists and a list of rated items. Failures are
 * injected per replica, and every mutation is recorded in `writes`.
 */

export interface FakeReplica {
  playlists: Map<string, PlaylistEntry[]>
  rated: CatalogItem[]
}

export type FakeWrite =
  | { replicaId: string; op: 'create'; playlist: string; keys: string[] }
  | { replicaId: string; op: 'add'; playlist: string; keys: string[] }
  | { replicaId: string; op: 'remove'; playlist: string; keys: string[] }

const DAY_MS = 24 * 60 * 60 * 1000
const EPOCH = Date.UTC(2024, 0, 1)

/** Date `day` days after 2024-01-01 */
export function day(n: number): Date {
  return new Date(EPOCH + n * DAY_MS)
}

/** A track whose title is its key, optionally stamped `n` days in */
export function track(key: string, n?: number): CatalogItem {
  return {
    key,
    title: key,
    artist: `Artist ${key}`,
    ...(n === undefined ? {} : { timestamp: day(n) }),
  }
}

export class FakeCatalog implements CatalogClient {
  readonly replicas = new Map<string, FakeReplica>()
  readonly writes: FakeWrite[] = []
  readonly switched: string[] = []
  readonly failSwitch = new Set<string>()
  readonly failRead = new Set<string>()
  readonly failWrite = new Set<string>()
  rootUnavailable = false
  replicaListUnavailable = false
  private nextEntryId = 1

  /**
   * @param rootId - Replica id of the server owner
   * @param homeUsers - Non-owner replicas returned by listReplicaIds
   */
  constructor(
    readonly rootId: string = 'admin',
    readonly homeUsers: string[] = [],
  ) {
    for (const id of [rootId, ...homeUsers]) {
      this.replica(id)
    }
  }

  /** State of a replica, created on first use */
  replica(id: string): FakeReplica {
    let state = this.replicas.get(id)
    if (!state) {
      state = { playlists: new Map(), rated: [] }
      this.replicas.set(id, state)
    }
    return state
  }

  /** Seeds a playlist for a replica */
  seedPlaylist(replicaId: string, name: string, items: CatalogItem[]): void {
    this.replica(replicaId).playlists.set(
      name,
      items.map((item) => this.toEntry(item)),
    )
  }

  /** Keys of a replica's playlist in order, undefined when absent */
  playlistKeys(replicaId: string, name: string): string[] | undefined {
    return this.replicas
      .get(replicaId)
      ?.playlists.get(name)
      ?.map((entry) => entry.key)
  }

  toEntry(item: CatalogItem): PlaylistEntry {
    return { ...item, entryId: String(this.nextEntryId++) }
  }

  async rootScope(): Promise<ScopedCatalog> {
    if (this.rootUnavailable) {
      throw new CatalogUnavailableError('Plex server is unreachable')
    }
    return new FakeScope(this, this.rootId)
  }

  async switchScope(replicaId: string): Promise<ScopedCatalog> {
    this.switched.push(replicaId)
    if (this.failSwitch.has(replicaId) || !this.replicas.has(replicaId)) {
      throw new ScopeUnavailableError(
        `Could not switch to '${replicaId}'`,
        replicaId,
      )
    }
    return new FakeScope(this, replicaId)
  }

  async listReplicaIds(): Promise<string[]> {
    if (this.replicaListUnavailable) {
      throw new CatalogUnavailableError('Could not list Plex home users')
    }
    return [...this.homeUsers]
  }
}

class FakeScope implements ScopedCatalog {
  constructor(
    private readonly catalog: FakeCatalog,
    readonly replicaId: string,
  ) {}

  private checkRead(): void {
    if (this.catalog.failRead.has(this.replicaId)) {
      throw new PlaylistReadError('Read timed out', this.replicaId)
    }
  }

  async findPlaylist(name: string): Promise<PlaylistHandle | null> {
    this.checkRead()
    const playlists = this.catalog.replica(this.replicaId).playlists
    return playlists.has(name)
      ? new FakePlaylist(this.catalog, this.replicaId, name)
      : null
  }

  async createPlaylist(
    name: string,
    items: readonly CatalogItem[],
  ): Promise<PlaylistHandle> {
    if (this.catalog.failWrite.has(this.replicaId)) {
      throw new PlaylistWriteError('Create rejected', this.replicaId)
    }
    this.catalog.writes.push({
      replicaId: this.replicaId,
      op: 'create',
      playlist: name,
      keys: items.map((item) => item.key),
    })
    this.catalog
      .replica(this.replicaId)
      .playlists.set(
        name,
        items.map((item) => this.catalog.toEntry(item)),
      )
    return new FakePlaylist(this.catalog, this.replicaId, name)
  }

  async searchByRating(
    _sectionType: SectionType,
    _minRating: number,
  ): Promise<CatalogItem[]> {
    this.checkRead()
    return [...this.catalog.replica(this.replicaId).rated]
  }
}

class FakePlaylist implements PlaylistHandle {
  readonly id: string

  constructor(
    private readonly catalog: FakeCatalog,
    private readonly replicaId: string,
    readonly title: string,
  ) {
    this.id = `${replicaId}:${title}`
  }

  private get entries(): PlaylistEntry[] {
    return this.catalog.replica(this.replicaId).playlists.get(this.title) ?? []
  }

  private checkWrite(): void {
    if (this.catalog.failWrite.has(this.replicaId)) {
      throw new PlaylistWriteError('Write rejected', this.replicaId)
    }
  }

  async items(): Promise<PlaylistEntry[]> {
    if (this.catalog.failRead.has(this.replicaId)) {
      throw new PlaylistReadError('Read timed out', this.replicaId)
    }
    return [...this.entries]
  }

  async addItems(items: readonly CatalogItem[]): Promise<void> {
    this.checkWrite()
    this.catalog.writes.push({
      replicaId: this.replicaId,
      op: 'add',
      playlist: this.title,
      keys: items.map((item) => item.key),
    })
    this.catalog
      .replica(this.replicaId)
      .playlists.set(this.title, [
        ...this.entries,
        ...items.map((item) => this.catalog.toEntry(item)),
      ])
  }

  async removeItems(entries: readonly PlaylistEntry[]): Promise<void> {
    this.checkWrite()
    const removed = new Set(entries.map((entry) => entry.entryId))
    this.catalog.writes.push({
      replicaId: this.replicaId,
      op: 'remove',
      playlist: this.title,
      keys: entries.map((entry) => entry.key),
    })
    this.catalog
      .replica(this.replicaId)
      .playlists.set(
        this.title,
        this.entries.filter((entry) => !removed.has(entry.entryId)),
      )
  }
}
