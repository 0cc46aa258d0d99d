/**
 * Plex Catalog Service
 *
 * Plex implementation of the catalog contract. The server owner's token gives
 * the root scope; home users are entered by switching into them on plex.tv and
 * looking up their access token for this server.
 *
 * Holds connection state only (machine id, home users, per-user tokens).
 * Playlist contents are never cached.
 */

import type { PlexHomeUser } from '@root/schemas/plex/plex-api.schema.js'
import type {
  CatalogClient,
  ScopedCatalog,
} from '@root/types/catalog.types.js'
import {
  CatalogUnavailableError,
  ScopeUnavailableError,
} from '@utils/catalog-errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import { PlexScopedCatalog } from './plex-scoped-catalog.js'
import {
  getHomeUsers,
  getServerAccessToken,
  getServerMachineId,
  isHomeAdmin,
  switchHomeUser,
} from './user-operations.js'

/** Replica id of the root scope when the owner's home profile is unknown */
export const ROOT_REPLICA_FALLBACK = 'admin'

const USERS_CACHE_TTL = 30 * 60 * 1000 // 30 minutes
const TOKEN_CACHE_TTL = 6 * 60 * 60 * 1000 // 6 hours

export class PlexCatalogService implements CatalogClient {
  private readonly log: FastifyBaseLogger
  private machineId: string | null = null
  private homeUsers: PlexHomeUser[] | null = null
  private usersTimestamp = 0
  private scopeTokens = new Map<string, { token: string; timestamp: number }>()

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'PLEX_CATALOG')
  }

  private get config() {
    return this.fastify.config
  }

  private get adminToken(): string {
    return this.config.plexToken
  }

  private get serverUrl(): string {
    return this.config.plexServerUrl
  }

  /**
   * Loads the server identity and home users ahead of the first sync.
   *
   * @returns false when the server cannot be reached yet
   */
  async initialize(): Promise<boolean> {
    try {
      await this.getMachineId()
      const users = await this.getUsers()
      this.log.info(
        `Connected to Plex server ${this.machineId} with ${users.length} home users`,
      )
      return true
    } catch (error) {
      this.log.warn({ error }, 'Plex catalog not reachable during startup')
      return false
    }
  }

  private async getMachineId(): Promise<string> {
    if (this.machineId) return this.machineId
    return this.probeServer()
  }

  /**
   * Reads the server identity over the network, bypassing the cached id.
   *
   * @throws CatalogUnavailableError when the server identity cannot be read
   */
  private async probeServer(): Promise<string> {
    if (!this.serverUrl || !this.adminToken) {
      throw new CatalogUnavailableError('Plex server URL or token not configured')
    }

    try {
      this.machineId = await getServerMachineId(this.serverUrl, this.adminToken)
      return this.machineId
    } catch (error) {
      throw new CatalogUnavailableError(
        `Plex server at ${this.serverUrl} is unreachable`,
        undefined,
        { cause: error },
      )
    }
  }

  private async getUsers(): Promise<PlexHomeUser[]> {
    if (this.homeUsers && Date.now() - this.usersTimestamp < USERS_CACHE_TTL) {
      this.log.debug('Using cached Plex home users')
      return this.homeUsers
    }

    this.homeUsers = await getHomeUsers(this.adminToken)
    this.usersTimestamp = Date.now()
    return this.homeUsers
  }

  private async getOwnerName(): Promise<string> {
    try {
      const owner = (await this.getUsers()).find(isHomeAdmin)
      return owner?.title ?? ROOT_REPLICA_FALLBACK
    } catch (error) {
      this.log.debug({ error }, 'Could not resolve owner profile name')
      return ROOT_REPLICA_FALLBACK
    }
  }

  async rootScope(): Promise<ScopedCatalog> {
    // Checked live on every sync so an outage aborts instead of failing per replica
    const machineId = await this.probeServer()
    const replicaId = await this.getOwnerName()

    return new PlexScopedCatalog({
      replicaId,
      serverUrl: this.serverUrl,
      machineId,
      token: this.adminToken,
      log: this.log,
    })
  }

  async switchScope(replicaId: string): Promise<ScopedCatalog> {
    const machineId = await this.getMachineId().catch((error: unknown) => {
      throw new ScopeUnavailableError(
        `Cannot reach the catalog for '${replicaId}'`,
        replicaId,
        { cause: error },
      )
    })

    const token = await this.getScopeToken(replicaId, machineId)
    this.log.debug(`Switched to scope '${replicaId}'`)

    return new PlexScopedCatalog({
      replicaId,
      serverUrl: this.serverUrl,
      machineId,
      token,
      log: this.log,
    })
  }

  /**
   * Resolves a server token for a home user, matching title or username
   * case-insensitively. The owner gets the admin token.
   *
   * @throws ScopeUnavailableError
   */
  private async getScopeToken(
    replicaId: string,
    machineId: string,
  ): Promise<string> {
    const cacheKey = replicaId.toLowerCase()
    const cached = this.scopeTokens.get(cacheKey)
    if (cached && Date.now() - cached.timestamp < TOKEN_CACHE_TTL) {
      return cached.token
    }

    try {
      const users = await this.getUsers()
      const user = users.find(
        (candidate) =>
          candidate.title.toLowerCase() === cacheKey ||
          candidate.username?.toLowerCase() === cacheKey,
      )

      if (!user) {
        throw new Error(`No Plex Home user named '${replicaId}'`)
      }

      let token: string | null
      if (isHomeAdmin(user)) {
        token = this.adminToken
      } else {
        const accountToken = await switchHomeUser(user.id, this.adminToken)
        token = await getServerAccessToken(accountToken, machineId)
      }

      if (!token) {
        throw new Error(`'${replicaId}' has no access to this server`)
      }

      this.scopeTokens.set(cacheKey, { token, timestamp: Date.now() })
      return token
    } catch (error) {
      throw new ScopeUnavailableError(
        `Could not switch to '${replicaId}'`,
        replicaId,
        { cause: error },
      )
    }
  }

  /**
   * Every home user except the owner, by profile title
   *
   * @throws CatalogUnavailableError when plex.tv cannot list the home users
   */
  async listReplicaIds(): Promise<string[]> {
    try {
      const users = await this.getUsers()
      return users.filter((user) => !isHomeAdmin(user)).map((user) => user.title)
    } catch (error) {
      throw new CatalogUnavailableError(
        'Could not list Plex home users',
        undefined,
        { cause: error },
      )
    }
  }

  /**
   * Drops cached users and tokens so the next sync re-resolves them
   */
  clearCaches(): void {
    this.homeUsers = null
    this.usersTimestamp = 0
    this.scopeTokens.clear()
  }
}
