/**
 * User Operations Module
 *
 * plex.tv calls for enumerating Plex Home users and obtaining a server access
 * token on their behalf.
 */

import {
  type PlexHomeUser,
  PlexHomeUsersSchema,
  PlexIdentitySchema,
  PlexResourcesSchema,
  PlexSwitchUserSchema,
} from '@root/schemas/plex/plex-api.schema.js'
import { PLEX_TV_URL, plexJson, plexXml } from './plex-request.js'

const PLEX_TV_TIMEOUT = 10000 // 10 seconds

/**
 * Reads the machine identifier of the configured server
 */
export async function getServerMachineId(
  serverUrl: string,
  token: string,
): Promise<string> {
  const data = await plexJson(
    new URL('/identity', serverUrl),
    token,
    PlexIdentitySchema,
  )
  return data.MediaContainer.machineIdentifier
}

/**
 * Lists the members of the owner's Plex Home, the owner included
 */
export async function getHomeUsers(adminToken: string): Promise<PlexHomeUser[]> {
  const data = await plexXml(
    new URL('/api/home/users', PLEX_TV_URL),
    adminToken,
    PlexHomeUsersSchema,
    { timeoutMs: PLEX_TV_TIMEOUT },
  )
  return data.MediaContainer.User
}

export function isHomeAdmin(user: PlexHomeUser): boolean {
  return user.admin === '1' || user.admin === 'true'
}

/**
 * Switches into a home user and returns their plex.tv token
 */
export async function switchHomeUser(
  userId: string,
  adminToken: string,
): Promise<string> {
  const data = await plexXml(
    new URL(`/api/home/users/${encodeURIComponent(userId)}/switch`, PLEX_TV_URL),
    adminToken,
    PlexSwitchUserSchema,
    { method: 'POST', timeoutMs: PLEX_TV_TIMEOUT },
  )
  return data.user.authToken || data.user.authenticationToken || ''
}

/**
 * Finds the access token a plex.tv account holds for one server
 *
 * @returns The server access token, or null when the account cannot see it
 */
export async function getServerAccessToken(
  accountToken: string,
  machineId: string,
): Promise<string | null> {
  const url = new URL('/api/v2/resources', PLEX_TV_URL)
  url.searchParams.append('includeHttps', '1')

  const resources = await plexJson(url, accountToken, PlexResourcesSchema, {
    timeoutMs: PLEX_TV_TIMEOUT,
  })

  const server = resources.find(
    (resource) =>
      resource.provides.split(',').includes('server') &&
      resource.clientIdentifier === machineId,
  )

  return server?.accessToken || null
}
