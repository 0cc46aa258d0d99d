import { PLEX_CLIENT_IDENTIFIER, USER_AGENT } from '@utils/version.js'
import { XMLParser } from 'fast-xml-parser'
import type { z } from 'zod'

export const PLEX_API_TIMEOUT = 30000 // 30 seconds
export const PLEX_TV_URL = 'https://plex.tv'

/** Raised for non-2xx Plex responses */
export class PlexHttpError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    readonly url: string,
  ) {
    super(`Plex request failed: ${status} ${statusText}`)
    this.name = 'PlexHttpError'
  }
}

export interface PlexRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE'
  accept?: 'json' | 'xml'
  timeoutMs?: number
}

/**
 * Sends an authenticated request to a Plex server or plex.tv.
 *
 * @throws PlexHttpError for non-2xx responses
 */
export async function plexFetch(
  url: URL,
  token: string,
  options: PlexRequestOptions = {},
): Promise<Response> {
  const response = await fetch(url.toString(), {
    method: options.method ?? 'GET',
    headers: {
      'User-Agent': USER_AGENT,
      Accept: options.accept === 'xml' ? 'application/xml' : 'application/json',
      'X-Plex-Token': token,
      'X-Plex-Client-Identifier': PLEX_CLIENT_IDENTIFIER,
    },
    signal: AbortSignal.timeout(options.timeoutMs ?? PLEX_API_TIMEOUT),
  })

  if (!response.ok) {
    throw new PlexHttpError(response.status, response.statusText, url.pathname)
  }

  return response
}

/**
 * Requests JSON and validates it against a schema
 */
export async function plexJson<S extends z.ZodTypeAny>(
  url: URL,
  token: string,
  schema: S,
  options: PlexRequestOptions = {},
): Promise<z.output<S>> {
  const response = await plexFetch(url, token, { ...options, accept: 'json' })
  const data: unknown = await response.json()
  return schema.parse(data)
}

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: (name) => name === 'User',
})

/**
 * Requests XML (plex.tv v1 endpoints), parses it and validates the result
 */
export async function plexXml<S extends z.ZodTypeAny>(
  url: URL,
  token: string,
  schema: S,
  options: PlexRequestOptions = {},
): Promise<z.output<S>> {
  const response = await plexFetch(url, token, { ...options, accept: 'xml' })
  const parsed: unknown = xmlParser.parse(await response.text())
  return schema.parse(parsed)
}
