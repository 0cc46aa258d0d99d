export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  // Plex Config
  plexServerUrl: string
  plexToken: string
  // Discord Config
  discordBotToken: string
  discordClientId: string
  // Recent Raves (incremental, capped)
  recentRavesContributors: string[]
  recentRavesPlaylistName: string
  recentRavesMaxSongs: number
  recentRavesMinRating: number
  // Jam Jar (full replace across members)
  jamJarMembers: string[]
  jamJarPlaylistName: string
  // Staff Picks (curators broadcast to everyone)
  staffPicksCurators: string[]
  staffPicksPlaylistName: string
  // Top Rated (root scope snapshot)
  topRatedPlaylistName: string
  topRatedMinRating: number
}

/**
 * Config as delivered by @fastify/env, before list-valued settings
 * (stored as JSON strings in the environment) are parsed.
 */
export type RawConfig = Omit<
  Config,
  'recentRavesContributors' | 'jamJarMembers' | 'staffPicksCurators'
> & {
  recentRavesContributors: string
  jamJarMembers: string
  staffPicksCurators: string
}
