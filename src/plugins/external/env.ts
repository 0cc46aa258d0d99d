import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config, RawConfig } from '@root/types/config.types.js'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3005,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 30,
    },
    plexServerUrl: {
      type: 'string',
      default: 'http://localhost:32400',
    },
    plexToken: {
      type: 'string',
      default: '',
    },
    discordBotToken: {
      type: 'string',
      default: '',
    },
    discordClientId: {
      type: 'string',
      default: '',
    },
    // List-valued settings are JSON arrays of Plex Home profile names
    recentRavesContributors: {
      type: 'string',
      default: '[]',
    },
    recentRavesPlaylistName: {
      type: 'string',
      default: 'Recent Raves',
    },
    recentRavesMaxSongs: {
      type: 'number',
      default: 50,
    },
    recentRavesMinRating: {
      type: 'number',
      default: 9.9,
    },
    jamJarMembers: {
      type: 'string',
      default: '[]',
    },
    jamJarPlaylistName: {
      type: 'string',
      default: 'Jam Jar',
    },
    staffPicksCurators: {
      type: 'string',
      default: '[]',
    },
    staffPicksPlaylistName: {
      type: 'string',
      default: 'Staff Picks',
    },
    topRatedPlaylistName: {
      type: 'string',
      default: 'Top Rated',
    },
    topRatedMinRating: {
      type: 'number',
      default: 8,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

/**
 * Parses a JSON array of names, falling back to an empty list
 */
export function parseNameList(
  value: string | undefined,
  fieldName: string,
  onError: (message: string, error: unknown) => void,
): string[] {
  if (!value) return []
  try {
    const parsed: unknown = JSON.parse(value)
    if (
      !Array.isArray(parsed) ||
      !parsed.every((name): name is string => typeof name === 'string')
    ) {
      throw new TypeError(`${fieldName} must be a JSON array of strings`)
    }
    return parsed
  } catch (error) {
    onError(`Failed to parse ${fieldName} config, using an empty list`, error)
    return []
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'rawConfig',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const rawConfig = fastify.getEnvs<RawConfig>()
    const warn = (message: string, error: unknown) =>
      fastify.log.warn({ error }, message)

    const config: Config = {
      ...rawConfig,
      recentRavesContributors: parseNameList(
        rawConfig.recentRavesContributors,
        'recentRavesContributors',
        warn,
      ),
      jamJarMembers: parseNameList(rawConfig.jamJarMembers, 'jamJarMembers', warn),
      staffPicksCurators: parseNameList(
        rawConfig.staffPicksCurators,
        'staffPicksCurators',
        warn,
      ),
    }

    fastify.decorate('config', config)
  },
  { name: 'config' },
)
