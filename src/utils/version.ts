import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: unknown = JSON.parse(
  readFileSync(resolve(__dirname, '../../package.json'), 'utf8'),
)

/** Application version from package.json */
export const APP_VERSION: string =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0'

/**
 * Standard User-Agent header for Plex requests
 * Format: "plex-playlist-bot/1.0.0"
 */
export const USER_AGENT = `plex-playlist-bot/${APP_VERSION}`

/** Client identifier sent to Plex so the server can attribute requests */
export const PLEX_CLIENT_IDENTIFIER = 'plex-playlist-bot'
