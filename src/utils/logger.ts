import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type AppLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

type Serializable = Error | Record<string, unknown> | string | number | boolean

function isSerializable(value: unknown): value is Serializable {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    (typeof value === 'object' && value !== null)
  )
}

/**
 * Serializes thrown values, keeping `cause` chains and the replica an error
 * belongs to.
 */
export function createErrorSerializer() {
  const serialize = (err: Serializable): Serializable => {
    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof Error) {
      serialized.type = err.name || 'Error'
    } else {
      serialized.type = 'UnknownError'
    }

    if ('stack' in err && err.stack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && isSerializable(err.cause)) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (!['message', 'stack', 'name', 'statusCode', 'type'].includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return (err: unknown): unknown => (isSerializable(err) ? serialize(err) : err)
}

/**
 * Serializes Fastify requests with tokens redacted from the URL
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => ({
    method: req.method,
    url: req.url
      .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
      .replace(/([?&])X-Plex-Token=([^&]+)/gi, '$1X-Plex-Token=[REDACTED]'),
    host: req.headers.host,
    remoteAddress: req.ip,
  })
}

/**
 * Builds the log filename for a rotation slot.
 * No time means the active file.
 */
export function filename(time: number | Date | null, index?: number): string {
  if (!time) return 'playlist-bot-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `playlist-bot-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Rotating file stream under data/logs, or stdout if the directory cannot
 * be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

function getFileOptions(): FileLoggerOptions {
  return {
    level: 'info',
    stream: getFileStream(),
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Logger options for the Fastify instance.
 *
 * Always logs to file. Environment variables:
 * - enableConsoleOutput: also show logs in the terminal (default: true)
 */
export function createLoggerConfig(): AppLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return getFileOptions()
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Child logger whose messages are prefixed with the service name,
 * e.g. `[PLEX_CATALOG] Switched to scope 'alice'`.
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  serviceName: string,
): FastifyBaseLogger {
  return baseLog.child({}, { msgPrefix: `[${serviceName.toUpperCase()}] ` })
}
