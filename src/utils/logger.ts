import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
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

export type LogDestination = 'terminal' | 'file' | 'both'

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type OrgMapperLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

type SerializableError = Error | Record<string, unknown> | string | number | boolean

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

const REDACTED_KEYS = ['password', 'clientSecret', 'token', 'credentials']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Creates an error serializer that handles standard errors, the service's own
 * error classes and plain objects thrown by dependencies.
 *
 * @returns A function that serializes error objects with message, stack, name, and custom properties.
 */
export function createErrorSerializer() {
  const serialize = (err: SerializableError): unknown => {
    if (err == null) {
      return err
    }

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
    if ('code' in err && err.code !== undefined) serialized.code = err.code
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof Error) {
      serialized.type = err.constructor.name || 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Skip stack traces for 4xx client errors to reduce noise
    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : 'status' in err && typeof err.status === 'number'
          ? err.status
          : undefined
    const shouldIncludeStack = !statusCode || statusCode >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        isRecord(cause) ||
        typeof cause === 'string' ||
        typeof cause === 'number' ||
        typeof cause === 'boolean'
          ? serialize(cause)
          : String(cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        ['message', 'stack', 'name', 'code', 'status', 'statusCode', 'type'].includes(
          key,
        )
      ) {
        continue
      }
      serialized[key] = REDACTED_KEYS.includes(key) ? '[REDACTED]' : value
    }

    return serialized
  }

  return serialize
}

/**
 * Returns a serializer for Fastify requests that drops credentials from the
 * logged request.
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => {
    const serialized = {
      method: req.method,
      url: req.url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }

    if (serialized.url) {
      serialized.url = serialized.url
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
        .replace(/([?&])password=([^&]+)/gi, '$1password=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * @param time - The date or timestamp for the log filename. If falsy, returns the current log filename.
 * @param index - Optional index appended for rotated files
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'orgmapper-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `orgmapper-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under data/logs, falling back to stdout when
 * the directory cannot be created.
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

function getTerminalOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: {
      req: createRequestSerializer(),
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
}

function getFileOptions(level: LevelWithSilent): FileLoggerOptions {
  return {
    level,
    stream: getFileStream(),
    serializers: {
      req: createRequestSerializer(),
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
}

function parseLogLevel(value: string | undefined): LevelWithSilent {
  return validLogLevels.find((level) => level === value) ?? 'info'
}

function parseDestination(value: string | undefined): LogDestination {
  return value === 'file' || value === 'both' ? value : 'terminal'
}

/**
 * Generates logger configuration from environment variables.
 *
 * - logLevel: initial level (default: info)
 * - logDestination: terminal, file or both (default: terminal)
 */
export function createLoggerConfig(): OrgMapperLoggerOptions {
  const level = parseLogLevel(process.env.logLevel)
  const destination = parseDestination(process.env.logDestination)

  if (destination === 'terminal') {
    return getTerminalOptions(level)
  }

  if (destination === 'file') {
    return getFileOptions(level)
  }

  const fileStream = getFileStream()

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions(level)
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level,
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers: {
      req: createRequestSerializer(),
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Creates a child logger whose messages are prefixed with the service name
 *
 * @param baseLog - Parent logger
 * @param service - Upper-case service tag, e.g. `TENANT_RECONCILER`
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return baseLog.child({}, { msgPrefix: `[${service}] ` })
}
