import dotenv from 'dotenv'
import { parseSizeUnit, SizeUnit } from '@internal/streams/units'

type GuardConfigType = {
  version: string
  host: string
  port: number
  requestTraceHeader?: string
  logLevel: string
  uploadSizeLimit: number
  uploadSizeLimitUnit: SizeUnit
  uploadReadChunkSize: number
}

function getOptionalConfigFromEnv(key: string, fallback?: string): string | undefined {
  const envValue = process.env[key]

  if (!envValue && fallback) {
    return getOptionalConfigFromEnv(fallback)
  }

  return envValue
}

function getNumberFromEnv(key: string, defaultValue: number, fallback?: string): number {
  const value = getOptionalConfigFromEnv(key, fallback)
  if (!value) {
    return defaultValue
  }

  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${value}"`)
  }
  return parsed
}

let config: GuardConfigType | undefined
let envPaths = ['.env']

export function setEnvPaths(paths: string[]) {
  envPaths = paths
}

export function mergeConfig(newConfig: Partial<GuardConfigType>) {
  config = { ...getConfig(), ...newConfig }
}

export function getConfig(options?: { reload?: boolean }): GuardConfigType {
  if (config && !options?.reload) {
    return config
  }

  envPaths.map((envPath) => dotenv.config({ path: envPath, override: false }))

  const sizeUnit = getOptionalConfigFromEnv('UPLOAD_SIZE_LIMIT_UNIT') || 'mb'
  let uploadSizeLimitUnit: SizeUnit
  try {
    uploadSizeLimitUnit = parseSizeUnit(sizeUnit)
  } catch (e) {
    throw new Error(`UPLOAD_SIZE_LIMIT_UNIT must be one of b, kb, mb, gb, got "${sizeUnit}"`, {
      cause: e,
    })
  }

  config = {
    version: getOptionalConfigFromEnv('VERSION') || '0.0.0',
    host: getOptionalConfigFromEnv('SERVER_HOST', 'HOST') || '0.0.0.0',
    port: getNumberFromEnv('SERVER_PORT', 5000, 'PORT'),
    requestTraceHeader: getOptionalConfigFromEnv('REQUEST_TRACE_HEADER', 'REQUEST_ID_HEADER'),
    logLevel: getOptionalConfigFromEnv('LOG_LEVEL') || 'info',

    // Uploads
    uploadSizeLimit: getNumberFromEnv('UPLOAD_SIZE_LIMIT', 50),
    uploadSizeLimitUnit,
    uploadReadChunkSize: getNumberFromEnv('UPLOAD_READ_CHUNK_SIZE', 64 * 1024),
  }

  return config
}
