/**
 * Service configuration from environment variables
 */

export interface AppConfig {
  port: number
  host: string
  logLevel: string
  prettyLogs: boolean
  corsOrigin: string | undefined   // CORS stays off when unset
  maxUploadSize: number     // Bytes
  defaultRate: number       // Playback rate used when a request gives none
  timingScale: number       // Wife timing scale used when a request gives none
}

type Env = Record<string, string | undefined>

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw === '') return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} must be a non-negative integer (got "${raw}")`)
  }
  return n
}

function readPositive(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw === '') return fallback
  const n = Number(raw)
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number (got "${raw}")`)
  }
  return n
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]
  if (raw === undefined || raw === '') return fallback
  switch (raw.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true
    case '0':
    case 'false':
    case 'no':
      return false
    default:
      throw new Error(`${name} must be a boolean (got "${raw}")`)
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, 'BACKEND_PORT', 3000),
    host: env.BACKEND_HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    prettyLogs: readBool(env, 'PRETTY_LOGS', true),
    corsOrigin: env.CORS_ORIGIN || undefined,
    maxUploadSize: readInt(env, 'MAX_UPLOAD_SIZE', 1048576), // 1 MiB default
    defaultRate: readPositive(env, 'DEFAULT_RATE', 1),
    timingScale: readPositive(env, 'TIMING_SCALE', 1),
  }
}
