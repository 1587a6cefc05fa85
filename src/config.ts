import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

export interface Config {
  port?: number
  host?: string
  logFile?: string | null
  offerTimeoutMs?: number
  transferIdleTimeoutMs?: number
  authTimeoutMs?: number
  shutdownGraceMs?: number
}

export interface Settings {
  port: number
  host: string
  logFile: string | null
  offerTimeoutMs: number
  transferIdleTimeoutMs: number
  authTimeoutMs: number
  shutdownGraceMs: number
}

export interface ConfigValidationError {
  field: string
  message: string
}

export const DEFAULT_SETTINGS: Settings = {
  port: 5000,
  host: '0.0.0.0',
  logFile: null,
  offerTimeoutMs: 30_000,
  transferIdleTimeoutMs: 30_000,
  authTimeoutMs: 60_000,
  shutdownGraceMs: 10_000
}

const TIMEOUT_FIELDS = ['offerTimeoutMs', 'transferIdleTimeoutMs', 'authTimeoutMs', 'shutdownGraceMs'] as const

export function getConfigDir(): string {
  return process.env.SWITCHBOARD_HOME ?? path.join(os.homedir(), '.switchboard')
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (!isRecord(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  const c = config

  if (c.port !== undefined && !isPort(c.port)) {
    errors.push({ field: 'port', message: 'Port must be an integer between 1 and 65535' })
  }

  if (c.host !== undefined) {
    if (typeof c.host !== 'string') {
      errors.push({ field: 'host', message: 'Host must be a string' })
    } else if (c.host.trim().length === 0) {
      errors.push({ field: 'host', message: 'Host cannot be empty' })
    }
  }

  if (c.logFile !== undefined && c.logFile !== null) {
    if (typeof c.logFile !== 'string' || c.logFile.length === 0) {
      errors.push({ field: 'logFile', message: 'Log file must be a non-empty path or null' })
    }
  }

  for (const field of TIMEOUT_FIELDS) {
    const value = c[field]
    if (value === undefined) continue
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      errors.push({ field, message: `${field} must be a positive integer (milliseconds)` })
    }
  }

  return errors
}

// Keeps only the fields that passed validation.
function sanitizeConfig(parsed: Record<string, unknown>, errors: ConfigValidationError[]): Config {
  const invalid = new Set(errors.map(e => e.field))
  const config: Config = {}

  if (isPort(parsed.port) && !invalid.has('port')) config.port = parsed.port
  if (typeof parsed.host === 'string' && !invalid.has('host')) config.host = parsed.host
  if (!invalid.has('logFile')) {
    if (typeof parsed.logFile === 'string') config.logFile = parsed.logFile
    else if (parsed.logFile === null) config.logFile = null
  }
  for (const field of TIMEOUT_FIELDS) {
    const value = parsed[field]
    if (typeof value === 'number' && !invalid.has(field)) config[field] = value
  }

  return config
}

export function loadConfig(): Config {
  const configFile = getConfigPath()
  try {
    if (!fs.existsSync(configFile)) return {}

    const parsed: unknown = JSON.parse(fs.readFileSync(configFile, 'utf8'))
    const errors = validateConfig(parsed)
    if (!isRecord(parsed)) {
      console.error(`Config in ${configFile} is not an object, using defaults`)
      return {}
    }

    if (errors.length > 0) {
      console.error(`Config validation errors in ${configFile}:`)
      for (const err of errors) {
        console.error(`  - ${err.field}: ${err.message}`)
      }
      console.error('Using default values for invalid fields.')
    }

    return sanitizeConfig(parsed, errors)
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configFile}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    const dir = getConfigDir()
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true })
    }
    fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

/**
 * Merges defaults, the config file and environment overrides
 * (SWITCHBOARD_PORT, SWITCHBOARD_HOST, SWITCHBOARD_LOG_FILE), in that order.
 */
export function resolveSettings(config: Config, env: Record<string, string | undefined> = process.env): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS, ...config, logFile: config.logFile ?? DEFAULT_SETTINGS.logFile }

  if (env.SWITCHBOARD_PORT !== undefined) {
    const port = Number(env.SWITCHBOARD_PORT)
    if (isPort(port)) {
      settings.port = port
    } else {
      console.error(`Ignoring invalid SWITCHBOARD_PORT: ${env.SWITCHBOARD_PORT}`)
    }
  }

  if (env.SWITCHBOARD_HOST) settings.host = env.SWITCHBOARD_HOST
  if (env.SWITCHBOARD_LOG_FILE) settings.logFile = env.SWITCHBOARD_LOG_FILE

  return settings
}
