import fs from 'fs'
import path from 'path'
import os from 'os'

export interface Config {
  host?: string
  hostname?: string
  smtpPort?: number
  pop3Port?: number
  idleTimeoutMs?: number
  maxMessageSize?: number
  waitForLock?: boolean
}

export interface Settings {
  dataDir: string
  host: string
  hostname: string
  smtpPort: number
  pop3Port: number
  idleTimeoutMs: number
  maxMessageSize: number
  waitForLock: boolean
}

export interface ConfigValidationError {
  field: string
  message: string
}

export type Env = Record<string, string | undefined>

export const DEFAULT_SETTINGS: Omit<Settings, 'dataDir'> = {
  host: '127.0.0.1',
  hostname: 'localhost',
  smtpPort: 2525,
  pop3Port: 1110,
  idleTimeoutMs: 300000,
  maxMessageSize: 10 * 1024 * 1024,
  waitForLock: false
}

const CONFIG_FILE_NAME = 'config.json'
const REGISTRY_FILE_NAME = 'userinfo.txt'
const MAILBOXES_DIR_NAME = 'users'

export function getDataDir(env: Env = process.env): string {
  return env.MAIL_ROOT ?? path.join(os.homedir(), '.mailpair')
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILE_NAME)
}

export function getRegistryPath(dataDir: string): string {
  return path.join(dataDir, REGISTRY_FILE_NAME)
}

export function getMailboxesDir(dataDir: string): string {
  return path.join(dataDir, MAILBOXES_DIR_NAME)
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0
}

function isHostname(value: unknown): value is string {
  return typeof value === 'string' && /^[a-zA-Z0-9.-]+$/.test(value)
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  const c = config as Record<string, unknown>

  if (c.host !== undefined) {
    if (typeof c.host !== 'string' || c.host.length === 0) {
      errors.push({ field: 'host', message: 'Host must be a non-empty string' })
    }
  }

  if (c.hostname !== undefined && !isHostname(c.hostname)) {
    errors.push({ field: 'hostname', message: 'Hostname can only contain letters, numbers, dots, and hyphens' })
  }

  for (const field of ['smtpPort', 'pop3Port'] as const) {
    if (c[field] === undefined) continue
    if (typeof c[field] !== 'number') {
      errors.push({ field, message: `${field} must be a number` })
    } else if (!isPort(c[field])) {
      errors.push({ field, message: `${field} must be an integer between 1 and 65535` })
    }
  }

  for (const field of ['idleTimeoutMs', 'maxMessageSize'] as const) {
    if (c[field] !== undefined && !isPositiveInteger(c[field])) {
      errors.push({ field, message: `${field} must be a positive integer` })
    }
  }

  if (c.waitForLock !== undefined && typeof c.waitForLock !== 'boolean') {
    errors.push({ field: 'waitForLock', message: 'waitForLock must be a boolean' })
  }

  return errors
}

// Keep only the fields that pass validation on their own
function pickValid(parsed: Record<string, unknown>): Config {
  const config: Config = {}
  if (typeof parsed.host === 'string' && parsed.host.length > 0) config.host = parsed.host
  if (isHostname(parsed.hostname)) config.hostname = parsed.hostname
  if (isPort(parsed.smtpPort)) config.smtpPort = parsed.smtpPort
  if (isPort(parsed.pop3Port)) config.pop3Port = parsed.pop3Port
  if (isPositiveInteger(parsed.idleTimeoutMs)) config.idleTimeoutMs = parsed.idleTimeoutMs
  if (isPositiveInteger(parsed.maxMessageSize)) config.maxMessageSize = parsed.maxMessageSize
  if (typeof parsed.waitForLock === 'boolean') config.waitForLock = parsed.waitForLock
  return config
}

export function loadConfig(dataDir: string): Config {
  const configPath = getConfigPath(dataDir)
  try {
    if (!fs.existsSync(configPath)) return {}

    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'))
    const errors = validateConfig(parsed)
    if (errors.length > 0) {
      console.error(`Config validation errors in ${configPath}:`)
      for (const err of errors) {
        console.error(`  - ${err.field}: ${err.message}`)
      }
      console.error('Using default values for invalid fields.')
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {}
    return pickValid(parsed as Record<string, unknown>)
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configPath}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

function envPort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const port = Number(value)
  if (!isPort(port)) {
    console.error(`Ignoring invalid port from environment: ${value}`)
    return undefined
  }
  return port
}

/** Apply environment overrides and defaults to a loaded config. */
export function resolveSettings(config: Config, dataDir: string, env: Env = process.env): Settings {
  return {
    dataDir,
    host: env.MAIL_HOST ?? config.host ?? DEFAULT_SETTINGS.host,
    hostname: env.MAIL_HOSTNAME ?? config.hostname ?? DEFAULT_SETTINGS.hostname,
    smtpPort: envPort(env.SMTP_PORT) ?? config.smtpPort ?? DEFAULT_SETTINGS.smtpPort,
    pop3Port: envPort(env.POP3_PORT) ?? config.pop3Port ?? DEFAULT_SETTINGS.pop3Port,
    idleTimeoutMs: config.idleTimeoutMs ?? DEFAULT_SETTINGS.idleTimeoutMs,
    maxMessageSize: config.maxMessageSize ?? DEFAULT_SETTINGS.maxMessageSize,
    waitForLock: config.waitForLock ?? DEFAULT_SETTINGS.waitForLock
  }
}
