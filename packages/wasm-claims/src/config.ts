/**
 * Configuration loading, validation, and defaults for wasm-claims.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigError } from './errors.js'
import type { SigningDefaults, WasmClaimsConfig } from './types.js'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'wasm-claims')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'wasm-claims')
  }
  return path.join(os.homedir(), '.config', 'wasm-claims')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): WasmClaimsConfig {
  return {
    version: 1,
    defaults: {},
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function validateDayCount(value: unknown, field: string): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new ConfigError(`Config defaults.${field} must be a non-negative integer`)
  }
  return value
}

/**
 * Validate an unknown value as a WasmClaimsConfig, throwing on invalid structure.
 */
export function validateConfig(config: unknown): WasmClaimsConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new ConfigError('Config version must be 1')
  }

  const defaults: SigningDefaults = {}
  if (config.defaults !== undefined) {
    if (!isObject(config.defaults)) {
      throw new ConfigError('Config defaults must be an object')
    }
    const expiresInDays = validateDayCount(config.defaults.expiresInDays, 'expiresInDays')
    if (expiresInDays !== undefined) {
      defaults.expiresInDays = expiresInDays
    }
    const notBeforeDays = validateDayCount(config.defaults.notBeforeDays, 'notBeforeDays')
    if (notBeforeDays !== undefined) {
      defaults.notBeforeDays = notBeforeDays
    }
  }

  return { version: 1, defaults }
}

/**
 * Load the wasm-claims config from disk, falling back to defaults if the
 * file does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<WasmClaimsConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`, configPath)
  }

  try {
    return validateConfig(parsed)
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`${err.message} (in ${configPath})`, configPath)
    }
    throw err
  }
}
