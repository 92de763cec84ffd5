import { describe, it, expect, afterEach, beforeEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { defaultConfig, loadConfig, validateConfig } from '../../src/config.js'
import { ConfigError } from '../../src/errors.js'

describe('validateConfig', () => {
  it('accepts a minimal config', () => {
    expect(validateConfig({ version: 1 })).toEqual({ version: 1, defaults: {} })
  })

  it('keeps signing defaults', () => {
    expect(
      validateConfig({ version: 1, defaults: { expiresInDays: 90, notBeforeDays: 0 } }),
    ).toEqual({ version: 1, defaults: { expiresInDays: 90, notBeforeDays: 0 } })
  })

  it('rejects non-objects', () => {
    expect(() => validateConfig([])).toThrow('Config must be an object')
    expect(() => validateConfig(null)).toThrow(ConfigError)
  })

  it('rejects other versions', () => {
    expect(() => validateConfig({ version: 2 })).toThrow('Config version must be 1')
  })

  it('rejects defaults that are not an object', () => {
    expect(() => validateConfig({ version: 1, defaults: 'none' })).toThrow(
      'Config defaults must be an object',
    )
  })

  it('rejects negative or fractional day counts', () => {
    expect(() => validateConfig({ version: 1, defaults: { expiresInDays: -1 } })).toThrow(
      'Config defaults.expiresInDays must be a non-negative integer',
    )
    expect(() => validateConfig({ version: 1, defaults: { notBeforeDays: 0.5 } })).toThrow(
      'Config defaults.notBeforeDays must be a non-negative integer',
    )
  })
})

describe('loadConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wasm-claims-config-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('falls back to defaults when no config file exists', async () => {
    expect(await loadConfig(dir)).toEqual(defaultConfig())
  })

  it('reads config.json from the given directory', async () => {
    await fs.writeFile(
      path.join(dir, 'config.json'),
      JSON.stringify({ version: 1, defaults: { expiresInDays: 7 } }),
    )
    expect(await loadConfig(dir)).toEqual({ version: 1, defaults: { expiresInDays: 7 } })
  })

  it('reports unparseable files with their path', async () => {
    const configPath = path.join(dir, 'config.json')
    await fs.writeFile(configPath, '{ nope')
    await expect(loadConfig(dir)).rejects.toThrow(`Failed to parse config file at ${configPath}`)
  })

  it('reports invalid content with its path', async () => {
    const configPath = path.join(dir, 'config.json')
    await fs.writeFile(configPath, JSON.stringify({ version: 3 }))
    const err = await loadConfig(dir).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ConfigError)
    if (err instanceof ConfigError) {
      expect(err.message).toBe(`Config version must be 1 (in ${configPath})`)
      expect(err.path).toBe(configPath)
    }
  })
})
