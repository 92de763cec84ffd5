import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as os from 'node:os'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { KeyPair, MESSAGING, extractClaims, fixedClock, signBufferWithClaims } from 'wasm-claims'
import { inspectCommand } from '../../../src/commands/inspect.js'

const EMPTY_MODULE = Uint8Array.from([0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00])

describe('inspectCommand', () => {
  let stderrOutput: string
  let stdoutOutput: string
  let tempDir: string
  let file: string

  beforeEach(async () => {
    stderrOutput = ''
    stdoutOutput = ''
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wasm-claims-inspect-test-'))
    file = path.join(tempDir, 'module.wasm')
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  async function writeSigned(options: { expiresInDays?: number; clock?: Date } = {}): Promise<Uint8Array> {
    const signed = await signBufferWithClaims(EMPTY_MODULE, {
      accountKey: KeyPair.generate('account'),
      moduleKey: KeyPair.generate('module'),
      caps: [MESSAGING, 'acme:teleport'],
      tags: ['blue'],
      expiresInDays: options.expiresInDays,
      clock: options.clock === undefined ? undefined : fixedClock(options.clock),
    })
    await fs.writeFile(file, signed)
    return signed
  }

  it('should require a file argument', async () => {
    expect(await inspectCommand([])).toBe(1)
    expect(stderrOutput).toContain('Usage: wasm-claims inspect')
  })

  it('should report a module without claims', async () => {
    await fs.writeFile(file, EMPTY_MODULE)
    expect(await inspectCommand([file])).toBe(0)
    expect(stdoutOutput).toBe(`No embedded claims found in ${file}\n`)
  })

  it('should describe embedded claims', async () => {
    const signed = await writeSigned({ expiresInDays: 2 })
    const token = await extractClaims(signed)

    expect(await inspectCommand([file])).toBe(0)
    expect(stdoutOutput).toContain(token?.claims.subject ?? 'missing subject')
    expect(stdoutOutput).toContain(token?.claims.issuer ?? 'missing issuer')
    expect(stdoutOutput).toContain('Messaging, acme:teleport')
    expect(stdoutOutput).toContain('blue')
    expect(stdoutOutput).toContain('in 2 days')
    expect(stdoutOutput).toContain('immediately')
    expect(stdoutOutput).not.toContain('Warning')
  })

  it('should print the raw token with --raw', async () => {
    const token = await extractClaims(await writeSigned())
    expect(await inspectCommand([file, '--raw'])).toBe(0)
    expect(stdoutOutput).toBe(`${token?.jwt ?? ''}\n`)
  })

  it('should warn about expired tokens', async () => {
    await writeSigned({ expiresInDays: 1, clock: new Date('2020-01-01T00:00:00Z') })
    expect(await inspectCommand([file])).toBe(0)
    expect(stdoutOutput).toContain('Warning: this token has expired.')
  })

  it('should fail when the module was modified after signing', async () => {
    const signed = await writeSigned()
    const tampered = Uint8Array.from([...signed.subarray(0, 8), 0x00, 0x01, 0x00, ...signed.subarray(8)])
    await fs.writeFile(file, tampered)

    expect(await inspectCommand([file])).toBe(1)
    expect(stderrOutput).toBe(
      'InvalidModuleHashError: Module hash does not match the hash recorded in its token\n',
    )
  })

  it('should fail for a missing file', async () => {
    expect(await inspectCommand([path.join(tempDir, 'absent.wasm')])).toBe(1)
    expect(stderrOutput).toContain('ENOENT')
  })
})
