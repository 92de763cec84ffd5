import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { capsCommand } from '../../../src/commands/caps.js'

describe('capsCommand', () => {
  let stdoutOutput: string

  beforeEach(() => {
    stdoutOutput = ''
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should list every well-known capability with its name', () => {
    expect(capsCommand([])).toBe(0)
    expect(stdoutOutput.trimEnd().split('\n')).toHaveLength(8)
    expect(stdoutOutput).toContain('wasmcap:keyvalue')
    expect(stdoutOutput).toContain('K/V Store')
  })
})
