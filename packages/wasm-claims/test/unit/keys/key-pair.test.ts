import { describe, it, expect } from 'vitest'
import { KeyFormatError } from '../../../src/errors.js'
import { KeyPair, parsePublicKey } from '../../../src/keys/key-pair.js'

const ZERO_ACCOUNT_SEED = `SA${'A'.repeat(43)}`

describe('KeyPair', () => {
  it('generates account keys with an A prefix', () => {
    const keyPair = KeyPair.generate('account')
    expect(keyPair.kind).toBe('account')
    expect(keyPair.publicKey()).toMatch(/^A[A-Za-z0-9_-]{43}$/)
    expect(keyPair.seed()).toMatch(/^SA[A-Za-z0-9_-]{43}$/)
  })

  it('generates module keys with an M prefix', () => {
    const keyPair = KeyPair.generate('module')
    expect(keyPair.publicKey()).toMatch(/^M[A-Za-z0-9_-]{43}$/)
    expect(keyPair.seed()).toMatch(/^SM[A-Za-z0-9_-]{43}$/)
  })

  it('generates a different key each time', () => {
    expect(KeyPair.generate('account').publicKey()).not.toBe(
      KeyPair.generate('account').publicKey(),
    )
  })

  it('restores the same identity from its seed', () => {
    const original = KeyPair.generate('module')
    const restored = KeyPair.fromSeed(original.seed())
    expect(restored.kind).toBe('module')
    expect(restored.publicKey()).toBe(original.publicKey())
  })

  it('round-trips a fixed seed', () => {
    expect(KeyPair.fromSeed(ZERO_ACCOUNT_SEED).seed()).toBe(ZERO_ACCOUNT_SEED)
  })

  it('rejects a seed without the seed prefix', () => {
    expect(() => KeyPair.fromSeed(`XA${'A'.repeat(43)}`)).toThrow(KeyFormatError)
  })

  it('rejects a seed with an unknown kind', () => {
    expect(() => KeyPair.fromSeed(`SZ${'A'.repeat(43)}`)).toThrow('unknown key kind prefix')
  })

  it('rejects a seed of the wrong length', () => {
    expect(() => KeyPair.fromSeed(`SA${'A'.repeat(42)}`)).toThrow(KeyFormatError)
  })

  it('rejects a seed that is not canonical base64url', () => {
    expect(() => KeyPair.fromSeed(`SA${'A'.repeat(42)}B`)).toThrow('not valid base64url')
  })
})

describe('parsePublicKey', () => {
  it('decodes a public key into an Ed25519 verification key', () => {
    const keyPair = KeyPair.generate('account')
    const info = parsePublicKey(keyPair.publicKey())
    expect(info.kind).toBe('account')
    expect(info.key.type).toBe('public')
    expect(info.key.asymmetricKeyType).toBe('ed25519')
  })

  it('rejects an unknown prefix', () => {
    const text = KeyPair.generate('account').publicKey().slice(1)
    expect(() => parsePublicKey(`Q${text}`)).toThrow(KeyFormatError)
  })

  it('rejects text that is not a key', () => {
    expect(() => parsePublicKey('test.wasm')).toThrow(KeyFormatError)
    expect(() => parsePublicKey('')).toThrow(KeyFormatError)
  })
})
