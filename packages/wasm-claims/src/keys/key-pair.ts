/**
 * Ed25519 signing identities with compact textual encodings.
 *
 * Public keys are written as a one-letter kind prefix (`A` account, `M`
 * module) followed by the base64url raw 32-byte key. Seeds are `S`, the kind
 * prefix, then the base64url 32-byte private seed.
 */

import * as crypto from 'node:crypto'
import { KeyFormatError } from '../errors.js'
import type { KeyKind } from './types.js'

const KEY_LENGTH = 32
const ENCODED_KEY_LENGTH = 43
const SEED_PREFIX = 'S'

/** DER prefixes that wrap a raw Ed25519 key as PKCS#8 / SPKI. */
const PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex')
const SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex')

const KIND_PREFIX: Readonly<Record<KeyKind, string>> = {
  account: 'A',
  module: 'M',
}

function kindFromPrefix(prefix: string | undefined): KeyKind | undefined {
  if (prefix === KIND_PREFIX.account) return 'account'
  if (prefix === KIND_PREFIX.module) return 'module'
  return undefined
}

/** Decode a base64url raw key, rejecting anything that does not round-trip. */
function decodeRawKey(text: string, what: string): Buffer {
  if (text.length !== ENCODED_KEY_LENGTH) {
    throw new KeyFormatError(`Invalid ${what}: expected ${String(ENCODED_KEY_LENGTH)} key characters`)
  }
  const raw = Buffer.from(text, 'base64url')
  if (raw.length !== KEY_LENGTH || raw.toString('base64url') !== text) {
    throw new KeyFormatError(`Invalid ${what}: key is not valid base64url`)
  }
  return raw
}

/** A decoded public key. */
export interface PublicKeyInfo {
  kind: KeyKind
  key: crypto.KeyObject
}

/**
 * Decode public key text into a verification key.
 *
 * @throws KeyFormatError if the text is not a well-formed public key
 */
export function parsePublicKey(text: string): PublicKeyInfo {
  const kind = kindFromPrefix(text[0])
  if (kind === undefined) {
    throw new KeyFormatError('Invalid public key: unknown key kind prefix')
  }
  const raw = decodeRawKey(text.slice(1), 'public key')
  const key = crypto.createPublicKey({
    key: Buffer.concat([SPKI_PREFIX, raw]),
    format: 'der',
    type: 'spki',
  })
  return { kind, key }
}

/** An Ed25519 signing identity of a given kind. */
export class KeyPair {
  readonly kind: KeyKind
  readonly #privateKey: crypto.KeyObject
  readonly #publicKey: crypto.KeyObject

  private constructor(kind: KeyKind, privateKey: crypto.KeyObject) {
    this.kind = kind
    this.#privateKey = privateKey
    this.#publicKey = crypto.createPublicKey(privateKey)
  }

  /** Generate a fresh random key pair. */
  static generate(kind: KeyKind): KeyPair {
    const { privateKey } = crypto.generateKeyPairSync('ed25519')
    return new KeyPair(kind, privateKey)
  }

  /**
   * Restore a key pair from its seed text.
   *
   * @throws KeyFormatError if the seed is malformed
   */
  static fromSeed(seed: string): KeyPair {
    if (seed[0] !== SEED_PREFIX) {
      throw new KeyFormatError('Invalid seed: missing seed prefix')
    }
    const kind = kindFromPrefix(seed[1])
    if (kind === undefined) {
      throw new KeyFormatError('Invalid seed: unknown key kind prefix')
    }
    const raw = decodeRawKey(seed.slice(2), 'seed')
    const privateKey = crypto.createPrivateKey({
      key: Buffer.concat([PKCS8_PREFIX, raw]),
      format: 'der',
      type: 'pkcs8',
    })
    return new KeyPair(kind, privateKey)
  }

  /** Public key text, safe to publish and embed in claims. */
  publicKey(): string {
    const spki = this.#publicKey.export({ format: 'der', type: 'spki' })
    return KIND_PREFIX[this.kind] + spki.subarray(spki.length - KEY_LENGTH).toString('base64url')
  }

  /** Seed text from which `fromSeed` rebuilds this key pair. Keep it secret. */
  seed(): string {
    const pkcs8 = this.#privateKey.export({ format: 'der', type: 'pkcs8' })
    return (
      SEED_PREFIX +
      KIND_PREFIX[this.kind] +
      pkcs8.subarray(pkcs8.length - KEY_LENGTH).toString('base64url')
    )
  }

  /**
   * The private key consumed by the token codec.
   * @internal
   */
  signingKey(): crypto.KeyObject {
    return this.#privateKey
  }
}
