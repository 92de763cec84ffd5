/**
 * Embedding signed claims into a WebAssembly module.
 *
 * @packageDocumentation
 */

import { canonicalHash, TOKEN_SECTION } from './hash/canonical.js'
import { newClaims } from './jwt/claims.js'
import { encodeClaims } from './jwt/token.js'
import type { Claims } from './jwt/types.js'
import type { KeyPair } from './keys/key-pair.js'
import { daysFromNow, fixedClock, systemClock } from './time.js'
import type { Clock } from './time.js'
import { parseModule } from './wasm/parse.js'
import { setCustomSection } from './wasm/sections.js'
import { serializeModule } from './wasm/serialize.js'

/**
 * Sign `claims` for the module in `bytes` and return a new module carrying
 * the token in its `jwt` custom section.
 *
 * The claims' `moduleHash` is always replaced by the canonical hash of the
 * module. Any token already present is replaced, so re-signing a signed
 * module yields a module with exactly one token.
 *
 * @param bytes - The module to sign. Not modified.
 * @param claims - Claims to sign. Not modified.
 * @param keyPair - Issuer key used to sign the token.
 * @returns The serialized, signed module
 * @throws ParseError if `bytes` is not a valid module
 * @throws SigningError if the token cannot be signed
 */
export async function embedClaims(
  bytes: Uint8Array,
  claims: Claims,
  keyPair: KeyPair,
): Promise<Uint8Array> {
  const module = parseModule(bytes)
  const moduleHash = await canonicalHash(module)
  const jwt = await encodeClaims({ ...claims, moduleHash }, keyPair)
  const signed = setCustomSection(module, TOKEN_SECTION, new TextEncoder().encode(jwt))
  return serializeModule(signed)
}

/** Options for `signBufferWithClaims`. */
export interface SignBufferOptions {
  /** Account key that issues and signs the token. */
  accountKey: KeyPair
  /** Module key whose public key becomes the token subject. */
  moduleKey: KeyPair
  caps?: string[] | undefined
  tags?: string[] | undefined
  /** Token lifetime in days from now. Unset means the token never expires. */
  expiresInDays?: number | undefined
  /** Days from now before which the token is not valid. */
  notBeforeDays?: number | undefined
  clock?: Clock | undefined
}

/**
 * Build claims from an account key, a module key and day offsets, then embed
 * them in `bytes`.
 */
export function signBufferWithClaims(
  bytes: Uint8Array,
  options: SignBufferOptions,
): Promise<Uint8Array> {
  // One reading of the clock so issue time and offsets share a base.
  const clock = fixedClock((options.clock ?? systemClock).now())
  const claims = newClaims(
    {
      issuer: options.accountKey.publicKey(),
      subject: options.moduleKey.publicKey(),
      caps: options.caps,
      tags: options.tags,
      notBefore: daysFromNow(options.notBeforeDays, clock),
      expires: daysFromNow(options.expiresInDays, clock),
    },
    clock,
  )
  return embedClaims(bytes, claims, options.accountKey)
}
