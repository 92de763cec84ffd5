/**
 * Extracting and verifying the claims embedded in a WebAssembly module.
 *
 * @packageDocumentation
 */

import { EncodingError, InvalidModuleHashError } from './errors.js'
import { canonicalHash, TOKEN_SECTION } from './hash/canonical.js'
import { decodeClaims } from './jwt/token.js'
import type { Token } from './jwt/types.js'
import { parseModule } from './wasm/parse.js'
import { getCustomSection } from './wasm/sections.js'

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Read the token embedded in `bytes`, verify its signature, and check that
 * it was issued for this exact module content.
 *
 * @returns The token, or `undefined` when the module carries none
 * @throws ParseError if `bytes` is not a valid module
 * @throws EncodingError if the token section is not UTF-8
 * @throws TokenDecodeError if the token is malformed or its signature fails
 * @throws InvalidModuleHashError if the module changed after signing
 */
export async function extractClaims(bytes: Uint8Array): Promise<Token | undefined> {
  const module = parseModule(bytes)
  const section = getCustomSection(module, TOKEN_SECTION)
  if (section === undefined) {
    return undefined
  }

  let jwt: string
  try {
    jwt = utf8.decode(section)
  } catch {
    throw new EncodingError(`The ${TOKEN_SECTION} section does not contain valid UTF-8`)
  }

  const claims = await decodeClaims(jwt)
  const hash = await canonicalHash(module)

  if (hash !== claims.moduleHash) {
    throw new InvalidModuleHashError(
      'Module hash does not match the hash recorded in its token',
      claims.moduleHash,
      hash,
    )
  }

  return { jwt, claims }
}
