/**
 * The canonical module hash that tokens attest to.
 *
 * The token section is stripped before hashing so that a token never covers
 * itself; embedding and extraction both hash through this one function.
 */

import { clearCustomSection } from '../wasm/sections.js'
import { serializeModule } from '../wasm/serialize.js'
import type { WasmModule } from '../wasm/types.js'
import { digestBytes, encodeHex } from './digest.js'

/** Name of the custom section that carries the signed token. */
export const TOKEN_SECTION = 'jwt'

/**
 * Hash `module` without its token section.
 *
 * @returns Uppercase hex SHA-256 of the canonical serialization
 */
export async function canonicalHash(module: WasmModule): Promise<string> {
  const stripped = clearCustomSection(module, TOKEN_SECTION)
  return encodeHex(await digestBytes(serializeModule(stripped)))
}
