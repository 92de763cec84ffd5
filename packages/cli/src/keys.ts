/**
 * Seed loading for CLI key arguments.
 *
 * @internal
 */

import * as fs from 'node:fs/promises'
import { KeyPair } from 'wasm-claims'

const SEED_PATTERN = /^S[AM][A-Za-z0-9_-]{43}$/

/**
 * Resolve a key argument that is either seed text or the path of a file
 * whose trimmed content is seed text.
 */
export async function loadKeyPair(value: string): Promise<KeyPair> {
  if (SEED_PATTERN.test(value)) {
    return KeyPair.fromSeed(value)
  }
  const content = await fs.readFile(value, 'utf8')
  return KeyPair.fromSeed(content.trim())
}
