/**
 * Key pair barrel export.
 */

export { KeyPair, parsePublicKey } from './key-pair.js'
export type { PublicKeyInfo } from './key-pair.js'
export type { KeyKind } from './types.js'
