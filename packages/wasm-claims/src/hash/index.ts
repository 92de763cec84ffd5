/**
 * Hashing barrel export.
 */

export { digest, digestBytes, encodeHex, chunks } from './digest.js'
export { canonicalHash, TOKEN_SECTION } from './canonical.js'
