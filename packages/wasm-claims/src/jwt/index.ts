/**
 * Claims token layer barrel export.
 */

export { encodeClaims, decodeClaims, peekClaims, isSignatureValid } from './token.js'
export { newClaims, generateTokenId } from './claims.js'
export type { NewClaimsOptions } from './claims.js'
export { validateToken, humanizeOffset } from './validation.js'
export type { Claims, Token, TokenValidation } from './types.js'
