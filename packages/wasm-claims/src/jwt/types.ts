/**
 * Claims and token types.
 */

/**
 * The signed manifest embedded in a module.
 *
 * All timestamps are whole seconds since the Unix epoch.
 */
export interface Claims {
  /** Public key of the account that signed the token. */
  issuer: string
  /** Identity of the module the token describes, usually its public key. */
  subject: string
  /** Capability ids the module may use, in declaration order. */
  caps?: string[] | undefined
  /** Free-form tags, in declaration order. */
  tags?: string[] | undefined
  issuedAt: number
  notBefore?: number | undefined
  expires?: number | undefined
  /** Unique token id. */
  id: string
  /**
   * Uppercase hex canonical hash of the module. Empty until the claims are
   * embedded; the embedder always overwrites it.
   */
  moduleHash: string
}

/** A verified token extracted from a module. */
export interface Token {
  /** The compact JWS text as stored in the module. */
  jwt: string
  claims: Claims
}

/** Validity report for a token, relative to a point in time. */
export interface TokenValidation {
  signatureValid: boolean
  expired: boolean
  cannotUseYet: boolean
  /** e.g. `"in 3 days"`, `"2 hours ago"`, or `"never"`. */
  expiresHuman: string
  /** e.g. `"in 1 day"`, or `"immediately"` when there is no lower bound. */
  notBeforeHuman: string
}

/**
 * Module-specific claims carried under the `wasm` key of the JWT payload.
 * @internal
 */
export interface WasmClaimsPayload {
  hash: string
  caps?: string[]
  tags?: string[]
}
