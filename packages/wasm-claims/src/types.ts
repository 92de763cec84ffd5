/**
 * Shared types for wasm-claims.
 */

/** Defaults applied when signing modules from the command line. */
export interface SigningDefaults {
  /** Token lifetime in days. Unset means tokens never expire. */
  expiresInDays?: number | undefined
  /** Days before a freshly signed token becomes valid. */
  notBeforeDays?: number | undefined
}

/** The on-disk configuration file. */
export interface WasmClaimsConfig {
  version: 1
  defaults: SigningDefaults
}
