/**
 * Error hierarchy for wasm-claims.
 *
 * @packageDocumentation
 */

/** Base error for all wasm-claims errors. */
export class ClaimsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ClaimsError'
  }
}

// --- Module Container Failures ---

/**
 * Thrown when a byte buffer is not a structurally valid WebAssembly module
 * (bad magic, unsupported version, truncated or malformed section headers).
 */
export class ParseError extends ClaimsError {
  /** Byte offset in the input at which parsing failed. */
  readonly offset: number

  constructor(message: string, offset: number) {
    super(message)
    this.name = 'ParseError'
    this.offset = offset
  }
}

/**
 * Thrown when an in-memory module cannot be written back to bytes.
 * Modules produced by `parseModule` never trigger this.
 */
export class SerializationError extends ClaimsError {
  constructor(message: string) {
    super(message)
    this.name = 'SerializationError'
  }
}

/**
 * Thrown when the embedded token section does not hold valid UTF-8 text.
 */
export class EncodingError extends ClaimsError {
  constructor(message: string) {
    super(message)
    this.name = 'EncodingError'
  }
}

/**
 * Thrown when the byte stream feeding the hasher fails.
 */
export class IoError extends ClaimsError {
  constructor(message: string) {
    super(message)
    this.name = 'IoError'
  }
}

// --- Token Failures ---

/**
 * Thrown when a token is malformed or its signature does not verify against
 * the issuer's public key.
 */
export class TokenDecodeError extends ClaimsError {
  constructor(message: string) {
    super(message)
    this.name = 'TokenDecodeError'
  }
}

/**
 * Thrown when the signer fails to produce a token.
 */
export class SigningError extends ClaimsError {
  constructor(message: string) {
    super(message)
    this.name = 'SigningError'
  }
}

/**
 * Thrown when the module hash declared in a token does not match the hash of
 * the module that carries it. This is the tamper signal: the module content
 * changed after the token was issued.
 */
export class InvalidModuleHashError extends ClaimsError {
  /** The hash recorded in the token's claims at signing time. */
  readonly expectedHash: string

  /** The canonical hash computed from the module as it is now. */
  readonly actualHash: string

  constructor(message: string, expectedHash: string, actualHash: string) {
    super(message)
    this.name = 'InvalidModuleHashError'
    this.expectedHash = expectedHash
    this.actualHash = actualHash
  }
}

// --- Infrastructure Failures ---

/**
 * Thrown when a seed or public key string cannot be decoded.
 */
export class KeyFormatError extends ClaimsError {
  constructor(message: string) {
    super(message)
    this.name = 'KeyFormatError'
  }
}

/**
 * Thrown when the configuration file exists but is not valid.
 */
export class ConfigError extends ClaimsError {
  /** Path of the offending configuration file, when known. */
  readonly path: string | undefined

  constructor(message: string, filePath?: string) {
    super(message)
    this.name = 'ConfigError'
    this.path = filePath
  }
}
