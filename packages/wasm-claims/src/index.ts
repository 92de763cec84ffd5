/**
 * wasm-claims — signed capability claims embedded in WebAssembly modules.
 *
 * @packageDocumentation
 */

export {
  ClaimsError,
  ParseError,
  SerializationError,
  EncodingError,
  IoError,
  TokenDecodeError,
  SigningError,
  InvalidModuleHashError,
  KeyFormatError,
  ConfigError,
} from './errors.js'

export type { WasmClaimsConfig, SigningDefaults } from './types.js'

export { embedClaims, signBufferWithClaims } from './embed.js'
export type { SignBufferOptions } from './embed.js'
export { extractClaims } from './extract.js'

export {
  parseModule,
  serializeModule,
  getCustomSection,
  setCustomSection,
  clearCustomSection,
  customSections,
  WASM_MAGIC,
  WASM_VERSION,
} from './wasm/index.js'
export type { WasmModule, Section, KnownSection, CustomSection, KnownSectionId } from './wasm/index.js'

export { digest, digestBytes, encodeHex, canonicalHash, TOKEN_SECTION } from './hash/index.js'

export {
  encodeClaims,
  decodeClaims,
  peekClaims,
  isSignatureValid,
  newClaims,
  validateToken,
  humanizeOffset,
} from './jwt/index.js'
export type { Claims, Token, TokenValidation, NewClaimsOptions } from './jwt/index.js'

export { KeyPair, parsePublicKey } from './keys/index.js'
export type { KeyKind, PublicKeyInfo } from './keys/index.js'

export { SECONDS_PER_DAY, systemClock, fixedClock, nowSeconds, daysFromNow } from './time.js'
export type { Clock } from './time.js'

export {
  MESSAGING,
  KEY_VALUE,
  HTTP_SERVER,
  HTTP_CLIENT,
  BLOB,
  EVENTSTREAMS,
  EXTRAS,
  LOGGING,
  knownCapabilities,
  capabilityName,
} from './caps.js'

export { loadConfig, getDefaultConfigDir, validateConfig, defaultConfig } from './config.js'
