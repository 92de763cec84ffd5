/**
 * Compact JWS encoding of claims using `jose` with `EdDSA` over Ed25519.
 *
 * The verification key is taken from the token's own `iss` claim, so a token
 * is self-verifying: it proves the issuer named inside it signed it.
 */

import type { KeyObject } from 'node:crypto'
import { SignJWT, compactVerify, decodeJwt } from 'jose'
import type { JWTPayload } from 'jose'
import { KeyFormatError, SigningError, TokenDecodeError } from '../errors.js'
import { parsePublicKey } from '../keys/key-pair.js'
import type { KeyPair } from '../keys/key-pair.js'
import type { Claims, WasmClaimsPayload } from './types.js'

const ALGORITHM = 'EdDSA'

/**
 * Type guard that checks whether an unknown value is a non-null object.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === 'number'
}

function isOptionalStringArray(value: unknown): value is string[] | undefined {
  return (
    value === undefined ||
    (Array.isArray(value) && value.every((item) => typeof item === 'string'))
  )
}

function toPayload(claims: Claims): JWTPayload {
  const wasm: WasmClaimsPayload = { hash: claims.moduleHash }
  if (claims.caps !== undefined) wasm.caps = claims.caps
  if (claims.tags !== undefined) wasm.tags = claims.tags

  const payload: JWTPayload = {
    jti: claims.id,
    iat: claims.issuedAt,
    iss: claims.issuer,
    sub: claims.subject,
    wasm,
  }
  if (claims.notBefore !== undefined) payload.nbf = claims.notBefore
  if (claims.expires !== undefined) payload.exp = claims.expires
  return payload
}

/**
 * Parses a raw JSON payload object into Claims, validating that all required
 * fields are present and of the correct types. Returns `undefined` if
 * validation fails.
 */
function parseClaims(raw: unknown): Claims | undefined {
  if (!isObject(raw)) {
    return undefined
  }

  const { jti, iat, iss, sub, nbf, exp, wasm } = raw

  if (typeof jti !== 'string') return undefined
  if (typeof iat !== 'number') return undefined
  if (typeof iss !== 'string') return undefined
  if (typeof sub !== 'string') return undefined
  if (!isOptionalNumber(nbf)) return undefined
  if (!isOptionalNumber(exp)) return undefined
  if (!isObject(wasm)) return undefined

  const { hash, caps, tags } = wasm
  if (typeof hash !== 'string') return undefined

  if (!isOptionalStringArray(caps)) return undefined
  if (!isOptionalStringArray(tags)) return undefined

  return {
    issuer: iss,
    subject: sub,
    caps,
    tags,
    issuedAt: iat,
    notBefore: nbf,
    expires: exp,
    id: jti,
    moduleHash: hash,
  }
}

/**
 * Signs `claims` with `keyPair` and returns the compact JWS.
 *
 * @throws SigningError if signing fails
 */
export async function encodeClaims(claims: Claims, keyPair: KeyPair): Promise<string> {
  try {
    return await new SignJWT(toPayload(claims))
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .sign(keyPair.signingKey())
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new SigningError(`Failed to sign claims: ${message}`)
  }
}

/**
 * Reads the claims of a token without checking its signature.
 *
 * @throws TokenDecodeError if the token or its payload is malformed
 */
export function peekClaims(jwt: string): Claims {
  let payload: JWTPayload
  try {
    payload = decodeJwt(jwt)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new TokenDecodeError(`Malformed token: ${message}`)
  }
  const claims = parseClaims(payload)
  if (claims === undefined) {
    throw new TokenDecodeError('Token payload does not match the claims schema')
  }
  return claims
}

/**
 * Verifies the signature of `jwt` against the public key text `issuer` and
 * returns the signed payload bytes.
 *
 * @throws TokenDecodeError if the key is malformed or verification fails
 */
async function verifySignature(jwt: string, issuer: string): Promise<Uint8Array> {
  let key: KeyObject
  try {
    key = parsePublicKey(issuer).key
  } catch (err) {
    if (err instanceof KeyFormatError) {
      throw new TokenDecodeError(`Token issuer is not a valid public key: ${err.message}`)
    }
    throw err
  }

  try {
    const { payload } = await compactVerify(jwt, key, { algorithms: [ALGORITHM] })
    return payload
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new TokenDecodeError(`Token signature verification failed: ${message}`)
  }
}

/**
 * Returns `true` when `jwt` carries a valid signature by its issuer.
 */
export async function isSignatureValid(jwt: string): Promise<boolean> {
  try {
    await verifySignature(jwt, peekClaims(jwt).issuer)
    return true
  } catch (err) {
    if (err instanceof TokenDecodeError) {
      return false
    }
    throw err
  }
}

/**
 * Verifies `jwt` against the issuer named inside it and returns its claims.
 * Validity windows (`nbf`, `exp`) are not enforced here; see `validateToken`.
 *
 * @throws TokenDecodeError if the token is malformed or the signature fails
 */
export async function decodeClaims(jwt: string): Promise<Claims> {
  const { issuer } = peekClaims(jwt)
  const signed = await verifySignature(jwt, issuer)

  let parsed: unknown
  try {
    parsed = JSON.parse(new TextDecoder().decode(signed))
  } catch {
    throw new TokenDecodeError('Token payload is not valid JSON')
  }

  const claims = parseClaims(parsed)
  if (claims === undefined) {
    throw new TokenDecodeError('Token payload does not match the claims schema')
  }
  return claims
}
