/**
 * Time-window validation of tokens with human-readable summaries.
 */

import { nowSeconds, systemClock } from '../time.js'
import type { Clock } from '../time.js'
import { isSignatureValid, peekClaims } from './token.js'
import type { TokenValidation } from './types.js'

const relativeFormat = new Intl.RelativeTimeFormat('en', { numeric: 'always' })

const UNITS: readonly [Intl.RelativeTimeFormatUnit, number][] = [
  ['day', 86_400],
  ['hour', 3_600],
  ['minute', 60],
]

/** Describe an offset in seconds from now, e.g. `"in 3 days"`. */
export function humanizeOffset(deltaSeconds: number): string {
  const magnitude = Math.abs(deltaSeconds)
  for (const [unit, seconds] of UNITS) {
    if (magnitude >= seconds) {
      return relativeFormat.format(Math.round(deltaSeconds / seconds), unit)
    }
  }
  return relativeFormat.format(deltaSeconds, 'second')
}

/**
 * Report the signature and time-window state of `jwt` as of `clock`.
 *
 * A token is expired once the current second reaches `exp`, and cannot be
 * used yet while the current second is before `nbf`.
 *
 * @throws TokenDecodeError if the token is malformed
 */
export async function validateToken(
  jwt: string,
  clock: Clock = systemClock,
): Promise<TokenValidation> {
  const claims = peekClaims(jwt)
  const now = nowSeconds(clock)

  return {
    signatureValid: await isSignatureValid(jwt),
    expired: claims.expires !== undefined && now >= claims.expires,
    cannotUseYet: claims.notBefore !== undefined && now < claims.notBefore,
    expiresHuman: claims.expires === undefined ? 'never' : humanizeOffset(claims.expires - now),
    notBeforeHuman:
      claims.notBefore === undefined ? 'immediately' : humanizeOffset(claims.notBefore - now),
  }
}
