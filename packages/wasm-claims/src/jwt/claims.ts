/**
 * Claims construction.
 *
 * @packageDocumentation
 */

import * as crypto from 'node:crypto'
import { nowSeconds, systemClock } from '../time.js'
import type { Clock } from '../time.js'
import type { Claims } from './types.js'

/** Inputs to `newClaims`; everything else is filled in. */
export interface NewClaimsOptions {
  issuer: string
  subject: string
  caps?: string[] | undefined
  tags?: string[] | undefined
  /** Absolute epoch seconds. */
  notBefore?: number | undefined
  /** Absolute epoch seconds. */
  expires?: number | undefined
}

/** Random token id: 16 bytes, base64url. */
export function generateTokenId(): string {
  return crypto.randomBytes(16).toString('base64url')
}

/**
 * Build a claims value issued now, with a fresh id and an empty module hash.
 * The caps and tags arrays are copied.
 */
export function newClaims(options: NewClaimsOptions, clock: Clock = systemClock): Claims {
  return {
    issuer: options.issuer,
    subject: options.subject,
    caps: options.caps === undefined ? undefined : [...options.caps],
    tags: options.tags === undefined ? undefined : [...options.tags],
    issuedAt: nowSeconds(clock),
    notBefore: options.notBefore,
    expires: options.expires,
    id: generateTokenId(),
    moduleHash: '',
  }
}
