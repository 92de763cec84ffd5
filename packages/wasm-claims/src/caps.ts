/**
 * Well-known capability ids. Capabilities are opaque strings to the signing
 * and verification code; this table only gives them display names.
 */

export const MESSAGING = 'wasmcap:messaging'
export const KEY_VALUE = 'wasmcap:keyvalue'
export const HTTP_SERVER = 'wasmcap:http_server'
export const HTTP_CLIENT = 'wasmcap:http_client'
export const BLOB = 'wasmcap:blobstore'
export const EVENTSTREAMS = 'wasmcap:eventstreams'
export const EXTRAS = 'wasmcap:extras'
export const LOGGING = 'wasmcap:logging'

const CAPABILITY_NAMES: ReadonlyMap<string, string> = new Map([
  [MESSAGING, 'Messaging'],
  [KEY_VALUE, 'K/V Store'],
  [HTTP_SERVER, 'HTTP Server'],
  [HTTP_CLIENT, 'HTTP Client'],
  [BLOB, 'Blob Store'],
  [EVENTSTREAMS, 'Event Streams'],
  [EXTRAS, 'Extras'],
  [LOGGING, 'Logging'],
])

/** All well-known capability ids, in display order. */
export function knownCapabilities(): string[] {
  return [...CAPABILITY_NAMES.keys()]
}

/** Friendly name of a capability, or the id itself when it is not well known. */
export function capabilityName(id: string): string {
  return CAPABILITY_NAMES.get(id) ?? id
}
