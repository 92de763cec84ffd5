/**
 * Unsigned LEB128 helpers for the 32-bit sizes and counts used in section
 * headers.
 */

const MAX_U32 = 0xffffffff

/** Result of decoding a varuint32. */
export interface DecodedU32 {
  value: number
  /** Number of bytes consumed. */
  length: number
}

/**
 * Decode a varuint32 starting at `offset`. Returns `undefined` when the
 * encoding is truncated, longer than five bytes, or overflows 32 bits.
 * Padded (non-minimal) encodings are accepted.
 */
export function decodeU32(bytes: Uint8Array, offset: number): DecodedU32 | undefined {
  let value = 0
  for (let i = 0; i < 5; i++) {
    const byte = bytes[offset + i]
    if (byte === undefined) {
      return undefined
    }
    if (i === 4 && (byte & 0x70) !== 0) {
      return undefined
    }
    value += (byte & 0x7f) * 2 ** (7 * i)
    if ((byte & 0x80) === 0) {
      return { value, length: i + 1 }
    }
  }
  return undefined
}

/** Encode `value` as a minimal varuint32. */
export function encodeU32(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
    throw new RangeError(`Value out of range for varuint32: ${String(value)}`)
  }
  const out: number[] = []
  let remaining = value
  do {
    let byte = remaining % 0x80
    remaining = Math.floor(remaining / 0x80)
    if (remaining !== 0) {
      byte |= 0x80
    }
    out.push(byte)
  } while (remaining !== 0)
  return Uint8Array.from(out)
}
