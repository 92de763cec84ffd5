/**
 * Streamed SHA-256 hashing of module bytes.
 */

import * as crypto from 'node:crypto'
import { Readable } from 'node:stream'
import { IoError } from '../errors.js'

/** Chunk size used when an in-memory buffer is replayed as a stream. */
const CHUNK_SIZE = 1024

/**
 * Fold every chunk of `stream` into a SHA-256 state and resolve with the raw
 * 32-byte digest.
 *
 * @throws IoError if the stream emits an error
 */
export function digest(stream: Readable): Promise<Uint8Array> {
  return new Promise<Uint8Array>((resolve, reject) => {
    const hash = crypto.createHash('sha256')

    stream.on('data', (chunk: Uint8Array | string) => {
      hash.update(chunk)
    })

    stream.on('end', () => {
      resolve(new Uint8Array(hash.digest()))
    })

    stream.on('error', (err: Error) => {
      reject(new IoError(`Failed to read bytes for hashing: ${err.message}`))
    })
  })
}

/** Split `bytes` into views of at most `size` bytes, in order. */
export function* chunks(bytes: Uint8Array, size = CHUNK_SIZE): Generator<Uint8Array> {
  for (let start = 0; start < bytes.length; start += size) {
    yield bytes.subarray(start, Math.min(start + size, bytes.length))
  }
}

/** Digest an in-memory buffer by streaming it in bounded chunks. */
export function digestBytes(bytes: Uint8Array): Promise<Uint8Array> {
  return digest(Readable.from(chunks(bytes)))
}

/** Render a digest as uppercase hexadecimal with no separators. */
export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex').toUpperCase()
}
