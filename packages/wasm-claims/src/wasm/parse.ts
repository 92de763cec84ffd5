/**
 * WebAssembly binary → `WasmModule`.
 */

import { ParseError } from '../errors.js'
import { decodeU32 } from './leb128.js'
import {
  CUSTOM_SECTION_ID,
  WASM_MAGIC,
  WASM_VERSION,
  isKnownSectionId,
  sectionRank,
} from './types.js'
import type { Section, WasmModule } from './types.js'

const HEADER_LENGTH = 8

const utf8 = new TextDecoder('utf-8', { fatal: true })

function readU32(bytes: Uint8Array, offset: number, what: string): { value: number; next: number } {
  const decoded = decodeU32(bytes, offset)
  if (decoded === undefined) {
    throw new ParseError(`Malformed or truncated ${what} at offset ${String(offset)}`, offset)
  }
  return { value: decoded.value, next: offset + decoded.length }
}

function parseCustomSection(bytes: Uint8Array, start: number, end: number): Section {
  const { value: nameLength, next } = readU32(bytes, start, 'custom section name length')
  if (next > end || nameLength > end - next) {
    throw new ParseError(
      `Custom section name at offset ${String(start)} runs past the end of its section`,
      start,
    )
  }
  let name: string
  try {
    name = utf8.decode(bytes.subarray(next, next + nameLength))
  } catch {
    throw new ParseError(`Custom section name at offset ${String(next)} is not valid UTF-8`, next)
  }
  return { kind: 'custom', name, payload: bytes.slice(next + nameLength, end) }
}

/**
 * Parse a WebAssembly module into its sections.
 *
 * Payloads are copied, so the returned module never aliases `bytes`.
 *
 * @throws ParseError on bad magic, unsupported version, malformed section
 *   headers, unknown section ids, or misplaced known sections
 */
export function parseModule(bytes: Uint8Array): WasmModule {
  if (bytes.length < HEADER_LENGTH) {
    throw new ParseError('Input is too short to be a WebAssembly module', bytes.length)
  }
  for (const [i, expected] of WASM_MAGIC.entries()) {
    if (bytes[i] !== expected) {
      throw new ParseError('Missing WebAssembly magic number', 0)
    }
  }
  const version = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).readUInt32LE(4)
  if (version !== WASM_VERSION) {
    throw new ParseError(`Unsupported WebAssembly version: ${String(version)}`, 4)
  }

  const sections: Section[] = []
  let offset = HEADER_LENGTH
  let lastRank = 0

  while (offset < bytes.length) {
    const headerOffset = offset
    const id = bytes[offset] ?? CUSTOM_SECTION_ID
    const { value: size, next } = readU32(bytes, offset + 1, 'section size')
    if (size > bytes.length - next) {
      throw new ParseError(
        `Section ${String(id)} at offset ${String(headerOffset)} declares ${String(size)} bytes but only ${String(bytes.length - next)} remain`,
        headerOffset,
      )
    }
    const end = next + size

    if (id === CUSTOM_SECTION_ID) {
      sections.push(parseCustomSection(bytes, next, end))
    } else if (isKnownSectionId(id)) {
      const rank = sectionRank(id)
      if (rank <= lastRank) {
        throw new ParseError(
          `Section ${String(id)} at offset ${String(headerOffset)} is duplicated or out of order`,
          headerOffset,
        )
      }
      lastRank = rank
      sections.push({ kind: 'known', id, payload: bytes.slice(next, end) })
    } else {
      throw new ParseError(
        `Unknown section id ${String(id)} at offset ${String(headerOffset)}`,
        headerOffset,
      )
    }

    offset = end
  }

  return { version, sections }
}
