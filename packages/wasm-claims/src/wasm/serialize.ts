/**
 * `WasmModule` → WebAssembly binary.
 *
 * The output is canonical for a given module value: sections are written in
 * stored order and every size is a minimal LEB128. Padding present in the
 * parsed input is therefore not reproduced, and modules hash the same no
 * matter which toolchain produced the original bytes.
 */

import { SerializationError } from '../errors.js'
import { encodeU32 } from './leb128.js'
import { CUSTOM_SECTION_ID, WASM_MAGIC, WASM_VERSION, isKnownSectionId } from './types.js'
import type { Section, WasmModule } from './types.js'

const MAX_U32 = 0xffffffff

const utf8 = new TextEncoder()

function sectionBody(section: Section): Uint8Array {
  if (section.kind === 'known') {
    return section.payload
  }
  const name = utf8.encode(section.name)
  return Buffer.concat([encodeU32(name.length), name, section.payload])
}

function sectionId(section: Section): number {
  if (section.kind === 'custom') {
    return CUSTOM_SECTION_ID
  }
  if (!isKnownSectionId(section.id)) {
    throw new SerializationError(`Cannot serialize unknown section id ${String(section.id)}`)
  }
  return section.id
}

/**
 * Serialize a module to bytes.
 *
 * @throws SerializationError if the module value is not representable
 */
export function serializeModule(module: WasmModule): Uint8Array {
  if (module.version !== WASM_VERSION) {
    throw new SerializationError(`Cannot serialize WebAssembly version ${String(module.version)}`)
  }

  const version = Buffer.alloc(4)
  version.writeUInt32LE(module.version)
  const parts: Uint8Array[] = [Uint8Array.from(WASM_MAGIC), version]

  for (const section of module.sections) {
    const id = sectionId(section)
    const body = sectionBody(section)
    if (body.length > MAX_U32) {
      throw new SerializationError(`Section ${String(id)} is too large to serialize`)
    }
    parts.push(Uint8Array.of(id), encodeU32(body.length), body)
  }

  return new Uint8Array(Buffer.concat(parts))
}
