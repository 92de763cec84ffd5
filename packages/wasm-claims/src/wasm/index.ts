/**
 * WebAssembly container codec barrel export.
 */

export { parseModule } from './parse.js'
export { serializeModule } from './serialize.js'
export {
  getCustomSection,
  setCustomSection,
  clearCustomSection,
  customSections,
} from './sections.js'
export { decodeU32, encodeU32 } from './leb128.js'
export type { DecodedU32 } from './leb128.js'
export { WASM_MAGIC, WASM_VERSION, CUSTOM_SECTION_ID, isKnownSectionId } from './types.js'
export type { WasmModule, Section, KnownSection, CustomSection, KnownSectionId } from './types.js'
