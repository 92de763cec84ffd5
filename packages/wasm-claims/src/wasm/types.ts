/**
 * Section-level model of a WebAssembly binary module.
 *
 * Only custom sections are decoded; every other section keeps its payload as
 * opaque bytes, which is all the claims layer needs to hash and rewrite a
 * module without disturbing its execution semantics.
 */

/** The `\0asm` preamble every module starts with. */
export const WASM_MAGIC: readonly number[] = [0x00, 0x61, 0x73, 0x6d]

/** The only binary format version this codec accepts. */
export const WASM_VERSION = 1

/** Section id reserved for custom sections. */
export const CUSTOM_SECTION_ID = 0

/**
 * Ids of the non-custom sections defined by WebAssembly 1.0 and its
 * finalized proposals (data count = 12, tag = 13).
 */
export type KnownSectionId = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13

/** A non-custom section whose payload is carried through untouched. */
export interface KnownSection {
  readonly kind: 'known'
  readonly id: KnownSectionId
  readonly payload: Uint8Array
}

/** A named, opaque metadata section ignored by execution. */
export interface CustomSection {
  readonly kind: 'custom'
  readonly name: string
  readonly payload: Uint8Array
}

export type Section = KnownSection | CustomSection

/**
 * A parsed module. Values are never mutated in place: every transform in
 * `sections.ts` returns a new module.
 */
export interface WasmModule {
  readonly version: number
  readonly sections: readonly Section[]
}

/**
 * Placement rank of each known section. Known sections must appear in
 * strictly increasing rank; custom sections may appear anywhere.
 */
const SECTION_ORDER: Readonly<Record<KnownSectionId, number>> = {
  1: 1, // type
  2: 2, // import
  3: 3, // function
  4: 4, // table
  5: 5, // memory
  13: 6, // tag
  6: 7, // global
  7: 8, // export
  8: 9, // start
  9: 10, // element
  12: 11, // data count
  10: 12, // code
  11: 13, // data
}

/** Type guard for the ids of known, non-custom sections. */
export function isKnownSectionId(id: number): id is KnownSectionId {
  return Number.isInteger(id) && id >= 1 && id <= 13
}

/** Placement rank of a known section id. */
export function sectionRank(id: KnownSectionId): number {
  return SECTION_ORDER[id]
}
