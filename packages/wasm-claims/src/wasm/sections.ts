/**
 * Named custom-section access over an immutable `WasmModule`.
 */

import type { CustomSection, WasmModule } from './types.js'

/** Return the payload of the first custom section called `name`. */
export function getCustomSection(module: WasmModule, name: string): Uint8Array | undefined {
  for (const section of module.sections) {
    if (section.kind === 'custom' && section.name === name) {
      return section.payload
    }
  }
  return undefined
}

/**
 * Return a copy of `module` without any custom section called `name`.
 * Returns `module` itself when there is nothing to remove.
 */
export function clearCustomSection(module: WasmModule, name: string): WasmModule {
  const sections = module.sections.filter(
    (section) => section.kind !== 'custom' || section.name !== name,
  )
  if (sections.length === module.sections.length) {
    return module
  }
  return { version: module.version, sections }
}

/**
 * Return a copy of `module` where every custom section called `name` is
 * replaced by a single one holding `payload`, appended after all other
 * sections.
 */
export function setCustomSection(
  module: WasmModule,
  name: string,
  payload: Uint8Array,
): WasmModule {
  const section: CustomSection = { kind: 'custom', name, payload: Uint8Array.from(payload) }
  const cleared = clearCustomSection(module, name)
  return { version: cleared.version, sections: [...cleared.sections, section] }
}

/**
 * Custom sections keyed by name. When a module carries several sections of
 * the same name, the first one wins, matching `getCustomSection`.
 */
export function customSections(module: WasmModule): ReadonlyMap<string, Uint8Array> {
  const byName = new Map<string, Uint8Array>()
  for (const section of module.sections) {
    if (section.kind === 'custom' && !byName.has(section.name)) {
      byName.set(section.name, section.payload)
    }
  }
  return byName
}
