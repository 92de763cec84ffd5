/**
 * Hand-assembled WebAssembly modules for tests.
 *
 * The base module exports one function, `answer`, returning the i32 42.
 */

const HEADER = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]

/** type section: one signature, () -> i32 */
const TYPE_SECTION = [0x01, 0x05, 0x01, 0x60, 0x00, 0x01, 0x7f]
/** function section: one function of type 0 */
const FUNCTION_SECTION = [0x03, 0x02, 0x01, 0x00]
/** export section: "answer" -> func 0 */
const EXPORT_SECTION = [
  0x07, 0x0a, 0x01, 0x06, 0x61, 0x6e, 0x73, 0x77, 0x65, 0x72, 0x00, 0x00,
]
/** code section: i32.const 42; end */
const CODE_SECTION = [0x0a, 0x06, 0x01, 0x04, 0x00, 0x41, 0x2a, 0x0b]

/** Offset of the `42` immediate in `answerModule()` output. */
export const ANSWER_IMMEDIATE_OFFSET = 37

/** The minimal `answer` module, already in canonical form. */
export function answerModule(): Uint8Array {
  return Uint8Array.from([
    ...HEADER,
    ...TYPE_SECTION,
    ...FUNCTION_SECTION,
    ...EXPORT_SECTION,
    ...CODE_SECTION,
  ])
}

/**
 * The `answer` module with its type section size written as a padded
 * five-byte LEB128 (as some linkers emit), so it is four bytes longer than
 * its canonical form.
 */
export function paddedAnswerModule(): Uint8Array {
  return Uint8Array.from([
    ...HEADER,
    0x01,
    0x85,
    0x80,
    0x80,
    0x80,
    0x00,
    ...TYPE_SECTION.slice(2),
    ...FUNCTION_SECTION,
    ...EXPORT_SECTION,
    ...CODE_SECTION,
  ])
}

/** Encode a custom section with the given name and payload. */
export function customSectionBytes(name: string, payload: Uint8Array): Uint8Array {
  const nameBytes = new TextEncoder().encode(name)
  const body = [nameBytes.length, ...nameBytes, ...payload]
  if (nameBytes.length > 0x7f || body.length > 0x7f) {
    throw new Error('customSectionBytes only supports short sections')
  }
  return Uint8Array.from([0x00, body.length, ...body])
}

/** Append raw section bytes to a module. */
export function withSections(module: Uint8Array, ...sections: Uint8Array[]): Uint8Array {
  return Uint8Array.from([...module, ...sections.flatMap((section) => [...section])])
}
