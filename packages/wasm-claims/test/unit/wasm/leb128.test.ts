import { describe, it, expect } from 'vitest'
import { decodeU32, encodeU32 } from '../../../src/wasm/leb128.js'

describe('encodeU32', () => {
  it('encodes small values in one byte', () => {
    expect([...encodeU32(0)]).toEqual([0x00])
    expect([...encodeU32(127)]).toEqual([0x7f])
  })

  it('encodes multi-byte values minimally', () => {
    expect([...encodeU32(128)]).toEqual([0x80, 0x01])
    expect([...encodeU32(624485)]).toEqual([0xe5, 0x8e, 0x26])
  })

  it('encodes the largest u32 in five bytes', () => {
    expect([...encodeU32(0xffffffff)]).toEqual([0xff, 0xff, 0xff, 0xff, 0x0f])
  })

  it('rejects values outside the u32 range', () => {
    expect(() => encodeU32(-1)).toThrow(RangeError)
    expect(() => encodeU32(2 ** 32)).toThrow(RangeError)
    expect(() => encodeU32(1.5)).toThrow(RangeError)
  })
})

describe('decodeU32', () => {
  it('decodes a minimal encoding and reports its length', () => {
    expect(decodeU32(Uint8Array.from([0xe5, 0x8e, 0x26]), 0)).toEqual({ value: 624485, length: 3 })
  })

  it('decodes at an offset', () => {
    expect(decodeU32(Uint8Array.from([0xff, 0x80, 0x01]), 1)).toEqual({ value: 128, length: 2 })
  })

  it('accepts padded encodings', () => {
    expect(decodeU32(Uint8Array.from([0x85, 0x80, 0x80, 0x80, 0x00]), 0)).toEqual({
      value: 5,
      length: 5,
    })
  })

  it('returns undefined for a truncated encoding', () => {
    expect(decodeU32(Uint8Array.from([0x80, 0x80]), 0)).toBeUndefined()
  })

  it('returns undefined for encodings longer than five bytes', () => {
    expect(decodeU32(Uint8Array.from([0x80, 0x80, 0x80, 0x80, 0x80, 0x00]), 0)).toBeUndefined()
  })

  it('returns undefined when the value overflows 32 bits', () => {
    expect(decodeU32(Uint8Array.from([0xff, 0xff, 0xff, 0xff, 0x1f]), 0)).toBeUndefined()
  })
})
