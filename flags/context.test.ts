import { describe, expect, it } from 'vitest'
import { parseStableIdHex, stableId, stableIdFromHex } from './context'
import { InvalidIdentifierError } from './errors'

describe('stableId', () => {
  it('should lower-case and hex encode', () => {
    expect(stableId('User-1')).toBe('757365722d31')
    expect(stableId('user-1')).toBe(stableId('USER-1'))
  })

  it('should reject blank input', () => {
    expect(() => stableId('  ')).toThrow(InvalidIdentifierError)
  })
})

describe('parseStableIdHex', () => {
  it('should accept hex case-insensitively', () => {
    expect(parseStableIdHex('ABCDEF01')).toEqual({ ok: true, value: 'abcdef01' })
  })

  it('should reject non-hex input', () => {
    expect(parseStableIdHex('user-1')).toEqual({
      ok: false,
      error: { kind: 'invalid-hex-id', input: 'user-1', message: "'user-1' is not a hex identifier" },
    })
    expect(parseStableIdHex('').ok).toBe(false)
  })

  it('should throw from stableIdFromHex', () => {
    expect(stableIdFromHex('00ff')).toBe('00ff')
    expect(() => stableIdFromHex('zz')).toThrow(InvalidIdentifierError)
  })
})
