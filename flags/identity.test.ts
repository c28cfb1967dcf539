import { describe, expect, it } from 'vitest'
import { InvalidIdentifierError } from './errors'
import { compareFeatureIds, featureId, parseFeatureId } from './identity'

describe('featureId', () => {
  it('should encode namespace and key', () => {
    expect(featureId('checkout', 'applePay')).toBe('feature::checkout::applePay')
  })

  it.each([
    ['', 'applePay'],
    ['checkout', ' '],
    ['check::out', 'applePay'],
    ['checkout', ' applePay'],
    ['checkout:', 'applePay'],
    ['checkout', ':applePay'],
    ['checkout', 'apple:pay'],
  ])('should reject (%j, %j)', (namespace, key) => {
    expect(() => featureId(namespace, key)).toThrow(InvalidIdentifierError)
  })

  it('should never give two distinct part pairs the same encoding', () => {
    expect(() => featureId('a:', 'b')).toThrow("namespace must not contain ':'")
    expect(() => featureId('a', ':b')).toThrow("key must not contain ':'")
  })
})

describe('parseFeatureId', () => {
  it('should decode an encoded identity', () => {
    expect(parseFeatureId('feature::checkout::applePay')).toEqual({
      ok: true,
      value: { namespaceSeed: 'checkout', key: 'applePay' },
    })
  })

  it('should reject a wrong prefix or part count', () => {
    const wrongPrefix = parseFeatureId('flag::checkout::applePay')
    expect(wrongPrefix.ok).toBe(false)
    if (!wrongPrefix.ok) {
      expect(wrongPrefix.error).toMatchObject({ kind: 'invalid-snapshot', path: 'key' })
    }
    expect(parseFeatureId('feature::checkout').ok).toBe(false)
    expect(parseFeatureId('feature::checkout::a::b').ok).toBe(false)
  })

  it('should reject blank parts', () => {
    expect(parseFeatureId('feature::::applePay').ok).toBe(false)
  })

  it('should reject a stray colon next to a separator', () => {
    const result = parseFeatureId('feature::a:::b')
    expect(result).toEqual({
      ok: false,
      error: { kind: 'invalid-snapshot', path: 'key', expected: 'non-blank parts without colons', message: "key must not contain ':'" },
    })
  })
})

describe('compareFeatureIds', () => {
  it('should order lexicographically', () => {
    const ids = [featureId('b', 'x'), featureId('a', 'z'), featureId('a', 'y')]
    expect(ids.sort(compareFeatureIds)).toEqual(['feature::a::y', 'feature::a::z', 'feature::b::x'])
  })
})
