import { describe, expect, it } from 'vitest'
import { InvalidArgumentError } from './errors'
import { rankRules, rule } from './rule'
import { predicate } from './targeting'

describe('rule', () => {
  it('should default to a full rollout with no allowlist', () => {
    const r = rule(true)
    expect(r.rollout).toBe(100)
    expect(r.allowlist.size).toBe(0)
    expect(r.note).toBeUndefined()
  })

  it('should reject rollouts outside 0..100', () => {
    expect(() => rule(true, { rollout: 101 })).toThrow(InvalidArgumentError)
    expect(() => rule(true, { rollout: -0.5 })).toThrow(InvalidArgumentError)
  })

  it('should reject a negative or fractional predicate specificity', () => {
    expect(() => rule(true, { predicate: predicate(() => true, -1) })).toThrow(InvalidArgumentError)
    expect(() => rule(true, { predicate: predicate(() => true, 1.5) })).toThrow(InvalidArgumentError)
  })
})

describe('rankRules', () => {
  it('should order by specificity, most specific first', () => {
    const broad = rule('broad', { platforms: ['IOS'] })
    const narrow = rule('narrow', { platforms: ['IOS'], locales: ['en-US'] })
    const ranked = rankRules([broad, narrow])
    expect(ranked.map(r => r.rule.value)).toEqual(['narrow', 'broad'])
    expect(ranked.map(r => r.index)).toEqual([1, 0])
    expect(ranked.map(r => r.specificity)).toEqual([2, 1])
  })

  it('should keep declaration order between equals', () => {
    const ranked = rankRules([
      rule('a', { platforms: ['IOS'] }),
      rule('b', { locales: ['en-US'] }),
      rule('c'),
      rule('d', { platforms: ['ANDROID'] }),
    ])
    expect(ranked.map(r => r.rule.value)).toEqual(['a', 'b', 'd', 'c'])
  })

  it('should split base and extension specificity', () => {
    const [ranked] = rankRules([rule(1, { platforms: ['IOS'], predicate: predicate(() => true, 2) })])
    expect(ranked).toMatchObject({ baseSpecificity: 1, extensionSpecificity: 2, specificity: 3 })
  })
})
