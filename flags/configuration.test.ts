import { describe, expect, it } from 'vitest'
import {
  createConfiguration,
  emptyConfiguration,
  featureIds,
  patchConfiguration,
  withMetadata,
} from './configuration'
import { diffConfigurations, definitionsEqual, isEmptyDiff } from './diff'
import { DuplicateFeatureError } from './errors'
import { declareFeatures } from './feature'
import { defineFlag } from './flag-definition'
import { rule } from './rule'
import { predicate } from './targeting'

const f = declareFeatures('checkout')
const applePay = f.boolean('applePay')
const banner = f.string('banner')
const limit = f.int('limit')

describe('createConfiguration', () => {
  it('should index definitions by feature id', () => {
    const definition = defineFlag(applePay, { default: false })
    const config = createConfiguration([definition], { version: '7' })
    expect(config.flags.get(applePay.id)).toBe(definition)
    expect(config.metadata).toEqual({ version: '7' })
    expect(Object.isFrozen(config.metadata)).toBe(true)
  })

  it('should expose flags through a frozen read-only view', () => {
    const definition = defineFlag(applePay, { default: false })
    const config = createConfiguration([definition])
    expect(Object.isFrozen(config.flags)).toBe(true)
    expect('set' in config.flags).toBe(false)
    expect('delete' in config.flags).toBe(false)
    expect(config.flags.size).toBe(1)
    expect([...config.flags]).toEqual([[applePay.id, definition]])
    const seen: unknown[] = []
    config.flags.forEach((value, key, map) => seen.push(value, key, map))
    expect(seen).toEqual([definition, applePay.id, config.flags])
  })

  it('should reject duplicate features', () => {
    expect(() => createConfiguration([
      defineFlag(applePay, { default: false }),
      defineFlag(applePay, { default: true }),
    ])).toThrow(DuplicateFeatureError)
  })

  it('should list ids in order', () => {
    const config = createConfiguration([
      defineFlag(limit, { default: 1 }),
      defineFlag(applePay, { default: false }),
    ])
    expect(featureIds(config)).toEqual(['feature::checkout::applePay', 'feature::checkout::limit'])
    expect(emptyConfiguration().flags.size).toBe(0)
  })

  it('should replace metadata without touching definitions', () => {
    const definition = defineFlag(applePay, { default: false })
    const config = withMetadata(createConfiguration([definition], { version: '1' }), { version: '2' })
    expect(config.metadata.version).toBe('2')
    expect(config.flags.get(applePay.id)).toBe(definition)
  })
})

describe('patchConfiguration', () => {
  const base = createConfiguration([
    defineFlag(applePay, { default: false }),
    defineFlag(banner, { default: 'none' }),
  ], { version: '1' })

  it('should upsert and remove into a new configuration', () => {
    const replacement = defineFlag(applePay, { default: true })
    const patched = patchConfiguration(base, {
      upsert: [replacement, defineFlag(limit, { default: 5 })],
      remove: [banner.id],
    })
    expect(featureIds(patched)).toEqual(['feature::checkout::applePay', 'feature::checkout::limit'])
    expect(patched.flags.get(applePay.id)).toBe(replacement)
    expect(patched.metadata.version).toBe('1')
    expect(base.flags.size).toBe(2)
  })

  it('should let an upsert win over a removal of the same feature', () => {
    const replacement = defineFlag(banner, { default: 'sale' })
    const patched = patchConfiguration(base, { upsert: [replacement], remove: [banner.id], metadata: { version: '2' } })
    expect(patched.flags.get(banner.id)).toBe(replacement)
    expect(patched.metadata).toEqual({ version: '2' })
  })

  it('should reject the same feature upserted twice', () => {
    expect(() => patchConfiguration(base, {
      upsert: [defineFlag(limit, { default: 1 }), defineFlag(limit, { default: 2 })],
    })).toThrow(DuplicateFeatureError)
  })
})

describe('diffConfigurations', () => {
  it('should report added, removed and changed features', () => {
    const before = createConfiguration([
      defineFlag(applePay, { default: false }),
      defineFlag(banner, { default: 'none' }),
    ], { version: '1' })
    const after = createConfiguration([
      defineFlag(applePay, { default: false, rules: [rule(true, { platforms: ['IOS'] })] }),
      defineFlag(limit, { default: 3 }),
    ], { version: '2' })

    expect(diffConfigurations(before, after)).toEqual({
      before: { version: '1' },
      after: { version: '2' },
      added: ['feature::checkout::limit'],
      removed: ['feature::checkout::banner'],
      changed: ['feature::checkout::applePay'],
    })
  })

  it('should treat rebuilt identical definitions as equal', () => {
    const build = () => defineFlag(banner, {
      default: 'none',
      rules: [rule('sale', { platforms: ['IOS', 'ANDROID'], rollout: 25, note: 'spring' })],
    })
    expect(definitionsEqual(build(), build())).toBe(true)
    expect(isEmptyDiff(diffConfigurations(createConfiguration([build()]), createConfiguration([build()])))).toBe(true)
  })

  it('should compare predicates by identity', () => {
    const always = predicate(() => true)
    const a = defineFlag(applePay, { default: false, rules: [rule(true, { predicate: always })] })
    const b = defineFlag(applePay, { default: false, rules: [rule(true, { predicate: always })] })
    const c = defineFlag(applePay, { default: false, rules: [rule(true, { predicate: predicate(() => true) })] })
    expect(definitionsEqual(a, b)).toBe(true)
    expect(definitionsEqual(a, c)).toBe(false)
  })

  it('should notice a flipped active switch', () => {
    expect(definitionsEqual(
      defineFlag(applePay, { default: false }),
      defineFlag(applePay, { default: false, isActive: false })
    )).toBe(false)
  })
})
