import { describe, expect, it } from 'vitest'
import { AxisCatalog } from './axis'
import { AxisConflictError, InvalidArgumentError } from './errors'

describe('AxisCatalog', () => {
  it('should define and look up axes by id and type', () => {
    const catalog = new AxisCatalog('checkout')
    const environment = catalog.define('environment', 'Environment', ['dev', 'prod'])
    expect(catalog.byId('environment')).toBe(environment)
    expect(catalog.byType('Environment')).toBe(environment)
    expect(catalog.list()).toEqual([environment])
    expect(Object.isFrozen(environment.values)).toBe(true)
  })

  it('should treat an identical registration as a no-op', () => {
    const catalog = new AxisCatalog('checkout')
    const first = catalog.define('environment', 'Environment', ['dev', 'prod'])
    catalog.register({ id: 'environment', type: 'Environment', values: ['dev', 'prod'] })
    expect(catalog.byId('environment')).toBe(first)
    expect(catalog.list()).toHaveLength(1)
  })

  it('should reject an id reused with another type', () => {
    const catalog = new AxisCatalog('checkout')
    catalog.define('environment', 'Environment', ['dev', 'prod'])
    expect(() => catalog.define('environment', 'Stage', ['dev', 'prod'])).toThrow(AxisConflictError)
    expect(() => catalog.define('environment', 'Environment', ['dev'])).toThrow(AxisConflictError)
  })

  it('should reject a type reused under another id', () => {
    const catalog = new AxisCatalog('checkout')
    catalog.define('environment', 'Environment', ['dev', 'prod'])
    expect(() => catalog.define('env', 'Environment', ['dev', 'prod'])).toThrow(AxisConflictError)
  })

  it('should validate definitions', () => {
    const catalog = new AxisCatalog('checkout')
    expect(() => catalog.define(' ', 'Blank', ['a'])).toThrow(InvalidArgumentError)
    expect(() => catalog.define('tier', 'Tier', [])).toThrow(InvalidArgumentError)
    expect(() => catalog.define('tier', 'Tier', ['free', 'free'])).toThrow(InvalidArgumentError)
  })

  it('should keep catalogs of different namespaces apart', () => {
    const checkout = new AxisCatalog('checkout')
    const search = new AxisCatalog('search')
    checkout.define('environment', 'Environment', ['dev', 'prod'])
    search.define('environment', 'Region', ['eu', 'us'])
    expect(checkout.byId('environment')?.type).toBe('Environment')
    expect(search.byId('environment')?.type).toBe('Region')
  })
})

describe('AxisValuesBuilder', () => {
  it('should collect values per axis', () => {
    const catalog = new AxisCatalog('checkout')
    const environment = catalog.define('environment', 'Environment', ['dev', 'staging', 'prod'])
    const values = catalog.values().set(environment, 'dev').set(environment, 'staging').build()
    expect([...(values.get('environment') ?? [])]).toEqual(['dev', 'staging'])
  })

  it('should reject axes from another catalog', () => {
    const search = new AxisCatalog('search')
    const region = search.define('region', 'Region', ['eu', 'us'])
    const checkout = new AxisCatalog('checkout')
    expect(() => checkout.values().set(region, 'eu')).toThrow(AxisConflictError)
  })

  it('should accept a structurally identical axis', () => {
    const catalog = new AxisCatalog('checkout')
    catalog.define('tier', 'Tier', ['free', 'pro'])
    const values = catalog.values().set({ id: 'tier', type: 'Tier', values: ['free', 'pro'] }, 'pro').build()
    expect(values.get('tier')?.has('pro')).toBe(true)
  })

  it('should reject values outside the axis', () => {
    const catalog = new AxisCatalog('checkout')
    const tier = catalog.define<string>('tier', 'Tier', ['free', 'pro'])
    expect(() => catalog.values().set(tier, 'enterprise')).toThrow(InvalidArgumentError)
  })

  it('should not change built values when the builder is reused', () => {
    const catalog = new AxisCatalog('checkout')
    const tier = catalog.define('tier', 'Tier', ['free', 'pro'])
    const builder = catalog.values().set(tier, 'free')
    const first = builder.build()
    builder.set(tier, 'pro')
    expect(first.get('tier')?.size).toBe(1)
  })
})
