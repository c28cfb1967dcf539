import { describe, expect, it } from 'vitest'
import { AxisCatalog } from './axis'
import type { EvaluationContext } from './context'
import { InvalidArgumentError } from './errors'
import { baseSpecificity, extensionSpecificity, matches, predicate, specificity, targeting } from './targeting'
import { UNBOUNDED, atLeast, between, versionOf } from './version'

interface AppContext extends EvaluationContext {
  betaOptIn?: boolean
}

describe('matches', () => {
  it('should match anything when nothing is constrained', () => {
    expect(matches(targeting(), {})).toBe(true)
  })

  it('should OR values within a category and AND categories', () => {
    const target = targeting({ locales: ['en-US', 'en-GB'], platforms: ['IOS'] })
    expect(matches(target, { locale: 'en-GB', platform: 'IOS' })).toBe(true)
    expect(matches(target, { locale: 'fr-FR', platform: 'IOS' })).toBe(false)
    expect(matches(target, { locale: 'en-US', platform: 'ANDROID' })).toBe(false)
  })

  it('should fail a constraint the context cannot answer', () => {
    expect(matches(targeting({ platforms: ['IOS'] }), {})).toBe(false)
    expect(matches(targeting({ versions: atLeast(versionOf('2')) }), { platform: 'IOS' })).toBe(false)
  })

  it('should check version ranges', () => {
    const target = targeting({ versions: between(versionOf('2.0'), versionOf('2.5')) })
    expect(matches(target, { appVersion: versionOf('2.4.9') })).toBe(true)
    expect(matches(target, { appVersion: versionOf('2.5.1') })).toBe(false)
  })

  it('should require an intersection for every axis constraint', () => {
    const catalog = new AxisCatalog('checkout')
    const environment = catalog.define('environment', 'Environment', ['dev', 'staging', 'prod'])
    const tier = catalog.define('tier', 'Tier', ['free', 'pro'])
    const target = targeting({ axes: { environment: ['staging', 'prod'], tier: ['pro'] } })

    const both = catalog.values().set(environment, 'prod').set(tier, 'pro').build()
    const wrongTier = catalog.values().set(environment, 'prod').set(tier, 'free').build()
    const missingTier = catalog.values().set(environment, 'prod').build()

    expect(matches(target, { axes: both })).toBe(true)
    expect(matches(target, { axes: wrongTier })).toBe(false)
    expect(matches(target, { axes: missingTier })).toBe(false)
    expect(matches(target, {})).toBe(false)
  })

  it('should consult the custom predicate last', () => {
    const beta = predicate<AppContext>(ctx => ctx.betaOptIn === true)
    const target = targeting<AppContext>({ platforms: ['IOS'], predicate: beta })
    expect(matches(target, { platform: 'IOS', betaOptIn: true })).toBe(true)
    expect(matches(target, { platform: 'IOS', betaOptIn: false })).toBe(false)
  })

  it('should reject an axis constraint with no values', () => {
    expect(() => targeting({ axes: { environment: [] } })).toThrow(InvalidArgumentError)
  })
})

describe('specificity', () => {
  it('should count each constrained category once', () => {
    expect(specificity(targeting({ locales: ['en-US', 'en-GB'] }))).toBe(1)
    expect(specificity(targeting({ locales: ['en-US'], platforms: ['IOS'] }))).toBe(2)
    expect(specificity(targeting({ axes: { environment: ['prod'], tier: ['pro'] } }))).toBe(2)
  })

  it('should count an explicit unbounded range as zero', () => {
    expect(baseSpecificity(targeting({ versions: UNBOUNDED }))).toBe(0)
    expect(baseSpecificity(targeting())).toBe(0)
    expect(baseSpecificity(targeting({ versions: atLeast(versionOf('1')) }))).toBe(1)
  })

  it('should add the predicate specificity', () => {
    const target = targeting<AppContext>({ platforms: ['IOS'], predicate: predicate(() => true, 3) })
    expect(baseSpecificity(target)).toBe(1)
    expect(extensionSpecificity(target)).toBe(3)
    expect(specificity(target)).toBe(4)
  })
})
