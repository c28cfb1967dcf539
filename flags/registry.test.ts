import { describe, expect, it, vi } from 'vitest'
import { Logger } from '../lib/logger'
import { createConfiguration, type Configuration } from './configuration'
import { FlagNotFoundError, InvalidArgumentError, TypeMismatchError } from './errors'
import { declareFeatures } from './feature'
import { evaluate, explain } from './evaluation'
import { defineFlag } from './flag-definition'
import { NamespaceRegistry } from './registry'
import { rule } from './rule'
import { InMemoryMetrics, createHooks } from './telemetry'

const f = declareFeatures('checkout')
const applePay = f.boolean('applePay')
const banner = f.string('banner')

function config(version: string): Configuration {
  return createConfiguration([
    defineFlag(applePay, { default: version === 'on' }),
    defineFlag(banner, { default: `banner-${version}` }),
  ], { version })
}

describe('NamespaceRegistry', () => {
  describe('load', () => {
    it('should start empty', () => {
      const registry = new NamespaceRegistry('checkout')
      expect(registry.configuration.flags.size).toBe(0)
      expect(() => registry.flag(applePay)).toThrow(FlagNotFoundError)
    })

    it('should replace the configuration and keep the previous one', () => {
      const first = config('1')
      const second = config('2')
      const registry = new NamespaceRegistry('checkout', { configuration: first })
      registry.load(second)
      expect(registry.configuration).toBe(second)
      expect(registry.history).toEqual([first])
    })

    it('should drop the oldest history beyond the limit', () => {
      const configs = ['1', '2', '3', '4'].map(config)
      const registry = new NamespaceRegistry('checkout', { configuration: configs[0], historyLimit: 2 })
      registry.load(configs[1])
      registry.load(configs[2])
      registry.load(configs[3])
      expect(registry.history).toHaveLength(2)
      expect(registry.history[0]).toBe(configs[1])
      expect(registry.history[1]).toBe(configs[2])
    })

    it('should keep no history with a limit of zero', () => {
      const registry = new NamespaceRegistry('checkout', { historyLimit: 0 })
      registry.load(config('1'))
      expect(registry.history).toHaveLength(0)
      expect(registry.rollback()).toBe(false)
    })

    it('should reject a negative history limit', () => {
      expect(() => new NamespaceRegistry('checkout', { historyLimit: -1 })).toThrow(InvalidArgumentError)
    })
  })

  describe('rollback', () => {
    it('should restore the exact previous configuration', () => {
      const first = config('1')
      const registry = new NamespaceRegistry('checkout', { configuration: first })
      registry.load(config('2'))
      expect(registry.rollback()).toBe(true)
      expect(registry.configuration).toBe(first)
      expect(registry.history).toHaveLength(0)
    })

    it('should go back several steps at once', () => {
      const [c1, c2, c3, c4] = ['1', '2', '3', '4'].map(config)
      const registry = new NamespaceRegistry('checkout', { configuration: c1 })
      registry.load(c2)
      registry.load(c3)
      registry.load(c4)
      expect(registry.rollback(2)).toBe(true)
      expect(registry.configuration).toBe(c2)
      expect(registry.history).toEqual([c1])
    })

    it('should refuse, changing nothing, when history is too short', () => {
      const current = config('2')
      const registry = new NamespaceRegistry('checkout', { configuration: config('1') })
      registry.load(current)
      expect(registry.rollback(2)).toBe(false)
      expect(registry.configuration).toBe(current)
      expect(registry.history).toHaveLength(1)
    })

    it('should throw for fewer than one step', () => {
      const registry = new NamespaceRegistry('checkout')
      expect(() => registry.rollback(0)).toThrow(InvalidArgumentError)
    })

    it('should record rollbacks and loads', () => {
      const metrics = new InMemoryMetrics()
      const registry = new NamespaceRegistry('checkout', { hooks: createHooks({ metrics }) })
      registry.load(config('1'))
      registry.rollback()
      expect(metrics.loads).toEqual([{ namespaceId: 'checkout', featureCount: 2, version: '1' }])
      expect(metrics.rollbacks).toEqual([{ namespaceId: 'checkout', steps: 1, success: true, version: undefined }])
    })

    it('should log loads at info', () => {
      const logger = new Logger({ level: 'info', context: 'flags:checkout' })
      const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined)
      const registry = new NamespaceRegistry('checkout', { hooks: createHooks({ logger }) })
      registry.load(config('5'))
      expect(info).toHaveBeenCalledWith('Configuration loaded', { namespaceId: 'checkout', version: '5', featureCount: 2 })
    })
  })

  describe('snapshot', () => {
    it('should not see later loads', () => {
      const first = config('1')
      const registry = new NamespaceRegistry('checkout', { configuration: first })
      const snapshot = registry.snapshot()
      registry.load(config('2'))
      registry.disableAll()
      expect(snapshot.configuration).toBe(first)
      expect(snapshot.isAllDisabled).toBe(false)
      expect(snapshot.flag(banner).defaultValue).toBe('banner-1')
    })

    it('should give every reader a whole configuration while loads interleave', async () => {
      const registry = new NamespaceRegistry('checkout', { configuration: config('0'), historyLimit: 3 })
      const writers = Array.from({ length: 5 }, async (_, w) => {
        for (let i = 0; i < 50; i++) {
          registry.load(config(`${w}-${i}`))
          await Promise.resolve()
        }
      })
      const torn: string[] = []
      const readers = Array.from({ length: 5 }, async () => {
        for (let i = 0; i < 50; i++) {
          const snapshot = registry.snapshot()
          const version = snapshot.configuration.metadata.version ?? ''
          if (snapshot.flag(banner).defaultValue !== `banner-${version}`) torn.push(version)
          await Promise.resolve()
        }
      })
      await Promise.all([...writers, ...readers])
      expect(torn).toEqual([])
      expect(registry.history).toHaveLength(3)
    })
  })

  describe('kill switch', () => {
    it('should toggle only this registry', () => {
      const checkout = new NamespaceRegistry('checkout')
      const search = new NamespaceRegistry('search')
      checkout.disableAll()
      expect(checkout.isAllDisabled).toBe(true)
      expect(search.isAllDisabled).toBe(false)
      checkout.enableAll()
      expect(checkout.isAllDisabled).toBe(false)
    })
  })

  describe('updateDefinition', () => {
    it('should swap one definition without adding history', () => {
      const registry = new NamespaceRegistry('checkout', { configuration: config('1') })
      const replacement = defineFlag(banner, { default: 'sale', rules: [rule('ios-sale', { platforms: ['IOS'] })] })
      registry.updateDefinition(replacement)
      expect(registry.flag(banner)).toBe(replacement)
      expect(registry.configuration.metadata.version).toBe('1')
      expect(registry.history).toHaveLength(0)
    })
  })

  describe('overrides', () => {
    it('should stack and unwind', () => {
      const registry = new NamespaceRegistry('checkout', { configuration: config('1') })
      registry.setOverride(banner, 'first')
      registry.setOverride(banner, 'second')
      expect(evaluate(banner, {}, registry)).toBe('second')
      registry.clearOverride(banner)
      expect(evaluate(banner, {}, registry)).toBe('first')
      registry.clearOverride(banner)
      expect(registry.hasOverride(banner)).toBe(false)
      expect(registry.flag(banner)).toBe(registry.configuration.flags.get(banner.id))
    })

    it('should keep the configured default and salt behind one unconstrained rule', () => {
      const registry = new NamespaceRegistry('checkout', {
        configuration: createConfiguration([defineFlag(applePay, { default: false, salt: 'v2', isActive: false })]),
      })
      registry.setOverride(applePay, true)
      const definition = registry.flag(applePay)
      expect(definition.defaultValue).toBe(false)
      expect(definition.salt).toBe('v2')
      expect(definition.isActive).toBe(true)
      expect(definition.rules.map(r => [r.value, r.rollout])).toEqual([[true, 100]])
      expect(evaluate(applePay, {}, registry)).toBe(true)
    })

    it('should return the configured default while all flags are disabled', () => {
      const registry = new NamespaceRegistry('checkout', { configuration: config('1') })
      registry.setOverride(applePay, true)
      registry.disableAll()
      const diagnostics = explain(applePay, {}, registry)
      expect(diagnostics.value).toBe(false)
      expect(diagnostics.decision.kind).toBe('registry-disabled')
      registry.enableAll()
      expect(evaluate(applePay, {}, registry)).toBe(true)
    })

    it('should still throw for a feature missing from the configuration', () => {
      const registry = new NamespaceRegistry('checkout')
      registry.setOverride(applePay, true)
      expect(() => evaluate(applePay, {}, registry)).toThrow(FlagNotFoundError)
    })

    it('should reject values of the wrong type', () => {
      const registry = new NamespaceRegistry('checkout')
      const limit = f.int('limit')
      expect(() => registry.setOverride(limit, 1.5)).toThrow(TypeMismatchError)
    })

    it('should leave existing snapshots alone', () => {
      const registry = new NamespaceRegistry('checkout', { configuration: config('1') })
      const snapshot = registry.snapshot()
      registry.setOverride(banner, 'forced')
      expect(evaluate(banner, {}, { snapshot: () => snapshot })).toBe('banner-1')
    })
  })
})
