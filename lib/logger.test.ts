import { afterEach, describe, expect, it, vi } from 'vitest'
import { Logger, createLogger, isLogLevel, silentLogger } from './logger'

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('format', () => {
    it('should render level, context and message', () => {
      const logger = createLogger('flags:checkout', { level: 'debug' })
      expect(logger.format('info', 'Configuration loaded')).toBe('[info] (flags:checkout) Configuration loaded')
    })

    it('should append data as JSON on the same line', () => {
      const logger = new Logger({ level: 'debug' })
      expect(logger.format('warn', 'Rejected', { featureCount: 2, keys: new Set(['a']) })).toBe(
        '[warn] Rejected {"featureCount":2,"keys":["a"]}'
      )
    })

    it('should colour the level tag and dim the context', () => {
      const logger = new Logger({ context: 'loader', colors: true })
      expect(logger.format('error', 'Broken')).toBe('\x1b[31m[error]\x1b[0m \x1b[2m(loader)\x1b[0m Broken')
    })
  })

  describe('levels', () => {
    it('should drop messages below the configured level', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
      const logger = new Logger({ level: 'warn' })
      logger.debug('hidden')
      logger.info('hidden')
      expect(log).not.toHaveBeenCalled()
      expect(logger.isEnabled('error')).toBe(true)
    })

    it('should route warn and error to the matching console methods', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
      const logger = new Logger({ level: 'info', context: 'loader' })
      logger.warn('Snapshot rejected')
      logger.error('Broken', { code: 'X' })
      expect(warn).toHaveBeenCalledWith('[warn] (loader) Snapshot rejected')
      expect(error).toHaveBeenCalledWith('[error] (loader) Broken {"code":"X"}')
    })

    it('should write through log with an explicit level', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
      new Logger({ level: 'debug' }).log('debug', 'Evaluated', { value: true })
      expect(log).toHaveBeenCalledWith('[debug] Evaluated {"value":true}')
    })

    it('should never write when silent', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
      silentLogger.error('nothing')
      expect(error).not.toHaveBeenCalled()
    })
  })

  describe('child', () => {
    it('should join contexts with a colon and keep the level', () => {
      const child = createLogger('flags:checkout', { level: 'warn' }).child('loader')
      expect(child.context).toBe('flags:checkout:loader')
      expect(child.level).toBe('warn')
    })

    it('should use the child context alone when the parent has none', () => {
      expect(new Logger({ level: 'info' }).child('loader').context).toBe('loader')
    })
  })

  describe('isLogLevel', () => {
    it('should accept known levels only', () => {
      expect(isLogLevel('debug')).toBe(true)
      expect(isLogLevel('trace')).toBe(false)
      expect(isLogLevel('toString')).toBe(false)
    })
  })
})
