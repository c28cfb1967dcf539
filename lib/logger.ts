/**
 * Logger
 *
 * Leveled console logging for the flag engine. Registries, loaders and
 * shadow evaluation report through a Logger carried in their hooks.
 *
 * Lines read `[level] (context) message {data}`, with data rendered by
 * safeStringify so Maps, Sets and cycles survive.
 */

import { safeStringify } from './safe-stringify'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export type LogData = Record<string, unknown>

export interface LoggerOptions {
  /** Lowest level written (default: debug when DEBUG is set, else info) */
  level?: LogLevel
  context?: string
  silent?: boolean
  /** ANSI colours for the level tag and context */
  colors?: boolean
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'

interface LevelStyle {
  rank: number
  color: string
  write: (line: string) => void
}

const styles: Record<LogLevel, LevelStyle> = {
  debug: { rank: 0, color: '\x1b[90m', write: line => console.log(line) },
  info: { rank: 1, color: '\x1b[34m', write: line => console.log(line) },
  warn: { rank: 2, color: '\x1b[33m', write: line => console.warn(line) },
  error: { rank: 3, color: '\x1b[31m', write: line => console.error(line) },
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

export class Logger {
  readonly level: LogLevel
  readonly context: string
  private readonly silent: boolean
  private readonly colored: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info')
    this.context = options.context ?? ''
    this.silent = options.silent ?? false
    this.colored = options.colors ?? false
  }

  format(level: LogLevel, message: string, data?: LogData): string {
    const paint = (text: string, color: string) => (this.colored ? `${color}${text}${RESET}` : text)
    const parts = [paint(`[${level}]`, styles[level].color)]
    if (this.context) parts.push(paint(`(${this.context})`, DIM))
    parts.push(message)
    if (data) parts.push(paint(safeStringify(data), DIM))
    return parts.join(' ')
  }

  isEnabled(level: LogLevel): boolean {
    return !this.silent && styles[level].rank >= styles[this.level].rank
  }

  log(level: LogLevel, message: string, data?: LogData): void {
    if (this.isEnabled(level)) {
      styles[level].write(this.format(level, message, data))
    }
  }

  debug(message: string, data?: LogData): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: LogData): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: LogData): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: LogData): void {
    this.log('error', message, data)
  }

  /**
   * Same level and output, context extended as `parent:child`.
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.colored,
    })
  }
}

export function createLogger(context?: string, options?: Omit<LoggerOptions, 'context'>): Logger {
  return new Logger({ ...options, context })
}

/** Discards everything. Default for registries created without hooks. */
export const silentLogger = new Logger({ silent: true })
