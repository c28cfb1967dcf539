/**
 * Safe JSON helpers used by logging and the snapshot codec.
 *
 * - safeStringify renders diagnostic data (Maps, Sets, Errors, bigint, cycles)
 *   without throwing
 * - parseJson wraps JSON.parse in a result value instead of an exception
 * - canonicalJson produces a key-sorted rendering for structural comparison
 */

export interface SafeStringifyOptions {
  /** Nesting below this depth renders as a marker (default: 10) */
  maxDepth?: number
  /** Longer strings are cut (default: 10000) */
  maxLength?: number
  /** Indentation passed through to JSON.stringify */
  space?: number
}

const DEFAULTS: Required<SafeStringifyOptions> = {
  maxDepth: 10,
  maxLength: 10000,
  space: 0,
}

function entriesOf(obj: object): [string, unknown][] {
  if (obj instanceof Map) {
    return Array.from(obj, ([key, val]): [string, unknown] => [String(key), val])
  }
  const entries: [string, unknown][] = Object.entries(obj)
  return obj instanceof Error ? [['name', obj.name], ['message', obj.message], ...entries] : entries
}

/**
 * Convert a value into something JSON.stringify accepts. Only true cycles
 * render as `[Circular]`; an object reached twice on separate paths is
 * written twice.
 */
export function safeSerialize(value: unknown, options?: SafeStringifyOptions): unknown {
  const { maxDepth, maxLength } = { ...DEFAULTS, ...options }
  const ancestors = new Set<object>()

  function walk(node: unknown, depth: number): unknown {
    switch (typeof node) {
      case 'undefined':
      case 'boolean':
      case 'number':
        return node
      case 'string':
        return node.length > maxLength
          ? `${node.slice(0, maxLength)}... [truncated ${node.length - maxLength} chars]`
          : node
      case 'bigint':
        return `${node}n`
      case 'symbol':
        return node.toString()
      case 'function':
        return '[Function]'
    }
    if (node === null || typeof node !== 'object') return node
    if (node instanceof Date) return node.toISOString()
    if (depth > maxDepth) return '[Max depth exceeded]'
    if (ancestors.has(node)) return '[Circular]'

    ancestors.add(node)
    try {
      if (node instanceof Set || Array.isArray(node)) {
        return Array.from(node, item => walk(item, depth + 1))
      }
      const out: Record<string, unknown> = {}
      for (const [key, val] of entriesOf(node)) {
        out[key] = walk(val, depth + 1)
      }
      return out
    } finally {
      ancestors.delete(node)
    }
  }

  return walk(value, 0)
}

/**
 * Stringify a value for logs. Never throws.
 */
export function safeStringify(value: unknown, options?: SafeStringifyOptions): string {
  const space = options?.space ?? DEFAULTS.space
  return JSON.stringify(safeSerialize(value, options), null, space || undefined) ?? 'undefined'
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Result type for parseJson
 */
export type JsonParseResult<T = unknown> = {
  ok: true
  value: T
} | {
  ok: false
  error: SyntaxError
}

/**
 * Parse JSON, returning a result instead of throwing.
 *
 * @example
 * const result = parseJson(payload)
 * if (!result.ok) {
 *   return fail({ kind: 'invalid-json', message: result.error.message })
 * }
 */
export function parseJson(input: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { ok: false, error }
    }
    throw error
  }
}

// ============================================================================
// Canonical form
// ============================================================================

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {}
    for (const [key, val] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(val)
    }
    return sorted
  }

  return value
}

/**
 * Key-sorted JSON rendering. Two structurally equal plain values always
 * produce the same string.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'undefined'
}
