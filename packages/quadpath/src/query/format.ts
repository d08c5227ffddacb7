/**
 * Bound Value Formatting
 *
 * Renders the predicate / tags arguments of Out, In and Both.
 */

import { encodeJson, isPlainObject, type JsonObject } from '../utils/json'
import type { QueryChain } from './base'

export type BoundValue =
  | string
  | number
  | boolean
  | readonly string[]
  | JsonObject
  | QueryChain
  | null
  | undefined

/**
 * Format one bound argument:
 * - plain object: JSON text
 * - string: single-quoted
 * - null / undefined: `null`
 * - tag list: `['a', 'b']`, single-quoted items, not a JSON array
 * - anything else: `String(value)`
 */
export function formatBoundValue(value: BoundValue): string {
  if (isJsonObjectBound(value)) return encodeJson(value)
  if (typeof value === 'string') return `'${value}'`
  if (value === null || value === undefined) return 'null'
  if (isTagList(value)) return `[${value.map((tag) => `'${tag}'`).join(', ')}]`
  return String(value)
}

// narrows to JsonObject for encodeJson; isPlainObject alone yields Record<string, unknown>
function isJsonObjectBound(value: BoundValue): value is JsonObject {
  return isPlainObject(value)
}

function isTagList(value: BoundValue): value is readonly string[] {
  return Array.isArray(value)
}
