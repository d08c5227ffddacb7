/**
 * JSON Text Encoding
 *
 * All JSON text the library produces (tag lists, bound objects, emitted
 * values, quad payloads) goes through `encodeJson`, which separates items
 * with `", "` and keys with `": "`, e.g. `["t1", "t2"]`.
 */

export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject

export interface JsonObject {
  readonly [key: string]: JsonValue | undefined
}

/**
 * Encode a JSON value as text.
 * Object keys holding `undefined` are skipped; `undefined` inside an array
 * and non-finite numbers are written as `null`.
 */
export function encodeJson(value: JsonValue): string {
  if (value === null) return 'null'
  if (typeof value === 'string') return JSON.stringify(value)
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'null'
  if (typeof value === 'boolean') return value ? 'true' : 'false'

  if (isJsonArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : encodeJson(item))).join(', ')}]`
  }

  const entries: string[] = []
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue
    entries.push(`${JSON.stringify(key)}: ${encodeJson(item)}`)
  }
  return `{${entries.join(', ')}}`
}

/**
 * Parse JSON text. Thin wrapper so callers get `unknown` instead of `any`.
 */
export function parseJson(text: string): unknown {
  const parsed: unknown = JSON.parse(text)
  return parsed
}

/**
 * Check for a plain object (`{}` literal or `Object.create(null)`),
 * as opposed to arrays, class instances and other built-ins.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isJsonArray(value: readonly JsonValue[] | JsonObject): value is readonly JsonValue[] {
  return Array.isArray(value)
}
