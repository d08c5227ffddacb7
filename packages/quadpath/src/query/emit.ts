/**
 * Emit Values
 *
 * Data passed to `g.Emit(...)`. JSON values are written as they are; other
 * types opt in by implementing `Emittable`.
 */

import { InvalidParameterError } from '../errors'
import { isPlainObject, type JsonPrimitive, type JsonValue } from '../utils/json'

/**
 * A type that knows how to turn itself into emit data.
 *
 * @example
 * ```typescript
 * class Point implements Emittable {
 *   constructor(readonly x: number, readonly y: number) {}
 *   toEmitValue() { return { x: this.x, y: this.y } }
 * }
 * graph.emit(new Point(1, 2)) // g.Emit({"x": 1, "y": 2})
 * ```
 */
export interface Emittable {
  toEmitValue(): EmitValue
}

export type EmitValue =
  | JsonPrimitive
  | Emittable
  | readonly EmitValue[]
  | { readonly [key: string]: EmitValue | undefined }

export function isEmittable(value: unknown): value is Emittable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toEmitValue' in value &&
    typeof value.toEmitValue === 'function'
  )
}

/**
 * Resolve every `Emittable` inside `value` to plain JSON.
 * @throws InvalidParameterError for objects that are neither plain nor Emittable
 */
export function toEmitJson(value: EmitValue): JsonValue {
  if (value === null || typeof value !== 'object') return value
  if (isEmittable(value)) return toEmitJson(value.toEmitValue())
  if (isEmitArray(value)) return value.map((item) => toEmitJson(item))

  // class instances must go through Emittable
  if (!isPlainObject(value)) {
    throw new InvalidParameterError('emit', 'JSON value or Emittable', value)
  }

  const result: Record<string, JsonValue> = {}
  for (const key of Object.keys(value)) {
    const item = value[key]
    if (item === undefined) continue
    result[key] = toEmitJson(item)
  }
  return result
}

function isEmitArray(value: EmitValue): value is readonly EmitValue[] {
  return Array.isArray(value)
}
