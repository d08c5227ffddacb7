/**
 * Utilities Module
 */

export type { JsonValue, JsonObject, JsonPrimitive } from './json'
export { encodeJson, parseJson, isPlainObject } from './json'

export { Logger, LogLevel } from './logger'
