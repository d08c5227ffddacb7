/**
 * Query Module
 *
 * Fluent API for building traversal queries.
 */

// Entry point
export { GraphEntryPoint, createGraph } from './entry'
export type { GraphOptions } from './entry'

// Chains
export { QueryChain, isQueryChain, chainText } from './base'
export type { ChainKind } from './base'
export { VertexChain } from './vertex'
export { MorphismChain } from './morphism'

// Steps and formatting
export { QueryStep } from './step'
export type { QueryParameter } from './step'
export { formatBoundValue } from './format'
export type { BoundValue } from './format'

// Emit
export { toEmitJson, isEmittable } from './emit'
export type { Emittable, EmitValue } from './emit'
