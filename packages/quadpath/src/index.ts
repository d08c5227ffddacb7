/**
 * quadpath - Quad Store Client and Traversal Query Builder
 *
 * Builds graph-edge records for bulk writes and fluent traversal queries for
 * a Cayley-compatible HTTP API.
 *
 * @example
 * ```typescript
 * import { createClient, Quad, QuadSet } from 'quadpath';
 *
 * const client = createClient({ url: 'http://localhost:64210' });
 *
 * // WRITES
 * await client.write(
 *   new QuadSet([
 *     new Quad('alice', 'follows', 'bob'),
 *     new Quad('bob', 'follows', 'carol', 'social'),
 *   ]),
 * );
 *
 * // QUERIES
 * const g = client.graph;
 * const followsTwice = g.morphism().Out('follows').Out('follows');
 * const { result } = await client.send(g.vertices('alice').Follow(followsTwice).All());
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// QUADS
// =============================================================================

export { normalize, Quad, QuadSet, quadRecordSchema, hashString, ABSENT_LABEL_HASH } from './quad'
export type { QuadRecord } from './quad'

// =============================================================================
// QUERY BUILDERS
// =============================================================================

export {
  createGraph,
  GraphEntryPoint,
  QueryChain,
  VertexChain,
  MorphismChain,
  QueryStep,
  formatBoundValue,
  toEmitJson,
  isEmittable,
  isQueryChain,
} from './query'
export type {
  GraphOptions,
  ChainKind,
  QueryParameter,
  BoundValue,
  Emittable,
  EmitValue,
} from './query'

// =============================================================================
// CLIENT
// =============================================================================

export { createClient, GraphClient, FetchTransport, resolveClientConfig } from './executor'
export type {
  ClientConfig,
  ResolvedClientConfig,
  GraphResponse,
  HttpTransport,
  TransportResponse,
} from './executor'

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphQueryError,
  InvalidQuadError,
  InvalidParameterError,
  QueryFormatError,
  ConfigurationError,
  ConnectionError,
  ExecutionError,
} from './errors'

// =============================================================================
// UTILITIES
// =============================================================================

export { encodeJson, Logger, LogLevel } from './utils'
export type { JsonValue, JsonObject, JsonPrimitive } from './utils'
