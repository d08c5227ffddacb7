/**
 * Base Query Chain
 *
 * Shared traversal vocabulary for vertex and morphism chains.
 */

import { InvalidParameterError } from '../errors'
import { encodeJson } from '../utils/json'
import { formatBoundValue, type BoundValue } from './format'
import { QueryStep, type QueryParameter } from './step'
import type { MorphismChain } from './morphism'
import type { VertexChain } from './vertex'

export type ChainKind = 'vertex' | 'morphism'

type Direction = 'Out' | 'In' | 'Both'

// =============================================================================
// QUERY CHAIN
// =============================================================================

/**
 * Ordered, never-empty list of steps serialized as `step1.step2...`.
 *
 * Every traversal method appends one step to this chain and returns it, so
 * calls can be chained. The chain is mutated in place.
 */
export abstract class QueryChain {
  abstract readonly kind: ChainKind

  private readonly _steps: QueryStep[] = []

  protected constructor(root: string) {
    this.put(root)
  }

  /** Steps in order, root selector first */
  get steps(): ReadonlyArray<QueryStep> {
    return this._steps
  }

  // ===========================================================================
  // TRAVERSAL
  // ===========================================================================

  /** Follow outgoing edges, optionally restricted by predicate and tags. */
  Out(predicate?: BoundValue, tags?: BoundValue): this {
    return this.bounds('Out', predicate, tags)
  }

  /** Follow incoming edges. */
  In(predicate?: BoundValue, tags?: BoundValue): this {
    return this.bounds('In', predicate, tags)
  }

  /** Follow edges in either direction. */
  Both(predicate?: BoundValue, tags?: BoundValue): this {
    return this.bounds('Both', predicate, tags)
  }

  /** Keep only the given nodes: `Is('a', 'b')`. */
  Is(...nodeIds: string[]): this {
    return this.put("Is('%s')", nodeIds.join("', '"))
  }

  Has(predicate: string, object: string): this {
    return this.put("Has('%s', '%s')", predicate, object)
  }

  /** Name the current nodes so they appear in the results. */
  Tag(...tags: string[]): this {
    return this.put('Tag(%s)', encodeJson(tags))
  }

  /** Jump back to the nodes saved under `tag`. */
  Back(tag: string): this {
    return this.put("Back('%s')", tag)
  }

  Save(predicate: string, tag: string): this {
    return this.put("Save('%s', '%s')", predicate, tag)
  }

  // ===========================================================================
  // COMPOSITION
  // ===========================================================================

  /**
   * @throws InvalidParameterError unless `query` is a VertexChain or a string
   */
  Intersect(query: VertexChain | string): this {
    return this.put('Intersect(%s)', chainText(query, 'vertex', 'Intersect'))
  }

  /**
   * @throws InvalidParameterError unless `query` is a VertexChain or a string
   */
  Union(query: VertexChain | string): this {
    return this.put('Union(%s)', chainText(query, 'vertex', 'Union'))
  }

  /**
   * Apply a morphism.
   * @throws InvalidParameterError unless `query` is a MorphismChain or a string
   */
  Follow(query: MorphismChain | string): this {
    return this.put('Follow(%s)', chainText(query, 'morphism', 'Follow'))
  }

  /**
   * Apply a morphism in reverse.
   * @throws InvalidParameterError unless `query` is a MorphismChain or a string
   */
  FollowR(query: MorphismChain | string): this {
    return this.put('FollowR(%s)', chainText(query, 'morphism', 'FollowR'))
  }

  // ===========================================================================
  // SERIALIZATION
  // ===========================================================================

  /** The query text, e.g. `g.V('alice').Out('follows').All()` */
  build(): string {
    return this._steps.map((step) => step.serialize()).join('.')
  }

  toString(): string {
    return this.build()
  }

  protected put(token: string, ...parameters: QueryParameter[]): this {
    this._steps.push(new QueryStep(token, ...parameters))
    return this
  }

  private bounds(direction: Direction, predicate?: BoundValue, tags?: BoundValue): this {
    const noPredicate = predicate === undefined || predicate === null
    const noTags = tags === undefined || tags === null

    if (noPredicate && noTags) {
      return this.put('%s()', direction)
    }
    if (noTags) {
      return this.put('%s(%s)', direction, formatBoundValue(predicate))
    }
    return this.put('%s(%s, %s)', direction, formatBoundValue(predicate), formatBoundValue(tags))
  }
}

// =============================================================================
// ARGUMENT CHECK
// =============================================================================

export function isQueryChain(value: unknown): value is QueryChain {
  return value instanceof QueryChain
}

/**
 * Text of a sub-query argument, or an InvalidParameterError when the
 * argument is not a string or a chain of the expected kind.
 */
export function chainText(query: unknown, expected: ChainKind, operation: string): string {
  if (typeof query === 'string') return query
  if (isQueryChain(query) && query.kind === expected) return query.build()

  const name = expected === 'vertex' ? 'VertexChain' : 'MorphismChain'
  throw new InvalidParameterError(operation, `${name} or string`, query)
}
