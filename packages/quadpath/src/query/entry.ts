/**
 * Graph Entry Point
 *
 * Starts vertex and morphism chains and builds standalone emit fragments.
 */

import { encodeJson } from '../utils/json'
import { toEmitJson, type EmitValue } from './emit'
import { MorphismChain } from './morphism'
import { VertexChain } from './vertex'

export interface GraphOptions {
  /** Name of the graph object in the query language (default `g`) */
  root?: string
}

/**
 * Main entry point for building queries.
 *
 * @example
 * ```typescript
 * const graph = createGraph()
 *
 * graph.vertices('alice').Out('follows').All().build()
 * // g.V('alice').Out('follows').All()
 *
 * const friendOfFriend = graph.morphism().Out('follows').Out('follows')
 * graph.vertices('alice').Follow(friendOfFriend).All().build()
 * // g.V('alice').Follow(g.Morphism().Out('follows').Out('follows')).All()
 * ```
 */
export class GraphEntryPoint {
  readonly root: string

  constructor(options: GraphOptions = {}) {
    this.root = options.root ?? 'g'
  }

  /**
   * Start a chain at the given nodes, or at every node when called
   * without ids.
   */
  vertices(...nodeIds: string[]): VertexChain {
    return new VertexChain(nodeIds, this.root)
  }

  /** Alias of `vertices` */
  V(...nodeIds: string[]): VertexChain {
    return this.vertices(...nodeIds)
  }

  morphism(): MorphismChain {
    return new MorphismChain(this.root)
  }

  /** Alias of `morphism` */
  M(): MorphismChain {
    return this.morphism()
  }

  /**
   * Query fragment emitting `data` as a result: `g.Emit({"name": "alice"})`.
   * @throws InvalidParameterError when `data` holds an object that is neither
   * plain nor Emittable
   */
  emit(data: EmitValue): string {
    return `${this.root}.Emit(${encodeJson(toEmitJson(data))})`
  }
}

export function createGraph(options?: GraphOptions): GraphEntryPoint {
  return new GraphEntryPoint(options)
}
