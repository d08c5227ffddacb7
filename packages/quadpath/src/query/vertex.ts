/**
 * Vertex Chain
 *
 * A traversal rooted at given nodes (or every node). The only chain that can
 * be sent for execution.
 */

import { QueryChain } from './base'

export class VertexChain extends QueryChain {
  override readonly kind = 'vertex' as const

  /**
   * @param nodeIds - starting nodes; none means every node
   * @param root - name of the graph object in the query language
   */
  constructor(nodeIds: readonly string[] = [], root: string = 'g') {
    super(`${root}.V(${nodeIds.map((id) => `'${id}'`).join(',')})`)
  }

  /** Return every result. */
  All(): this {
    return this.put('All()')
  }

  /** Return at most `limit` results. */
  GetLimit(limit: number): this {
    return this.put('GetLimit(%d)', limit)
  }

  ToArray(): this {
    return this.put('ToArray()')
  }

  ToValue(): this {
    return this.put('ToValue()')
  }

  TagArray(): this {
    return this.put('TagArray()')
  }

  TagValue(): this {
    return this.put('TagValue()')
  }
}
