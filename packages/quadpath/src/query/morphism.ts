/**
 * Morphism Chain
 *
 * A reusable traversal fragment. Never executed directly; applied through
 * `Follow` / `FollowR` on another chain.
 */

import { QueryChain } from './base'

export class MorphismChain extends QueryChain {
  override readonly kind = 'morphism' as const

  constructor(root: string = 'g') {
    super(`${root}.Morphism()`)
  }
}
