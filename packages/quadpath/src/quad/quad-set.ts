/**
 * QuadSet
 *
 * Deduplicated collection of quads. Membership is decided by `Quad.hash()`
 * to pick a bucket and `Quad.equals()` inside it. Iteration follows
 * insertion order, so `toText()` is stable for a given sequence of adds.
 */

import { InvalidQuadError } from '../errors'
import { encodeJson, parseJson } from '../utils/json'
import { Quad } from './quad'
import { quadRecordListSchema, type QuadRecord } from './schema'

export class QuadSet implements Iterable<Quad> {
  private readonly buckets = new Map<number, Quad[]>()
  private readonly order: Quad[] = []

  constructor(quads?: Iterable<Quad>) {
    if (quads) this.addAll(quads)
  }

  /**
   * Build a set from structured records.
   * @throws InvalidQuadError on the first invalid record
   */
  static fromRecords(records: readonly unknown[]): QuadSet {
    return new QuadSet(records.map((record) => Quad.fromRecord(record)))
  }

  /**
   * Build a set from a JSON array of records.
   * @throws InvalidQuadError when the text is not a JSON array of valid records
   */
  static fromText(text: string): QuadSet {
    let parsed: unknown
    try {
      parsed = parseJson(text)
    } catch (error) {
      throw new InvalidQuadError(
        'Invalid quad set text: not parseable as JSON',
        [],
        error instanceof Error ? error : undefined,
      )
    }

    const list = quadRecordListSchema.safeParse(parsed)
    if (!list.success) {
      throw new InvalidQuadError('Invalid quad set text: expected a JSON array', list.error.errors)
    }
    return QuadSet.fromRecords(list.data)
  }

  get size(): number {
    return this.order.length
  }

  has(quad: Quad): boolean {
    return this.find(quad) !== undefined
  }

  /** Insert a quad; a duplicate is ignored. */
  add(quad: Quad): this {
    if (this.has(quad)) return this

    const hash = quad.hash()
    const bucket = this.buckets.get(hash)
    if (bucket) {
      bucket.push(quad)
    } else {
      this.buckets.set(hash, [quad])
    }
    this.order.push(quad)
    return this
  }

  /** Merge the given quads into this set. */
  addAll(quads: Iterable<Quad>): this {
    for (const quad of quads) {
      this.add(quad)
    }
    return this
  }

  delete(quad: Quad): boolean {
    const existing = this.find(quad)
    if (existing === undefined) return false

    const hash = existing.hash()
    const bucket = this.buckets.get(hash) ?? []
    const remaining = bucket.filter((member) => member !== existing)
    if (remaining.length > 0) {
      this.buckets.set(hash, remaining)
    } else {
      this.buckets.delete(hash)
    }
    this.order.splice(this.order.indexOf(existing), 1)
    return true
  }

  /** New set holding the members of both; neither operand changes. */
  union(other: Iterable<Quad>): QuadSet {
    return new QuadSet(this.order).addAll(other)
  }

  values(): IterableIterator<Quad> {
    return this.order.values()
  }

  [Symbol.iterator](): IterableIterator<Quad> {
    return this.values()
  }

  toRecords(): QuadRecord[] {
    return this.order.map((quad) => quad.toRecord())
  }

  toText(): string {
    return encodeJson(this.order.map((quad) => quad.toEmitValue()))
  }

  toString(): string {
    return this.toText()
  }

  private find(quad: Quad): Quad | undefined {
    return this.buckets.get(quad.hash())?.find((member) => member.equals(quad))
  }
}
