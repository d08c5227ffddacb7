/**
 * Quad
 *
 * One directed, optionally labeled graph edge. All fields are stored in
 * canonical form (see `normalize`), and equality and hashing look at the
 * canonical fields only.
 */

import { InvalidQuadError } from '../errors'
import type { Emittable } from '../query/emit'
import { encodeJson, parseJson, type JsonObject } from '../utils/json'
import { normalize } from './normalize'
import { quadRecordSchema, type QuadRecord } from './schema'

/** Hash used for an absent label, distinct from the hash of `''` */
export const ABSENT_LABEL_HASH = 0x9e3779b9 | 0

export class Quad implements Emittable {
  readonly subject: string
  readonly predicate: string
  readonly object: string
  readonly label: string | undefined

  constructor(subject: string, predicate: string, object: string, label?: string | null) {
    this.subject = normalize(subject)
    this.predicate = normalize(predicate)
    this.object = normalize(object)
    this.label = normalize(label)
  }

  static create(subject: string, predicate: string, object: string, label?: string | null): Quad {
    return new Quad(subject, predicate, object, label)
  }

  /**
   * Build a quad from a structured record.
   * @throws InvalidQuadError when a required key is missing, a value is not a
   * string, or the record carries a key a quad does not have
   */
  static fromRecord(record: unknown): Quad {
    const result = quadRecordSchema.safeParse(record)
    if (!result.success) {
      const first = result.error.errors[0]
      const where = first && first.path.length > 0 ? ` at '${first.path.join('.')}'` : ''
      throw new InvalidQuadError(
        `Invalid quad record${where}: ${first?.message ?? 'validation failed'}`,
        result.error.errors,
      )
    }

    const { subject, predicate, object, label } = result.data
    return new Quad(subject, predicate, object, label)
  }

  /**
   * Build a quad from its JSON text.
   * @throws InvalidQuadError when the text is not JSON or not a valid record
   */
  static fromText(text: string): Quad {
    let record: unknown
    try {
      record = parseJson(text)
    } catch (error) {
      throw new InvalidQuadError(
        'Invalid quad text: not parseable as JSON',
        [],
        error instanceof Error ? error : undefined,
      )
    }
    return Quad.fromRecord(record)
  }

  toRecord(): QuadRecord {
    const record: QuadRecord = {
      subject: this.subject,
      predicate: this.predicate,
      object: this.object,
    }
    if (this.label !== undefined) {
      record.label = this.label
    }
    return record
  }

  toText(): string {
    return encodeJson({ ...this.toRecord() })
  }

  toEmitValue(): JsonObject {
    return { ...this.toRecord() }
  }

  /**
   * Compare against another quad, a structured record or JSON text.
   * Anything that cannot be read as a quad is simply not equal.
   */
  equals(other: unknown): boolean {
    const quad = Quad.coerce(other)
    if (quad === undefined) return false

    return (
      this.subject === quad.subject &&
      this.predicate === quad.predicate &&
      this.object === quad.object &&
      this.label === quad.label
    )
  }

  hash(): number {
    const label = this.label === undefined ? ABSENT_LABEL_HASH : hashString(this.label)
    return (
      (Math.imul(3, hashString(this.subject)) +
        Math.imul(5, hashString(this.predicate)) +
        Math.imul(7, hashString(this.object)) +
        Math.imul(11, label)) |
      0
    )
  }

  toString(): string {
    return this.toText()
  }

  // record first, then text; stop at the first conversion that works
  private static coerce(value: unknown): Quad | undefined {
    if (value instanceof Quad) return value

    const fromRecord = attempt(() => Quad.fromRecord(value))
    if (fromRecord !== undefined) return fromRecord

    if (typeof value === 'string') {
      return attempt(() => Quad.fromText(value))
    }
    return undefined
  }
}

function attempt(convert: () => Quad): Quad | undefined {
  try {
    return convert()
  } catch (error) {
    if (error instanceof InvalidQuadError) return undefined
    throw error
  }
}

/** 32-bit string hash (31 multiplier over UTF-16 code units) */
export function hashString(text: string): number {
  let hash = 0
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0
  }
  return hash
}
