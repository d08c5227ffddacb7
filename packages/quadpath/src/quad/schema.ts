/**
 * Quad Record Schema
 *
 * Runtime validation of the structured record exchanged with the write
 * endpoint. Unknown keys are rejected.
 */

import { z } from 'zod'

export const quadRecordSchema = z
  .object({
    subject: z.string(),
    predicate: z.string(),
    object: z.string(),
    label: z.string().nullish(),
  })
  .strict()

/**
 * Record produced by `Quad.toRecord`.
 * `label` is left out entirely when the quad has none.
 */
export interface QuadRecord {
  subject: string
  predicate: string
  object: string
  label?: string
}

export const quadRecordListSchema = z.array(z.unknown())
