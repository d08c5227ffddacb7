/**
 * Quad Module
 *
 * Graph edge records for bulk writes.
 */

export { normalize } from './normalize'
export { Quad, hashString, ABSENT_LABEL_HASH } from './quad'
export { QuadSet } from './quad-set'
export { quadRecordSchema } from './schema'
export type { QuadRecord } from './schema'
