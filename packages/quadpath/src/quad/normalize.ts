/**
 * Canonical form of a quad field: trimmed, spaces turned into underscores,
 * lowercased. Absent stays absent.
 *
 * @example
 * ```typescript
 * normalize('  Follows Back ') // 'follows_back'
 * ```
 */
export function normalize(text: string): string
export function normalize(text: string | null | undefined): string | undefined
export function normalize(text: string | null | undefined): string | undefined {
  if (text === null || text === undefined) return undefined
  return text.trim().replaceAll(' ', '_').toLowerCase()
}
