/**
 * Query Step
 *
 * One fragment of a traversal: a format token plus its already-formatted
 * parameters. Tokens use `%s` (text), `%d` (integer) and `%%` (literal `%`).
 */

import { QueryFormatError } from '../errors'

export type QueryParameter = string | number

const PLACEHOLDER = /%([sd%])/g

export class QueryStep {
  readonly token: string
  readonly parameters: ReadonlyArray<QueryParameter>

  constructor(token: string, ...parameters: QueryParameter[]) {
    this.token = token
    this.parameters = Object.freeze([...parameters])
  }

  /**
   * Substitute the parameters into the token in order.
   * Without parameters the token is returned as is.
   * @throws QueryFormatError when placeholders and parameters do not match
   */
  serialize(): string {
    if (this.parameters.length === 0) return this.token

    let index = 0
    const text = this.token.replace(PLACEHOLDER, (_match, kind: string) => {
      if (kind === '%') return '%'

      if (index >= this.parameters.length) {
        throw new QueryFormatError(
          `Not enough parameters for '${this.token}': got ${this.parameters.length}`,
          this.token,
        )
      }
      const parameter = this.parameters[index++]
      return kind === 'd' ? formatInteger(parameter, this.token) : String(parameter)
    })

    if (index < this.parameters.length) {
      throw new QueryFormatError(
        `Too many parameters for '${this.token}': expected ${index}, got ${this.parameters.length}`,
        this.token,
      )
    }
    return text
  }

  toString(): string {
    return this.serialize()
  }
}

function formatInteger(value: QueryParameter | undefined, token: string): string {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new QueryFormatError(`'%d' in '${token}' needs a finite number, got ${String(value)}`, token)
  }
  return String(Math.trunc(value))
}
