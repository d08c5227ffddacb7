/**
 * Graph Client
 *
 * Sends query text to the query endpoint and quad sets to the write
 * endpoint. Exactly one request per call.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { ConnectionError, ExecutionError } from '../errors'
import type { QuadSet } from '../quad'
import { chainText, GraphEntryPoint, type VertexChain } from '../query'
import { parseJson } from '../utils/json'
import { Logger } from '../utils/logger'
import { resolveClientConfig } from './config'
import { FetchTransport } from './fetch'
import type { HttpTransport, TransportResponse } from './provider'
import type { ClientConfig, GraphResponse, ResolvedClientConfig } from './types'

/**
 * @example
 * ```typescript
 * const client = createClient({ url: 'http://localhost:64210' })
 *
 * const { result } = await client.send(client.graph.vertices('alice').Out('follows').All())
 *
 * await client.write(new QuadSet([new Quad('alice', 'follows', 'bob')]))
 * ```
 */
export class GraphClient {
  readonly config: ResolvedClientConfig
  readonly graph: GraphEntryPoint

  private readonly transport: HttpTransport

  constructor(config: ClientConfig = {}) {
    this.config = resolveClientConfig(config)
    this.transport = config.transport ?? new FetchTransport()
    this.graph = new GraphEntryPoint()
  }

  /**
   * Run a query and decode the JSON response. With a `schema`, the decoded
   * body is validated against it and typed as its output.
   * @throws InvalidParameterError when `query` is not a VertexChain or a string
   * @throws ConnectionError when the request fails
   * @throws ExecutionError when the response body is not JSON or does not match `schema`
   */
  send(query: VertexChain | string): Promise<GraphResponse>
  send<T>(query: VertexChain | string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<GraphResponse<T>>
  async send<T>(
    query: VertexChain | string,
    schema?: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<GraphResponse<unknown>> {
    const text = chainText(query, 'vertex', 'send')
    const raw = await this.post(this.config.queryUrl, text)

    let result: unknown
    try {
      result = parseJson(raw.body)
    } catch (error) {
      throw new ExecutionError(
        `Query response is not JSON (HTTP ${raw.status} ${raw.statusText})`,
        text,
        raw.status,
        error instanceof Error ? error : undefined,
      )
    }

    if (!schema) return { raw, result }

    const parsed = schema.safeParse(result)
    if (!parsed.success) {
      const issue = parsed.error.errors[0]
      const path = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : ''
      throw new ExecutionError(
        `Query response does not match the expected shape${path}: ${issue?.message ?? 'invalid value'}`,
        text,
        raw.status,
        parsed.error,
      )
    }
    return { raw, result: parsed.data }
  }

  /**
   * Write quads and return the response body as received.
   * @throws ConnectionError when the request fails
   */
  async write(quads: QuadSet): Promise<string> {
    const raw = await this.post(this.config.writeUrl, quads.toText())
    if (!raw.ok) {
      Logger.warn(`Write returned HTTP ${raw.status} ${raw.statusText}`, raw.body)
    }
    return raw.body
  }

  private async post(url: string, body: string): Promise<TransportResponse> {
    Logger.debug(`POST ${url} via ${this.transport.name}`, body)

    try {
      return await this.transport.post(url, body)
    } catch (error) {
      Logger.error(`Request to ${url} failed`, error)
      const reason = error instanceof Error ? error.message : String(error)
      throw new ConnectionError(
        `Request to ${url} failed: ${reason}`,
        url,
        error instanceof Error ? error : undefined,
      )
    }
  }
}

export function createClient(config?: ClientConfig): GraphClient {
  return new GraphClient(config)
}
