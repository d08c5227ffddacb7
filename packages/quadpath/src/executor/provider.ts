/**
 * HTTP Transport Interface
 *
 * Abstraction over the HTTP layer so the client can run on `fetch`, a
 * custom agent, or an in-process fake in tests.
 */

/**
 * Interface for HTTP transports.
 * One call is one request; no retry happens at this level.
 */
export interface HttpTransport {
  /** Unique name for this transport (e.g., 'fetch') */
  readonly name: string

  /** POST `body` as text to `url` and read the whole response body as text */
  post(url: string, body: string): Promise<TransportResponse>
}

export interface TransportResponse {
  status: number
  statusText: string
  ok: boolean
  body: string
}
