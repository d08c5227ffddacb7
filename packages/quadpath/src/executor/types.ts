/**
 * Executor Type Definitions
 */

import type { HttpTransport, TransportResponse } from './provider'

/**
 * Client configuration.
 * Unset fields fall back to `CAYLEY_URL` / `CAYLEY_API_VERSION`, then to the
 * defaults.
 */
export interface ClientConfig {
  /** Server base URL (default `http://localhost:64210`) */
  url?: string
  /** API version path segment (default `v1`) */
  version?: string
  /** HTTP transport (default `FetchTransport`) */
  transport?: HttpTransport
}

/**
 * Configuration after defaults are applied.
 */
export interface ResolvedClientConfig {
  url: string
  version: string
  queryUrl: string
  writeUrl: string
}

/**
 * Result of a query request.
 */
export interface GraphResponse<T = unknown> {
  /** The HTTP response as received */
  raw: TransportResponse
  /** The decoded JSON body */
  result: T
}
