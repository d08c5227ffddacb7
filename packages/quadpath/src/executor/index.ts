/**
 * Executor Module
 *
 * Configuration and HTTP delivery of queries and quad writes.
 */

// Transport interface
export type { HttpTransport, TransportResponse } from './provider'

// Fetch transport (default)
export { FetchTransport } from './fetch'

// Client
export { GraphClient, createClient } from './client'

// Configuration
export { resolveClientConfig, clientConfigSchema, DEFAULT_URL, DEFAULT_VERSION } from './config'

// Types
export type { ClientConfig, ResolvedClientConfig, GraphResponse } from './types'
