/**
 * Client Configuration
 *
 * Explicit options win over environment variables, which win over defaults.
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors'
import type { ClientConfig, ResolvedClientConfig } from './types'

export const DEFAULT_URL = 'http://localhost:64210'
export const DEFAULT_VERSION = 'v1'

export const clientConfigSchema = z.object({
  url: z.string().url(),
  version: z.string().regex(/^[A-Za-z0-9._-]+$/, 'version must be a single path segment'),
})

export function resolveClientConfig(
  config: ClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedClientConfig {
  const result = clientConfigSchema.safeParse({
    url: config.url ?? (env.CAYLEY_URL || DEFAULT_URL),
    version: config.version ?? (env.CAYLEY_API_VERSION || DEFAULT_VERSION),
  })

  if (!result.success) {
    const first = result.error.errors[0]
    throw new ConfigurationError(
      `Invalid client config${first ? ` '${first.path.join('.')}'` : ''}: ${first?.message ?? 'validation failed'}`,
      result.error.errors,
    )
  }

  const url = result.data.url.replace(/\/+$/, '')
  const { version } = result.data

  return {
    url,
    version,
    queryUrl: `${url}/api/${version}/query/gremlin`,
    writeUrl: `${url}/api/${version}/write`,
  }
}
