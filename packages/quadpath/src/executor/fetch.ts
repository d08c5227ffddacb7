/**
 * Fetch Transport
 *
 * Default transport on the global `fetch` of Node.js.
 */

import type { HttpTransport, TransportResponse } from './provider'

export class FetchTransport implements HttpTransport {
  readonly name = 'fetch'

  async post(url: string, body: string): Promise<TransportResponse> {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain; charset=utf-8' },
      body,
    })

    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      body: await response.text(),
    }
  }
}
