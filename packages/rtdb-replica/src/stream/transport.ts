/**
 * @file Streaming Transport
 *
 * Opens the long-lived push-event request and hands back the raw body bytes.
 * Sessions talk to the {@link StreamTransport} interface only; the stock
 * {@link FetchStreamTransport} uses `fetch`.
 *
 * Errors thrown by `open()` and by the byte iterable:
 * - {@link HttpStatusError} for a non-2xx status
 * - {@link ProtocolViolationError} when the response is not an event stream
 * - {@link ConnectionError} for network failures
 *
 * Aborting the request's signal ends the byte iterable without an error.
 *
 * @module rtdb-replica/stream/transport
 */

import {
  ConnectionError,
  HttpStatusError,
  ProtocolViolationError,
} from '../errors.js'
import { createDebugLogger } from '../logger.js'
import type { DebugLogger, DebugOption } from '../logger.js'

// =============================================================================
// Types
// =============================================================================

/**
 * A streaming request.
 */
export interface StreamRequest {
  /** Fully built URL, query parameters included */
  url: string
  /** Request headers */
  headers: Record<string, string>
  /** Aborts the request and ends the body */
  signal: AbortSignal
}

/**
 * Opens push-event connections.
 */
export interface StreamTransport {
  /**
   * Issues the request and resolves once the response headers arrive.
   *
   * @returns The body, chunk by chunk
   */
  open(request: StreamRequest): Promise<AsyncIterable<Uint8Array>>
}

/**
 * The subset of a `fetch` response the transport reads.
 */
export interface StreamResponse {
  readonly ok: boolean
  readonly status: number
  readonly statusText: string
  readonly headers: { get(name: string): string | null }
  readonly body: {
    getReader(): {
      read(): Promise<{ done: boolean; value?: Uint8Array }>
      cancel(reason?: unknown): Promise<void>
    }
  } | null
}

/**
 * The subset of `fetch` the transport calls. The global `fetch` satisfies it.
 */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; signal: AbortSignal }
) => Promise<StreamResponse>

/**
 * Configuration for {@link FetchStreamTransport}.
 */
export interface FetchStreamTransportOptions {
  /**
   * `fetch` implementation.
   * @default globalThis.fetch
   */
  fetch?: FetchLike

  /**
   * Enable debug logging.
   * @default false
   */
  debug?: DebugOption
}

const EVENT_STREAM = 'text/event-stream'

// =============================================================================
// FetchStreamTransport
// =============================================================================

/**
 * `fetch`-based transport.
 *
 * @example
 * ```typescript
 * const transport = new FetchStreamTransport()
 * const controller = new AbortController()
 * const body = await transport.open({
 *   url: 'https://example-db.example.com/scores.json',
 *   headers: { Accept: 'text/event-stream' },
 *   signal: controller.signal,
 * })
 * for await (const chunk of body) {
 *   decoder.push(chunk)
 * }
 * ```
 */
export class FetchStreamTransport implements StreamTransport {
  private readonly fetchImpl: FetchLike
  private readonly log: DebugLogger

  constructor(options: FetchStreamTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
    this.log = createDebugLogger('FetchStreamTransport', options.debug)
  }

  async open(request: StreamRequest): Promise<AsyncIterable<Uint8Array>> {
    const headers: Record<string, string> = { Accept: EVENT_STREAM, ...request.headers }

    if (request.signal.aborted) {
      throw new ConnectionError('Request aborted before it was sent')
    }

    this.log('Opening stream', { url: redactUrl(request.url) })

    let response: StreamResponse
    try {
      response = await this.fetchImpl(request.url, {
        method: 'GET',
        headers,
        signal: request.signal,
      })
    } catch (error) {
      throw new ConnectionError(
        `Failed to open stream: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined }
      )
    }

    if (!response.ok) {
      this.log('Stream rejected', { status: response.status })
      await discardBody(response)
      throw new HttpStatusError(response.status, response.statusText, redactUrl(request.url))
    }

    const contentType = response.headers.get('content-type') ?? ''
    if (!contentType.toLowerCase().startsWith(EVENT_STREAM)) {
      await discardBody(response)
      throw new ProtocolViolationError(
        `Expected an ${EVENT_STREAM} response, got '${contentType || 'no content type'}'`
      )
    }

    if (response.body === null) {
      throw new ConnectionError('Stream response has no body')
    }

    this.log('Stream open', { status: response.status })
    return readBody(response.body, request.signal)
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function* readBody(
  body: NonNullable<StreamResponse['body']>,
  signal: AbortSignal
): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader()
  let finished = false
  try {
    while (true) {
      let result: { done: boolean; value?: Uint8Array }
      try {
        result = await reader.read()
      } catch (error) {
        if (signal.aborted) {
          finished = true
          return
        }
        throw new ConnectionError(
          `Stream read failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error instanceof Error ? error : undefined }
        )
      }

      if (result.done) {
        finished = true
        return
      }
      if (result.value !== undefined && result.value.byteLength > 0) {
        yield result.value
      }
    }
  } finally {
    if (!finished) {
      await cancelQuietly(reader)
    }
  }
}

/**
 * Cancels a reader whose stream may already be errored; the cancellation
 * outcome carries no information for the caller.
 */
async function cancelQuietly(reader: { cancel(reason?: unknown): Promise<void> }): Promise<void> {
  await reader.cancel().then(
    () => undefined,
    () => undefined
  )
}

async function discardBody(response: StreamResponse): Promise<void> {
  if (response.body) {
    await cancelQuietly(response.body.getReader())
  }
}

/**
 * Removes the `auth` query parameter from URLs that end up in logs and
 * error messages.
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&]auth=)[^&]*/, '$1<redacted>')
}

/**
 * Builds `{endpoint}/{path}.json?{parameters}`.
 *
 * @example
 * ```typescript
 * buildStreamUrl('https://example-db.example.com/', Path.parse('/scores'), { orderBy: '"$key"' })
 * // 'https://example-db.example.com/scores.json?orderBy=%22%24key%22'
 * ```
 */
export function buildStreamUrl(
  endpoint: string,
  path: { toUrlPath(): string },
  parameters: Record<string, string> = {}
): string {
  const base = endpoint.replace(/\/+$/, '')
  const search = new URLSearchParams(parameters).toString()
  const url = `${base}/${path.toUrlPath()}.json`
  return search === '' ? url : `${url}?${search}`
}
