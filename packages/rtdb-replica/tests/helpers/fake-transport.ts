/**
 * In-process stand-in for the streaming transport.
 *
 * Every `open()` creates a {@link FakeConnection} the test drives by hand:
 * push text or frames, end the stream, or fail it. Connections honor the
 * request's abort signal the way a real `fetch` body does: aborting ends the
 * byte iterable.
 */

import type { StreamRequest, StreamTransport } from '../../src/stream/transport.js'

const encoder = new TextEncoder()

export class FakeConnection {
  readonly request: StreamRequest
  private readonly queue: Uint8Array[] = []
  private ended = false
  private failure: Error | undefined
  private wake: (() => void) | undefined

  constructor(request: StreamRequest) {
    this.request = request
    request.signal.addEventListener('abort', () => this.notify(), { once: true })
  }

  get aborted(): boolean {
    return this.request.signal.aborted
  }

  /** Pushes raw text (or bytes) as one chunk */
  push(chunk: string | Uint8Array): void {
    this.queue.push(typeof chunk === 'string' ? encoder.encode(chunk) : chunk)
    this.notify()
  }

  /** Pushes one complete frame */
  send(event: string, data: unknown): void {
    this.push(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`)
  }

  /** Server closes the stream */
  end(): void {
    this.ended = true
    this.notify()
  }

  /** The stream breaks with an I/O error */
  fail(error: Error): void {
    this.failure = error
    this.notify()
  }

  async *body(): AsyncGenerator<Uint8Array, void, undefined> {
    while (true) {
      if (this.aborted) {
        return
      }
      const chunk = this.queue.shift()
      if (chunk !== undefined) {
        yield chunk
        continue
      }
      if (this.failure) {
        throw this.failure
      }
      if (this.ended) {
        return
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve
      })
    }
  }

  private notify(): void {
    const wake = this.wake
    this.wake = undefined
    wake?.()
  }
}

export class FakeTransport implements StreamTransport {
  readonly connections: FakeConnection[] = []
  private readonly openErrors: Error[] = []
  private waiters: Array<{ index: number; resolve: (connection: FakeConnection) => void }> = []

  /** Makes the next `open()` calls reject, in order */
  rejectNext(...errors: Error[]): void {
    this.openErrors.push(...errors)
  }

  private rejectedCalls = 0

  get openCalls(): number {
    return this.connections.length + this.rejectedCalls
  }

  async open(request: StreamRequest): Promise<AsyncIterable<Uint8Array>> {
    const error = this.openErrors.shift()
    if (error) {
      this.rejectedCalls++
      throw error
    }

    const connection = new FakeConnection(request)
    this.connections.push(connection)
    const index = this.connections.length - 1
    this.waiters = this.waiters.filter((waiter) => {
      if (waiter.index === index) {
        waiter.resolve(connection)
        return false
      }
      return true
    })
    return connection.body()
  }

  /**
   * Resolves with the connection opened by the `index`-th successful
   * `open()` (0-based), waiting for it if needed.
   */
  connection(index: number): Promise<FakeConnection> {
    const existing = this.connections[index]
    if (existing) {
      return Promise.resolve(existing)
    }
    return new Promise((resolve) => {
      this.waiters.push({ index, resolve })
    })
  }
}

/**
 * Reads up to `count` events from an async iterator, or until it ends.
 */
export async function take<T>(iterator: AsyncIterator<T>, count: number): Promise<T[]> {
  const items: T[] = []
  while (items.length < count) {
    const result = await iterator.next()
    if (result.done) {
      break
    }
    items.push(result.value)
  }
  return items
}

/**
 * Reads until the iterator ends.
 */
export async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of iterable) {
    items.push(item)
  }
  return items
}
