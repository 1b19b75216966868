/**
 * @file Stream Frame Decoder
 *
 * Incremental parser for the push-event wire format. Bytes are fed in as
 * they arrive, in chunks of any size; complete frames come out.
 *
 * Wire format:
 * - a frame is a run of lines terminated by a blank line
 * - `event: <name>` sets the event name, `data: <json>` adds a data line
 *   (several data lines are joined with `\n`), `id: <id>` sets the id
 * - lines starting with `:` are comments (keep-alive padding); other fields
 *   are ignored
 * - lines end in LF, CR or CRLF
 *
 * A decoder holds the state of one connection. Create a new one for every
 * connection attempt.
 *
 * @example
 * ```typescript
 * const decoder = new FrameDecoder()
 * for await (const chunk of body) {
 *   for (const frame of decoder.push(chunk)) {
 *     console.log(frame.event, frame.data)
 *   }
 * }
 * ```
 *
 * @module rtdb-replica/stream/frame-decoder
 */

import { MalformedFrameError } from '../errors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * One decoded frame.
 */
export interface Frame {
  /** Event name; `message` when the frame had no `event:` line */
  readonly event: string
  /** Parsed JSON of the data lines, `null` when there were none */
  readonly data: unknown
  /** Value of the last `id:` line, if any */
  readonly id?: string
}

const DEFAULT_EVENT = 'message'

// =============================================================================
// FrameDecoder
// =============================================================================

export class FrameDecoder {
  private readonly textDecoder = new TextDecoder('utf-8', { fatal: true })

  /** Text of the line being accumulated */
  private partialLine = ''

  /** The previous chunk ended in CR; a leading LF in the next one belongs to it */
  private pendingCr = false

  private eventName: string | undefined
  private dataLines: string[] = []
  private lastId: string | undefined
  private ended = false

  /**
   * Feeds bytes into the decoder.
   *
   * @returns The frames completed by this chunk, in order
   * @throws MalformedFrameError on invalid UTF-8, or on invalid JSON in a
   *   completed frame
   */
  push(chunk: Uint8Array): Frame[] {
    return Array.from(this.feed(chunk))
  }

  /**
   * Lazy form of {@link push}: frames are parsed as the result is iterated,
   * so the frames before a malformed one are yielded before the error is
   * thrown. Iterate the result to completion before feeding the next chunk.
   */
  feed(chunk: Uint8Array): Generator<Frame, void, undefined> {
    if (this.ended) {
      throw new Error('FrameDecoder.feed() called after end()')
    }
    return this.consume(this.decode(chunk, true))
  }

  /**
   * Signals the end of the byte stream. An unterminated trailing frame is
   * discarded, as the wire format requires.
   *
   * @throws MalformedFrameError if the stream ends inside a UTF-8 sequence
   */
  end(): void {
    if (this.ended) {
      return
    }
    this.ended = true
    this.partialLine = ''
    this.resetFrame()
    this.decode(new Uint8Array(0), false)
  }

  private decode(chunk: Uint8Array, stream: boolean): string {
    try {
      return this.textDecoder.decode(chunk, { stream })
    } catch (error) {
      throw new MalformedFrameError('Stream is not valid UTF-8', {
        event: this.eventName,
        cause: error instanceof Error ? error : undefined,
      })
    }
  }

  private *consume(text: string): Generator<Frame, void, undefined> {
    let start = 0

    if (this.pendingCr && text.startsWith('\n')) {
      start = 1
    }
    if (text.length > 0) {
      this.pendingCr = false
    }

    for (let i = start; i < text.length; i++) {
      const char = text[i]
      if (char !== '\n' && char !== '\r') {
        continue
      }

      const line = this.partialLine + text.slice(start, i)
      this.partialLine = ''

      if (char === '\r') {
        if (i + 1 < text.length) {
          if (text[i + 1] === '\n') {
            i++
          }
        } else {
          this.pendingCr = true
        }
      }
      start = i + 1

      const frame = this.processLine(line)
      if (frame) {
        yield frame
      }
    }

    this.partialLine += text.slice(start)
  }

  private processLine(line: string): Frame | undefined {
    if (line === '') {
      return this.dispatch()
    }
    if (line.startsWith(':')) {
      return undefined
    }

    const colon = line.indexOf(':')
    const field = colon === -1 ? line : line.slice(0, colon)
    let value = colon === -1 ? '' : line.slice(colon + 1)
    if (value.startsWith(' ')) {
      value = value.slice(1)
    }

    switch (field) {
      case 'event':
        this.eventName = value
        break
      case 'data':
        this.dataLines.push(value)
        break
      case 'id':
        this.lastId = value
        break
      default:
        break
    }
    return undefined
  }

  private dispatch(): Frame | undefined {
    if (this.eventName === undefined && this.dataLines.length === 0) {
      return undefined
    }

    const event = this.eventName ?? DEFAULT_EVENT
    const raw = this.dataLines.join('\n')
    const hasData = this.dataLines.length > 0
    this.resetFrame()

    let data: unknown = null
    if (hasData && raw.trim() !== '') {
      try {
        data = JSON.parse(raw)
      } catch (error) {
        throw new MalformedFrameError(`Frame '${event}' carries invalid JSON`, {
          event,
          raw,
          cause: error instanceof Error ? error : undefined,
        })
      }
    }

    return this.lastId === undefined ? { event, data } : { event, data, id: this.lastId }
  }

  private resetFrame(): void {
    this.eventName = undefined
    this.dataLines = []
  }
}

// =============================================================================
// Async Adapter
// =============================================================================

/**
 * Decodes an async byte stream into an async stream of frames, using a fresh
 * decoder.
 *
 * @example
 * ```typescript
 * for await (const frame of decodeFrames(body)) {
 *   handle(frame)
 * }
 * ```
 */
export async function* decodeFrames(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<Frame, void, undefined> {
  const decoder = new FrameDecoder()
  for await (const chunk of chunks) {
    yield* decoder.feed(chunk)
  }
  decoder.end()
}
