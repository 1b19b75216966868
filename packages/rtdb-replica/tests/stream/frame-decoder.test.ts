/**
 * Stream Frame Decoder Tests
 *
 * Frame assembly from the wire format, line-ending handling, malformed
 * input, and the property that splitting the byte stream at any point
 * yields the same frames.
 */

import { describe, it, expect } from 'vitest'
import { FrameDecoder, decodeFrames } from '../../src/stream/frame-decoder.js'
import type { Frame } from '../../src/stream/frame-decoder.js'
import { MalformedFrameError } from '../../src/errors.js'

const encoder = new TextEncoder()
const bytes = (text: string): Uint8Array => encoder.encode(text)

function decodeAll(text: string): Frame[] {
  const decoder = new FrameDecoder()
  const frames = decoder.push(bytes(text))
  decoder.end()
  return frames
}

async function* chunked(...chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield chunk
  }
}

describe('FrameDecoder', () => {
  describe('frames', () => {
    it('should decode a put frame', () => {
      const frames = decodeAll('event: put\ndata: {"path":"/","data":{"a":1}}\n\n')
      expect(frames).toEqual([{ event: 'put', data: { path: '/', data: { a: 1 } } }])
    })

    it('should decode several frames from one chunk', () => {
      const frames = decodeAll(
        'event: put\ndata: {"path":"/","data":1}\n\nevent: keep-alive\ndata: null\n\n'
      )
      expect(frames).toEqual([
        { event: 'put', data: { path: '/', data: 1 } },
        { event: 'keep-alive', data: null },
      ])
    })

    it('should join multiple data lines with a newline', () => {
      const frames = decodeAll('event: patch\ndata: {"path":"/",\ndata: "data":{"b":2}}\n\n')
      expect(frames).toEqual([{ event: 'patch', data: { path: '/', data: { b: 2 } } }])
    })

    it('should default the event name to message', () => {
      expect(decodeAll('data: 5\n\n')).toEqual([{ event: 'message', data: 5 }])
    })

    it('should yield null data for a frame without data lines', () => {
      expect(decodeAll('event: keep-alive\n\n')).toEqual([{ event: 'keep-alive', data: null }])
    })

    it('should accept fields without the space after the colon', () => {
      expect(decodeAll('event:put\ndata:{"path":"/","data":2}\n\n')).toEqual([
        { event: 'put', data: { path: '/', data: 2 } },
      ])
    })

    it('should carry the last id', () => {
      expect(decodeAll('id: 7\nevent: put\ndata: 1\n\n')).toEqual([{ event: 'put', data: 1, id: '7' }])
    })

    it('should ignore comments and unknown fields', () => {
      expect(decodeAll(': padding\nretry: 100\nevent: put\ndata: 1\n\n')).toEqual([{ event: 'put', data: 1 }])
    })

    it('should ignore blank lines between frames', () => {
      expect(decodeAll('\n\n\nevent: put\ndata: 1\n\n\n')).toEqual([{ event: 'put', data: 1 }])
    })
  })

  describe('line endings', () => {
    it('should accept CRLF', () => {
      expect(decodeAll('event: put\r\ndata: 1\r\n\r\n')).toEqual([{ event: 'put', data: 1 }])
    })

    it('should accept bare CR', () => {
      expect(decodeAll('event: put\rdata: 1\r\r')).toEqual([{ event: 'put', data: 1 }])
    })

    it('should treat a CRLF split across chunks as one line ending', () => {
      const decoder = new FrameDecoder()
      const frames = [
        ...decoder.push(bytes('event: put\r')),
        ...decoder.push(bytes('\ndata: 1\r')),
        ...decoder.push(bytes('\n\r')),
        ...decoder.push(bytes('\n')),
      ]
      expect(frames).toEqual([{ event: 'put', data: 1 }])
    })
  })

  describe('chunking', () => {
    it('should hold partial frames until the blank line arrives', () => {
      const decoder = new FrameDecoder()
      expect(decoder.push(bytes('event: pu'))).toEqual([])
      expect(decoder.push(bytes('t\ndata: {"a"'))).toEqual([])
      expect(decoder.push(bytes(':1}\n'))).toEqual([])
      expect(decoder.push(bytes('\n'))).toEqual([{ event: 'put', data: { a: 1 } }])
    })

    it('should produce the same frames for every split point', () => {
      const text =
        'event: put\r\ndata: {"path":"/","data":{"name":"Zoë ✓"}}\r\n\r\n' +
        ': keep\nevent: patch\ndata: {"path":"/x",\ndata: "data":{"y":1}}\n\n' +
        'event: keep-alive\rdata: null\r\r'
      const all = bytes(text)
      const expected = decodeAll(text)
      expect(expected).toHaveLength(3)

      for (let split = 0; split <= all.length; split++) {
        const decoder = new FrameDecoder()
        const frames = [...decoder.push(all.slice(0, split)), ...decoder.push(all.slice(split))]
        decoder.end()
        expect(frames).toEqual(expected)
      }
    })

    it('should decode multi-byte characters split across chunks', () => {
      const all = bytes('data: "é"\n\n')
      const decoder = new FrameDecoder()
      // 'é' is two bytes starting at offset 7
      const frames = [...decoder.push(all.slice(0, 8)), ...decoder.push(all.slice(8))]
      expect(frames).toEqual([{ event: 'message', data: 'é' }])
    })
  })

  describe('malformed input', () => {
    it('should throw MalformedFrameError on invalid JSON', () => {
      const decoder = new FrameDecoder()
      try {
        decoder.push(bytes('event: put\ndata: {nope\n\n'))
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedFrameError)
        if (error instanceof MalformedFrameError) {
          expect(error.event).toBe('put')
          expect(error.raw).toBe('{nope')
          expect(error.message).toBe("Frame 'put' carries invalid JSON")
        }
      }
    })

    it('should throw MalformedFrameError on invalid UTF-8', () => {
      const decoder = new FrameDecoder()
      expect(() => decoder.push(new Uint8Array([0x64, 0xff, 0x0a]))).toThrow(MalformedFrameError)
    })

    it('should throw on end() inside a multi-byte sequence', () => {
      const decoder = new FrameDecoder()
      decoder.push(new Uint8Array([0xc3]))
      expect(() => decoder.end()).toThrow('Stream is not valid UTF-8')
    })

    it('should yield the frames before a malformed one from feed()', () => {
      const decoder = new FrameDecoder()
      const frames: Frame[] = []
      expect(() => {
        for (const frame of decoder.feed(bytes('data: 1\n\ndata: {\n\n'))) {
          frames.push(frame)
        }
      }).toThrow(MalformedFrameError)
      expect(frames).toEqual([{ event: 'message', data: 1 }])
    })
  })

  describe('end', () => {
    it('should discard an unterminated trailing frame', () => {
      const decoder = new FrameDecoder()
      expect(decoder.push(bytes('event: put\ndata: 1\n'))).toEqual([])
      decoder.end()
      expect(() => decoder.push(bytes('\n'))).toThrow('FrameDecoder.feed() called after end()')
    })

    it('should be idempotent', () => {
      const decoder = new FrameDecoder()
      decoder.end()
      expect(() => decoder.end()).not.toThrow()
    })
  })
})

describe('decodeFrames', () => {
  it('should decode an async byte stream', async () => {
    const frames: Frame[] = []
    for await (const frame of decodeFrames(chunked(bytes('event: put\nda'), bytes('ta: 1\n\nevent: x\n\n')))) {
      frames.push(frame)
    }
    expect(frames).toEqual([
      { event: 'put', data: 1 },
      { event: 'x', data: null },
    ])
  })
})
