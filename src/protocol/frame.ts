import b4a from 'b4a'
import { TransportError } from '../errors.js'
import type { Frame, DataFrame, TextFrame } from './types.js'

// Wire layout: [kind:u8][length:u32be][payload:length]
export const HEADER_SIZE = 5
export const KIND_TEXT = 0x01
export const KIND_DATA = 0x02

export const MAX_TEXT_PAYLOAD = 4096
export const CHUNK_SIZE = 8192

const EMPTY = b4a.alloc(0)

function encode(kind: number, payload: Uint8Array): Buffer {
  const frame = b4a.allocUnsafe(HEADER_SIZE + payload.byteLength)
  frame[0] = kind
  frame.writeUInt32BE(payload.byteLength, 1)
  frame.set(payload, HEADER_SIZE)
  return frame
}

export function textFrame(text: string): TextFrame {
  return { kind: 'text', text }
}

export function dataFrame(data: Uint8Array): DataFrame {
  return { kind: 'data', data: b4a.isBuffer(data) ? data : b4a.from(data) }
}

export function encodeFrame(frame: Frame): Buffer {
  if (frame.kind === 'text') {
    const payload = b4a.from(frame.text, 'utf8')
    if (payload.byteLength > MAX_TEXT_PAYLOAD) {
      throw new RangeError(`Text frame exceeds ${MAX_TEXT_PAYLOAD} bytes`)
    }
    return encode(KIND_TEXT, payload)
  }
  if (frame.data.byteLength > CHUNK_SIZE) {
    throw new RangeError(`Data frame exceeds ${CHUNK_SIZE} bytes`)
  }
  return encode(KIND_DATA, frame.data)
}

/**
 * Incremental frame decoder. Bytes may arrive split or coalesced in any way;
 * push() returns every frame completed by the new bytes and keeps the rest.
 * Unknown kinds and oversized payloads throw a TransportError since the
 * stream cannot be trusted after that point.
 */
export class FrameDecoder {
  private buffer: Buffer = EMPTY

  push(chunk: Uint8Array): Frame[] {
    this.buffer = this.buffer.byteLength === 0 ? b4a.from(chunk) : b4a.concat([this.buffer, chunk])

    const frames: Frame[] = []
    while (this.buffer.byteLength >= HEADER_SIZE) {
      const kind = this.buffer[0]
      const length = this.buffer.readUInt32BE(1)

      if (kind === KIND_TEXT) {
        if (length > MAX_TEXT_PAYLOAD) {
          throw new TransportError(`Text frame of ${length} bytes exceeds ${MAX_TEXT_PAYLOAD}`)
        }
      } else if (kind === KIND_DATA) {
        if (length > CHUNK_SIZE) {
          throw new TransportError(`Data frame of ${length} bytes exceeds ${CHUNK_SIZE}`)
        }
      } else {
        throw new TransportError(`Unknown frame kind 0x${kind.toString(16).padStart(2, '0')}`)
      }

      const end = HEADER_SIZE + length
      if (this.buffer.byteLength < end) break

      const payload = this.buffer.subarray(HEADER_SIZE, end)
      if (kind === KIND_TEXT) {
        frames.push(textFrame(b4a.toString(payload, 'utf8')))
      } else {
        // Copy so the frame does not pin the whole receive buffer
        frames.push({ kind: 'data', data: b4a.from(payload) })
      }
      this.buffer = this.buffer.subarray(end)
    }

    if (this.buffer.byteLength === 0) this.buffer = EMPTY
    return frames
  }

  get pendingBytes(): number {
    return this.buffer.byteLength
  }
}
