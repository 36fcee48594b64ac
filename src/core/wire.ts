/**
 * Wire format: 16-byte binary frame header + opaque payload.
 *
 * ┌─────────┬─────────┬────────┬─────────────┬──────────────┬──────────────┐
 * │ magic   │ version │ type   │ length      │ seq          │ payload      │
 * │ 2 bytes │ 1 byte  │ 1 byte │ 4 bytes LE  │ 8 bytes LE   │ variable     │
 * └─────────┴─────────┴────────┴─────────────┴──────────────┴──────────────┘
 *
 * - seq: 64-bit counter chosen by the sender. Responses echo the seq of
 *   the request they answer; heartbeats carry their own counter.
 */

import { MAGIC, PROTOCOL_VERSION, type Frame, type FrameHeader, type MessageType } from './types.js';

export const HEADER_SIZE = 16;

/** Encode a frame header into a buffer. */
export function encodeHeader(type: MessageType, payloadLength: number, seq: bigint = 0n): Uint8Array {
  const buf = new Uint8Array(HEADER_SIZE);
  const view = new DataView(buf.buffer);

  // Magic bytes (big-endian, so 'R' = 0x52, 'C' = 0x43)
  view.setUint16(0, MAGIC, false);
  view.setUint8(2, PROTOCOL_VERSION);
  view.setUint8(3, type);
  view.setUint32(4, payloadLength, true);
  view.setBigUint64(8, seq, true);

  return buf;
}

/** Decode a frame header from bytes. Returns null if magic doesn't match. */
export function decodeHeader(data: Uint8Array): FrameHeader | null {
  if (data.length < HEADER_SIZE) return null;

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const magic = view.getUint16(0, false);

  if (magic !== MAGIC) return null;

  return {
    magic,
    version: view.getUint8(2),
    type: view.getUint8(3),
    length: view.getUint32(4, true),
    seq: view.getBigUint64(8, true),
  };
}

/** Combine a header and payload into a complete frame. */
export function encodeFrame(type: MessageType, payload: Uint8Array, seq: bigint = 0n): Uint8Array {
  const header = encodeHeader(type, payload.length, seq);
  const frame = new Uint8Array(HEADER_SIZE + payload.length);
  frame.set(header, 0);
  frame.set(payload, HEADER_SIZE);
  return frame;
}

/**
 * Stream parser for reading frames from a byte stream.
 * Handles partial reads and buffering.
 */
export class FrameReader {
  private buffer: Uint8Array = new Uint8Array(0);

  /** Feed bytes into the reader. Returns any complete frames. */
  feed(data: Uint8Array): Frame[] {
    const combined = new Uint8Array(this.buffer.length + data.length);
    combined.set(this.buffer, 0);
    combined.set(data, this.buffer.length);
    this.buffer = combined;

    const frames: Frame[] = [];

    while (this.buffer.length >= HEADER_SIZE) {
      const header = decodeHeader(this.buffer);
      if (!header) {
        // Bad magic — skip one byte and try again
        this.buffer = this.buffer.slice(1);
        continue;
      }

      const totalSize = HEADER_SIZE + header.length;
      if (this.buffer.length < totalSize) break;

      const payload = this.buffer.slice(HEADER_SIZE, totalSize);
      frames.push({ header, payload });
      this.buffer = this.buffer.slice(totalSize);
    }

    return frames;
  }

  /** How many bytes are buffered but not yet forming a complete frame. */
  get pendingBytes(): number {
    return this.buffer.length;
  }
}
