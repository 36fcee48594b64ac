/**
 * Heartbeat frames.
 *
 * The body is a CBOR map `{ seq, sentAt }`; the frame header repeats seq
 * so a peer can answer without decoding the body.
 */

import { decode, encode } from 'cborg';
import { MessageType } from '../core/types.js';
import { encodeFrame } from '../core/wire.js';

export interface HeartbeatBody {
  seq: number;
  sentAt: number;
}

export function encodeHeartbeat(seq: number, sentAt: number = Date.now()): Uint8Array {
  const payload = encode({ seq, sentAt });
  return encodeFrame(MessageType.HEARTBEAT, payload, BigInt(seq));
}

export function decodeHeartbeat(payload: Uint8Array): HeartbeatBody {
  const value: unknown = decode(payload);
  if (typeof value !== 'object' || value === null || !('seq' in value) || !('sentAt' in value)) {
    throw new Error('Invalid heartbeat payload');
  }
  const { seq, sentAt } = value;
  if (typeof seq !== 'number' || typeof sentAt !== 'number') {
    throw new Error('Invalid heartbeat payload');
  }
  return { seq, sentAt };
}
