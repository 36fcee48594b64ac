/**
 * Shared wire constants and frame types.
 *
 * The connection layer only needs enough of the framing to run the
 * background reader and the heartbeat writer; request/response bodies are
 * opaque here and belong to the codec layer above.
 */

// ── Wire format constants ──────────────────────────────────────────

export const MAGIC = 0x5243; // ASCII 'RC'
export const PROTOCOL_VERSION = 1;

export enum MessageType {
  REQUEST = 0x01,
  RESPONSE = 0x02,
  HEARTBEAT = 0x03,
}

export interface FrameHeader {
  magic: number;
  version: number;
  type: MessageType;
  length: number; // payload size in bytes (LE u32)
  seq: bigint;
}

export interface Frame {
  header: FrameHeader;
  payload: Uint8Array;
}

// ── Transport constants ────────────────────────────────────────────

/** Path used for HTTP tunnels and WebSocket upgrades when none is configured. */
export const DEFAULT_RPC_PATH = '/_rpcx_';

/** Status line the server must send back to accept an HTTP CONNECT tunnel. */
export const TUNNEL_CONNECTED_STATUS = '200 Connected to rpcx';
