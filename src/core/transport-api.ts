/**
 * Transport API — the connection contract every connector produces.
 *
 * A connector dials one kind of transport and hands back an RpcConnection:
 * a duplex byte stream with no message framing of its own. Framing,
 * request multiplexing and payload encoding happen above this layer.
 *
 * Architecture:
 *   Client.connect(network, address)
 *     → connector (http tunnel | websocket | registry entry | direct)
 *     → post-connect policy (keep-alive, deadline, plugins)
 *     → reader task + optional heartbeat task
 */

import type { Client } from '../client/client.js';

// ── Connection ───────────────────────────────────────────────────

/**
 * A live duplex byte stream to a remote peer.
 *
 * Bytes that arrive before the first onData handler is registered are
 * held and delivered to that handler, so a connector may hand over a
 * stream that already has data queued behind a handshake.
 */
export interface RpcConnection {
  /** Write bytes to the peer. Throws if the connection is closed. */
  write(data: Uint8Array): void;

  /** Register handler for inbound bytes. */
  onData(handler: (chunk: Uint8Array) => void): void;

  /** Register handler for connection errors (including deadline expiry). */
  onError(handler: (error: Error) => void): void;

  /** Register handler for connection close. */
  onClose(handler: () => void): void;

  /** Close the connection. */
  close(): void;

  /**
   * Set an absolute deadline. When it passes, the connection fails with a
   * DeadlineExceededError and is destroyed. `null` clears the deadline.
   */
  setDeadline(deadline: Date | null): void;

  /** Whether the connection is currently open. */
  readonly connected: boolean;

  /** Metadata about this connection. */
  readonly info: ConnectionInfo;
}

export interface ConnectionInfo {
  /** The transport name the connection was dialed with. */
  network: string;
  /** Human-readable description of the remote endpoint. */
  remoteAddress: string;
  /** When the connection was established. */
  connectedAt: number;
}

// ── Capabilities ─────────────────────────────────────────────────

/** Exposed by connections backed by a plain TCP socket. */
export interface KeepAliveCapable {
  setKeepAlive(enable: boolean, periodMs: number): void;
}

export function supportsKeepAlive(conn: RpcConnection): conn is RpcConnection & KeepAliveCapable {
  return 'setKeepAlive' in conn && typeof conn.setKeepAlive === 'function';
}

// ── Connector ────────────────────────────────────────────────────

/**
 * Dials one transport. `client` supplies the connect options; connectors
 * that cannot work without one reject with InvalidArgumentError.
 */
export type ConnectorFn = (
  client: Client | undefined,
  network: string,
  address: string,
) => Promise<RpcConnection>;

// ── TLS ──────────────────────────────────────────────────────────

export interface TlsOptions {
  cert?: string;       // path to certificate file
  key?: string;        // path to private key file
  ca?: string;         // path to CA certificate file
  servername?: string; // SNI / verification name, defaults to the dialed host
  insecure?: boolean;  // skip certificate verification
}
