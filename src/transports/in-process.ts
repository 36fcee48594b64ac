/**
 * In-process transport — direct memory transfer, no sockets.
 *
 * Registered as `memu`. A MemoryNetwork maps addresses to listeners in the
 * same process; dialing an address creates a connection pair and hands the
 * far end to the listener. Used for tests and for embedding a server and
 * client in one process.
 */

import type { Client } from '../client/client.js';
import { DeadlineTimer } from '../core/deadline.js';
import { DialError } from '../core/errors.js';
import type { ConnectionInfo, RpcConnection } from '../core/transport-api.js';

// ── In-Process Connection Pair ───────────────────────────────────

class MemoryConnection implements RpcConnection {
  private dataHandlers: Array<(chunk: Uint8Array) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];
  private closeHandlers: Array<() => void> = [];
  private pending: Uint8Array[] = [];
  private readonly deadline: DeadlineTimer;
  private _connected = true;

  /** The other end of this connection. Set after construction. */
  peer: MemoryConnection | null = null;

  readonly info: ConnectionInfo;

  constructor(network: string, label: string) {
    this.info = {
      network,
      remoteAddress: label,
      connectedAt: Date.now(),
    };
    this.deadline = new DeadlineTimer((error) => {
      for (const handler of this.errorHandlers) {
        handler(error);
      }
      this.close();
    });
  }

  get connected(): boolean {
    return this._connected;
  }

  write(data: Uint8Array): void {
    if (!this._connected) throw new Error('Connection is closed');
    if (!this.peer?._connected) throw new Error('Peer connection is closed');

    // Copy so the caller may reuse its buffer
    this.peer.deliver(data.slice());
  }

  private deliver(chunk: Uint8Array): void {
    if (this.dataHandlers.length === 0) {
      this.pending.push(chunk);
      return;
    }
    for (const handler of this.dataHandlers) {
      handler(chunk);
    }
  }

  onData(handler: (chunk: Uint8Array) => void): void {
    this.dataHandlers.push(handler);
    if (this.dataHandlers.length === 1 && this.pending.length > 0) {
      const queued = this.pending;
      this.pending = [];
      for (const chunk of queued) {
        handler(chunk);
      }
    }
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  onClose(handler: () => void): void {
    this.closeHandlers.push(handler);
  }

  close(): void {
    if (!this._connected) return;
    this._connected = false;
    this.deadline.clear();
    for (const handler of this.closeHandlers) {
      handler();
    }
    // Close peer too
    if (this.peer?._connected) {
      this.peer.close();
    }
  }

  setDeadline(deadline: Date | null): void {
    this.deadline.set(deadline);
  }
}

/**
 * Create a connected pair of in-process connections.
 *
 * Bytes written on one end are delivered synchronously to the other.
 */
export function createConnectionPair(
  network = 'memu',
  address = 'in-process',
): [RpcConnection, RpcConnection] {
  const clientSide = new MemoryConnection(network, `${address} (server)`);
  const serverSide = new MemoryConnection(network, `${address} (client)`);
  clientSide.peer = serverSide;
  serverSide.peer = clientSide;
  return [clientSide, serverSide];
}

// ── Network ──────────────────────────────────────────────────────

/**
 * Address space for in-process connections. Each listener receives the
 * server end of every connection dialed to its address.
 */
export class MemoryNetwork {
  private listeners = new Map<string, (conn: RpcConnection) => void>();

  /** Accept connections on an address. Returns a function that stops listening. */
  listen(address: string, onConnection: (conn: RpcConnection) => void): () => void {
    this.listeners.set(address, onConnection);
    return () => {
      if (this.listeners.get(address) === onConnection) {
        this.listeners.delete(address);
      }
    };
  }

  /** Connector for this network; rejects when nothing listens on the address. */
  readonly dial = async (
    _client: Client | undefined,
    network: string,
    address: string,
  ): Promise<RpcConnection> => {
    const accept = this.listeners.get(address);
    if (!accept) {
      throw new DialError(network, address, new Error('connection refused'));
    }
    const [clientSide, serverSide] = createConnectionPair(network, address);
    accept(serverSide);
    return clientSide;
  };
}
