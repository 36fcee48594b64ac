/**
 * RpcConnection backed by a Node duplex stream: a net.Socket, a
 * tls.TLSSocket, or a WebSocket wrapped with createWebSocketStream.
 */

import type * as net from 'node:net';
import type { Duplex } from 'node:stream';
import { DeadlineTimer } from '../core/deadline.js';
import type { ConnectionInfo, KeepAliveCapable, RpcConnection } from '../core/transport-api.js';

export class StreamConnection implements RpcConnection {
  private dataHandlers: Array<(chunk: Uint8Array) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];
  private closeHandlers: Array<() => void> = [];
  private readonly deadline: DeadlineTimer;
  private _connected = true;

  readonly info: ConnectionInfo;

  constructor(
    private readonly stream: Duplex,
    network: string,
    remoteAddress: string,
  ) {
    this.info = {
      network,
      remoteAddress,
      connectedAt: Date.now(),
    };

    this.deadline = new DeadlineTimer((error) => {
      this.stream.destroy(error);
    });

    stream.on('error', (err: Error) => {
      for (const handler of this.errorHandlers) {
        handler(err);
      }
    });

    stream.on('close', () => {
      this._connected = false;
      this.deadline.clear();
      for (const handler of this.closeHandlers) {
        handler();
      }
    });
  }

  get connected(): boolean {
    return this._connected && !this.stream.destroyed;
  }

  write(data: Uint8Array): void {
    if (!this.connected) {
      throw new Error('Connection is closed');
    }
    this.stream.write(data);
  }

  onData(handler: (chunk: Uint8Array) => void): void {
    this.dataHandlers.push(handler);
    if (this.dataHandlers.length > 1) return;

    // Start reading only once someone listens; until then bytes stay in
    // the stream's buffer (including anything unshifted by a handshake).
    this.stream.on('data', (chunk: Uint8Array) => {
      for (const h of this.dataHandlers) {
        h(chunk);
      }
    });
    this.stream.resume();
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
    this.stream.destroy();
  }

  setDeadline(deadline: Date | null): void {
    this.deadline.set(deadline);
  }
}

/** A plain (unencrypted) TCP socket; the only kind that takes keep-alive settings. */
export class TcpConnection extends StreamConnection implements KeepAliveCapable {
  constructor(
    private readonly socket: net.Socket,
    network: string,
    remoteAddress: string,
  ) {
    super(socket, network, remoteAddress);
  }

  setKeepAlive(enable: boolean, periodMs: number): void {
    this.socket.setKeepAlive(enable, periodMs);
  }
}
