/**
 * Shared test utilities: loopback servers and connection doubles.
 */

import * as net from 'node:net';
import type { ConnectionInfo, KeepAliveCapable, RpcConnection } from '../src/core/transport-api.js';

export interface TestServer {
  server: net.Server;
  port: number;
  address: string;
  sockets: Set<net.Socket>;
  close(): Promise<void>;
}

/** Start a TCP server on 127.0.0.1 with an ephemeral port. */
export async function listenTcp(onConnection: (socket: net.Socket) => void): Promise<TestServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => sockets.delete(socket));
    onConnection(socket);
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  if (addr === null || typeof addr === 'string') {
    throw new Error('expected a TCP address');
  }

  return {
    server,
    port: addr.port,
    address: `127.0.0.1:${addr.port}`,
    sockets,
    close: () => new Promise<void>((resolve) => {
      for (const socket of sockets) socket.destroy();
      server.close(() => resolve());
    }),
  };
}

/** A port that nothing listens on. */
export async function unusedPort(): Promise<number> {
  const { port, close } = await listenTcp(() => {});
  await close();
  return port;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until the predicate holds, or fail after timeoutMs. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (!predicate()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await sleep(5);
  }
}

/** Forwards everything to an inner connection. */
export class DelegatingConnection implements RpcConnection {
  constructor(readonly inner: RpcConnection) {}

  write(data: Uint8Array): void { this.inner.write(data); }
  onData(handler: (chunk: Uint8Array) => void): void { this.inner.onData(handler); }
  onError(handler: (error: Error) => void): void { this.inner.onError(handler); }
  onClose(handler: () => void): void { this.inner.onClose(handler); }
  close(): void { this.inner.close(); }
  setDeadline(deadline: Date | null): void { this.inner.setDeadline(deadline); }
  get connected(): boolean { return this.inner.connected; }
  get info(): ConnectionInfo { return this.inner.info; }
}

/** Records keep-alive calls instead of touching a socket. */
export class KeepAliveProbe extends DelegatingConnection implements KeepAliveCapable {
  calls: Array<[boolean, number]> = [];
  failWith: Error | null = null;

  setKeepAlive(enable: boolean, periodMs: number): void {
    if (this.failWith) throw this.failWith;
    this.calls.push([enable, periodMs]);
  }
}
