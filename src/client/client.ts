/**
 * RPC client connection lifecycle.
 *
 * Client.connect(network, address) picks a connector, dials, applies the
 * post-connect policy and, only when all of that succeeded, installs the
 * connection and starts its background tasks:
 *
 *   http      → HTTP CONNECT tunnel
 *   ws, wss   → WebSocket
 *   otherwise → registry entry for the name, else the direct connector
 *
 * A failed connect leaves the client exactly as it was.
 */

import { resolveConnectOption, type ConnectOption } from '../core/connect-option.js';
import { moduleLogger } from '../core/logger.js';
import { PluginContainer, type ClientPlugin } from '../core/plugin.js';
import type { TransportRegistry } from '../core/transport-registry.js';
import { supportsKeepAlive, type ConnectorFn, type RpcConnection } from '../core/transport-api.js';
import type { Frame } from '../core/types.js';
import { dialHttpTunnel } from '../transports/http-tunnel.js';
import { createDefaultRegistry } from '../transports/index.js';
import { dialDirect } from '../transports/net-socket.js';
import { dialWebSocket } from '../transports/websocket.js';
import { HeartbeatTask } from './heartbeat.js';
import { ReaderTask } from './reader.js';

const log = moduleLogger('client');

const DIRECT_NETWORKS = new Set(['tcp', 'tcp4', 'tcp6']);

export interface ClientOptions {
  /** Transport registry. Defaults to createDefaultRegistry(). */
  registry?: TransportRegistry;
  /** Plugins, as a container or a list in hook order. */
  plugins?: PluginContainer | ClientPlugin[];
}

/** Everything tied to one installed connection. */
interface Session {
  conn: RpcConnection;
  abort: AbortController;
  reader: ReaderTask;
  heartbeat: HeartbeatTask | null;
}

export class Client {
  readonly option: ConnectOption;
  readonly registry: TransportRegistry;
  plugins: PluginContainer | undefined;

  private session: Session | null = null;
  private frameHandlers: Array<(frame: Frame) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];

  constructor(option: Partial<ConnectOption> = {}, options: ClientOptions = {}) {
    this.option = resolveConnectOption(option);
    this.registry = options.registry ?? createDefaultRegistry();
    this.plugins = Array.isArray(options.plugins)
      ? new PluginContainer(options.plugins)
      : options.plugins;
  }

  // ── State ────────────────────────────────────────────────────

  /** The active connection, or null before the first successful connect. */
  get conn(): RpcConnection | null {
    return this.session?.conn ?? null;
  }

  get readerRunning(): boolean {
    return this.session?.reader.running ?? false;
  }

  get heartbeatRunning(): boolean {
    return this.session?.heartbeat?.running ?? false;
  }

  /** Register handler for frames decoded by the background reader. */
  onFrame(handler: (frame: Frame) => void): void {
    this.frameHandlers.push(handler);
  }

  /** Register handler for errors from the background tasks. */
  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  // ── Connect ──────────────────────────────────────────────────

  /** Pick the connector for a transport name. */
  connectorFor(network: string): ConnectorFn {
    switch (network) {
      case 'http':
        return dialHttpTunnel;
      case 'ws':
      case 'wss':
        return dialWebSocket;
    }

    const registered = this.registry.get(network);
    if (registered) return registered;

    if (!DIRECT_NETWORKS.has(network)) {
      log.debug({ network }, 'no connector registered, dialing directly');
    }
    return dialDirect;
  }

  async connect(network: string, address: string): Promise<void> {
    let conn = await this.connectorFor(network)(this, network, address);

    if (supportsKeepAlive(conn) && this.option.tcpKeepAlivePeriod > 0) {
      try {
        conn.setKeepAlive(true, this.option.tcpKeepAlivePeriod);
      } catch (err) {
        log.warn({ err, network, address }, 'failed to enable keep-alive');
      }
    }

    if (this.option.idleTimeout !== 0) {
      conn.setDeadline(new Date(Date.now() + this.option.idleTimeout));
    }

    if (this.plugins) {
      const created = conn;
      try {
        conn = await this.plugins.doConnectionCreated(created);
      } catch (err) {
        created.close();
        throw err;
      }
    }

    const previous = this.session;
    this.session = this.startSession(conn);
    log.debug({ network, address, remote: conn.info.remoteAddress }, 'connected');

    if (this.plugins) {
      try {
        await this.plugins.doClientConnected(conn);
      } catch (err) {
        log.warn({ err, network, address }, 'client-connected hook failed');
      }
    }

    if (previous) {
      try {
        await this.endSession(previous);
      } catch (err) {
        log.warn({ err }, 'failed to close replaced connection');
      }
    }
  }

  /** Close the active connection and stop its tasks. Safe to call twice. */
  async close(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;
    await this.endSession(session);
  }

  // ── Sessions ─────────────────────────────────────────────────

  private startSession(conn: RpcConnection): Session {
    const abort = new AbortController();
    conn.onClose(() => abort.abort());

    const reader = new ReaderTask(conn, abort.signal, {
      onFrame: (frame) => this.emitFrame(frame),
      onError: (error) => this.emitError(error),
    });
    reader.start();

    let heartbeat: HeartbeatTask | null = null;
    if (this.option.heartbeat && this.option.heartbeatInterval > 0) {
      heartbeat = new HeartbeatTask(
        conn,
        this.option.heartbeatInterval,
        abort.signal,
        (error) => this.emitError(error),
      );
      heartbeat.start();
    }

    return { conn, abort, reader, heartbeat };
  }

  private async endSession(session: Session): Promise<void> {
    session.abort.abort();
    session.conn.close();
    await this.plugins?.doConnectionClose(session.conn);
  }

  private emitFrame(frame: Frame): void {
    for (const handler of this.frameHandlers) {
      handler(frame);
    }
  }

  private emitError(error: Error): void {
    for (const handler of this.errorHandlers) {
      handler(error);
    }
  }
}
