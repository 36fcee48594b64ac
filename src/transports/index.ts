/**
 * Transport module index — default registry with all built-in transports.
 *
 * Usage:
 *   import { createDefaultRegistry } from './transports/index.js';
 *   const registry = createDefaultRegistry();
 *
 * The default registry includes:
 *   - http: HTTP CONNECT tunnel (Client.connect routes `http` here itself)
 *   - unix: direct connector over a Unix socket path
 *   - memu: in-process MemoryNetwork
 *   - kcp, quic: placeholders until a real connector is registered
 *
 * `ws`/`wss` are always dialed by the WebSocket connector and anything
 * unregistered falls back to the direct connector, so neither needs an
 * entry.
 *
 * To add a custom transport:
 *   registry.register('kcp', dialKcp);
 */

import { TransportRegistry } from '../core/transport-registry.js';
import { dialHttpTunnel } from './http-tunnel.js';
import { MemoryNetwork } from './in-process.js';
import { dialDirect } from './net-socket.js';
import { unsupportedConnector } from './unsupported.js';

export interface DefaultRegistryOptions {
  /** Network backing the `memu` transport. A fresh one is created if omitted. */
  memoryNetwork?: MemoryNetwork;
}

/**
 * Create a registry pre-loaded with all built-in transports.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): TransportRegistry {
  const registry = new TransportRegistry();

  registry.register('http', dialHttpTunnel);
  registry.register('unix', dialDirect);
  registry.register('memu', (options.memoryNetwork ?? new MemoryNetwork()).dial);
  registry.register('kcp', unsupportedConnector('kcp'));
  registry.register('quic', unsupportedConnector('quic'));

  return registry;
}

export { TransportRegistry, createRegistry } from '../core/transport-registry.js';
export { dialDirect, dialSocket } from './net-socket.js';
export { dialHttpTunnel, negotiateTunnel } from './http-tunnel.js';
export { dialWebSocket, buildWebSocketTarget } from './websocket.js';
export { MemoryNetwork, createConnectionPair } from './in-process.js';
export { StreamConnection, TcpConnection } from './socket-connection.js';
export { unsupportedConnector } from './unsupported.js';
export type {
  RpcConnection,
  ConnectionInfo,
  ConnectorFn,
  KeepAliveCapable,
  TlsOptions,
} from '../core/transport-api.js';
