/**
 * rpc-connect — connection establishment and transport dispatch for an
 * RPC client.
 *
 *   const client = new Client({ connectTimeout: 5000, heartbeat: true, heartbeatInterval: 30_000 });
 *   client.onFrame((frame) => codec.dispatch(frame));
 *   await client.connect('http', 'rpc.internal:8972');
 */

export * from './client/index.js';
export * from './transports/index.js';
export {
  DEFAULT_CONNECT_OPTION,
  resolveConnectOption,
  connectOptionFromEnv,
  loadTlsMaterial,
  rpcPathOf,
  type ConnectOption,
  type TlsMaterial,
} from './core/connect-option.js';
export { PluginContainer, type ClientPlugin } from './core/plugin.js';
export { supportsKeepAlive } from './core/transport-api.js';
export {
  InvalidArgumentError,
  DialError,
  TunnelNegotiationError,
  UnsupportedTransportError,
  DeadlineExceededError,
} from './core/errors.js';
export { parseHostPort, resolveDialTarget, type DialTarget } from './core/address.js';
export { logger } from './core/logger.js';
export { encodeFrame, encodeHeader, decodeHeader, FrameReader, HEADER_SIZE } from './core/wire.js';
export {
  MessageType,
  DEFAULT_RPC_PATH,
  TUNNEL_CONNECTED_STATUS,
  type Frame,
  type FrameHeader,
} from './core/types.js';
export { encodeHeartbeat, decodeHeartbeat, type HeartbeatBody } from './protocol/heartbeat.js';
