/**
 * WebSocket connector — RPC over ws:// and wss://.
 *
 * The target address is a bare host:port; the URL and origin are derived
 * from it:
 *   ws  → ws://<address><rpcPath>,  origin http://<address>
 *   wss → wss://<address><rpcPath>, origin https://<address>
 *
 * The socket is exposed through createWebSocketStream, so upper layers see
 * a plain byte stream. Message boundaries carry no meaning here; frames are
 * delimited by the wire header like on every other transport.
 */

import WebSocket, { createWebSocketStream, type ClientOptions } from 'ws';
import type { Client } from '../client/client.js';
import { loadTlsMaterial, rpcPathOf } from '../core/connect-option.js';
import { InvalidArgumentError } from '../core/errors.js';
import type { RpcConnection } from '../core/transport-api.js';
import { StreamConnection } from './socket-connection.js';

export function buildWebSocketTarget(
  network: string,
  address: string,
  path: string,
): { url: string; origin: string } {
  if (network === 'ws') {
    return { url: `ws://${address}${path}`, origin: `http://${address}` };
  }
  return { url: `wss://${address}${path}`, origin: `https://${address}` };
}

export async function dialWebSocket(
  client: Client | undefined,
  network: string,
  address: string,
): Promise<RpcConnection> {
  if (!client) {
    throw new InvalidArgumentError('empty client');
  }
  const option = client.option;
  const { url, origin } = buildWebSocketTarget(network, address, rpcPathOf(option));

  let wsOptions: ClientOptions = { origin };
  if (option.connectTimeout > 0) {
    wsOptions.handshakeTimeout = option.connectTimeout;
  }
  if (option.tlsConfig) {
    wsOptions = { ...wsOptions, ...loadTlsMaterial(option.tlsConfig) };
  }

  const ws = new WebSocket(url, wsOptions);

  return new Promise<RpcConnection>((resolve, reject) => {
    const onOpen = (): void => {
      ws.removeListener('error', onError);
      // Wrap before yielding so no message slips past the stream.
      resolve(new StreamConnection(createWebSocketStream(ws), network, url));
    };
    const onError = (err: Error): void => {
      ws.removeListener('open', onOpen);
      reject(err);
    };
    ws.once('open', onOpen);
    ws.once('error', onError);
  });
}
