/**
 * Direct connector — dials a stream socket, plain or TLS.
 *
 * Handles `tcp`, `tcp4`, `tcp6` and `unix`, and is the fallback for any
 * transport name with no dedicated connector. Addresses are resolved by
 * resolveDialTarget():
 *   - unix       → { path: '/tmp/rpc.sock' }
 *   - tcp4/tcp6  → { host, port, family }
 *   - otherwise  → { host, port }
 * A configured tlsConfig wraps the dial in TLS.
 */

import * as net from 'node:net';
import * as tls from 'node:tls';
import type { Client } from '../client/client.js';
import { describeTarget, resolveDialTarget, type DialTarget } from '../core/address.js';
import { DEFAULT_CONNECT_OPTION, loadTlsMaterial } from '../core/connect-option.js';
import { DialError } from '../core/errors.js';
import { moduleLogger } from '../core/logger.js';
import type { RpcConnection, TlsOptions } from '../core/transport-api.js';
import { StreamConnection, TcpConnection } from './socket-connection.js';

const log = moduleLogger('net-socket');

// ── Dialing ──────────────────────────────────────────────────────

function resolveNetOptions(target: DialTarget): net.NetConnectOpts {
  switch (target.type) {
    case 'path':
      return { path: target.path };
    case 'host':
      return target.family
        ? { host: target.host, port: target.port, family: target.family }
        : { host: target.host, port: target.port };
  }
}

/**
 * Open a socket to the target and resolve once it is connected (or, with
 * TLS, once the handshake completes). `timeoutMs` bounds the whole dial;
 * 0 disables the bound.
 */
export function dialSocket(
  target: DialTarget,
  timeoutMs: number,
  tlsOptions?: TlsOptions,
): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    let socket: net.Socket;
    let readyEvent: 'connect' | 'secureConnect';

    if (tlsOptions) {
      let tlsOpts: tls.ConnectionOptions;
      try {
        const material = loadTlsMaterial(tlsOptions);
        tlsOpts = { ...resolveNetOptions(target), ...material };
      } catch (err) {
        reject(err);
        return;
      }
      socket = tls.connect(tlsOpts);
      readyEvent = 'secureConnect';
    } else {
      socket = net.createConnection(resolveNetOptions(target));
      readyEvent = 'connect';
    }

    const onTimeout = (): void => {
      socket.destroy(new Error(`Connection timeout after ${timeoutMs}ms`));
    };
    const onError = (err: Error): void => {
      socket.removeListener(readyEvent, onReady);
      socket.removeListener('timeout', onTimeout);
      reject(err);
    };
    const onReady = (): void => {
      socket.setTimeout(0); // clear connect timeout
      socket.removeListener('timeout', onTimeout);
      socket.removeListener('error', onError);
      resolve(socket);
    };

    if (timeoutMs > 0) {
      socket.setTimeout(timeoutMs);
      socket.once('timeout', onTimeout);
    }
    socket.once(readyEvent, onReady);
    socket.once('error', onError);
  });
}

/** Wrap a connected socket; only plain TCP sockets expose keep-alive. */
export function wrapSocket(
  socket: net.Socket,
  network: string,
  target: DialTarget,
  encrypted: boolean,
): RpcConnection {
  const remote = describeTarget(target);
  if (target.type === 'host' && !encrypted) {
    return new TcpConnection(socket, network, remote);
  }
  return new StreamConnection(socket, network, remote);
}

// ── Connector ────────────────────────────────────────────────────

export async function dialDirect(
  client: Client | undefined,
  network: string,
  address: string,
): Promise<RpcConnection> {
  const option = client?.option ?? DEFAULT_CONNECT_OPTION;

  let target: DialTarget;
  let socket: net.Socket;
  try {
    target = resolveDialTarget(network, address);
    socket = await dialSocket(target, option.connectTimeout, option.tlsConfig);
  } catch (err) {
    log.warn({ err, network, address }, 'failed to dial server');
    throw new DialError(network, address, err);
  }

  return wrapSocket(socket, network, target, option.tlsConfig !== undefined);
}
