/**
 * HTTP tunnel connector — RPC over an HTTP CONNECT handshake.
 *
 * The client dials TCP (or TLS), sends
 *
 *   CONNECT <rpcPath> HTTP/1.0\r\n\r\n
 *
 * and waits for a response whose status is exactly
 * `200 Connected to rpcx`. After that the socket carries raw RPC bytes;
 * anything the server sent past the response header is pushed back into
 * the socket so the caller sees the stream from that point on.
 */

import type * as net from 'node:net';
import type { Client } from '../client/client.js';
import { resolveDialTarget, type DialTarget } from '../core/address.js';
import { rpcPathOf } from '../core/connect-option.js';
import { DialError, InvalidArgumentError, TunnelNegotiationError } from '../core/errors.js';
import { moduleLogger } from '../core/logger.js';
import type { RpcConnection } from '../core/transport-api.js';
import { TUNNEL_CONNECTED_STATUS } from '../core/types.js';
import { dialSocket, wrapSocket } from './net-socket.js';

const log = moduleLogger('http-tunnel');

/** Upper bound on the response header block. */
const MAX_HEADER_BYTES = 8 * 1024;

// ── Response parsing ─────────────────────────────────────────────

/**
 * Locate the blank line that ends the header block. Accepts CRLF and bare
 * LF line endings. Returns the offset where the tunneled stream begins.
 */
export function findHeaderEnd(buf: Uint8Array): { headerEnd: number; bodyStart: number } | null {
  const bytes = Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
  const crlf = bytes.indexOf('\r\n\r\n');
  const lf = bytes.indexOf('\n\n');

  if (crlf === -1 && lf === -1) return null;
  if (lf === -1 || (crlf !== -1 && crlf < lf)) {
    return { headerEnd: crlf, bodyStart: crlf + 4 };
  }
  return { headerEnd: lf, bodyStart: lf + 2 };
}

/**
 * Parse a response header block and return its status (`<code> <reason>`).
 * Throws on a malformed status line or header line.
 */
export function parseResponseStatus(head: string): string {
  const [statusLine, ...headerLines] = head.replace(/\r$/, '').split(/\r?\n/);

  const match = /^HTTP\/\d\.\d +(\d{3}(?: .*)?)$/.exec(statusLine);
  if (!match) {
    throw new Error(`malformed HTTP response "${statusLine}"`);
  }

  for (const line of headerLines) {
    if (line !== '' && !line.includes(':')) {
      throw new Error(`malformed MIME header line: ${line}`);
    }
  }

  return match[1];
}

// ── Handshake ────────────────────────────────────────────────────

/**
 * Run the CONNECT exchange on a connected socket. Resolves with the socket
 * paused and positioned right after the response header.
 */
export function negotiateTunnel(socket: net.Socket, path: string, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    let buffered = Buffer.alloc(0);
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const cleanup = (): void => {
      settled = true;
      socket.removeListener('data', onData);
      socket.removeListener('end', onEnd);
      socket.removeListener('error', fail);
      socket.removeListener('close', onClose);
      socket.pause();
      if (timer !== null) clearTimeout(timer);
    };

    const fail = (err: Error): void => {
      if (settled) return;
      cleanup();
      reject(err);
    };

    const onData = (chunk: Buffer): void => {
      buffered = Buffer.concat([buffered, chunk]);
      const end = findHeaderEnd(buffered);
      if (end === null) {
        if (buffered.length > MAX_HEADER_BYTES) {
          fail(new Error('malformed HTTP response: header block too large'));
        }
        return;
      }

      cleanup();
      const rest = buffered.subarray(end.bodyStart);
      if (rest.length > 0) {
        socket.unshift(rest);
      }

      let status: string;
      try {
        status = parseResponseStatus(buffered.subarray(0, end.headerEnd).toString('latin1'));
      } catch (err) {
        reject(err);
        return;
      }

      if (status !== TUNNEL_CONNECTED_STATUS) {
        reject(new Error(`unexpected HTTP response: ${status}`));
        return;
      }
      resolve();
    };

    const onEnd = (): void => fail(new Error('unexpected EOF'));
    const onClose = (): void => fail(new Error('connection closed before HTTP response'));

    socket.on('data', onData);
    socket.once('end', onEnd);
    socket.once('error', fail);
    socket.once('close', onClose);

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        fail(new Error(`tunnel handshake timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    socket.write(`CONNECT ${path} HTTP/1.0\r\n\r\n`, (err) => {
      if (err) fail(err);
    });
  });
}

// ── Connector ────────────────────────────────────────────────────

export async function dialHttpTunnel(
  client: Client | undefined,
  network: string,
  address: string,
): Promise<RpcConnection> {
  if (!client) {
    throw new InvalidArgumentError('empty client');
  }
  const option = client.option;
  const path = rpcPathOf(option);

  let target: DialTarget;
  let socket: net.Socket;
  try {
    target = resolveDialTarget('tcp', address);
    socket = await dialSocket(target, option.connectTimeout, option.tlsConfig);
  } catch (err) {
    log.error({ err, address }, 'failed to dial server');
    throw new DialError(network, address, err);
  }

  try {
    await negotiateTunnel(socket, path, option.connectTimeout);
  } catch (err) {
    socket.destroy();
    log.error({ err, network, address, path }, 'failed to open HTTP tunnel');
    throw new TunnelNegotiationError('dial-http', `${network} ${address}`, err);
  }

  return wrapSocket(socket, network, target, option.tlsConfig !== undefined);
}
