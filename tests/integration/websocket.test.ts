/**
 * WebSocket connector against an in-process ws server.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { Client } from '../../src/client/client.js';
import { InvalidArgumentError } from '../../src/core/errors.js';
import { MessageType, type Frame } from '../../src/core/types.js';
import { FrameReader, encodeFrame } from '../../src/core/wire.js';
import { createConnectionPair } from '../../src/transports/in-process.js';
import { buildWebSocketTarget, dialWebSocket } from '../../src/transports/websocket.js';
import { waitFor } from '../helpers.js';

interface Accepted {
  socket: WebSocket;
  url: string | undefined;
  origin: string | undefined;
}

let wss: WebSocketServer;
let address: string;
let accepted: Accepted[];

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

beforeEach(async () => {
  accepted = [];
  wss = new WebSocketServer({ host: '127.0.0.1', port: 0, path: '/_rpcx_' });
  wss.on('connection', (socket, req) => {
    accepted.push({ socket, url: req.url, origin: req.headers.origin });
  });
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));

  const addr = wss.address();
  if (typeof addr === 'string') throw new Error('expected a TCP address');
  address = `127.0.0.1:${addr.port}`;
});

afterEach(async () => {
  for (const { socket } of accepted) socket.terminate();
  await new Promise<void>((resolve) => wss.close(() => resolve()));
});

describe('WebSocket connector', () => {
  it('connects with the derived url and origin', async () => {
    const client = new Client();
    await client.connect('ws', address);

    await waitFor(() => accepted.length === 1);
    expect(accepted[0].url).toBe('/_rpcx_');
    expect(accepted[0].origin).toBe(`http://${address}`);
    expect(client.conn?.info.network).toBe('ws');
    expect(client.conn?.info.remoteAddress).toBe(`ws://${address}/_rpcx_`);
    await client.close();
  });

  it('carries frames in both directions', async () => {
    const client = new Client();
    const frames: Frame[] = [];
    client.onFrame((frame) => frames.push(frame));
    await client.connect('ws', address);
    await waitFor(() => accepted.length === 1);

    const reader = new FrameReader();
    const inbound: Frame[] = [];
    accepted[0].socket.on('message', (data) => inbound.push(...reader.feed(toBuffer(data))));

    client.conn?.write(encodeFrame(MessageType.REQUEST, new Uint8Array([1, 2]), 1n));
    await waitFor(() => inbound.length === 1);
    expect(inbound[0].header.type).toBe(MessageType.REQUEST);
    expect(inbound[0].payload).toEqual(new Uint8Array([1, 2]));

    accepted[0].socket.send(encodeFrame(MessageType.RESPONSE, new Uint8Array([3]), 1n));
    await waitFor(() => frames.length === 1);
    expect(frames[0].header.type).toBe(MessageType.RESPONSE);
    expect(frames[0].payload).toEqual(new Uint8Array([3]));

    await client.close();
  });

  it('rejects an upgrade the server refuses', async () => {
    const client = new Client({ rpcPath: '/elsewhere' });
    await expect(client.connect('ws', address)).rejects.toThrow(/Unexpected server response/);
    expect(client.conn).toBeNull();
  });

  it('ignores a registry entry for ws', async () => {
    const client = new Client();
    let registryUsed = false;
    client.registry.register('ws', async () => {
      registryUsed = true;
      return createConnectionPair()[0];
    });

    await client.connect('ws', address);

    expect(registryUsed).toBe(false);
    await waitFor(() => accepted.length === 1);
    await client.close();
  });

  it('requires a client', async () => {
    await expect(dialWebSocket(undefined, 'ws', address)).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});

describe('buildWebSocketTarget', () => {
  it('derives ws and http for ws', () => {
    expect(buildWebSocketTarget('ws', 'h:1', '/p')).toEqual({ url: 'ws://h:1/p', origin: 'http://h:1' });
  });

  it('derives wss and https for wss', () => {
    expect(buildWebSocketTarget('wss', 'h:1', '/p')).toEqual({ url: 'wss://h:1/p', origin: 'https://h:1' });
  });
});
