import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONNECT_OPTION,
  connectOptionFromEnv,
  loadTlsMaterial,
  resolveConnectOption,
  rpcPathOf,
} from '../../src/core/connect-option.js';
import { InvalidArgumentError } from '../../src/core/errors.js';

describe('resolveConnectOption', () => {
  it('returns the defaults with no sources', () => {
    expect(resolveConnectOption()).toEqual(DEFAULT_CONNECT_OPTION);
    expect(DEFAULT_CONNECT_OPTION.connectTimeout).toBe(10_000);
  });

  it('applies later sources over earlier ones', () => {
    const option = resolveConnectOption(
      { idleTimeout: 100, heartbeatInterval: 10 },
      { heartbeat: true, heartbeatInterval: 50 },
    );
    expect(option).toEqual({
      connectTimeout: 10_000,
      tcpKeepAlivePeriod: 0,
      idleTimeout: 100,
      heartbeat: true,
      heartbeatInterval: 50,
      rpcPath: '',
    });
  });

  it('ignores undefined fields', () => {
    const option = resolveConnectOption({ connectTimeout: 5 }, { connectTimeout: undefined });
    expect(option.connectTimeout).toBe(5);
  });

  it('merges tlsConfig field by field', () => {
    const option = resolveConnectOption(
      { tlsConfig: { ca: '/etc/rpc/ca.pem' } },
      { tlsConfig: { insecure: true } },
    );
    expect(option.tlsConfig).toEqual({ ca: '/etc/rpc/ca.pem', insecure: true });
  });

  it('does not share state with the defaults', () => {
    const option = resolveConnectOption();
    option.rpcPath = '/changed';
    expect(DEFAULT_CONNECT_OPTION.rpcPath).toBe('');
  });
});

describe('rpcPathOf', () => {
  it('falls back to the default path', () => {
    expect(rpcPathOf(resolveConnectOption())).toBe('/_rpcx_');
    expect(rpcPathOf(resolveConnectOption({ rpcPath: '/rpc' }))).toBe('/rpc');
  });
});

describe('connectOptionFromEnv', () => {
  it('reads durations, flags and the path', () => {
    expect(connectOptionFromEnv({
      RPC_CONNECT_TIMEOUT: '2500',
      RPC_IDLE_TIMEOUT: '100',
      RPC_TCP_KEEPALIVE: '15000',
      RPC_HEARTBEAT: 'true',
      RPC_HEARTBEAT_INTERVAL: '50',
      RPC_PATH: '/tunnel',
    })).toEqual({
      connectTimeout: 2500,
      idleTimeout: 100,
      tcpKeepAlivePeriod: 15000,
      heartbeat: true,
      heartbeatInterval: 50,
      rpcPath: '/tunnel',
    });
  });

  it('returns nothing for an empty environment', () => {
    expect(connectOptionFromEnv({})).toEqual({});
  });

  it('reads TLS settings', () => {
    expect(connectOptionFromEnv({ RPC_TLS_CA: '/etc/ca.pem', RPC_TLS_INSECURE: '1' })).toEqual({
      tlsConfig: { ca: '/etc/ca.pem', insecure: true },
    });
  });

  it('rejects invalid durations', () => {
    expect(() => connectOptionFromEnv({ RPC_IDLE_TIMEOUT: '-5' })).toThrow(InvalidArgumentError);
    expect(() => connectOptionFromEnv({ RPC_CONNECT_TIMEOUT: '1.5s' }))
      .toThrow('RPC_CONNECT_TIMEOUT must be a non-negative integer (ms), got "1.5s"');
  });

  it('rejects invalid flags', () => {
    expect(() => connectOptionFromEnv({ RPC_HEARTBEAT: 'yes' }))
      .toThrow('RPC_HEARTBEAT must be true or false, got "yes"');
  });
});

describe('loadTlsMaterial', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rpc-connect-tls-'));
    fs.writeFileSync(path.join(dir, 'ca.pem'), 'test-ca');
    fs.writeFileSync(path.join(dir, 'cert.pem'), 'test-cert');
    fs.writeFileSync(path.join(dir, 'key.pem'), 'test-key');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the named files', () => {
    const material = loadTlsMaterial({
      ca: path.join(dir, 'ca.pem'),
      cert: path.join(dir, 'cert.pem'),
      key: path.join(dir, 'key.pem'),
      servername: 'rpc.test',
    });
    expect(material.ca?.toString()).toBe('test-ca');
    expect(material.cert?.toString()).toBe('test-cert');
    expect(material.key?.toString()).toBe('test-key');
    expect(material.servername).toBe('rpc.test');
    expect(material.rejectUnauthorized).toBe(true);
  });

  it('disables verification when insecure', () => {
    expect(loadTlsMaterial({ insecure: true })).toEqual({ rejectUnauthorized: false });
  });

  it('throws for a missing file', () => {
    expect(() => loadTlsMaterial({ ca: path.join(dir, 'missing.pem') })).toThrow(/ENOENT/);
  });
});
