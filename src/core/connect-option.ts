/**
 * Client connect options.
 *
 * Options are merged from multiple sources: defaults → caller → env vars.
 * All durations are milliseconds.
 */

import * as fs from 'node:fs';
import { InvalidArgumentError } from './errors.js';
import { DEFAULT_RPC_PATH } from './types.js';
import type { TlsOptions } from './transport-api.js';

// ── Schema ───────────────────────────────────────────────────────

export interface ConnectOption {
  /** Bounds dial and handshake. 0 = no timeout. */
  connectTimeout: number;

  /**
   * TLS settings. Presence switches every transport that supports it
   * (direct, http, ws/wss) to an encrypted dial.
   */
  tlsConfig?: TlsOptions;

  /** TCP keep-alive period for plain TCP connections. 0 = disabled. */
  tcpKeepAlivePeriod: number;

  /** Absolute deadline applied right after connect. 0 = disabled. */
  idleTimeout: number;

  /** Start the heartbeat task (also requires heartbeatInterval > 0). */
  heartbeat: boolean;
  heartbeatInterval: number;

  /** Path for HTTP tunnels and WebSocket upgrades. Empty = DEFAULT_RPC_PATH. */
  rpcPath: string;
}

export const DEFAULT_CONNECT_OPTION: ConnectOption = {
  connectTimeout: 10_000,
  tcpKeepAlivePeriod: 0,
  idleTimeout: 0,
  heartbeat: false,
  heartbeatInterval: 0,
  rpcPath: '',
};

// ── Merging ──────────────────────────────────────────────────────

/**
 * Merge options over DEFAULT_CONNECT_OPTION. Later sources win; undefined
 * fields are ignored and tlsConfig is merged field by field.
 */
export function resolveConnectOption(...sources: Partial<ConnectOption>[]): ConnectOption {
  let result: ConnectOption = { ...DEFAULT_CONNECT_OPTION };

  for (const source of sources) {
    result = mergeTwo(result, source);
  }

  return result;
}

function mergeTwo(base: ConnectOption, override: Partial<ConnectOption>): ConnectOption {
  const result = { ...base };

  if (override.connectTimeout !== undefined) result.connectTimeout = override.connectTimeout;
  if (override.tcpKeepAlivePeriod !== undefined) result.tcpKeepAlivePeriod = override.tcpKeepAlivePeriod;
  if (override.idleTimeout !== undefined) result.idleTimeout = override.idleTimeout;
  if (override.heartbeat !== undefined) result.heartbeat = override.heartbeat;
  if (override.heartbeatInterval !== undefined) result.heartbeatInterval = override.heartbeatInterval;
  if (override.rpcPath !== undefined) result.rpcPath = override.rpcPath;

  if (override.tlsConfig !== undefined) {
    result.tlsConfig = { ...result.tlsConfig, ...override.tlsConfig };
  }

  return result;
}

/** The tunnel / upgrade path for a resolved option set. */
export function rpcPathOf(option: ConnectOption): string {
  return option.rpcPath || DEFAULT_RPC_PATH;
}

// ── Environment ──────────────────────────────────────────────────

/**
 * Read connect options from environment variables.
 *
 * Recognized variables:
 *   RPC_CONNECT_TIMEOUT      Dial/handshake timeout (ms)
 *   RPC_IDLE_TIMEOUT         Deadline after connect (ms)
 *   RPC_TCP_KEEPALIVE        Keep-alive period (ms)
 *   RPC_HEARTBEAT            true/false
 *   RPC_HEARTBEAT_INTERVAL   Heartbeat interval (ms)
 *   RPC_PATH                 Tunnel / upgrade path
 *   RPC_TLS_CA, RPC_TLS_CERT, RPC_TLS_KEY   PEM file paths
 *   RPC_TLS_INSECURE         Skip certificate verification
 */
export function connectOptionFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ConnectOption> {
  const option: Partial<ConnectOption> = {};

  const connectTimeout = env['RPC_CONNECT_TIMEOUT'];
  if (connectTimeout) option.connectTimeout = parseMillis('RPC_CONNECT_TIMEOUT', connectTimeout);

  const idleTimeout = env['RPC_IDLE_TIMEOUT'];
  if (idleTimeout) option.idleTimeout = parseMillis('RPC_IDLE_TIMEOUT', idleTimeout);

  const keepAlive = env['RPC_TCP_KEEPALIVE'];
  if (keepAlive) option.tcpKeepAlivePeriod = parseMillis('RPC_TCP_KEEPALIVE', keepAlive);

  const heartbeat = env['RPC_HEARTBEAT'];
  if (heartbeat) option.heartbeat = parseFlag('RPC_HEARTBEAT', heartbeat);

  const heartbeatInterval = env['RPC_HEARTBEAT_INTERVAL'];
  if (heartbeatInterval) option.heartbeatInterval = parseMillis('RPC_HEARTBEAT_INTERVAL', heartbeatInterval);

  const rpcPath = env['RPC_PATH'];
  if (rpcPath) option.rpcPath = rpcPath;

  const tls: TlsOptions = {};
  if (env['RPC_TLS_CA']) tls.ca = env['RPC_TLS_CA'];
  if (env['RPC_TLS_CERT']) tls.cert = env['RPC_TLS_CERT'];
  if (env['RPC_TLS_KEY']) tls.key = env['RPC_TLS_KEY'];
  const insecure = env['RPC_TLS_INSECURE'];
  if (insecure) tls.insecure = parseFlag('RPC_TLS_INSECURE', insecure);
  if (Object.keys(tls).length > 0) option.tlsConfig = tls;

  return option;
}

function parseMillis(name: string, value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer (ms), got "${value}"`);
  }
  return parseInt(trimmed, 10);
}

function parseFlag(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new InvalidArgumentError(`${name} must be true or false, got "${value}"`);
  }
}

// ── TLS material ─────────────────────────────────────────────────

export interface TlsMaterial {
  ca?: Buffer;
  cert?: Buffer;
  key?: Buffer;
  servername?: string;
  rejectUnauthorized: boolean;
}

/** Read the PEM files named by TLS options. */
export function loadTlsMaterial(options: TlsOptions): TlsMaterial {
  const material: TlsMaterial = {
    rejectUnauthorized: !options.insecure,
  };
  if (options.ca) {
    material.ca = fs.readFileSync(options.ca);
  }
  if (options.cert) {
    material.cert = fs.readFileSync(options.cert);
  }
  if (options.key) {
    material.key = fs.readFileSync(options.key);
  }
  if (options.servername) {
    material.servername = options.servername;
  }
  return material;
}
