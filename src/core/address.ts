/**
 * Address parsing for stream-socket dials.
 *
 * Addresses are `host:port` strings (IPv6 hosts in brackets) for every
 * network except `unix`, whose address is a socket path.
 */

import { InvalidArgumentError } from './errors.js';

export type DialTarget =
  | { type: 'path'; path: string }
  | { type: 'host'; host: string; port: number; family?: 4 | 6 };

/**
 * Map a network name and address to something `net.connect` understands.
 * Names other than `unix`, `tcp4` and `tcp6` dial plain TCP.
 */
export function resolveDialTarget(network: string, address: string): DialTarget {
  switch (network) {
    case 'unix':
      if (!address) {
        throw new InvalidArgumentError('Missing socket path for unix network');
      }
      return { type: 'path', path: address };

    case 'tcp4':
      return { type: 'host', ...parseHostPort(address), family: 4 };

    case 'tcp6':
      return { type: 'host', ...parseHostPort(address), family: 6 };

    default:
      return { type: 'host', ...parseHostPort(address) };
  }
}

export function parseHostPort(address: string): { host: string; port: number } {
  if (!address) {
    throw new InvalidArgumentError('Missing host:port address');
  }

  // Handle IPv6: [::1]:port
  let host: string;
  let portStr: string;
  if (address.startsWith('[')) {
    const bracketEnd = address.indexOf(']');
    if (bracketEnd === -1 || address[bracketEnd + 1] !== ':') {
      throw new InvalidArgumentError(`Malformed IPv6 address "${address}"`);
    }
    host = address.substring(1, bracketEnd);
    portStr = address.substring(bracketEnd + 2); // skip ]:
  } else {
    const lastColon = address.lastIndexOf(':');
    if (lastColon === -1) {
      throw new InvalidArgumentError(`Missing port in address "${address}"`);
    }
    host = address.substring(0, lastColon);
    portStr = address.substring(lastColon + 1);
  }

  const port = /^\d+$/.test(portStr) ? parseInt(portStr, 10) : NaN;
  if (isNaN(port) || port > 65535) {
    throw new InvalidArgumentError(`Invalid port "${portStr}" in address "${address}"`);
  }

  return { host: host || 'localhost', port };
}

export function describeTarget(target: DialTarget): string {
  switch (target.type) {
    case 'path': return target.path;
    case 'host': return target.host.includes(':')
      ? `[${target.host}]:${target.port}`
      : `${target.host}:${target.port}`;
  }
}
