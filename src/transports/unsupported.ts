/**
 * Placeholder connectors for transports whose implementations live outside
 * this package (KCP, QUIC). They keep the names reserved in the default
 * registry; register a real connector under the same name to replace them.
 */

import type { Client } from '../client/client.js';
import { UnsupportedTransportError } from '../core/errors.js';
import type { ConnectorFn, RpcConnection } from '../core/transport-api.js';

export function unsupportedConnector(network: string): ConnectorFn {
  return async (_client: Client | undefined, _network: string, _address: string): Promise<RpcConnection> => {
    throw new UnsupportedTransportError(network);
  };
}
