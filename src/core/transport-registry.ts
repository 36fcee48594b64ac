/**
 * Transport Registry — maps transport names to connectors.
 *
 * Each client holds one registry, usually built by createDefaultRegistry()
 * from src/transports/index.ts. Register custom transports while setting
 * up, before the first connect; there is no removal.
 *
 * Usage:
 *   const registry = createDefaultRegistry();
 *   registry.register('kcp', dialKcp);
 *   const client = new Client({ connectTimeout: 5000 }, { registry });
 *   await client.connect('kcp', '10.0.0.1:8972');
 */

import type { ConnectorFn } from './transport-api.js';

export class TransportRegistry {
  private connectors = new Map<string, ConnectorFn>();

  // ── Registration ─────────────────────────────────────────────

  /**
   * Register a connector under a transport name. Registering the same
   * name again replaces the earlier connector.
   */
  register(network: string, connector: ConnectorFn): this {
    this.connectors.set(network, connector);
    return this;
  }

  // ── Lookup ───────────────────────────────────────────────────

  /** Get the connector for a name, or undefined if not registered. */
  get(network: string): ConnectorFn | undefined {
    return this.connectors.get(network);
  }

  has(network: string): boolean {
    return this.connectors.has(network);
  }

  /** List all registered transport names. */
  get networks(): string[] {
    return [...this.connectors.keys()];
  }
}

/**
 * Create a new empty registry.
 *
 * For a registry pre-loaded with built-in transports, use
 * createDefaultRegistry() from src/transports/index.ts.
 */
export function createRegistry(): TransportRegistry {
  return new TransportRegistry();
}
