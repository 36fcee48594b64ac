/**
 * Client plugins.
 *
 * A plugin implements any subset of the hooks below. Hooks run in
 * registration order; `onConnectionCreated` is a chain where each plugin
 * receives the connection returned by the previous one.
 */

import type { RpcConnection } from './transport-api.js';

export interface ClientPlugin {
  readonly name?: string;

  /**
   * Called with a freshly dialed connection before the client installs it.
   * Return the connection (or a wrapper around it) to accept; throw to veto.
   */
  onConnectionCreated?(conn: RpcConnection): RpcConnection | Promise<RpcConnection>;

  /** Called once the connection is installed and the reader is running. */
  onClientConnected?(conn: RpcConnection): void | Promise<void>;

  /** Called when the client closes a connection it had installed. */
  onConnectionClose?(conn: RpcConnection): void | Promise<void>;
}

export class PluginContainer {
  private plugins: ClientPlugin[] = [];

  constructor(plugins: ClientPlugin[] = []) {
    this.plugins = [...plugins];
  }

  add(plugin: ClientPlugin): void {
    this.plugins.push(plugin);
  }

  remove(plugin: ClientPlugin): void {
    this.plugins = this.plugins.filter(p => p !== plugin);
  }

  all(): readonly ClientPlugin[] {
    return this.plugins;
  }

  async doConnectionCreated(conn: RpcConnection): Promise<RpcConnection> {
    let current = conn;
    for (const plugin of this.plugins) {
      if (plugin.onConnectionCreated) {
        current = await plugin.onConnectionCreated(current);
      }
    }
    return current;
  }

  async doClientConnected(conn: RpcConnection): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.onClientConnected?.(conn);
    }
  }

  async doConnectionClose(conn: RpcConnection): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.onConnectionClose?.(conn);
    }
  }
}
