import type { RpcConnection } from '../core/transport-api.js';
import { encodeHeartbeat } from '../protocol/heartbeat.js';

/**
 * Background heartbeat: writes a heartbeat frame every `intervalMs` until
 * the signal aborts or a write fails.
 */
export class HeartbeatTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private seq = 0;

  constructor(
    private readonly conn: RpcConnection,
    private readonly intervalMs: number,
    private readonly signal: AbortSignal,
    private readonly onError: (error: Error) => void,
  ) {}

  start(): void {
    if (this.timer !== null || this.signal.aborted) return;

    this.timer = setInterval(() => this.beat(), this.intervalMs);
    this.timer.unref();
    this.signal.addEventListener('abort', () => this.stop(), { once: true });
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Number of heartbeats written so far. */
  get sent(): number {
    return this.seq;
  }

  private beat(): void {
    if (!this.conn.connected) {
      this.stop();
      return;
    }
    try {
      this.conn.write(encodeHeartbeat(this.seq + 1));
      this.seq++;
    } catch (err) {
      this.stop();
      this.onError(err instanceof Error ? err : new Error(String(err)));
    }
  }
}
