import type { RpcConnection } from '../core/transport-api.js';
import type { Frame } from '../core/types.js';
import { FrameReader } from '../core/wire.js';

export interface ReaderSink {
  onFrame(frame: Frame): void;
  onError(error: Error): void;
}

/**
 * Background reader: feeds inbound bytes through a FrameReader and hands
 * complete frames to the sink. Runs until the signal aborts (connection
 * closed) or the connection reports an error.
 */
export class ReaderTask {
  private readonly frames = new FrameReader();
  private _running = false;

  constructor(
    private readonly conn: RpcConnection,
    private readonly signal: AbortSignal,
    private readonly sink: ReaderSink,
  ) {}

  start(): void {
    if (this._running || this.signal.aborted) return;
    this._running = true;

    this.signal.addEventListener('abort', () => {
      this._running = false;
    }, { once: true });

    this.conn.onData((chunk) => {
      if (!this._running) return;
      for (const frame of this.frames.feed(chunk)) {
        this.sink.onFrame(frame);
      }
    });

    this.conn.onError((error) => {
      if (!this._running) return;
      this._running = false;
      this.sink.onError(error);
    });
  }

  get running(): boolean {
    return this._running;
  }

  /** Bytes received but not yet forming a complete frame. */
  get pendingBytes(): number {
    return this.frames.pendingBytes;
  }
}
