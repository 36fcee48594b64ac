import { DeadlineExceededError } from './errors.js';

/**
 * Absolute deadline for a connection. When it fires the owner destroys the
 * connection with the supplied error; setting a new deadline replaces the
 * pending one and `null` clears it.
 */
export class DeadlineTimer {
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly onExpire: (error: DeadlineExceededError) => void) {}

  set(deadline: Date | null): void {
    this.clear();
    if (deadline === null) return;

    const delay = Math.max(0, deadline.getTime() - Date.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.onExpire(new DeadlineExceededError(deadline));
    }, delay);
    this.timer.unref();
  }

  clear(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get pending(): boolean {
    return this.timer !== null;
  }
}
