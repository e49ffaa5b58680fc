import { abortReason } from './delay.js';

type Waiter = {
  resolve: () => void;
  cleanup: () => void;
};

/**
 * Counting limiter: at most `capacity` tasks run at once, the rest wait in
 * FIFO order. A waiter whose signal aborts leaves the queue without taking a
 * slot.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Limiter capacity must be a positive integer (received ${capacity})`);
    }
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.active < this.capacity) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        if (signal) {
          reject(abortReason(signal));
        }
      };

      const waiter: Waiter = {
        resolve,
        cleanup: () => {
          signal?.removeEventListener('abort', onAbort);
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private release() {
    const next = this.waiters.shift();
    if (next) {
      // the slot passes straight to the next waiter
      next.cleanup();
      next.resolve();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }
}
