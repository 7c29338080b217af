// packages/node-runtime/src/pool.ts
import { availableParallelism } from 'node:os';

/**
 * Bounded task pool: at most `size` tasks run at once, the rest wait in FIFO
 * order. There is no per-task cancellation; a started task runs to completion.
 */
export class WorkerPool {
  readonly size: number;
  private active = 0;
  private readonly queue: Array<() => Promise<void>> = [];
  private idleWaiters: Array<() => void> = [];

  /** @param size - Concurrency bound; 0 or less means one per CPU */
  constructor(size = 0) {
    this.size = size > 0 ? Math.floor(size) : availableParallelism();
  }

  get running(): number { return this.active; }
  get pending(): number { return this.queue.length; }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        this.active++;
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          this.active--;
          this.next();
        }
      });
      this.next();
    });
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private next(): void {
    while (this.active < this.size) {
      const start = this.queue.shift();
      if (!start) break;
      void start();
    }
    if (this.active === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const w of waiters) w();
    }
  }
}
