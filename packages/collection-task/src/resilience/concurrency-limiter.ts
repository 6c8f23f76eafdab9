/**
 * Concurrency Limiter
 *
 * Bulkhead-style cap on concurrent executions. Overflow work queues instead
 * of being rejected, and every submitted item eventually runs.
 */

export interface LimiterStats {
  readonly name: string;
  readonly maxConcurrent: number;
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly completedCount: number;
}

interface QueuedRequest {
  readonly start: () => void;
}

/**
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter({ name: 'downloads', maxConcurrent: 4 });
 * const results = await Promise.all(urls.map((url) => limiter.execute(() => fetchOne(url))));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly name: string;
  private readonly maxConcurrent: number;
  private activeCount = 0;
  private completedCount = 0;
  private readonly queue: QueuedRequest[] = [];

  constructor(config: { readonly name: string; readonly maxConcurrent: number }) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${config.maxConcurrent}`);
    }
    this.name = config.name;
    this.maxConcurrent = config.maxConcurrent;
  }

  /**
   * Execute `fn` once a slot is free
   */
  execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.activeCount++;
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => {
            this.activeCount--;
            this.completedCount++;
            this.next();
          });
      };

      if (this.activeCount < this.maxConcurrent) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  private next(): void {
    const request = this.queue.shift();
    if (request) {
      request.start();
    }
  }

  getStats(): LimiterStats {
    return {
      name: this.name,
      maxConcurrent: this.maxConcurrent,
      activeCount: this.activeCount,
      queuedCount: this.queue.length,
      completedCount: this.completedCount,
    };
  }
}

/**
 * Map `items` through `fn` with at most `maxConcurrent` in flight
 *
 * Results are position-stable with `items`; each slot is written by exactly
 * one execution, so no further synchronisation is needed.
 */
export async function mapBounded<I, O>(
  items: readonly I[],
  maxConcurrent: number,
  fn: (item: I, index: number) => Promise<O>,
  name = 'map-bounded'
): Promise<O[]> {
  const limiter = new ConcurrencyLimiter({ name, maxConcurrent });
  return Promise.all(items.map((item, index) => limiter.execute(() => fn(item, index))));
}
