/**
 * Worker Pool - bounded concurrency over a drain-once task queue
 *
 * Features:
 * - Fixed number of workers pulling from one shared queue
 * - Results collected in completion order
 * - Cancellation checked between dequeues; in-flight work finishes
 */

// ============================================
// Types
// ============================================

export type PoolConfig = {
  /** Number of workers */
  concurrency: number;
  /** Stops further dequeues once aborted */
  signal?: AbortSignal;
  /** Enable debug logging */
  debug?: boolean;
};

export type PoolRun<T, R> = {
  /** Completion order */
  results: R[];
  /** Items never dequeued because the run was cancelled */
  skipped: T[];
};

// ============================================
// Pool Implementation
// ============================================

export class WorkerPool {
  private config: Required<Omit<PoolConfig, 'signal'>> & { signal?: AbortSignal };
  private inFlight = 0;

  constructor(config: PoolConfig) {
    this.config = {
      concurrency: Math.max(1, Math.floor(config.concurrency)),
      signal: config.signal,
      debug: config.debug ?? false,
    };
  }

  /**
   * Run `work` over every item with at most `concurrency` in flight.
   * `onResult` fires as each item finishes.
   */
  async run<T, R>(
    items: readonly T[],
    work: (item: T, workerId: number) => Promise<R>,
    onResult?: (result: R, item: T) => void
  ): Promise<PoolRun<T, R>> {
    const results: R[] = [];
    let nextIndex = 0;

    const worker = async (workerId: number) => {
      while (true) {
        if (this.config.signal?.aborted) {
          this.log(`Worker ${workerId} stopping (cancelled)`);
          return;
        }
        const i = nextIndex;
        if (i >= items.length) return;
        nextIndex += 1;

        const item = items[i];
        this.inFlight++;
        this.log(`Worker ${workerId} took item ${i} (in-flight: ${this.inFlight})`);
        try {
          const result = await work(item, workerId);
          results.push(result);
          onResult?.(result, item);
        } finally {
          this.inFlight--;
        }
      }
    };

    const workerCount = Math.min(this.config.concurrency, items.length);
    await Promise.all(Array.from({ length: workerCount }, (_, id) => worker(id)));

    return { results, skipped: items.slice(nextIndex) };
  }

  private log(message: string) {
    if (this.config.debug) {
      console.log(`[Pool] ${message}`);
    }
  }
}
