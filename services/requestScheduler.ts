export interface RequestSchedulerOptions {
  maxConcurrent: number;
  /** Minimum spacing between task starts, in ms. */
  minInterval?: number;
}

/**
 * REQUEST SCHEDULER
 * Counting semaphore over async tasks: at most `maxConcurrent` run at once,
 * the rest wait in FIFO order. Keeps parallel chunk workers under the
 * upstream rate limits.
 */
export class RequestScheduler {
  private queue: Array<() => Promise<void>> = [];
  private active = 0;
  private readonly maxConcurrent: number;
  private readonly minInterval: number;
  private lastRequestTime = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor({ maxConcurrent, minInterval = 0 }: RequestSchedulerOptions) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent <= 0) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
    this.minInterval = minInterval;
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  add<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (e) {
          reject(e);
        }
      });
      this.process();
    });
  }

  private process(): void {
    if (this.timer || this.active >= this.maxConcurrent || this.queue.length === 0) return;

    const timeSinceLast = Date.now() - this.lastRequestTime;
    if (this.minInterval > 0 && timeSinceLast < this.minInterval) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.process();
      }, this.minInterval - timeSinceLast);
      return;
    }

    const task = this.queue.shift();
    if (!task) return;

    this.active++;
    this.lastRequestTime = Date.now();
    void task().finally(() => {
      this.active--;
      this.process();
    });
    this.process();
  }
}
