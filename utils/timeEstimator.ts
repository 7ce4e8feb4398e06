import { EstimatorStateError } from '../lib/errors';

export interface TimeEstimatorOptions {
  /** Number of rate samples averaged for the estimate. */
  windowSize?: number;
  /** Clock in milliseconds. */
  now?: () => number;
}

const DEFAULT_WINDOW_SIZE = 10;

/**
 * Estimates remaining time from a stream of progress percentages.
 *
 * Each update after the first records seconds-per-percent since the previous
 * update; the estimate is the remaining percentage times the mean of the last
 * `windowSize` samples.
 */
export class TimeEstimator {
  private readonly windowSize: number;
  private readonly now: () => number;

  private startedAt: number | null = null;
  private lastProgress: number | null = null;
  private lastTimestamp = 0;
  private rates: number[] = [];

  constructor({ windowSize = DEFAULT_WINDOW_SIZE, now = Date.now }: TimeEstimatorOptions = {}) {
    if (!Number.isInteger(windowSize) || windowSize <= 0) {
      throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
    }
    this.windowSize = windowSize;
    this.now = now;
  }

  get isRunning(): boolean {
    return this.startedAt !== null;
  }

  start(): void {
    this.startedAt = this.now();
    this.lastProgress = null;
    this.lastTimestamp = this.startedAt;
    this.rates = [];
  }

  reset(): void {
    this.startedAt = null;
    this.lastProgress = null;
    this.rates = [];
  }

  /**
   * Records a progress value in [0, 100] and returns the estimated seconds left.
   * The first call after `start()` only primes the state and returns 0.
   */
  update(progressPercent: number): number {
    if (this.startedAt === null) throw new EstimatorStateError();

    const timestamp = this.now();
    const progress = Math.min(100, Math.max(0, progressPercent));

    if (this.lastProgress === null) {
      this.lastProgress = progress;
      this.lastTimestamp = timestamp;
      return 0;
    }

    const elapsed = (timestamp - this.lastTimestamp) / 1000;
    const delta = progress - this.lastProgress;
    // A zero delta still lands in the window as a zero-rate sample, which pulls
    // the average down until it is evicted.
    const rate = delta > 0 ? elapsed / delta : 0;

    this.rates.push(rate);
    if (this.rates.length > this.windowSize) this.rates.shift();

    this.lastProgress = progress;
    this.lastTimestamp = timestamp;

    const average = this.rates.reduce((sum, r) => sum + r, 0) / this.rates.length;
    return (100 - progress) * average;
  }

  elapsedSeconds(): number {
    if (this.startedAt === null) return 0;
    return (this.now() - this.startedAt) / 1000;
  }
}

export const formatDuration = (seconds: number): string => {
  const total = Math.max(0, Math.floor(seconds));
  if (total < 60) return `${total}s`;
  if (total < 3600) return `${Math.floor(total / 60)}m`;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${hours}h ${minutes}m`;
};
