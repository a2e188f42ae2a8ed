/**
 * Throttler - Collapses bursts of calls into one delayed execution.
 *
 * The first call of a burst arms a timer for `minimumDelayMs`. Calls that
 * arrive before it fires replace the held work without moving the timer.
 * When the timer fires less than `minimumDelayMs` after the latest call,
 * it is re-armed for the remainder, so a continuous burst runs once, with
 * the most recent work, after it goes quiet.
 *
 * @example
 * ```typescript
 * const throttler = new Throttler({ minimumDelayMs: 500 });
 *
 * input.addEventListener('input', () => {
 *   const bin = input.value.slice(0, 6);
 *   throttler.throttle(() => lookupBin(bin));
 * });
 *
 * // when the field goes away
 * throttler.dispose();
 * ```
 */

import type { ThrottlerConfig } from '../types';
import { InvalidConfigurationError } from './errors';
import { createLogger } from './logger';
import type { Logger } from './logger';

export type Work = () => void;

export class Throttler {
  private config: Required<ThrottlerConfig>;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pendingWork: Work | null = null;
  private lastCallAt = 0;
  private disposed = false;
  private log: Logger;

  constructor(config: ThrottlerConfig) {
    if (!Number.isFinite(config.minimumDelayMs) || config.minimumDelayMs <= 0) {
      throw new InvalidConfigurationError(
        'minimumDelayMs',
        `minimumDelayMs must be a positive number of milliseconds, got ${config.minimumDelayMs}`
      );
    }

    this.config = {
      minimumDelayMs: config.minimumDelayMs,
      onError: config.onError || (() => {}),
      debug: config.debug || false
    };
    this.log = createLogger(this.config.debug, 'throttler');
  }

  /** Delay fixed at construction. */
  get minimumDelayMs(): number {
    return this.config.minimumDelayMs;
  }

  /** Whether a window is open and work is waiting for the timer. */
  get isPending(): boolean {
    return this.timer !== null;
  }

  /**
   * Submit work. Runs once calls have been quiet for `minimumDelayMs`,
   * unless newer work is submitted first. No-op once disposed.
   */
  throttle(work: Work): void {
    if (this.disposed) return;

    this.pendingWork = work;
    this.lastCallAt = Date.now();

    if (this.timer) {
      this.log('Replaced pending work');
      return;
    }

    this.log('Opening window of', this.config.minimumDelayMs, 'ms');
    this.timer = setTimeout(() => this.fire(), this.config.minimumDelayMs);
  }

  /** Drop any pending work and stop the timer. Later calls are ignored. */
  dispose(): void {
    this.disposed = true;
    this.pendingWork = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private fire(): void {
    this.timer = null;

    const quietFor = Date.now() - this.lastCallAt;
    if (quietFor < this.config.minimumDelayMs) {
      this.timer = setTimeout(() => this.fire(), this.config.minimumDelayMs - quietFor);
      return;
    }

    const work = this.pendingWork;
    this.pendingWork = null;

    if (!work) return;

    try {
      work();
    } catch (error) {
      this.log('Throttled work failed:', error);
      this.config.onError(error);
    }
  }
}

/**
 * Builds work that reaches its owner through a `WeakRef`.
 * If the owner has been collected by the time the timer fires, nothing runs.
 */
export function weakWork<Owner extends object>(owner: Owner, run: (owner: Owner) => void): Work {
  const ref = new WeakRef(owner);
  return () => {
    const current = ref.deref();
    if (current) {
      run(current);
    }
  };
}
