/**
 * Semaphore for concurrency control
 *
 * With a single permit it is the critical section that serializes every
 * mutation of one session.
 */

import { logger } from './logger.js';

const log = logger.child('semaphore');

export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiters: Array<() => void> = [];
  private readonly name: string;

  constructor(name: string, maxPermits: number = 1) {
    if (maxPermits < 1) {
      throw new RangeError(`Semaphore '${name}' needs at least one permit`);
    }
    this.name = name;
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  /**
   * Acquire a permit, waiting in FIFO order when none is free
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
      log.debug('Waiting for permit', { name: this.name, queued: this.waiters.length });
    });
  }

  /**
   * Acquire a permit without waiting
   */
  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return false;
  }

  /**
   * Release a permit, handing it straight to the next waiter if any
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }

    if (this.permits >= this.maxPermits) {
      throw new Error(`Semaphore '${this.name}' released more often than acquired`);
    }
    this.permits++;
  }

  /**
   * Run `fn` while holding a permit
   */
  async execute<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.permits === 0;
  }

  getState(): { available: number; maxPermits: number; queued: number } {
    return {
      available: this.permits,
      maxPermits: this.maxPermits,
      queued: this.waiters.length,
    };
  }
}
