/**
 * File Mutex
 *
 * In-process lock per queue file so read-modify-write cycles never
 * interleave. Waiters are chained on the previous holder's promise, so
 * they run in arrival order.
 */

import { resolve } from 'path';
import { queueLogger } from '../utils/logger.js';

const SLOW_WAIT_MS = 5000;

export class FileMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();
  private pending = 0;
  private idleWaiters: Array<() => void> = [];

  /**
   * Run an operation while holding the lock for a file path
   */
  async withLock<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
    const key = resolve(filePath);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((done) => {
      release = done;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);
    this.pending++;

    const queuedAt = Date.now();
    try {
      await previous;
      const waitedMs = Date.now() - queuedAt;
      if (waitedMs >= SLOW_WAIT_MS) {
        queueLogger.warn({ filePath: key, waitedMs }, 'Long wait for queue file lock');
      }
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
      this.pending--;
      if (this.pending === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((notify) => notify());
      }
    }
  }

  /**
   * True while any operation holds or waits for a lock
   */
  hasPendingOperations(): boolean {
    return this.pending > 0;
  }

  /**
   * Resolve once every held and queued operation has finished
   */
  waitForPending(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((done) => {
      this.idleWaiters.push(done);
    });
  }
}
