/**
 * FileMutex Unit Tests
 */

import { FileMutex } from '../../src/queue/file-mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('FileMutex', () => {
  let mutex: FileMutex;

  beforeEach(() => {
    mutex = new FileMutex();
  });

  describe('withLock', () => {
    it('should return the result of the operation', async () => {
      const result = await mutex.withLock('/queue/default.jsonl', async () => 'done');

      expect(result).toBe('done');
    });

    it('should release the lock when the operation throws', async () => {
      await expect(
        mutex.withLock('/queue/default.jsonl', async () => {
          throw new Error('write failed');
        })
      ).rejects.toThrow('write failed');

      await expect(mutex.withLock('/queue/default.jsonl', async () => 'again')).resolves.toBe(
        'again'
      );
      expect(mutex.hasPendingOperations()).toBe(false);
    });

    it('should serialize concurrent operations on the same path', async () => {
      const events: string[] = [];

      await Promise.all(
        [1, 2, 3].map((n) =>
          mutex.withLock('/queue/default.jsonl', async () => {
            events.push(`start ${n}`);
            await delay(10);
            events.push(`end ${n}`);
          })
        )
      );

      expect(events).toEqual(['start 1', 'end 1', 'start 2', 'end 2', 'start 3', 'end 3']);
    });

    it('should treat equivalent paths as one lock', async () => {
      const events: string[] = [];

      await Promise.all([
        mutex.withLock('/queue/a/../default.jsonl', async () => {
          events.push('start first');
          await delay(10);
          events.push('end first');
        }),
        mutex.withLock('/queue/default.jsonl', async () => {
          events.push('second');
        }),
      ]);

      expect(events).toEqual(['start first', 'end first', 'second']);
    });

    it('should let different paths run side by side', async () => {
      const events: string[] = [];

      await Promise.all([
        mutex.withLock('/queue/home.jsonl', async () => {
          events.push('start home');
          await delay(10);
          events.push('end home');
        }),
        mutex.withLock('/queue/work.jsonl', async () => {
          events.push('start work');
          await delay(10);
          events.push('end work');
        }),
      ]);

      expect(events.slice(0, 2)).toEqual(['start home', 'start work']);
    });

    it('should complete many waiters in arrival order', async () => {
      const order: number[] = [];

      const values = await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          mutex.withLock('/queue/default.jsonl', async () => {
            await delay(1);
            order.push(i);
            return i;
          })
        )
      );

      expect(order).toEqual(values);
      expect(values).toHaveLength(20);
    });
  });

  describe('hasPendingOperations', () => {
    it('should stay pending until the last queued operation finishes', async () => {
      const first = mutex.withLock('/queue/default.jsonl', () => delay(20));
      const second = mutex.withLock('/queue/default.jsonl', async () => 'queued');

      expect(mutex.hasPendingOperations()).toBe(true);
      await first;
      await expect(second).resolves.toBe('queued');
      expect(mutex.hasPendingOperations()).toBe(false);
    });
  });

  describe('waitForPending', () => {
    it('should resolve immediately when idle', async () => {
      await expect(mutex.waitForPending()).resolves.toBeUndefined();
    });

    it('should wait for an in-flight operation', async () => {
      let finished = false;
      const operation = mutex.withLock('/queue/default.jsonl', async () => {
        await delay(30);
        finished = true;
      });

      expect(mutex.hasPendingOperations()).toBe(true);
      await mutex.waitForPending();

      expect(finished).toBe(true);
      await operation;
    });

    it('should wait for operations still queued behind the holder', async () => {
      const order: string[] = [];
      const operations = [
        mutex.withLock('/queue/default.jsonl', async () => {
          await delay(10);
          order.push('first');
        }),
        mutex.withLock('/queue/default.jsonl', async () => {
          await delay(10);
          order.push('second');
        }),
      ];

      await mutex.waitForPending();

      expect(order).toEqual(['first', 'second']);
      await Promise.all(operations);
    });
  });
});
