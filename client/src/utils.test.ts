// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import { initializeLogger } from './log.js';
import {
  AsyncIterableQueue,
  Future,
  InvalidErrorType,
  Queue,
  TIMEOUT_SENTINEL,
  delay,
  shortuuid,
  toError,
  withTimeout,
} from './utils.js';

describe('utils', () => {
  initializeLogger({ pretty: false, level: 'silent' });

  describe('Queue', () => {
    it('returns items in insertion order', async () => {
      const queue = new Queue<number>();
      await queue.put(1);
      await queue.put(2);

      expect(await queue.get()).toBe(1);
      expect(await queue.get()).toBe(2);
      expect(queue.size).toBe(0);
    });

    it('get waits for the next put', async () => {
      const queue = new Queue<string>();
      let received: string | undefined;
      const pending = queue.get().then((item) => {
        received = item;
      });

      await delay(10);
      expect(received).toBeUndefined();

      await queue.put('a');
      await pending;
      expect(received).toBe('a');
    });

    it('put waits for room when the queue is full', async () => {
      const queue = new Queue<number>(1);
      await queue.put(1);
      let stored = false;
      const blocked = queue.put(2).then(() => {
        stored = true;
      });

      await delay(10);
      expect(stored).toBe(false);

      expect(await queue.get()).toBe(1);
      await blocked;
      expect(stored).toBe(true);
      expect(await queue.get()).toBe(2);
    });
  });

  describe('Future', () => {
    it('resolves once', async () => {
      const future = new Future<number>();
      expect(future.done).toBe(false);

      future.resolve(1);
      future.resolve(2);
      future.reject(new Error('ignored'));

      expect(future.done).toBe(true);
      expect(await future.await).toBe(1);
    });

    it('rejects with the given error', async () => {
      const future = new Future();
      const error = new Error('failed');
      future.reject(error);

      await expect(future.await).rejects.toBe(error);
    });
  });

  describe('AsyncIterableQueue', () => {
    it('iterates until closed', async () => {
      const queue = new AsyncIterableQueue<number>();
      queue.put(1);
      queue.put(2);
      queue.close();

      const items: number[] = [];
      for await (const item of queue) {
        items.push(item);
      }
      expect(items).toEqual([1, 2]);
    });

    it('counts buffered items without the close marker', () => {
      const queue = new AsyncIterableQueue<number>();
      queue.put(1);
      queue.close();

      expect(queue.size).toBe(1);
      expect(queue.closed).toBe(true);
    });

    it('refuses items after close', () => {
      const queue = new AsyncIterableQueue<number>();
      queue.close();
      expect(() => queue.put(1)).toThrow('Queue is closed');
    });

    it('wakes a pending reader on close', async () => {
      const queue = new AsyncIterableQueue<number>();
      const pending = queue.next();
      queue.close();

      expect(await pending).toEqual({ value: undefined, done: true });
    });

    it('wakes every pending reader on close', async () => {
      const queue = new AsyncIterableQueue<number>();
      const readers = [queue.next(), queue.next(), queue.next()];
      queue.put(1);
      queue.close();

      expect(await Promise.all(readers)).toEqual([
        { value: 1, done: false },
        { value: undefined, done: true },
        { value: undefined, done: true },
      ]);
      expect(await queue.next()).toEqual({ value: undefined, done: true });
      expect(queue.size).toBe(0);
    });
  });

  describe('withTimeout', () => {
    it('returns the value when the promise settles first', async () => {
      expect(await withTimeout(Promise.resolve('ok'), 100)).toBe('ok');
    });

    it('returns the sentinel when the timer fires first', async () => {
      const never = new Future<string>();
      expect(await withTimeout(never.await, 10)).toBe(TIMEOUT_SENTINEL);
    });

    it('passes rejections through', async () => {
      const error = new Error('failed');
      await expect(withTimeout(Promise.reject(error), 100)).rejects.toBe(error);
    });
  });

  describe('delay', () => {
    it('rejects with the abort reason', async () => {
      const controller = new AbortController();
      const pending = delay(1000, { signal: controller.signal });
      controller.abort(new Error('stop'));

      await expect(pending).rejects.toThrow('stop');
    });

    it('rejects right away with an aborted signal', async () => {
      await expect(delay(1000, { signal: AbortSignal.abort('early') })).rejects.toBe('early');
    });
  });

  describe('toError', () => {
    it('keeps errors as they are', () => {
      const error = new TypeError('bad');
      expect(toError(error)).toBe(error);
    });

    it('wraps other values', () => {
      const error = toError('bad');
      expect(error).toBeInstanceOf(InvalidErrorType);
      expect(error.message).toBe('Expected error, got bad (string)');
    });
  });

  describe('shortuuid', () => {
    it('adds the prefix to a 12 character id', () => {
      const id = shortuuid('live_');
      expect(id).toMatch(/^live_[0-9a-f-]{12}$/);
      expect(shortuuid('live_')).not.toBe(id);
    });
  });
});
