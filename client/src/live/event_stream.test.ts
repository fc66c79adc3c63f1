// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { EventStream } from './event_stream.js';
import type { InboundEvent } from './messages.js';

const logger = pino({ level: 'silent' });

const interrupted: InboundEvent = { type: 'interrupted' };
const goAway: InboundEvent = { type: 'go_away', timeLeftMs: 500 };
const closed: InboundEvent = { type: 'closed', code: 1000, reason: '' };

describe('EventStream', () => {
  it('yields events in push order and then ends', async () => {
    const stream = new EventStream({ warnThreshold: 10, logger });
    stream.push(interrupted);
    stream.push(goAway);
    stream.push(closed);
    stream.end();

    const received: InboundEvent[] = [];
    for await (const event of stream) {
      received.push(event);
    }
    expect(received).toEqual([interrupted, goAway, closed]);
    expect(stream.ended).toBe(true);
  });

  it('keeps reporting done after it ended', async () => {
    const stream = new EventStream({ warnThreshold: 10, logger });
    stream.end();

    expect(await stream.next()).toEqual({ value: undefined, done: true });
    expect(await stream.next()).toEqual({ value: undefined, done: true });
  });

  it('ends every read that was waiting when it ended', async () => {
    const stream = new EventStream({ warnThreshold: 10, logger });
    const reads = [stream.next(), stream.next(), stream.next()];
    stream.push(closed);
    stream.end();

    expect(await Promise.all(reads)).toEqual([
      { value: closed, done: false },
      { value: undefined, done: true },
      { value: undefined, done: true },
    ]);
    expect(await stream.next()).toEqual({ value: undefined, done: true });
  });

  it('waits for events pushed later', async () => {
    const stream = new EventStream({ warnThreshold: 10, logger });
    const pending = stream.next();
    stream.push(goAway);

    expect(await pending).toEqual({ value: goAway, done: false });
  });

  it('drops events pushed after it ended', async () => {
    const stream = new EventStream({ warnThreshold: 10, logger });
    stream.push(closed);
    stream.end();
    stream.push(interrupted);

    expect(await stream.next()).toEqual({ value: closed, done: false });
    expect(await stream.next()).toEqual({ value: undefined, done: true });
  });

  it('counts the unconsumed backlog', async () => {
    const stream = new EventStream({ warnThreshold: 10, logger });
    stream.push(interrupted);
    stream.push(goAway);
    expect(stream.backlog).toBe(2);

    await stream.next();
    expect(stream.backlog).toBe(1);
  });

  it('warns once when the backlog passes the threshold', () => {
    const warnLogger = pino({ level: 'silent' });
    const warn = vi.spyOn(warnLogger, 'warn');
    const stream = new EventStream({ warnThreshold: 2, logger: warnLogger });

    stream.push(interrupted);
    stream.push(interrupted);
    expect(warn).not.toHaveBeenCalled();

    stream.push(interrupted);
    stream.push(interrupted);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { backlog: 3, threshold: 2 },
      'live events are not being consumed, backlog keeps growing',
    );
  });

  describe('return', () => {
    it('runs the detach listeners once', async () => {
      const stream = new EventStream({ warnThreshold: 10, logger });
      const listener = vi.fn();
      stream.onDetach(listener);

      expect(await stream.return()).toEqual({ value: undefined, done: true });
      await stream.return();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(stream.detached).toBe(true);
    });

    it('runs listeners registered after the detach right away', async () => {
      const stream = new EventStream({ warnThreshold: 10, logger });
      await stream.return();

      const listener = vi.fn();
      stream.onDetach(listener);
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('stops delivering buffered and later events', async () => {
      const stream = new EventStream({ warnThreshold: 10, logger });
      stream.push(interrupted);
      await stream.return();
      stream.push(goAway);

      expect(await stream.next()).toEqual({ value: undefined, done: true });
      expect(stream.backlog).toBe(1);
    });

    it('settles a pending read as done', async () => {
      const stream = new EventStream({ warnThreshold: 10, logger });
      const pending = stream.next();
      await stream.return();

      expect(await pending).toEqual({ value: undefined, done: true });
      stream.push(goAway);
      stream.end();
      expect(await stream.next()).toEqual({ value: undefined, done: true });
    });

    it('is called when a for await loop breaks', async () => {
      const stream = new EventStream({ warnThreshold: 10, logger });
      const listener = vi.fn();
      stream.onDetach(listener);
      stream.push(interrupted);
      stream.push(goAway);

      for await (const event of stream) {
        expect(event).toEqual(interrupted);
        break;
      }
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });
});
