// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { Logger } from 'pino';
import { log } from '../log.js';
import { AsyncIterableQueue, Future } from '../utils.js';
import type { InboundEvent } from './messages.js';

export interface EventStreamOptions {
  /** Backlog size above which a warning is logged, once. */
  warnThreshold: number;
  logger?: Logger;
}

/**
 * Ordered, single-consumer sequence of the events of one Live session.
 *
 * The stream is finite: it ends after the `closed` event or a fatal `session_error`. Once it
 * has ended, `next()` keeps resolving to `{ done: true }`. The backlog is unbounded; a consumer
 * that stops reading makes it grow until the session ends.
 */
export class EventStream implements AsyncIterableIterator<InboundEvent> {
  #queue = new AsyncIterableQueue<InboundEvent>();
  #warnThreshold: number;
  #warned = false;
  #detached = new Future();
  #detachListeners: Array<() => void> = [];
  #logger: Logger;

  constructor({ warnThreshold, logger }: EventStreamOptions) {
    this.#warnThreshold = warnThreshold;
    this.#logger = logger ?? log();
  }

  /** Registers a callback run once, when the consumer calls `return()`. */
  onDetach(listener: () => void): void {
    if (this.#detached.done) {
      listener();
      return;
    }
    this.#detachListeners.push(listener);
  }

  /** True once the producer has ended the stream. */
  get ended(): boolean {
    return this.#queue.closed;
  }

  /** True once the consumer has called `return()`. */
  get detached(): boolean {
    return this.#detached.done;
  }

  /** Number of events buffered and not yet consumed. */
  get backlog(): number {
    return this.#queue.size;
  }

  /** @internal */
  push(event: InboundEvent): void {
    if (this.#queue.closed) {
      this.#logger.debug({ type: event.type }, 'dropping event pushed after the stream ended');
      return;
    }
    if (this.#detached.done) return;

    this.#queue.put(event);
    if (!this.#warned && this.#queue.size > this.#warnThreshold) {
      this.#warned = true;
      this.#logger.warn(
        { backlog: this.#queue.size, threshold: this.#warnThreshold },
        'live events are not being consumed, backlog keeps growing',
      );
    }
  }

  /** @internal */
  end(): void {
    this.#queue.close();
  }

  async next(): Promise<IteratorResult<InboundEvent>> {
    if (this.#detached.done) {
      return { value: undefined, done: true };
    }
    return Promise.race([
      this.#queue.next(),
      this.#detached.await.then((): IteratorResult<InboundEvent> => ({
        value: undefined,
        done: true,
      })),
    ]);
  }

  /**
   * Detaches the consumer and settles any pending `next()` as done. Together with releasing the
   * sender, this closes the session.
   */
  async return(): Promise<IteratorResult<InboundEvent>> {
    if (!this.#detached.done) {
      this.#detached.resolve();
      const listeners = this.#detachListeners;
      this.#detachListeners = [];
      listeners.forEach((listener) => listener());
    }
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): EventStream {
    return this;
  }
}
