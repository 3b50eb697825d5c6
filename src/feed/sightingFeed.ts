import type { Sighting } from '../domain/sighting.js';
import { logger } from '../utils/logger.js';
import { RingBuffer } from '../utils/ringBuffer.js';

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export type SightingFeedStatus = {
  buffered: number;
  capacity: number;
  pushed: number;
  dropped: number;
  ended: boolean;
};

/**
 * Push-to-pull bridge between the ingest route and the aggregator. The aggregator pulls one
 * sighting at a time; while it is busy, pushes wait in a bounded buffer that drops the oldest.
 * Single consumer.
 */
export class SightingFeed implements AsyncIterable<Sighting> {
  private buffer: RingBuffer<Sighting>;
  private waiter: ((result: IteratorResult<Sighting, undefined>) => void) | undefined;
  private ended = false;
  private pushed = 0;
  private dropped = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid feed capacity: ${capacity}`);
    }
    this.buffer = new RingBuffer<Sighting>(capacity);
  }

  /** Returns false once the feed has ended. */
  push(sighting: Sighting): boolean {
    if (this.ended) return false;
    this.pushed++;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ done: false, value: sighting });
      return true;
    }

    const { dropped } = this.buffer.push(sighting);
    if (dropped) {
      this.dropped++;
      logger.warn('feed_sighting_dropped', {
        tweetId: dropped.tweetId,
        boss: dropped.bossName,
        capacity: this.buffer.maxSize,
        droppedTotal: this.dropped,
      });
    }
    return true;
  }

  /** Completes the stream once whatever is buffered has been pulled. */
  end(): void {
    if (this.ended) return;
    this.ended = true;

    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(DONE);
  }

  status(): SightingFeedStatus {
    return {
      buffered: this.buffer.length,
      capacity: this.buffer.maxSize,
      pushed: this.pushed,
      dropped: this.dropped,
      ended: this.ended,
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<Sighting, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.end();
        this.buffer.drain(this.buffer.length);
        return Promise.resolve(DONE);
      },
    };
  }

  private next(): Promise<IteratorResult<Sighting, undefined>> {
    const [sighting] = this.buffer.drain(1);
    if (sighting) return Promise.resolve({ done: false, value: sighting });
    if (this.ended) return Promise.resolve(DONE);
    if (this.waiter) return Promise.reject(new Error('sighting feed already has a pending reader'));

    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }
}
