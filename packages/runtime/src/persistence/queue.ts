/**
 * EventDurabilityQueue
 *
 * Bounded, insertion-ordered buffer of events not yet stored by the backend.
 * When full, the oldest entries are evicted first. Eviction is silent data loss.
 * All mutations are synchronous, so interleaved async tasks never observe a
 * half-applied put or drain.
 */

import type { Logger } from '../logger.js';

export const DEFAULT_QUEUE_CAPACITY = 1000;

export class EventDurabilityQueue<T> {
  private items: T[] = [];

  constructor(
    readonly capacity: number = DEFAULT_QUEUE_CAPACITY,
    private readonly logger?: Logger
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    this.items.push(item);
    while (this.items.length > this.capacity) {
      this.logger?.debug({ size: this.items.length }, 'Event buffer full, evicting oldest entry');
      this.items.shift();
    }
  }

  /**
   * Remove and return every buffered entry in insertion order.
   */
  drainAll(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  /**
   * Remove an entry by identity. Returns false if it is no longer buffered.
   */
  remove(item: T): boolean {
    const index = this.items.indexOf(item);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  find(predicate: (item: T) => boolean): T | undefined {
    return this.items.find(predicate);
  }

  entries(): readonly T[] {
    return [...this.items];
  }
}
