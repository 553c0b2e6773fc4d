/**
 * EventDurabilityQueue Tests
 */

import { describe, it, expect } from 'vitest';
import { EventDurabilityQueue, DEFAULT_QUEUE_CAPACITY } from '../persistence/queue.js';

describe('EventDurabilityQueue', () => {
  it('defaults to a capacity of 1000 entries', () => {
    const queue = new EventDurabilityQueue<number>();
    expect(queue.capacity).toBe(DEFAULT_QUEUE_CAPACITY);
    expect(queue.capacity).toBe(1000);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new EventDurabilityQueue<number>(0)).toThrow(RangeError);
  });

  it('keeps entries in insertion order', () => {
    const queue = new EventDurabilityQueue<string>(5);
    queue.put('a');
    queue.put('b');
    queue.put('c');

    expect(queue.entries()).toEqual(['a', 'b', 'c']);
    expect(queue.size).toBe(3);
  });

  describe('bounded capacity', () => {
    it('never grows past its capacity', () => {
      const queue = new EventDurabilityQueue<number>(3);
      for (let i = 0; i < 10; i++) {
        queue.put(i);
        expect(queue.size).toBeLessThanOrEqual(3);
      }
    });

    it('retains exactly the most recent entries, evicting the oldest first', () => {
      const queue = new EventDurabilityQueue<number>(3);
      for (let i = 1; i <= 7; i++) {
        queue.put(i);
      }

      expect(queue.entries()).toEqual([5, 6, 7]);
    });
  });

  describe('drainAll', () => {
    it('returns every entry in insertion order and leaves the queue empty', () => {
      const queue = new EventDurabilityQueue<string>(10);
      queue.put('first');
      queue.put('second');

      expect(queue.drainAll()).toEqual(['first', 'second']);
      expect(queue.size).toBe(0);
      expect(queue.drainAll()).toEqual([]);
    });

    it('is not affected by puts made after the drain', () => {
      const queue = new EventDurabilityQueue<string>(10);
      queue.put('before');
      const drained = queue.drainAll();
      queue.put('after');

      expect(drained).toEqual(['before']);
      expect(queue.entries()).toEqual(['after']);
    });
  });

  describe('remove', () => {
    it('removes an entry by identity', () => {
      const queue = new EventDurabilityQueue<{ id: string }>(10);
      const first = { id: 'e1' };
      const twin = { id: 'e1' };
      queue.put(first);
      queue.put(twin);

      expect(queue.remove(first)).toBe(true);
      expect(queue.entries()).toEqual([twin]);
      expect(queue.entries()[0]).toBe(twin);
    });

    it('returns false once the entry has left the queue', () => {
      const queue = new EventDurabilityQueue<{ id: string }>(10);
      const event = { id: 'e1' };
      queue.put(event);
      queue.drainAll();

      expect(queue.remove(event)).toBe(false);
    });
  });

  it('does not remove entries on read', () => {
    const queue = new EventDurabilityQueue<{ id: string }>(10);
    queue.put({ id: 'e1' });

    expect(queue.find((entry) => entry.id === 'e1')).toEqual({ id: 'e1' });
    expect(queue.entries()).toHaveLength(1);
    expect(queue.size).toBe(1);
  });
});
