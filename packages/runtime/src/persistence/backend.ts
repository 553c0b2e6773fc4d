/**
 * Durable store contract for bus events, implemented once per backend kind.
 */

import type { BusEvent, EventFilter, EventStatus } from '../types.js';

export interface PersistenceBackend {
  /** Idempotent schema/index setup */
  init(): Promise<void>;
  /** Reachability probe. Implementations should resolve false rather than throw. */
  ping(): Promise<boolean>;
  store(event: BusEvent): Promise<void>;
  update(id: string, status: EventStatus): Promise<void>;
  /** Events matching the filter, oldest first */
  retrieve(filter: EventFilter): Promise<BusEvent[]>;
}

/**
 * In-memory predicate shared by the buffered retrieve path and test backends.
 */
export function matchesFilter(event: BusEvent, filter: EventFilter): boolean {
  if (filter.since && event.createdAt.getTime() < filter.since.getTime()) {
    return false;
  }

  if (filter.status !== undefined) {
    if (Array.isArray(filter.status)) {
      return filter.status.includes(event.status);
    }
    return event.status === filter.status;
  }

  return true;
}
