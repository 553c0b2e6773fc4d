/**
 * BusPersistence
 *
 * Durable storage of bus events with an in-memory fallback.
 * - Healthy backend: store/update/retrieve write through to it
 * - Unhealthy or absent backend: events go to a bounded FIFO buffer, each
 *   expiring after a TTL, and are fed back to the backend by a periodic loop
 *   once it answers its health probe again
 *
 * Buffered events are best-effort: once drained they are written at most once
 * and never re-buffered.
 */

import { EventDurabilityQueue } from './queue.js';
import { matchesFilter, type PersistenceBackend } from './backend.js';
import { BackendUnavailableError, DurabilityWriteFailedError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { createLoggingFaultHandler, type FaultHandler } from '../faults.js';
import {
  DEFAULT_PERSISTENCE_CONFIG,
  type BusEvent,
  type BusPersistenceConfig,
  type EventFilter,
  type EventStatus,
  type NewBusEvent,
  type PersistenceState,
  type PersistenceStatus,
} from '../types.js';

// ============================================================================
// Results
// ============================================================================

export type StoreResult =
  | { outcome: 'stored' }
  | { outcome: 'buffered' }
  | { outcome: 'failed'; error: DurabilityWriteFailedError };

export type UpdateResult = StoreResult | { outcome: 'missing' };

export interface BusPersistenceOptions {
  /** Durable backend. Without one, events only live in memory. */
  backend?: PersistenceBackend | null;
  config?: Partial<BusPersistenceConfig>;
  logger?: Logger;
  faults?: FaultHandler;
}

// ============================================================================
// BusPersistence Class
// ============================================================================

export class BusPersistence {
  private readonly backend: PersistenceBackend | null;
  private readonly config: BusPersistenceConfig;
  private readonly logger: Logger;
  private readonly faults: FaultHandler;
  private readonly queue: EventDurabilityQueue<BusEvent>;
  private readonly expiryTimers: Map<BusEvent, NodeJS.Timeout> = new Map();

  private initialized = false;
  private backendError: string | null = null;
  private feedTimer: NodeJS.Timeout | null = null;
  private draining: Promise<void> | null = null;
  private state: PersistenceState = 'stopped';
  private drained = 0;
  private drainFailures = 0;
  private lastDrainAt: Date | null = null;

  constructor(options: BusPersistenceOptions = {}) {
    this.backend = options.backend ?? null;
    this.config = { ...DEFAULT_PERSISTENCE_CONFIG, ...options.config };
    this.logger = (options.logger ?? createLogger('flowrelay')).child({ component: 'bus-persistence' });
    this.faults = options.faults ?? createLoggingFaultHandler(this.logger);
    this.queue = new EventDurabilityQueue<BusEvent>(this.config.queueSize, this.logger);

    if (!this.backend) {
      this.logger.info('No persistence backend selected, in-memory only');
    }
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Initialize the backend's schema. No-op without a backend.
   * On failure the schema setup is retried before the next write-through or drain.
   */
  async init(): Promise<void> {
    if (!this.backend) return;

    try {
      await this.backend.init();
      this.initialized = true;
    } catch (error) {
      throw new DurabilityWriteFailedError(
        `Persistence backend init failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Start feeding buffered events to the backend.
   */
  start(): void {
    if (this.state === 'running' || !this.backend) return;

    this.state = 'running';
    this.feedTimer = setInterval(() => {
      if (this.queue.size === 0) return;
      this.flush().catch((error: unknown) => {
        this.faults({ message: 'Bus persistence feed loop failed', error });
      });
    }, this.config.feedIntervalMs);

    this.logger.info(
      { feedIntervalMs: this.config.feedIntervalMs },
      'Bus persistence feed loop started'
    );
  }

  /**
   * Stop the feed loop and make one last attempt at emptying the buffer.
   * In-flight backend writes are not aborted.
   */
  async close(): Promise<void> {
    if (this.state === 'stopping') return;

    this.state = 'stopping';
    if (this.feedTimer) clearInterval(this.feedTimer);
    this.feedTimer = null;

    for (const timer of this.expiryTimers.values()) clearTimeout(timer);
    this.expiryTimers.clear();

    if (this.draining) await this.draining;
    await this.flush();

    this.state = 'stopped';
    this.logger.info('Bus persistence closed');
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Connection check. False when no backend is configured or the probe throws.
   */
  async ping(): Promise<boolean> {
    if (!this.backend) return false;

    try {
      return await this.backend.ping();
    } catch (error) {
      this.logger.debug({ err: error }, 'Persistence backend ping failed');
      return false;
    }
  }

  /**
   * Store a bus event, stamping its creation date. Never throws.
   */
  async store(event: NewBusEvent): Promise<StoreResult> {
    const stamped: BusEvent = { ...event, createdAt: new Date() };

    const backend = await this.connected();
    if (backend) {
      try {
        await backend.store(stamped);
        return { outcome: 'stored' };
      } catch (error) {
        return { outcome: 'failed', error: this.writeFailed('store', stamped.id, error) };
      }
    }

    this.queue.put(stamped);
    this.scheduleExpiry(stamped);
    return { outcome: 'buffered' };
  }

  /**
   * Update the status of a stored or buffered event. Never throws.
   */
  async update(id: string, status: EventStatus): Promise<UpdateResult> {
    // A buffered copy not yet drained would otherwise reach the backend with its old status
    const buffered = this.queue.find((event) => event.id === id);
    if (buffered) {
      buffered.status = status;
    }

    const backend = await this.connected();
    if (backend) {
      try {
        await backend.update(id, status);
        return { outcome: 'stored' };
      } catch (error) {
        return { outcome: 'failed', error: this.writeFailed('update', id, error) };
      }
    }

    return buffered ? { outcome: 'buffered' } : { outcome: 'missing' };
  }

  /**
   * Events created since `since` and/or matching `status`.
   * Falls back to the buffer when the backend is down or its read fails.
   */
  async retrieve(filter: EventFilter = {}): Promise<BusEvent[]> {
    const backend = await this.connected();
    if (backend) {
      try {
        return await backend.retrieve(filter);
      } catch (error) {
        this.faults({
          message: 'Persistence backend retrieve failed, answering from memory',
          error,
        });
      }
    }

    return this.queue.entries().filter((event) => matchesFilter(event, filter));
  }

  /**
   * Drain the buffer into the backend now. Concurrent calls share one drain.
   */
  flush(): Promise<void> {
    if (!this.draining) {
      this.draining = this.emptyBuffer().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  getStatus(): PersistenceStatus {
    return {
      state: this.state,
      backend: this.backend ? 'configured' : 'none',
      buffered: this.queue.size,
      drained: this.drained,
      drainFailures: this.drainFailures,
      lastDrainAt: this.lastDrainAt,
      backendError: this.backendError,
    };
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private async emptyBuffer(): Promise<void> {
    if (!this.backend || this.queue.size === 0) return;

    const backend = await this.connected();
    if (!backend) {
      this.logger.warn(
        { buffered: this.queue.size },
        'No connection to backend to empty in-memory events'
      );
      return;
    }

    const events = this.queue.drainAll();
    let failed = 0;

    for (const event of events) {
      this.clearExpiry(event);
      try {
        await backend.store(event);
        this.drained++;
      } catch (error) {
        failed++;
        this.drainFailures++;
        this.writeFailed('drain', event.id, error);
      }
    }

    this.lastDrainAt = new Date();
    this.logger.info(
      { written: events.length - failed, failed },
      'Events from memory dumped into backend'
    );
  }

  /**
   * The backend when it answers its probe and its schema is in place, null otherwise.
   */
  private async connected(): Promise<PersistenceBackend | null> {
    if (!this.backend) return null;

    try {
      await this.ensureAvailable(this.backend);
      this.backendError = null;
      return this.backend;
    } catch (error) {
      this.backendError = errorMessage(error);
      this.logger.debug({ err: error }, 'Persistence backend unavailable, using memory');
      return null;
    }
  }

  private async ensureAvailable(backend: PersistenceBackend): Promise<void> {
    let reachable: boolean;
    try {
      reachable = await backend.ping();
    } catch (error) {
      throw new BackendUnavailableError(
        `Persistence backend is unavailable: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    if (!reachable) {
      throw new BackendUnavailableError();
    }

    if (this.initialized) return;
    try {
      await backend.init();
    } catch (error) {
      throw new BackendUnavailableError(
        `Persistence backend init failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    this.initialized = true;
    this.logger.info('Persistence backend initialized');
  }

  private scheduleExpiry(event: BusEvent): void {
    const timer = setTimeout(() => {
      this.expiryTimers.delete(event);
      if (this.queue.remove(event)) {
        this.logger.debug({ eventId: event.id }, 'Buffered event expired');
      }
    }, this.config.memoryTtlMs);
    timer.unref();
    this.expiryTimers.set(event, timer);
  }

  private clearExpiry(event: BusEvent): void {
    const timer = this.expiryTimers.get(event);
    if (timer) {
      clearTimeout(timer);
      this.expiryTimers.delete(event);
    }
  }

  private writeFailed(
    operation: 'store' | 'update' | 'drain',
    eventId: string,
    cause: unknown
  ): DurabilityWriteFailedError {
    const error = new DurabilityWriteFailedError(
      `Bus event ${operation} failed for ${eventId}: ${errorMessage(cause)}`,
      { cause }
    );
    this.faults({ message: error.message, error, context: { eventId, operation } });
    return error;
  }
}
