/**
 * In-process fakes for the runtime's storage and delivery contracts
 */

import { vi } from 'vitest';
import { matchesFilter, type PersistenceBackend } from '../../persistence/backend.js';
import type { TenantCatalog } from '../../tenancy/registry.js';
import type { LiveDelivery, LiveSubscriber, WorkflowHistoryStorage } from '../../workflow/registry.js';
import { createLogger } from '../../logger.js';
import type {
  BusEvent,
  EventFilter,
  EventStatus,
  LivePayload,
  WorkflowReport,
  WorkflowTemplate,
} from '../../types.js';

export const silentLogger = createLogger('test', 'silent');

// ============================================================================
// Bus Event Backend
// ============================================================================

export class FakeBackend implements PersistenceBackend {
  healthy = true;
  events: BusEvent[] = [];
  /** Event ids whose store call is rejected */
  rejecting: Set<string> = new Set();

  init = vi.fn(async (): Promise<void> => undefined);

  async ping(): Promise<boolean> {
    return this.healthy;
  }

  async store(event: BusEvent): Promise<void> {
    if (this.rejecting.has(event.id)) {
      throw new Error(`write rejected for ${event.id}`);
    }
    this.events.push({ ...event });
  }

  async update(id: string, status: EventStatus): Promise<void> {
    // Like an UPDATE matching no row: unknown ids are left alone
    const event = this.events.find((candidate) => candidate.id === id);
    if (event) {
      event.status = status;
    }
  }

  async retrieve(filter: EventFilter): Promise<BusEvent[]> {
    return this.events.filter((event) => matchesFilter(event, filter));
  }
}

// ============================================================================
// Tenant Stores
// ============================================================================

export class FakeCatalog implements TenantCatalog {
  reachable = true;
  namespaces: string[] = [];
  pings = 0;

  async ping(): Promise<boolean> {
    this.pings++;
    return this.reachable;
  }

  async listNamespaces(): Promise<string[]> {
    return [...this.namespaces];
  }
}

export class FakeHistoryStorage implements WorkflowHistoryStorage {
  inits = 0;
  reports: WorkflowReport[] = [];
  failInsert = false;

  constructor(readonly namespace: string) {}

  async init(): Promise<void> {
    this.inits++;
    // Yield so concurrent callers overlap with the setup
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  async insert(report: WorkflowReport): Promise<void> {
    if (this.failInsert) {
      throw new Error('insert rejected');
    }
    this.reports.push(report);
  }
}

// ============================================================================
// Live Delivery
// ============================================================================

export interface TestSubscriber extends LiveSubscriber {
  organization: string;
}

export class RecordingDelivery implements LiveDelivery<TestSubscriber> {
  deliveries: Array<{ subscriberId: string; payload: LivePayload }> = [];

  async send(subscribers: readonly TestSubscriber[], payload: LivePayload): Promise<void> {
    for (const subscriber of subscribers) {
      this.deliveries.push({ subscriberId: subscriber.id, payload });
    }
  }

  to(subscriberId: string): LivePayload[] {
    return this.deliveries
      .filter((delivery) => delivery.subscriberId === subscriberId)
      .map((delivery) => delivery.payload);
  }
}

// ============================================================================
// Fixtures
// ============================================================================

export function createTemplateFixture(overrides: Partial<WorkflowTemplate> = {}): WorkflowTemplate {
  return {
    id: 'tmpl-1',
    version: 3,
    title: 'Ingest orders',
    state: 'active',
    tasks: [
      { id: 't1', name: 'fetch', title: 'Fetch orders', config: { source: 'queue-a' } },
      { id: 't2', name: 'store', title: 'Store orders', config: { table: 'orders' } },
    ],
    ...overrides,
  };
}
