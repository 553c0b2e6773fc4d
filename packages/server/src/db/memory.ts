/**
 * In-memory tenant storage, used when PERSISTENCE_BACKEND=memory.
 * Follows the Postgres implementation's filtering and ordering rules.
 */

import type { TenantCatalog, WorkflowReport } from '@flowrelay/runtime';
import {
  CHILD_REQUESTER_PREFIX,
  type HistoryOrder,
  type HistoryPage,
  type HistoryQuery,
  type WorkflowHistoryStore,
} from '../types/index.js';
import { historyView } from './tenants.js';

export class MemoryTenantStore implements TenantCatalog {
  private readonly storages: Map<string, MemoryWorkflowStorage> = new Map();

  async ping(): Promise<boolean> {
    return true;
  }

  async listNamespaces(): Promise<string[]> {
    return Array.from(this.storages.keys()).sort();
  }

  storage(namespace: string): MemoryWorkflowStorage {
    let storage = this.storages.get(namespace);
    if (!storage) {
      storage = new MemoryWorkflowStorage(namespace);
      this.storages.set(namespace, storage);
    }
    return storage;
  }
}

export class MemoryWorkflowStorage implements WorkflowHistoryStore {
  private readonly reports: Map<string, WorkflowReport> = new Map();

  constructor(readonly namespace: string) {}

  async init(): Promise<void> {}

  async insert(report: WorkflowReport): Promise<void> {
    if (this.reports.has(report.id)) {
      throw new Error(`Workflow ${report.id} is already stored in ${this.namespace}`);
    }
    this.reports.set(report.id, structuredClone(report));
  }

  async getOne(id: string, full = false): Promise<WorkflowReport | null> {
    const report = this.reports.get(id);
    return report ? historyView(structuredClone(report), full) : null;
  }

  async list(query: HistoryQuery): Promise<HistoryPage> {
    const search = query.search?.toLowerCase();
    const matches = Array.from(this.reports.values()).filter((report) => {
      if (query.since && report.start.getTime() < query.since.getTime()) return false;
      if (query.state && report.state !== query.state) return false;
      if (query.root && report.requester?.startsWith(CHILD_REQUESTER_PREFIX)) return false;
      if (search && !report.template.title.toLowerCase().includes(search)) return false;
      return true;
    });

    matches.sort(historyComparator(query.order ?? 'end_desc'));

    const offset = query.offset ?? 0;
    const end = query.limit !== undefined && query.limit > 0 ? offset + query.limit : undefined;
    return {
      count: matches.length,
      items: matches.slice(offset, end).map((report) => historyView(structuredClone(report), query.full)),
    };
  }
}

type SortKey = string | number | null;

// Nulls sort as the largest value, as Postgres does
function compareKeys(a: SortKey, b: SortKey): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

function historyComparator(order: HistoryOrder): (a: WorkflowReport, b: WorkflowReport) => number {
  const [field, direction] = order.split('_');
  const key = (report: WorkflowReport): SortKey => {
    switch (field) {
      case 'title':
        return report.template.title;
      case 'start':
        return report.start.getTime();
      default:
        return report.end ? report.end.getTime() : null;
    }
  };
  const sign = direction === 'asc' ? 1 : -1;
  return (a, b) => sign * compareKeys(key(a), key(b));
}
