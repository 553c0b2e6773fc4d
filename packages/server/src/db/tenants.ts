/**
 * Postgres tenant storage: one schema per organization, named `<prefix><organization>`
 */

import { and, asc, count, desc, eq, gte, ilike, sql, type SQL } from 'drizzle-orm';
import type pg from 'pg';
import type { Logger, TenantCatalog, WorkflowReport } from '@flowrelay/runtime';
import {
  CHILD_REQUESTER_PREFIX,
  type HistoryOrder,
  type HistoryPage,
  type HistoryQuery,
  type WorkflowHistoryStore,
} from '../types/index.js';
import {
  workflowInstancesTable,
  type WorkflowInstanceRow,
  type WorkflowInstancesTable,
} from './schema.js';
import { checkDatabaseConnection, type Database } from './index.js';

// ============================================================================
// Catalog
// ============================================================================

export class PgTenantCatalog implements TenantCatalog {
  constructor(
    private readonly pool: pg.Pool,
    private readonly db: Database,
    private readonly logger?: Logger
  ) {}

  ping(): Promise<boolean> {
    return checkDatabaseConnection(this.pool, this.logger);
  }

  async listNamespaces(): Promise<string[]> {
    const result = await this.db.execute(
      sql`SELECT schema_name FROM information_schema.schemata ORDER BY schema_name`
    );
    return result.rows.flatMap((row) =>
      typeof row.schema_name === 'string' ? [row.schema_name] : []
    );
  }
}

// ============================================================================
// Workflow History Storage
// ============================================================================

export class PgWorkflowStorage implements WorkflowHistoryStore {
  private readonly table: WorkflowInstancesTable;

  constructor(
    private readonly db: Database,
    readonly namespace: string
  ) {
    this.table = workflowInstancesTable(namespace);
  }

  // Idempotent schema, table and index setup
  async init(): Promise<void> {
    const schema = sql.identifier(this.namespace);
    await this.db.execute(sql`CREATE SCHEMA IF NOT EXISTS ${schema}`);
    await this.db.execute(
      sql`CREATE TABLE IF NOT EXISTS ${schema}.workflow_instances (id TEXT PRIMARY KEY, organization TEXT NOT NULL, state TEXT NOT NULL, requester TEXT, track TEXT, title TEXT NOT NULL, start TIMESTAMP WITH TIME ZONE NOT NULL, "end" TIMESTAMP WITH TIME ZONE, template JSONB NOT NULL, tasks JSONB NOT NULL)`
    );
    await this.db.execute(sql`CREATE INDEX IF NOT EXISTS idx_workflow_instances_state ON ${schema}.workflow_instances(state)`);
    await this.db.execute(sql`CREATE INDEX IF NOT EXISTS idx_workflow_instances_requester ON ${schema}.workflow_instances(requester)`);
    await this.db.execute(sql`CREATE INDEX IF NOT EXISTS idx_workflow_instances_title ON ${schema}.workflow_instances(title)`);
    await this.db.execute(sql`CREATE INDEX IF NOT EXISTS idx_workflow_instances_start ON ${schema}.workflow_instances(start DESC)`);
    await this.db.execute(sql`CREATE INDEX IF NOT EXISTS idx_workflow_instances_end ON ${schema}.workflow_instances("end" DESC)`);
  }

  async insert(report: WorkflowReport): Promise<void> {
    await this.db.insert(this.table).values({
      id: report.id,
      organization: report.organization,
      state: report.state,
      requester: report.requester,
      track: report.track,
      title: report.template.title,
      start: report.start,
      end: report.end,
      template: report.template,
      tasks: report.tasks,
    });
  }

  async getOne(id: string, full = false): Promise<WorkflowReport | null> {
    const [row] = await this.db.select().from(this.table).where(eq(this.table.id, id)).limit(1);
    return row ? historyView(toReport(row), full) : null;
  }

  async list(query: HistoryQuery): Promise<HistoryPage> {
    const where = historyConditions(this.table, query);

    const [{ total }] = await this.db.select({ total: count() }).from(this.table).where(where);

    let statement = this.db
      .select()
      .from(this.table)
      .where(where)
      .orderBy(historyOrder(this.table, query.order))
      .$dynamic();
    if (query.offset !== undefined && query.offset > 0) {
      statement = statement.offset(query.offset);
    }
    if (query.limit !== undefined && query.limit > 0) {
      statement = statement.limit(query.limit);
    }

    const rows = await statement;
    return { count: total, items: rows.map((row) => historyView(toReport(row), query.full)) };
  }
}

// ============================================================================
// Query Helpers
// ============================================================================

/**
 * Escape LIKE wildcards so the search term matches literally
 */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * A stored report as history reads return it: the template graph only comes with full reads.
 */
export function historyView(report: WorkflowReport, full = false): WorkflowReport {
  if (full) return report;
  const template = { ...report.template };
  delete template.graph;
  return { ...report, template };
}

function historyConditions(table: WorkflowInstancesTable, query: HistoryQuery): SQL | undefined {
  const conditions: SQL[] = [];

  if (query.since) {
    conditions.push(gte(table.start, query.since));
  }
  if (query.state) {
    conditions.push(eq(table.state, query.state));
  }
  if (query.root) {
    conditions.push(
      sql`(${table.requester} IS NULL OR ${table.requester} NOT LIKE ${`${escapeLike(CHILD_REQUESTER_PREFIX)}%`})`
    );
  }
  if (query.search) {
    conditions.push(ilike(table.title, `%${escapeLike(query.search)}%`));
  }

  return and(...conditions);
}

function historyOrder(table: WorkflowInstancesTable, order: HistoryOrder = 'end_desc'): SQL {
  switch (order) {
    case 'title_asc':
      return asc(table.title);
    case 'title_desc':
      return desc(table.title);
    case 'start_asc':
      return asc(table.start);
    case 'start_desc':
      return desc(table.start);
    case 'end_asc':
      return asc(table.end);
    case 'end_desc':
      return desc(table.end);
  }
}

function toReport(row: WorkflowInstanceRow): WorkflowReport {
  return {
    id: row.id,
    organization: row.organization,
    requester: row.requester,
    track: row.track,
    state: row.state,
    start: row.start,
    end: row.end,
    template: row.template,
    tasks: row.tasks,
  };
}
