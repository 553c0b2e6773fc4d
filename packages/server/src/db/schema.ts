import { pgEnum, pgSchema, pgTable, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { ExecState, ReportTask, WorkflowReport } from '@flowrelay/runtime';

// Enums
export const eventStatusEnum = pgEnum('event_status', ['pending', 'sent', 'failed']);

// Bus events table (shared, public schema)
export const busEvents = pgTable(
  'bus_events',
  {
    id: text('id').primaryKey(),
    status: eventStatusEnum('status').notNull().default('pending'),
    topic: text('topic').notNull(),
    payload: text('payload').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    statusIdx: index('idx_bus_events_status').on(table.status),
    createdAtIdx: index('idx_bus_events_created_at').on(table.createdAt),
  })
);

/**
 * Finished workflow reports of one organization, in the organization's own schema.
 * The merged report body is kept as JSONB next to the columns used for filtering.
 */
export function workflowInstancesTable(namespace: string) {
  return pgSchema(namespace).table('workflow_instances', {
    id: text('id').primaryKey(),
    organization: text('organization').notNull(),
    state: text('state').$type<ExecState>().notNull(),
    requester: text('requester'),
    track: text('track'),
    title: text('title').notNull(),
    start: timestamp('start', { withTimezone: true }).notNull(),
    end: timestamp('end', { withTimezone: true }),
    template: jsonb('template').$type<WorkflowReport['template']>().notNull(),
    tasks: jsonb('tasks').$type<ReportTask[]>().notNull(),
  });
}

export type WorkflowInstancesTable = ReturnType<typeof workflowInstancesTable>;

// Types inferred from schema
export type BusEventRow = typeof busEvents.$inferSelect;
export type NewBusEventRow = typeof busEvents.$inferInsert;
export type WorkflowInstanceRow = WorkflowInstancesTable['$inferSelect'];
