/**
 * Postgres backend for bus event durability
 */

import { and, asc, eq, gte, inArray, type SQL } from 'drizzle-orm';
import type pg from 'pg';
import type { BusEvent, EventFilter, EventStatus, Logger, PersistenceBackend } from '@flowrelay/runtime';
import { busEvents } from './schema.js';
import { checkDatabaseConnection, type Database } from './index.js';

export class PgBusEventBackend implements PersistenceBackend {
  constructor(
    private readonly pool: pg.Pool,
    private readonly db: Database,
    private readonly logger?: Logger
  ) {}

  // Idempotent DDL, run once at startup
  async init(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(
        `DO $$ BEGIN CREATE TYPE event_status AS ENUM ('pending', 'sent', 'failed'); EXCEPTION WHEN duplicate_object THEN null; END $$`
      );
      await client.query(
        `CREATE TABLE IF NOT EXISTS bus_events (id TEXT PRIMARY KEY, status event_status NOT NULL DEFAULT 'pending', topic TEXT NOT NULL, payload TEXT NOT NULL, created_at TIMESTAMP WITH TIME ZONE NOT NULL)`
      );
      await client.query(`CREATE INDEX IF NOT EXISTS idx_bus_events_status ON bus_events(status)`);
      await client.query(`CREATE INDEX IF NOT EXISTS idx_bus_events_created_at ON bus_events(created_at)`);
    } finally {
      client.release();
    }
  }

  ping(): Promise<boolean> {
    return checkDatabaseConnection(this.pool, this.logger);
  }

  async store(event: BusEvent): Promise<void> {
    await this.db.insert(busEvents).values({
      id: event.id,
      status: event.status,
      topic: event.topic,
      payload: event.payload,
      createdAt: event.createdAt,
    });
  }

  // Updating an id that was never stored is a no-op
  async update(id: string, status: EventStatus): Promise<void> {
    await this.db.update(busEvents).set({ status }).where(eq(busEvents.id, id));
  }

  async retrieve(filter: EventFilter): Promise<BusEvent[]> {
    const conditions: SQL[] = [];
    if (filter.since) {
      conditions.push(gte(busEvents.createdAt, filter.since));
    }
    if (filter.status !== undefined) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
      conditions.push(inArray(busEvents.status, statuses));
    }

    return this.db
      .select()
      .from(busEvents)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(busEvents.createdAt));
  }
}
