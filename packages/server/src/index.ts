import { pino } from 'pino';
import {
  BusPersistence,
  TenantStoreRegistry,
  WorkflowRuntimeRegistry,
  createEventBus,
  createLoggingFaultHandler,
  errorMessage,
  type PersistenceBackend,
  type TenantCatalog,
} from '@flowrelay/runtime';
import { config, resolveLogLevel } from './config/index.js';
import { checkDatabaseConnection, closeDatabaseConnection, createDatabase, createPool } from './db/index.js';
import { PgBusEventBackend } from './db/bus-events.js';
import { PgTenantCatalog, PgWorkflowStorage } from './db/tenants.js';
import { MemoryTenantStore } from './db/memory.js';
import { WebSocketDelivery, type LiveConnection } from './websocket/index.js';
import { buildApp } from './app.js';
import type { WorkflowHistoryStore } from './types/index.js';

// Root logger shared by Fastify and the runtime components
const logger = pino({
  name: 'flowrelay',
  level: resolveLogLevel(config),
  transport:
    config.NODE_ENV !== 'production'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
          },
        }
      : undefined,
});

const faults = createLoggingFaultHandler(logger);

// Durable storage: Postgres, or nothing but memory
const pool = config.PERSISTENCE_BACKEND === 'postgres' ? createPool(config.DATABASE_URL, logger) : null;

let backend: PersistenceBackend | null = null;
let catalog: TenantCatalog;
let createStorage: (namespace: string) => WorkflowHistoryStore;

if (pool) {
  const db = createDatabase(pool);
  backend = new PgBusEventBackend(pool, db, logger);
  catalog = new PgTenantCatalog(pool, db, logger);
  createStorage = (namespace) => new PgWorkflowStorage(db, namespace);
} else {
  const memory = new MemoryTenantStore();
  catalog = memory;
  createStorage = (namespace) => memory.storage(namespace);
}

const persistence = new BusPersistence({
  backend,
  config: {
    queueSize: config.EVENT_BUFFER_SIZE,
    memoryTtlMs: config.EVENT_MEMORY_TTL_MS,
    feedIntervalMs: config.EVENT_FEED_INTERVAL_MS,
  },
  logger,
  faults,
});

const tenants = new TenantStoreRegistry<WorkflowHistoryStore>({
  catalog,
  createStorage,
  prefix: config.TENANT_PREFIX,
  defaultOrganization: config.DEFAULT_ORGANIZATION,
  logger,
});

const registry = new WorkflowRuntimeRegistry<WorkflowHistoryStore, LiveConnection>({
  tenants,
  delivery: new WebSocketDelivery(logger.child({ component: 'live-delivery' })),
  logger,
  faults,
});

const bus = createEventBus();
registry.attach(bus);

const { app, liveChannel } = await buildApp({
  config,
  logger,
  persistence,
  tenants,
  registry,
  bus,
  checkDatabase: pool ? () => checkDatabaseConnection(pool, logger) : undefined,
});

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  app.log.info(`Received ${signal}. Starting graceful shutdown...`);

  try {
    // Close WebSocket connections
    liveChannel.closeAllConnections('Server shutting down');
    app.log.info('WebSocket connections closed');

    // Close HTTP server
    await app.close();
    app.log.info('HTTP server closed');

    // Let queued engine events and history writes settle
    registry.close();
    await registry.whenIdle();
    app.log.info('Workflow registry drained');

    // Last attempt at emptying the event buffer
    await persistence.close();
    app.log.info('Bus persistence closed');

    tenants.close();

    // Close database connection
    if (pool) {
      await closeDatabaseConnection(pool);
      app.log.info('Database connection closed');
    }

    process.exit(0);
  } catch (error) {
    app.log.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
}

// Start server
async function start(): Promise<void> {
  try {
    // The service runs in memory-only mode while the database is unreachable
    try {
      await persistence.init();
      app.log.info('Bus persistence initialized');
    } catch (error) {
      app.log.warn(`Failed to initialize bus persistence, retrying on next write: ${errorMessage(error)}`);
      app.log.warn('Events will be buffered in memory until the backend is reachable');
    }
    persistence.start();

    // Start listening
    const address = await app.listen({
      port: config.PORT,
      host: config.HOST,
    });

    app.log.info(`Flowrelay running at ${address}`);
    app.log.info(`Environment: ${config.NODE_ENV}, persistence: ${config.PERSISTENCE_BACKEND}`);

    // Register shutdown handlers
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

await start();
