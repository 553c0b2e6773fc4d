import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import jwt from '@fastify/jwt';
import websocket from '@fastify/websocket';
import {
  TenantInitFailedError,
  type BusPersistence,
  type Logger,
  type TenantStoreRegistry,
  type WorkflowEventBus,
  type WorkflowRuntimeRegistry,
} from '@flowrelay/runtime';
import type { Config } from './config/index.js';
import { healthRoutes } from './routes/health.js';
import { eventRoutes } from './routes/events.js';
import { engineRoutes } from './routes/engine.js';
import { workflowRoutes } from './routes/workflows.js';
import { LiveChannel, type LiveConnection } from './websocket/index.js';
import type { ApiResponse, WorkflowHistoryStore } from './types/index.js';

export interface AppDependencies {
  config: Config;
  logger: Logger;
  persistence: BusPersistence;
  tenants: TenantStoreRegistry<WorkflowHistoryStore>;
  registry: WorkflowRuntimeRegistry<WorkflowHistoryStore, LiveConnection>;
  bus: WorkflowEventBus;
  /** Database probe; absent when running without a durable backend */
  checkDatabase?: () => Promise<boolean>;
}

export interface FlowrelayApp {
  app: FastifyInstance;
  liveChannel: LiveChannel;
}

/**
 * Build the HTTP and websocket service around already constructed runtime components
 */
export async function buildApp(deps: AppDependencies): Promise<FlowrelayApp> {
  const { config } = deps;

  const app = Fastify<Server, IncomingMessage, ServerResponse, FastifyBaseLogger>({
    logger: deps.logger,
  });

  // Global error handler, set before any route plugin so every context inherits it
  app.setErrorHandler((error, _request, reply) => {
    // Tenant storage could not be reached or set up: only this request fails
    if (error instanceof TenantInitFailedError) {
      app.log.warn({ err: error, organization: error.organization }, error.message);
      return reply.code(503).send({
        success: false,
        error: 'Tenant storage unavailable',
        message: error.message,
      } satisfies ApiResponse);
    }

    app.log.error(error);

    if (error.validation) {
      return reply.code(400).send({
        success: false,
        error: 'Validation Error',
        message: error.message,
      } satisfies ApiResponse);
    }

    // Handle JWT errors
    if (error.code?.startsWith('FST_JWT')) {
      return reply.code(401).send({
        success: false,
        error: 'Unauthorized',
        message: error.message,
      } satisfies ApiResponse);
    }

    const statusCode = error.statusCode ?? 500;
    return reply.code(statusCode).send({
      success: false,
      error: error.name || 'Internal Server Error',
      message: config.NODE_ENV === 'production' ? 'An error occurred' : error.message,
    } satisfies ApiResponse);
  });

  // CORS
  await app.register(cors, {
    origin: config.CORS_ORIGIN.split(','),
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
  });

  // JWT
  await app.register(jwt, {
    secret: config.JWT_SECRET,
  });

  // WebSocket support
  await app.register(websocket, {
    options: {
      maxPayload: 1048576, // 1MB
    },
  });

  // Health check routes (unprotected)
  const liveChannel = new LiveChannel(deps.registry, deps.logger.child({ component: 'live-channel' }));
  await app.register(healthRoutes, {
    prefix: '/health',
    checkDatabase: deps.checkDatabase,
    persistence: deps.persistence,
    registry: deps.registry,
    liveChannel,
  });

  // Protected API routes
  await app.register(eventRoutes, { prefix: '/api/events', persistence: deps.persistence });
  await app.register(engineRoutes, { prefix: '/api/engine', bus: deps.bus });
  await app.register(workflowRoutes, {
    prefix: '/api/workflows',
    registry: deps.registry,
    tenants: deps.tenants,
  });

  // WebSocket routes
  liveChannel.register(app);
  app.addHook('onClose', async () => {
    liveChannel.closeAllConnections('Server shutting down');
  });

  // Root route
  app.get('/', async () => {
    return {
      name: 'Flowrelay API',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        health: '/health',
        events: '/api/events',
        engine: '/api/engine/events',
        workflows: '/api/workflows',
        websocket: '/ws',
      },
    };
  });

  return { app, liveChannel };
}
