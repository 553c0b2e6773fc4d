import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BusPersistence, PersistenceStatus, WorkflowRuntimeRegistry } from '@flowrelay/runtime';
import type { LiveChannel, LiveConnection } from '../websocket/index.js';
import type { ApiResponse, WorkflowHistoryStore } from '../types/index.js';

export interface HealthRoutesOptions {
  /** Database probe; absent when running without a durable backend */
  checkDatabase?: () => Promise<boolean>;
  persistence: BusPersistence;
  registry: WorkflowRuntimeRegistry<WorkflowHistoryStore, LiveConnection>;
  liveChannel: LiveChannel;
}

interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: {
      status: 'up' | 'down' | 'disabled';
      latency?: number;
    };
    persistence: PersistenceStatus;
  };
  workflows: {
    running: number;
    subscribers: number;
  };
  connections: number;
}

export async function healthRoutes(app: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  const { checkDatabase, persistence, registry, liveChannel } = options;

  // GET /health - Basic health check
  app.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    const startTime = Date.now();

    // Check database connectivity
    const dbHealthy = checkDatabase ? await checkDatabase() : null;
    const dbLatency = Date.now() - startTime;

    const persistenceStatus = persistence.getStatus();

    const isHealthy = dbHealthy !== false;
    // Events still buffered in memory mean the backend fell behind
    const status: HealthStatus['status'] = !isHealthy
      ? 'unhealthy'
      : dbHealthy && persistenceStatus.buffered > 0
        ? 'degraded'
        : 'healthy';

    const healthStatus: HealthStatus = {
      status,
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: process.uptime(),
      checks: {
        database:
          dbHealthy === null
            ? { status: 'disabled' }
            : { status: dbHealthy ? 'up' : 'down', latency: dbLatency },
        persistence: persistenceStatus,
      },
      workflows: {
        running: registry.size,
        subscribers: registry.subscriberCount(),
      },
      connections: liveChannel.getConnectionStats().totalConnections,
    };

    return reply.code(isHealthy ? 200 : 503).send({
      success: isHealthy,
      data: healthStatus,
    } satisfies ApiResponse<HealthStatus>);
  });

  // GET /health/ready - Readiness probe (for Kubernetes)
  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    const dbHealthy = checkDatabase ? await checkDatabase() : true;

    if (dbHealthy) {
      return reply.code(200).send({
        success: true,
        message: 'Service is ready',
      } satisfies ApiResponse);
    }

    return reply.code(503).send({
      success: false,
      error: 'Service not ready',
      message: 'Database connection not available',
    } satisfies ApiResponse);
  });

  // GET /health/live - Liveness probe (for Kubernetes)
  app.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      success: true,
      message: 'Service is alive',
    } satisfies ApiResponse);
  });
}

export default healthRoutes;
