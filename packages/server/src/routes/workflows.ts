import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { TenantStoreRegistry, WorkflowReport, WorkflowRuntimeRegistry } from '@flowrelay/runtime';
import {
  historyDetailQuerySchema,
  historyQuerySchema,
  type ApiResponse,
  type CountedResponse,
  type WorkflowHistoryStore,
} from '../types/index.js';
import type { LiveConnection } from '../websocket/index.js';
import { authenticateRequest, getOrganization } from '../middleware/auth.js';

export interface WorkflowRoutesOptions {
  registry: WorkflowRuntimeRegistry<WorkflowHistoryStore, LiveConnection>;
  tenants: TenantStoreRegistry<WorkflowHistoryStore>;
}

export async function workflowRoutes(app: FastifyInstance, options: WorkflowRoutesOptions): Promise<void> {
  const { registry, tenants } = options;

  // All routes require authentication
  app.addHook('preHandler', authenticateRequest);

  // GET /workflows - Executions currently running for the caller's organization
  app.get('/', async (request: FastifyRequest, reply: FastifyReply) => {
    const organization = getOrganization(request);

    return reply.code(200).send({
      success: true,
      data: registry.reports(organization),
    } satisfies ApiResponse<WorkflowReport[]>);
  });

  // GET /workflows/history - Finished executions, filtered and paginated
  app.get('/history', async (request: FastifyRequest, reply: FastifyReply) => {
    const validation = historyQuerySchema.safeParse(request.query);
    if (!validation.success) {
      return reply.code(400).send({
        success: false,
        error: 'Validation error',
        message: validation.error.issues.map((i) => i.message).join(', '),
      } satisfies ApiResponse);
    }

    const page = await tenants.withTenant(getOrganization(request), (storage) =>
      storage.list(validation.data)
    );

    return reply.code(200).send({
      success: true,
      data: page.items,
      count: page.count,
    } satisfies CountedResponse<WorkflowReport>);
  });

  // GET /workflows/history/:id - One finished execution
  app.get<{ Params: { id: string } }>(
    '/history/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const { id } = request.params;
      const validation = historyDetailQuerySchema.safeParse(request.query);
      if (!validation.success) {
        return reply.code(400).send({
          success: false,
          error: 'Validation error',
          message: validation.error.issues.map((i) => i.message).join(', '),
        } satisfies ApiResponse);
      }

      const report = await tenants.withTenant(getOrganization(request), (storage) =>
        storage.getOne(id, validation.data.full)
      );

      if (!report) {
        return reply.code(404).send({
          success: false,
          error: 'Not found',
          message: `No finished workflow with id ${id}`,
        } satisfies ApiResponse);
      }

      return reply.code(200).send({
        success: true,
        data: report,
      } satisfies ApiResponse<WorkflowReport>);
    }
  );
}

export default workflowRoutes;
