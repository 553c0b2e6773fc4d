import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { EngineEvent, WorkflowEventBus } from '@flowrelay/runtime';
import { engineEventSchema, type ApiResponse, type EngineEventInput } from '../types/index.js';
import { authenticateRequest, getOrganization } from '../middleware/auth.js';

export interface EngineRoutesOptions {
  bus: WorkflowEventBus;
}

/**
 * Attach the caller's organization and a reception timestamp when none was sent
 */
export function toEngineEvent(input: EngineEventInput, organization: string, receivedAt = new Date()): EngineEvent {
  const timestamp = input.timestamp ?? receivedAt;

  switch (input.type) {
    case 'begin':
      return { type: 'begin', executionId: input.executionId, organization, timestamp, content: input.content };
    case 'progress':
      return { type: 'progress', executionId: input.executionId, organization, timestamp, content: input.content };
    case 'end':
    case 'error':
      return { type: input.type, executionId: input.executionId, organization, timestamp, content: input.content };
  }
}

export async function engineRoutes(app: FastifyInstance, options: EngineRoutesOptions): Promise<void> {
  const { bus } = options;

  app.addHook('preHandler', authenticateRequest);

  // POST /engine/events - Lifecycle event from the workflow engine
  app.post('/events', async (request: FastifyRequest, reply: FastifyReply) => {
    const validation = engineEventSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        success: false,
        error: 'Validation error',
        message: validation.error.issues.map((i) => i.message).join(', '),
      } satisfies ApiResponse);
    }

    const event = toEngineEvent(validation.data, getOrganization(request));
    bus.emitEngineEvent(event);

    return reply.code(202).send({
      success: true,
      data: { executionId: event.executionId, type: event.type },
    } satisfies ApiResponse<{ executionId: string; type: EngineEvent['type'] }>);
  });
}

export default engineRoutes;
