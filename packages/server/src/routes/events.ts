import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BusEvent, BusPersistence } from '@flowrelay/runtime';
import {
  retrieveEventsQuerySchema,
  storeEventSchema,
  updateEventSchema,
  type ApiResponse,
  type StoreEventInput,
  type UpdateEventInput,
} from '../types/index.js';
import { authenticateRequest } from '../middleware/auth.js';

export interface EventRoutesOptions {
  persistence: BusPersistence;
}

interface EventWriteResult {
  id: string;
  outcome: 'stored' | 'buffered';
}

export async function eventRoutes(app: FastifyInstance, options: EventRoutesOptions): Promise<void> {
  const { persistence } = options;

  // All routes require authentication
  app.addHook('preHandler', authenticateRequest);

  // POST /events - Store a bus event, buffering it while the backend is down
  app.post<{ Body: StoreEventInput }>(
    '/',
    async (request: FastifyRequest<{ Body: StoreEventInput }>, reply: FastifyReply) => {
      const validation = storeEventSchema.safeParse(request.body);
      if (!validation.success) {
        return reply.code(400).send({
          success: false,
          error: 'Validation error',
          message: validation.error.issues.map((i) => i.message).join(', '),
        } satisfies ApiResponse);
      }

      const { id } = validation.data;
      const result = await persistence.store(validation.data);

      switch (result.outcome) {
        case 'stored':
          return reply.code(201).send({
            success: true,
            data: { id, outcome: 'stored' },
          } satisfies ApiResponse<EventWriteResult>);
        case 'buffered':
          return reply.code(202).send({
            success: true,
            data: { id, outcome: 'buffered' },
            message: 'Persistence backend unavailable, event kept in memory',
          } satisfies ApiResponse<EventWriteResult>);
        case 'failed':
          return reply.code(503).send({
            success: false,
            error: 'Durability write failed',
            message: result.error.message,
          } satisfies ApiResponse);
      }
    }
  );

  // PATCH /events/:id - Update the status of a stored or buffered event
  app.patch<{ Params: { id: string }; Body: UpdateEventInput }>(
    '/:id',
    async (
      request: FastifyRequest<{ Params: { id: string }; Body: UpdateEventInput }>,
      reply: FastifyReply
    ) => {
      const validation = updateEventSchema.safeParse(request.body);
      if (!validation.success) {
        return reply.code(400).send({
          success: false,
          error: 'Validation error',
          message: validation.error.issues.map((i) => i.message).join(', '),
        } satisfies ApiResponse);
      }

      const { id } = request.params;
      const result = await persistence.update(id, validation.data.status);

      switch (result.outcome) {
        case 'stored':
        case 'buffered':
          return reply.code(200).send({
            success: true,
            data: { id, outcome: result.outcome },
          } satisfies ApiResponse<EventWriteResult>);
        case 'missing':
          return reply.code(404).send({
            success: false,
            error: 'Not found',
            message: `No buffered event with id ${id}`,
          } satisfies ApiResponse);
        case 'failed':
          return reply.code(503).send({
            success: false,
            error: 'Durability write failed',
            message: result.error.message,
          } satisfies ApiResponse);
      }
    }
  );

  // GET /events - Events created since a date and/or with given statuses
  app.get<{ Querystring: { since?: string; status?: string } }>(
    '/',
    async (
      request: FastifyRequest<{ Querystring: { since?: string; status?: string } }>,
      reply: FastifyReply
    ) => {
      const validation = retrieveEventsQuerySchema.safeParse(request.query);
      if (!validation.success) {
        return reply.code(400).send({
          success: false,
          error: 'Validation error',
          message: validation.error.issues.map((i) => i.message).join(', '),
        } satisfies ApiResponse);
      }

      const events = await persistence.retrieve(validation.data);

      return reply.code(200).send({
        success: true,
        data: events,
      } satisfies ApiResponse<BusEvent[]>);
    }
  );
}

export default eventRoutes;
