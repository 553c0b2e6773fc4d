import { z } from 'zod';
import { EVENT_STATUSES, type ExecState, type WorkflowHistoryStorage, type WorkflowReport } from '@flowrelay/runtime';

// ============================================================================
// Zod Schemas for Request Validation
// ============================================================================

const eventStatusSchema = z.enum(EVENT_STATUSES);

// Bus event schemas
export const storeEventSchema = z.object({
  id: z.string().min(1).max(255),
  topic: z.string().min(1).max(255),
  payload: z.string(),
  status: eventStatusSchema.default('pending'),
});

export const updateEventSchema = z.object({
  status: eventStatusSchema,
});

export const retrieveEventsQuerySchema = z.object({
  since: z.coerce.date().optional(),
  // Comma-separated list of statuses
  status: z
    .string()
    .transform((value) => value.split(',').map((status) => status.trim()))
    .pipe(z.array(eventStatusSchema).nonempty())
    .optional(),
});

// Engine event schemas
const taskStatusSchema = z.enum(['pending', 'running', 'done', 'error', 'skipped']);

const taskDefinitionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    title: z.string().optional(),
    config: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const workflowTemplateSchema = z.object({
  id: z.string().min(1),
  version: z.number().int().min(0),
  title: z.string(),
  state: z.enum(['draft', 'active', 'archived']),
  tasks: z.array(taskDefinitionSchema),
  graph: z.record(z.unknown()).optional(),
});

const engineEventBase = {
  executionId: z.string().min(1).max(255),
  timestamp: z.coerce.date().optional(),
};

export const engineEventSchema = z.discriminatedUnion('type', [
  z.object({
    ...engineEventBase,
    type: z.literal('begin'),
    content: z
      .object({
        template: workflowTemplateSchema,
        requester: z.string().optional(),
        track: z.string().optional(),
      })
      .passthrough(),
  }),
  z.object({
    ...engineEventBase,
    type: z.literal('progress'),
    content: z
      .object({
        taskId: z.string().min(1),
        status: taskStatusSchema,
        start: z.coerce.date().optional(),
        end: z.coerce.date().optional(),
        inputs: z.unknown().optional(),
        outputs: z.unknown().optional(),
      })
      .passthrough(),
  }),
  z.object({
    ...engineEventBase,
    type: z.enum(['end', 'error']),
    content: z.record(z.unknown()).optional(),
  }),
]);

// Workflow history schemas
export const HISTORY_ORDERS = [
  'title_asc',
  'title_desc',
  'start_asc',
  'start_desc',
  'end_asc',
  'end_desc',
] as const;

const flagSchema = z.enum(['true', 'false']).transform((value) => value === 'true');

export const historyQuerySchema = z.object({
  since: z.coerce.date().optional(),
  state: z.enum(['begin', 'progress', 'end', 'error']).optional(),
  root: flagSchema.optional(),
  full: flagSchema.optional(),
  search: z.string().min(1).max(255).optional(),
  order: z.enum(HISTORY_ORDERS).optional(),
  offset: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export const historyDetailQuerySchema = z.object({
  full: flagSchema.optional(),
});

// ============================================================================
// Workflow History
// ============================================================================

export type HistoryOrder = (typeof HISTORY_ORDERS)[number];

export interface HistoryQuery {
  since?: Date;
  state?: ExecState;
  /** Only executions not started by another workflow */
  root?: boolean;
  /** Include the template graph */
  full?: boolean;
  /** Substring of the template title */
  search?: string;
  /** Defaults to end_desc */
  order?: HistoryOrder;
  offset?: number;
  limit?: number;
}

export interface HistoryPage {
  /** Total matches, regardless of offset and limit */
  count: number;
  items: WorkflowReport[];
}

/** Requesters of executions started by another workflow */
export const CHILD_REQUESTER_PREFIX = 'flowrelay://';

/**
 * Per-organization workflow history handle
 */
export interface WorkflowHistoryStore extends WorkflowHistoryStorage {
  readonly namespace: string;
  getOne(id: string, full?: boolean): Promise<WorkflowReport | null>;
  list(query: HistoryQuery): Promise<HistoryPage>;
}

// ============================================================================
// API Response Types
// ============================================================================

// Generic API response wrapper
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export interface CountedResponse<T> extends ApiResponse<T[]> {
  count: number;
}

// ============================================================================
// WebSocket Message Types
// ============================================================================

export type WebSocketMessageType =
  | 'connected'
  | 'error'
  | 'pong'
  | 'workflow_snapshot'
  | 'workflow_begin'
  | 'workflow_progress'
  | 'workflow_end'
  | 'workflow_error';

export interface WebSocketMessage<T = unknown> {
  type: WebSocketMessageType;
  organization: string;
  payload: T;
  timestamp: string;
}

// ============================================================================
// JWT Payload Types
// ============================================================================

export interface JWTPayload {
  sub: string;
  organization: string;
  iat?: number;
  exp?: number;
}

// Extend Fastify JWT to include proper payload typing
declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JWTPayload;
    user: JWTPayload;
  }
}

// ============================================================================
// Inferred Types from Zod Schemas
// ============================================================================

export type StoreEventInput = z.infer<typeof storeEventSchema>;
export type UpdateEventInput = z.infer<typeof updateEventSchema>;
export type EngineEventInput = z.infer<typeof engineEventSchema>;
