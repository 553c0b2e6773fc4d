/**
 * Runtime Types
 * Shared type definitions for bus event durability and the workflow runtime registry
 */

// ============================================================================
// Bus Events
// ============================================================================

export const EVENT_STATUSES = ['pending', 'sent', 'failed'] as const;

export type EventStatus = (typeof EVENT_STATUSES)[number];

export interface BusEvent {
  id: string;
  status: EventStatus;
  topic: string;
  /** Serialized message as handed over by the bus transport */
  payload: string;
  createdAt: Date;
}

/** An event as submitted by the bus transport, before it is stamped */
export type NewBusEvent = Omit<BusEvent, 'createdAt'>;

export interface EventFilter {
  since?: Date;
  status?: EventStatus | EventStatus[];
}

// ============================================================================
// Persistence Configuration & Status
// ============================================================================

export interface BusPersistenceConfig {
  /** Maximum number of events kept in memory while the backend is down */
  queueSize: number;
  /** Time a buffered event is kept before it expires */
  memoryTtlMs: number;
  /** Period of the backend feed loop */
  feedIntervalMs: number;
}

export const DEFAULT_PERSISTENCE_CONFIG: BusPersistenceConfig = {
  queueSize: 1000,
  memoryTtlMs: 24 * 60 * 60 * 1000, // one day
  feedIntervalMs: 5000,
};

export type PersistenceState = 'stopped' | 'running' | 'stopping';

export interface PersistenceStatus {
  state: PersistenceState;
  backend: 'configured' | 'none';
  buffered: number;
  drained: number;
  drainFailures: number;
  lastDrainAt: Date | null;
  /** Why the backend was last passed over for memory, null once it answers again */
  backendError: string | null;
}

// ============================================================================
// Workflow Templates
// ============================================================================

export type TemplateState = 'draft' | 'active' | 'archived';

export interface TaskDefinition {
  id: string;
  name: string;
  title?: string;
  config?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface WorkflowTemplate {
  id: string;
  version: number;
  title: string;
  state: TemplateState;
  tasks: TaskDefinition[];
  graph?: Record<string, unknown>;
}

// ============================================================================
// Workflow Executions
// ============================================================================

export type ExecState = 'begin' | 'progress' | 'end' | 'error';

export const TERMINAL_STATES: readonly ExecState[] = ['end', 'error'];

export type TaskStatus = 'pending' | 'running' | 'done' | 'error' | 'skipped';

export interface TaskExecution {
  id: string;
  status: TaskStatus;
  start?: Date;
  end?: Date;
  inputs?: unknown;
  outputs?: unknown;
  [key: string]: unknown;
}

/** Caller-supplied fields kept on an execution */
export const ALLOWED_EXEC_KEYS = ['requester', 'track'] as const;

export type ExecMetadataKey = (typeof ALLOWED_EXEC_KEYS)[number];

export type ExecMetadata = Partial<Record<ExecMetadataKey, string>>;

export interface ExecutionState {
  id: string;
  organization: string;
  state: ExecState;
  start: Date;
  end: Date | null;
  tasks: Map<string, TaskExecution>;
}

// ============================================================================
// Engine Events (consumed)
// ============================================================================

export interface BeginContent {
  template: WorkflowTemplate;
  requester?: string;
  track?: string;
  [key: string]: unknown;
}

export interface TaskProgressContent {
  taskId: string;
  status: TaskStatus;
  start?: Date;
  end?: Date;
  inputs?: unknown;
  outputs?: unknown;
  [key: string]: unknown;
}

interface EngineEventBase {
  executionId: string;
  organization?: string | null;
  timestamp: Date;
}

export interface BeginEngineEvent extends EngineEventBase {
  type: 'begin';
  content: BeginContent;
}

export interface ProgressEngineEvent extends EngineEventBase {
  type: 'progress';
  content: TaskProgressContent;
}

export interface TerminalEngineEvent extends EngineEventBase {
  type: 'end' | 'error';
  content?: Record<string, unknown>;
}

export type EngineEvent = BeginEngineEvent | ProgressEngineEvent | TerminalEngineEvent;

// ============================================================================
// Reports (persisted per finished workflow)
// ============================================================================

export interface ReportTask {
  id: string;
  [key: string]: unknown;
}

export interface WorkflowReport {
  id: string;
  organization: string;
  requester: string | null;
  track: string | null;
  state: ExecState;
  start: Date;
  end: Date | null;
  template: {
    id: string;
    version: number;
    title: string;
    state: TemplateState;
    tasks: ReportTask[];
    /** Left out of history reads unless the full template is asked for */
    graph?: Record<string, unknown>;
  };
  tasks: ReportTask[];
}

// ============================================================================
// Live Channel Payloads
// ============================================================================

export interface LiveSource {
  executionId: string;
  templateId: string;
  requester: string | null;
}

export interface LiveUpdatePayload {
  type: ExecState;
  organization: string;
  data: Record<string, unknown>;
  source: LiveSource;
  timestamp: string;
  template?: WorkflowTemplate;
}

export interface LiveSnapshotPayload {
  type: 'snapshot';
  organization: string;
  workflows: WorkflowReport[];
}

export type LivePayload = LiveUpdatePayload | LiveSnapshotPayload;
