/**
 * Flowrelay - Runtime
 * Bus event durability and the multi-tenant workflow runtime registry
 *
 * Components:
 * - EventDurabilityQueue: bounded FIFO of events not yet durably stored
 * - BusPersistence: write-through to a durable backend, buffered fallback and periodic drain
 * - TenantStoreRegistry: lazily created, cached durable storage per organization
 * - WorkflowRuntimeRegistry: live workflow executions, finalize-and-broadcast
 *
 * @packageDocumentation
 */

// ============================================================================
// Bus Event Persistence
// ============================================================================

export { EventDurabilityQueue, DEFAULT_QUEUE_CAPACITY } from './persistence/queue.js';
export { matchesFilter, type PersistenceBackend } from './persistence/backend.js';
export {
  BusPersistence,
  type BusPersistenceOptions,
  type StoreResult,
  type UpdateResult,
} from './persistence/coordinator.js';

// ============================================================================
// Tenancy
// ============================================================================

export {
  TenantStoreRegistry,
  DEFAULT_TENANT_PREFIX,
  DEFAULT_ORGANIZATION,
  type TenantStorage,
  type TenantCatalog,
  type TenantStorageFactory,
  type TenantStoreRegistryOptions,
} from './tenancy/registry.js';

// ============================================================================
// Workflow Runtime
// ============================================================================

export {
  WorkflowInstance,
  pickMetadata,
  sanitizeForStorage,
  snapshotTemplate,
  sanitizeReport,
  type WorkflowInstanceInit,
} from './workflow/instance.js';
export {
  WorkflowRuntimeRegistry,
  type WorkflowHistoryStorage,
  type LiveSubscriber,
  type LiveDelivery,
  type WorkflowRuntimeRegistryOptions,
} from './workflow/registry.js';

// ============================================================================
// Event Bus
// ============================================================================

export {
  WorkflowEventBus,
  createEventBus,
  type WorkflowEventMap,
  type WorkflowEventName,
} from './events.js';

// ============================================================================
// Errors, Faults & Logging
// ============================================================================

export {
  FlowrelayError,
  BackendUnavailableError,
  DurabilityWriteFailedError,
  UnknownExecutionError,
  TenantInitFailedError,
  errorMessage,
  type FlowrelayErrorCode,
} from './errors.js';
export { createLoggingFaultHandler, type Fault, type FaultHandler } from './faults.js';
export { createLogger, type Logger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type {
  EventStatus,
  BusEvent,
  NewBusEvent,
  EventFilter,
  BusPersistenceConfig,
  PersistenceState,
  PersistenceStatus,
  TemplateState,
  TaskDefinition,
  WorkflowTemplate,
  ExecState,
  TaskStatus,
  TaskExecution,
  ExecMetadataKey,
  ExecMetadata,
  ExecutionState,
  BeginContent,
  TaskProgressContent,
  BeginEngineEvent,
  ProgressEngineEvent,
  TerminalEngineEvent,
  EngineEvent,
  ReportTask,
  WorkflowReport,
  LiveSource,
  LiveUpdatePayload,
  LiveSnapshotPayload,
  LivePayload,
} from './types.js';

export {
  EVENT_STATUSES,
  TERMINAL_STATES,
  ALLOWED_EXEC_KEYS,
  DEFAULT_PERSISTENCE_CONFIG,
} from './types.js';
