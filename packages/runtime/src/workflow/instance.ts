/**
 * WorkflowInstance
 * Holds a template/execution pair so an execution's state can be reported at any moment.
 */

import {
  ALLOWED_EXEC_KEYS,
  type ExecMetadata,
  type ExecState,
  type ExecutionState,
  type ReportTask,
  type TaskDefinition,
  type TaskExecution,
  type TaskProgressContent,
  type WorkflowReport,
  type WorkflowTemplate,
} from '../types.js';

export interface WorkflowInstanceInit {
  executionId: string;
  organization: string;
  start: Date;
  /** Caller-supplied fields, filtered down to the allow-list */
  metadata?: Record<string, unknown>;
}

export class WorkflowInstance {
  readonly template: WorkflowTemplate;
  readonly metadata: ExecMetadata;
  private readonly execution: ExecutionState;

  /** Set once a terminal event was received and the report is being written */
  finalizing = false;

  constructor(template: WorkflowTemplate, init: WorkflowInstanceInit) {
    this.template = snapshotTemplate(template);
    this.metadata = pickMetadata(init.metadata ?? {});
    this.execution = {
      id: init.executionId,
      organization: init.organization,
      state: 'begin',
      start: init.start,
      end: null,
      tasks: new Map(),
    };
  }

  get id(): string {
    return this.execution.id;
  }

  get organization(): string {
    return this.execution.organization;
  }

  get state(): ExecState {
    return this.execution.state;
  }

  get requester(): string | null {
    return this.metadata.requester ?? null;
  }

  /**
   * Merge a task's new state into the execution, in place.
   */
  applyProgress(content: TaskProgressContent): TaskExecution {
    const { taskId, ...fields } = content;
    const task: TaskExecution = { ...this.execution.tasks.get(taskId), ...fields, id: taskId };
    this.execution.tasks.set(taskId, task);
    this.execution.state = 'progress';
    return task;
  }

  finish(state: 'end' | 'error', at: Date): void {
    this.execution.state = state;
    this.execution.end = at;
  }

  /**
   * Merge the execution state with its template.
   * The template carries more info per task (title, config) than the engine
   * reports, so each task entry combines both. The stored template is untouched.
   */
  report(): WorkflowReport {
    const tasks = new Map<string, ReportTask>();
    for (const definition of this.template.tasks) {
      tasks.set(definition.id, { ...definition });
    }
    for (const [taskId, execution] of this.execution.tasks) {
      tasks.set(taskId, { ...tasks.get(taskId), ...execution });
    }

    return {
      id: this.execution.id,
      organization: this.execution.organization,
      requester: this.metadata.requester ?? null,
      track: this.metadata.track ?? null,
      state: this.execution.state,
      start: this.execution.start,
      end: this.execution.end,
      template: {
        id: this.template.id,
        version: this.template.version,
        title: this.template.title,
        state: this.template.state,
        tasks: this.template.tasks.map((definition) => ({ ...definition })),
        ...(this.template.graph ? { graph: { ...this.template.graph } } : {}),
      },
      tasks: Array.from(tasks.values()),
    };
  }
}

export function pickMetadata(source: Record<string, unknown>): ExecMetadata {
  const metadata: ExecMetadata = {};
  for (const key of ALLOWED_EXEC_KEYS) {
    const value = source[key];
    if (typeof value === 'string') {
      metadata[key] = value;
    }
  }
  return metadata;
}

// ============================================================================
// Storage Sanitizing
// ============================================================================

/**
 * Deep copy keeping only storable values. Anything else (functions, class
 * instances, symbols...) is replaced by a marker string.
 */
export function sanitizeForStorage(value: unknown): unknown {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }

  if (value instanceof Date) {
    return new Date(value.getTime());
  }

  if (Array.isArray(value)) {
    return value.map(sanitizeForStorage);
  }

  if (isPlainObject(value)) {
    return sanitizeEntries(value);
  }

  return `Internal server data: ${describeType(value)}`;
}

export function sanitizeReport(report: WorkflowReport): WorkflowReport {
  return {
    ...report,
    start: new Date(report.start.getTime()),
    end: report.end ? new Date(report.end.getTime()) : null,
    template: {
      ...report.template,
      tasks: report.template.tasks.map(sanitizeTask),
      ...(report.template.graph ? { graph: sanitizeEntries(report.template.graph) } : {}),
    },
    tasks: report.tasks.map(sanitizeTask),
  };
}

/**
 * Copy of a template detached from the caller's objects. Values that cannot
 * be stored (functions, class instances) become marker strings.
 */
export function snapshotTemplate(template: WorkflowTemplate): WorkflowTemplate {
  const snapshot: WorkflowTemplate = {
    id: template.id,
    version: template.version,
    title: template.title,
    state: template.state,
    tasks: template.tasks.map(snapshotTaskDefinition),
  };
  if (template.graph) {
    snapshot.graph = sanitizeEntries(template.graph);
  }
  return snapshot;
}

function snapshotTaskDefinition(task: TaskDefinition): TaskDefinition {
  const snapshot: TaskDefinition = { id: task.id, name: task.name };
  for (const [key, value] of Object.entries(task)) {
    if (key !== 'id' && key !== 'name') {
      snapshot[key] = sanitizeForStorage(value);
    }
  }
  return snapshot;
}

function sanitizeTask(task: ReportTask): ReportTask {
  return { ...sanitizeEntries(task), id: task.id };
}

function sanitizeEntries(source: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(source)) {
    result[key] = sanitizeForStorage(entry);
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describeType(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name || 'object';
  }
  return typeof value;
}
