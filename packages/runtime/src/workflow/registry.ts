/**
 * WorkflowRuntimeRegistry
 *
 * In-memory view of the workflow executions currently running, keyed by
 * organization then execution id. Lifecycle events from the engine update it,
 * are fanned out to the organization's live subscribers, and terminal
 * executions are written to the organization's history store before eviction.
 *
 * Per execution: (none) → begin → progress* → end | error
 */

import { UnknownExecutionError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { createLoggingFaultHandler, type FaultHandler } from '../faults.js';
import type { TenantStorage, TenantStoreRegistry } from '../tenancy/registry.js';
import type { WorkflowEventBus } from '../events.js';
import { WorkflowInstance, sanitizeReport } from './instance.js';
import {
  TERMINAL_STATES,
  type BeginEngineEvent,
  type EngineEvent,
  type ExecState,
  type LivePayload,
  type LiveUpdatePayload,
  type ProgressEngineEvent,
  type TerminalEngineEvent,
  type WorkflowReport,
} from '../types.js';

// ============================================================================
// Contracts
// ============================================================================

/** Tenant handle able to keep finished workflow reports */
export interface WorkflowHistoryStorage extends TenantStorage {
  insert(report: WorkflowReport): Promise<void>;
}

export interface LiveSubscriber {
  readonly id: string;
}

/** Push-delivery primitive for live connections */
export interface LiveDelivery<S extends LiveSubscriber> {
  send(subscribers: readonly S[], payload: LivePayload): Promise<void>;
}

export interface WorkflowRuntimeRegistryOptions<H extends WorkflowHistoryStorage, S extends LiveSubscriber> {
  tenants: TenantStoreRegistry<H>;
  delivery: LiveDelivery<S>;
  logger?: Logger;
  faults?: FaultHandler;
}

type EngineEventOf<K extends ExecState> = K extends 'begin'
  ? BeginEngineEvent
  : K extends 'progress'
    ? ProgressEngineEvent
    : TerminalEngineEvent;

type Handlers = {
  [K in ExecState]: (event: EngineEventOf<K>) => Promise<void>;
};

// ============================================================================
// WorkflowRuntimeRegistry Class
// ============================================================================

export class WorkflowRuntimeRegistry<H extends WorkflowHistoryStorage, S extends LiveSubscriber> {
  private readonly tenants: TenantStoreRegistry<H>;
  private readonly delivery: LiveDelivery<S>;
  private readonly logger: Logger;
  private readonly faults: FaultHandler;

  /** organization → execution id → instance */
  private readonly running: Map<string, Map<string, WorkflowInstance>> = new Map();
  /** organization → live subscribers */
  private readonly subscribers: Map<string, Set<S>> = new Map();
  /** organization + execution id → tail of its event processing chain */
  private readonly chains: Map<string, Promise<void>> = new Map();
  private readonly finalizing: Set<Promise<void>> = new Set();

  private readonly handlers: Handlers = {
    begin: (event) => this.handleBegin(event),
    progress: (event) => this.handleProgress(event),
    end: (event) => this.handleTerminal(event),
    error: (event) => this.handleTerminal(event),
  };

  private detach: (() => void) | null = null;

  constructor(options: WorkflowRuntimeRegistryOptions<H, S>) {
    this.tenants = options.tenants;
    this.delivery = options.delivery;
    this.logger = (options.logger ?? createLogger('flowrelay')).child({ component: 'workflow-registry' });
    this.faults = options.faults ?? createLoggingFaultHandler(this.logger);
  }

  // ==========================================================================
  // Engine Events
  // ==========================================================================

  /**
   * Process an engine lifecycle event. Events of one execution are handled
   * strictly in the order they are received.
   */
  onEngineEvent(event: EngineEvent): Promise<void> {
    const key = this.chainKey(event);
    const previous = this.chains.get(key) ?? Promise.resolve();
    const run = (): Promise<void> => this.dispatch(event);
    const next = previous.then(run, run);

    const release = (): void => {
      if (this.chains.get(key) === next) {
        this.chains.delete(key);
      }
    };
    this.chains.set(key, next);
    void next.then(release, release);

    return next;
  }

  /**
   * Listen to an engine event bus. Handler failures are reported as faults.
   */
  attach(bus: WorkflowEventBus): void {
    this.detach?.();

    const listener = (event: EngineEvent): void => {
      this.onEngineEvent(event).catch((error: unknown) => {
        this.faults({
          message: `Failed to process '${event.type}' for execution ${event.executionId}`,
          error,
          context: { executionId: event.executionId, type: event.type },
        });
      });
    };

    bus.onEngineEvent(listener);
    this.detach = () => {
      bus.offEngineEvent(listener);
    };
  }

  /**
   * Resolve once every queued event and pending finalize write has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.chains.size > 0 || this.finalizing.size > 0) {
      await Promise.allSettled([...this.chains.values(), ...this.finalizing]);
    }
  }

  close(): void {
    this.detach?.();
    this.detach = null;
  }

  // ==========================================================================
  // Live Subscribers
  // ==========================================================================

  /**
   * Register a live subscriber and send it the organization's current state.
   */
  async subscribe(organization: string | null | undefined, subscriber: S): Promise<WorkflowReport[]> {
    const org = this.tenants.resolve(organization);
    let set = this.subscribers.get(org);
    if (!set) {
      set = new Set();
      this.subscribers.set(org, set);
    }
    set.add(subscriber);

    const workflows = this.reports(org);
    await this.delivery.send([subscriber], { type: 'snapshot', organization: org, workflows });
    return workflows;
  }

  unsubscribe(subscriber: S): void {
    for (const [org, set] of this.subscribers) {
      set.delete(subscriber);
      if (set.size === 0) {
        this.subscribers.delete(org);
      }
    }
  }

  /**
   * Deliver a payload to every subscriber of one organization.
   */
  async broadcastTo(organization: string, payload: LivePayload): Promise<void> {
    const set = this.subscribers.get(organization);
    if (!set || set.size === 0) return;
    await this.delivery.send(Array.from(set), payload);
  }

  subscriberCount(organization?: string): number {
    if (organization !== undefined) {
      return this.subscribers.get(organization)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.subscribers.values()) total += set.size;
    return total;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /**
   * Live record of an execution, within one organization when given.
   */
  get(executionId: string, organization?: string): WorkflowInstance | undefined {
    if (organization !== undefined) {
      return this.running.get(organization)?.get(executionId);
    }
    for (const executions of this.running.values()) {
      const instance = executions.get(executionId);
      if (instance) return instance;
    }
    return undefined;
  }

  list(organization?: string): WorkflowInstance[] {
    if (organization !== undefined) {
      return Array.from(this.running.get(organization)?.values() ?? []);
    }
    return Array.from(this.running.values(), (executions) => Array.from(executions.values())).flat();
  }

  reports(organization: string): WorkflowReport[] {
    return this.list(organization).map((instance) => instance.report());
  }

  get size(): number {
    let total = 0;
    for (const executions of this.running.values()) total += executions.size;
    return total;
  }

  // ==========================================================================
  // Handlers
  // ==========================================================================

  private dispatch(event: EngineEvent): Promise<void> {
    switch (event.type) {
      case 'begin':
        return this.handlers.begin(event);
      case 'progress':
        return this.handlers.progress(event);
      case 'end':
        return this.handlers.end(event);
      case 'error':
        return this.handlers.error(event);
    }
  }

  private async handleBegin(event: BeginEngineEvent): Promise<void> {
    const organization = this.tenants.resolve(event.organization);
    if (this.get(event.executionId, organization)) {
      this.logger.warn(
        { executionId: event.executionId, organization },
        'Duplicate begin for a live execution, dropped'
      );
      return;
    }

    const { template, ...metadata } = event.content;
    const instance = new WorkflowInstance(template, {
      executionId: event.executionId,
      organization,
      start: event.timestamp,
      metadata,
    });

    let executions = this.running.get(organization);
    if (!executions) {
      executions = new Map();
      this.running.set(organization, executions);
    }
    executions.set(instance.id, instance);

    this.logger.debug({ executionId: instance.id, organization }, 'Workflow execution began');
    await this.broadcastUpdate(instance, event, { ...metadata }, instance.template);
  }

  private async handleProgress(event: ProgressEngineEvent): Promise<void> {
    const instance = this.lookup(event);
    if (!instance) return;

    const task = instance.applyProgress(event.content);
    await this.broadcastUpdate(instance, event, { ...task });
  }

  private async handleTerminal(event: TerminalEngineEvent): Promise<void> {
    const instance = this.lookup(event);
    if (!instance) return;

    instance.finish(event.type, event.timestamp);
    instance.finalizing = true;

    try {
      await this.broadcastUpdate(instance, event, { ...event.content });
    } finally {
      this.finalize(instance);
    }
  }

  /**
   * Write the terminal report to the organization's history without blocking
   * the event path. The record stays registered until the write settles.
   */
  private finalize(instance: WorkflowInstance): void {
    const report = sanitizeReport(instance.report());

    const write = this.tenants
      .withTenant(instance.organization, (storage) => storage.insert(report))
      .catch((error: unknown) => {
        this.faults({
          message: `Failed to store finished workflow ${instance.id}: ${errorMessage(error)}`,
          error,
          context: { executionId: instance.id, organization: instance.organization },
        });
      })
      .finally(() => {
        this.evict(instance);
        this.finalizing.delete(write);
      });

    this.finalizing.add(write);
  }

  private evict(instance: WorkflowInstance): void {
    const executions = this.running.get(instance.organization);
    if (!executions) return;

    executions.delete(instance.id);
    if (executions.size === 0) {
      this.running.delete(instance.organization);
    }
    this.logger.debug({ executionId: instance.id, state: instance.state }, 'Workflow execution evicted');
  }

  // Events stamped with an organization only reach that organization's records
  private lookup(event: ProgressEngineEvent | TerminalEngineEvent): WorkflowInstance | null {
    const instance = event.organization
      ? this.get(event.executionId, this.tenants.resolve(event.organization))
      : this.get(event.executionId);
    if (!instance) {
      const error = new UnknownExecutionError(event.executionId);
      this.logger.warn({ executionId: event.executionId, type: event.type }, error.message);
      return null;
    }

    if (instance.finalizing || TERMINAL_STATES.includes(instance.state)) {
      this.logger.warn(
        { executionId: event.executionId, type: event.type },
        'Event received after workflow termination, dropped'
      );
      return null;
    }

    return instance;
  }

  // Unstamped events share the chain of the live record they will reach
  private chainKey(event: EngineEvent): string {
    const organization = event.organization
      ? this.tenants.resolve(event.organization)
      : (this.get(event.executionId)?.organization ?? this.tenants.resolve(undefined));
    return `${organization}:${event.executionId}`;
  }

  private async broadcastUpdate(
    instance: WorkflowInstance,
    event: EngineEvent,
    data: Record<string, unknown>,
    template?: WorkflowInstance['template']
  ): Promise<void> {
    const payload: LiveUpdatePayload = {
      type: event.type,
      organization: instance.organization,
      data,
      source: {
        executionId: instance.id,
        templateId: instance.template.id,
        requester: instance.requester,
      },
      timestamp: event.timestamp.toISOString(),
    };
    if (template) {
      payload.template = template;
    }

    await this.broadcastTo(instance.organization, payload);
  }
}
