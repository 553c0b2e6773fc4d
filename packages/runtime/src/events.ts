/**
 * Workflow Event Bus
 * Typed EventEmitter through which the workflow engine publishes lifecycle events
 */

import { EventEmitter } from 'eventemitter3';
import type {
  BeginEngineEvent,
  EngineEvent,
  ExecState,
  ProgressEngineEvent,
  TerminalEngineEvent,
} from './types.js';

// ============================================================================
// Event Type Mapping
// ============================================================================

export interface WorkflowEventMap {
  'workflow:begin': (event: BeginEngineEvent) => void;
  'workflow:progress': (event: ProgressEngineEvent) => void;
  'workflow:end': (event: TerminalEngineEvent) => void;
  'workflow:error': (event: TerminalEngineEvent) => void;
}

export type WorkflowEventName = keyof WorkflowEventMap;

const EVENT_NAMES: Record<ExecState, WorkflowEventName> = {
  begin: 'workflow:begin',
  progress: 'workflow:progress',
  end: 'workflow:end',
  error: 'workflow:error',
};

// ============================================================================
// Typed Event Bus
// ============================================================================

export class WorkflowEventBus extends EventEmitter<WorkflowEventMap> {
  /**
   * Publish an engine lifecycle event under its typed channel
   */
  emitEngineEvent(event: EngineEvent): void {
    switch (event.type) {
      case 'begin':
        this.emit('workflow:begin', event);
        break;
      case 'progress':
        this.emit('workflow:progress', event);
        break;
      case 'end':
        this.emit('workflow:end', event);
        break;
      case 'error':
        this.emit('workflow:error', event);
        break;
    }
  }

  /**
   * Subscribe to every lifecycle event
   */
  onEngineEvent(listener: (event: EngineEvent) => void): this {
    for (const name of Object.values(EVENT_NAMES)) {
      this.on(name, listener);
    }
    return this;
  }

  /**
   * Unsubscribe a listener registered with onEngineEvent
   */
  offEngineEvent(listener: (event: EngineEvent) => void): this {
    for (const name of Object.values(EVENT_NAMES)) {
      this.off(name, listener);
    }
    return this;
  }

  onBegin(listener: (event: BeginEngineEvent) => void): this {
    return this.on('workflow:begin', listener);
  }

  onTerminal(listener: (event: TerminalEngineEvent) => void): this {
    this.on('workflow:end', listener);
    return this.on('workflow:error', listener);
  }

  getListenerCount(state: ExecState): number {
    return this.listenerCount(EVENT_NAMES[state]);
  }
}

export function createEventBus(): WorkflowEventBus {
  return new WorkflowEventBus();
}
