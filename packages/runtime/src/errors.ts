/**
 * Runtime Errors
 */

export type FlowrelayErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'DURABILITY_WRITE_FAILED'
  | 'UNKNOWN_EXECUTION'
  | 'TENANT_INIT_FAILED';

export class FlowrelayError extends Error {
  constructor(
    message: string,
    public readonly code: FlowrelayErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FlowrelayError';
  }
}

/** The durable backend did not answer its health probe */
export class BackendUnavailableError extends FlowrelayError {
  constructor(message = 'Persistence backend is unavailable', options?: { cause?: unknown }) {
    super(message, 'BACKEND_UNAVAILABLE', options);
    this.name = 'BackendUnavailableError';
  }
}

export class DurabilityWriteFailedError extends FlowrelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DURABILITY_WRITE_FAILED', options);
    this.name = 'DurabilityWriteFailedError';
  }
}

export class UnknownExecutionError extends FlowrelayError {
  constructor(public readonly executionId: string) {
    super(`No live workflow for execution ${executionId}`, 'UNKNOWN_EXECUTION');
    this.name = 'UnknownExecutionError';
  }
}

export class TenantInitFailedError extends FlowrelayError {
  constructor(
    public readonly organization: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'TENANT_INIT_FAILED', options);
    this.name = 'TenantInitFailedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
