/**
 * Process-wide fault reporting for background and fire-and-forget paths.
 * Nothing reported here is thrown back to a caller.
 */

import type { Logger } from './logger.js';

export interface Fault {
  message: string;
  error: unknown;
  context?: Record<string, unknown>;
}

export type FaultHandler = (fault: Fault) => void;

export function createLoggingFaultHandler(logger: Logger): FaultHandler {
  return (fault) => {
    logger.error({ err: fault.error, ...fault.context }, fault.message);
  };
}
