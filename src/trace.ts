/**
 * Tracing for invariant violations
 *
 * traceAndThrow() is reserved for conditions that indicate a programming
 * error, such as an element ID that was never rendered. The message and stack are logged before the throw.
 */

import { getLogger } from './logger';

export class TraceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TraceError';
  }
}

export function traceAndThrow(message: string): never {
  const error = new TraceError(message);
  getLogger('Trace').error({ stack: error.stack }, message);
  throw error;
}
