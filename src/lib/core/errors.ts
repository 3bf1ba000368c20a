/**
 * Error types raised by the chart core.
 */

import type { Color } from './color.js';

/**
 * A label was requested for a colour that was never registered.
 * Callers must check `ColorRegistry.has` first.
 */
export class LookupError extends Error {
  constructor(public readonly color: Color) {
    super(`No entry registered for ${color.toHex()}`);
    this.name = 'LookupError';
  }
}

/**
 * A caller broke a precondition of the core (advancing past the end,
 * constructing a walker outside the grid, resuming a build that is not
 * waiting on a colour). Not recoverable.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export function isLookupError(value: unknown): value is LookupError {
  return value instanceof LookupError;
}

export function isInvariantViolation(value: unknown): value is InvariantViolation {
  return value instanceof InvariantViolation;
}
