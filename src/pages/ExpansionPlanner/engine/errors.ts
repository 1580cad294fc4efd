/**
 * Planner error taxonomy
 *
 * Only invalid configuration or out-of-range inputs abort a run. An unreachable
 * target is a result flag (`targetMet = false`), and a degenerate passage in the
 * trajectory is a logged warning.
 */

import type { Violation } from '../invariants/types';
import type { NumericRange } from '../types/expansion';

export class PlannerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlannerError';
  }
}

export class ConfigurationError extends PlannerError {
  readonly violations: Violation[];

  constructor(message: string, violations: Violation[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.violations = violations;
  }
}

export class InputRangeError extends PlannerError {
  readonly field: string;
  readonly value: number;
  readonly range: NumericRange;

  constructor(field: string, value: number, range: NumericRange) {
    super(`${field} ${value} is outside the allowed range [${range[0]}, ${range[1]}].`);
    this.name = 'InputRangeError';
    this.field = field;
    this.value = value;
    this.range = range;
  }
}

export function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export function assertWithinRange(field: string, value: number, range: NumericRange): void {
  if (!Number.isFinite(value) || value < range[0] || value > range[1]) {
    throw new InputRangeError(field, value, range);
  }
}
