/**
 * Invariant checking types
 */

export type Severity = 'error' | 'warning';

export interface Violation {
  type: string;
  severity: Severity;
  message: string;
  suggestion?: string;
  passageIndex?: number;
  details?: Record<string, unknown>;
}
