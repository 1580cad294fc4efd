/**
 * Invariant: Expansion Plan Integrity
 *
 * Executable form of the plan guarantees:
 * 1. Vessel counts are positive integers
 * 2. Every passage grows (output >= input) and output rises passage over passage
 * 3. Re-seedings never exceed the passage limit
 * 4. Days are contiguous and increasing
 * 5. targetMet agrees with the final harvest
 */

import type { ExpansionPlan } from '../types/expansion';
import type { Violation } from './types';

export function inv_positiveVesselCounts(plan: ExpansionPlan): Violation[] {
  return plan.passages
    .filter((p) => !Number.isInteger(p.vesselCount) || p.vesselCount < 1)
    .map((p) => ({
      type: 'vessel_count_invalid',
      severity: 'error' as const,
      passageIndex: p.index,
      message: `Passage ${p.index} uses ${p.vesselCount} vessels; must be a positive integer.`,
      details: { vesselCount: p.vesselCount },
    }));
}

export function inv_monotonicGrowth(plan: ExpansionPlan): Violation[] {
  const violations: Violation[] = [];

  plan.passages.forEach((p, i) => {
    if (p.outputCells < p.inputCells) {
      violations.push({
        type: 'passage_shrinks',
        severity: 'error',
        passageIndex: p.index,
        message: `Passage ${p.index} harvests ${p.outputCells} cells from ${p.inputCells} seeded.`,
        suggestion: 'Check the vessel capacity data.',
      });
    }

    const previous = i > 0 ? plan.passages[i - 1] : undefined;
    if (previous && p.outputCells <= previous.outputCells) {
      violations.push({
        type: 'output_not_increasing',
        severity: 'error',
        passageIndex: p.index,
        message: `Passage ${p.index} output (${p.outputCells}) does not exceed passage ${previous.index} output (${previous.outputCells}).`,
      });
    }
  });

  return violations;
}

export function inv_passageLimit(plan: ExpansionPlan): Violation[] {
  if (plan.passagesUsed <= plan.maxPassages && plan.passagesUsed === plan.passages.length - 1) {
    return [];
  }

  return [
    {
      type: 'passage_limit_exceeded',
      severity: 'error',
      message: `Plan uses ${plan.passagesUsed} re-seedings over ${plan.passages.length} records; limit is ${plan.maxPassages}.`,
      details: { passagesUsed: plan.passagesUsed, maxPassages: plan.maxPassages },
    },
  ];
}

export function inv_contiguousDays(plan: ExpansionPlan): Violation[] {
  const violations: Violation[] = [];
  let expectedStart = 0;

  for (const p of plan.passages) {
    if (p.startDay !== expectedStart || p.endDay < p.startDay) {
      violations.push({
        type: 'days_not_contiguous',
        severity: 'error',
        passageIndex: p.index,
        message: `Passage ${p.index} spans day ${p.startDay}–${p.endDay}; expected to start on day ${expectedStart}.`,
      });
    }
    expectedStart = p.endDay;
  }

  return violations;
}

export function inv_targetFlagConsistent(plan: ExpansionPlan): Violation[] {
  const last = plan.passages[plan.passages.length - 1];
  const reached = last !== undefined && last.outputCells >= plan.targetCells;

  if (reached === plan.targetMet) return [];

  return [
    {
      type: 'target_flag_mismatch',
      severity: 'error',
      message: `Plan reports targetMet=${plan.targetMet} but final harvest is ${last?.outputCells ?? 0} for a target of ${plan.targetCells}.`,
    },
  ];
}

/**
 * Run all plan invariants
 */
export function checkExpansionPlan(plan: ExpansionPlan): Violation[] {
  return [
    ...inv_positiveVesselCounts(plan),
    ...inv_monotonicGrowth(plan),
    ...inv_passageLimit(plan),
    ...inv_contiguousDays(plan),
    ...inv_targetFlagConsistent(plan),
  ];
}
