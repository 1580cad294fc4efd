/**
 * Plan integrity mutations
 *
 * Strategy: take a plan produced by the engine (zero violations), apply one
 * deterministic bad edit, and check the matching invariant fires.
 */

import { describe, test, expect } from 'vitest';
import { checkExpansionPlan } from '../../src/pages/ExpansionPlanner/invariants/planIntegrity';
import { planExpansion } from '../../src/pages/ExpansionPlanner/engine/expansionPlanner';
import type { ExpansionPlan } from '../../src/pages/ExpansionPlanner/types/expansion';
import { FEWEST_VESSELS, STANDARD_MEDIUM } from '../fixtures/planning';

// vessels [1, 5, 24], met at passage 2
const golden = planExpansion(70e6, STANDARD_MEDIUM, FEWEST_VESSELS);

const editPassage = (
  plan: ExpansionPlan,
  index: number,
  edit: Partial<ExpansionPlan['passages'][number]>
): ExpansionPlan => ({
  ...plan,
  passages: plan.passages.map((p) => (p.index === index ? { ...p, ...edit } : p)),
});

describe('checkExpansionPlan', () => {
  test('engine plans have no violations', () => {
    expect(checkExpansionPlan(golden)).toEqual([]);
    expect(checkExpansionPlan(planExpansion(1e12, STANDARD_MEDIUM, { ...FEWEST_VESSELS, maxInitialVessels: 3 }))).toEqual([]);
  });

  const mutationTests: Array<{
    name: string;
    mutator: (plan: ExpansionPlan) => ExpansionPlan;
    expectType: string;
  }> = [
    {
      name: 'zero vessels',
      mutator: (plan) => editPassage(plan, 1, { vesselCount: 0 }),
      expectType: 'vessel_count_invalid',
    },
    {
      name: 'fractional vessels',
      mutator: (plan) => editPassage(plan, 2, { vesselCount: 23.5 }),
      expectType: 'vessel_count_invalid',
    },
    {
      name: 'harvest below seeding',
      mutator: (plan) => editPassage(plan, 0, { outputCells: 1e6 }),
      expectType: 'passage_shrinks',
    },
    {
      name: 'output falls between passages',
      mutator: (plan) => editPassage(plan, 2, { inputCells: 1e6, outputCells: 30e6 }),
      expectType: 'output_not_increasing',
    },
    {
      name: 'too many re-seedings',
      mutator: (plan) => ({ ...plan, maxPassages: 1 }),
      expectType: 'passage_limit_exceeded',
    },
    {
      name: 'passage count disagrees with records',
      mutator: (plan) => ({ ...plan, passagesUsed: 1 }),
      expectType: 'passage_limit_exceeded',
    },
    {
      name: 'gap between passages',
      mutator: (plan) => editPassage(plan, 1, { startDay: 8 }),
      expectType: 'days_not_contiguous',
    },
    {
      name: 'target flag flipped',
      mutator: (plan) => ({ ...plan, targetMet: false }),
      expectType: 'target_flag_mismatch',
    },
  ];

  test.each(mutationTests)('$name → $expectType', ({ mutator, expectType }) => {
    const violations = checkExpansionPlan(mutator(golden));

    expect(violations.map((v) => v.type)).toContain(expectType);
  });

  test('violations name the offending passage', () => {
    const violations = checkExpansionPlan(editPassage(golden, 1, { vesselCount: 0 }));

    expect(violations).toHaveLength(1);
    expect(violations[0].passageIndex).toBe(1);
  });
});
