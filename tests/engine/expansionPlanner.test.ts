/**
 * Expansion planner search
 *
 * Reference vessel: seeding 2.1e6, confluent 8.4e6 (4× growth per passage),
 * safety factor 1.2, up to 3 re-seedings, N0 searched over 1..200.
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  estimateMinimumInitialVessels,
  planExpansion,
  reseedVesselCount,
  simulatePassages,
} from '../../src/pages/ExpansionPlanner/engine/expansionPlanner';
import { ConfigurationError } from '../../src/pages/ExpansionPlanner/engine/errors';
import { withProtocolOverrides } from '../../src/config/protocol';
import { FEWEST_PASSAGES, FEWEST_VESSELS, STANDARD_MEDIUM } from '../fixtures/planning';

describe('planExpansion', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('fewest-passages strategy', () => {
    test('70e6 cells fit in a single passage of 9 vessels', () => {
      const plan = planExpansion(70e6, STANDARD_MEDIUM, FEWEST_PASSAGES);

      expect(plan.initialVesselCount).toBe(9);
      expect(plan.passages).toHaveLength(1);
      expect(plan.passages[0].outputCells).toBe(75.6e6);
      expect(plan.passagesUsed).toBe(0);
      expect(plan.targetMet).toBe(true);
      expect(plan.metAtPassage).toBe(0);
      expect(plan.passages[0].endDay).toBe(7);
    });

    test('500e6 cells still fit in one passage when 60 vessels are allowed', () => {
      const plan = planExpansion(500e6, STANDARD_MEDIUM, FEWEST_PASSAGES);

      expect(plan.initialVesselCount).toBe(60);
      expect(plan.passagesUsed).toBe(0);
    });

    test('a tighter vessel bound forces re-seeding', () => {
      const settings = withProtocolOverrides({ maxInitialVessels: 50 }, FEWEST_PASSAGES);
      const plan = planExpansion(500e6, STANDARD_MEDIUM, settings);

      // 13 → ceil(52 × 1.2) = 63 vessels → 529.2e6
      expect(plan.initialVesselCount).toBe(13);
      expect(plan.passages.map((p) => p.vesselCount)).toEqual([13, 63]);
      expect(plan.passagesUsed).toBe(1);
      expect(plan.targetMet).toBe(true);
    });
  });

  describe('fewest-vessels strategy', () => {
    test('70e6 cells are reached from one vessel after two re-seedings', () => {
      const plan = planExpansion(70e6, STANDARD_MEDIUM, FEWEST_VESSELS);

      expect(plan.initialVesselCount).toBe(1);
      expect(plan.passages.map((p) => p.vesselCount)).toEqual([1, 5, 24]);
      expect(plan.passages.map((p) => p.inputCells)).toEqual([2.1e6, 8.4e6, 42e6]);
      expect(plan.passages.map((p) => p.outputCells)).toEqual([8.4e6, 42e6, 201.6e6]);
      expect(plan.metAtPassage).toBe(2);
      expect(plan.passages.map((p) => [p.startDay, p.endDay])).toEqual([[0, 7], [7, 12], [12, 17]]);
    });

    test('500e6 cells need a multi-passage plan', () => {
      const plan = planExpansion(500e6, STANDARD_MEDIUM, FEWEST_VESSELS);

      expect(plan.passages.map((p) => p.vesselCount)).toEqual([1, 5, 24, 116]);
      expect(plan.passages[3].outputCells).toBe(974.4e6);
      expect(plan.passagesUsed).toBe(3);
      expect(plan.passagesUsed).toBeGreaterThan(1);
      expect(plan.targetMet).toBe(true);
    });

    test('target equal to a passage output counts as met', () => {
      const plan = planExpansion(42e6, STANDARD_MEDIUM, FEWEST_VESSELS);

      expect(plan.initialVesselCount).toBe(1);
      expect(plan.metAtPassage).toBe(1);
      expect(plan.passages).toHaveLength(2);
    });

    test('no smaller N0 meets the target within the passage limit', () => {
      const settings = withProtocolOverrides({ maxPassages: 1 }, FEWEST_VESSELS);
      const targets = [10e6, 70e6, 250e6, 500e6, 1e9];

      for (const target of targets) {
        const plan = planExpansion(target, STANDARD_MEDIUM, settings);
        expect(plan.targetMet).toBe(true);

        for (let n0 = 1; n0 < plan.initialVesselCount; n0++) {
          const steps = simulatePassages(n0, STANDARD_MEDIUM, target, settings.maxPassages, settings.safetyFactor);
          expect(steps[steps.length - 1].outputCells).toBeLessThan(target);
        }
      }
    });

    test('one re-seeding allowed: 500e6 needs 13 vessels', () => {
      const plan = planExpansion(500e6, STANDARD_MEDIUM, withProtocolOverrides({ maxPassages: 1 }, FEWEST_VESSELS));

      expect(plan.initialVesselCount).toBe(13);
      expect(plan.passages[1].outputCells).toBe(529.2e6);
    });
  });

  describe('unreachable targets', () => {
    test('returns the upper-bound plan with targetMet = false', () => {
      const plan = planExpansion(1e12, STANDARD_MEDIUM, FEWEST_VESSELS);

      expect(plan.targetMet).toBe(false);
      expect(plan.metAtPassage).toBeNull();
      expect(plan.initialVesselCount).toBe(200);
      expect(plan.passages.map((p) => p.vesselCount)).toEqual([200, 960, 4608, 22119]);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    test('the degraded plan is the same under both strategies', () => {
      const a = planExpansion(1e12, STANDARD_MEDIUM, FEWEST_VESSELS);
      const b = planExpansion(1e12, STANDARD_MEDIUM, FEWEST_PASSAGES);

      expect(b.passages).toEqual(a.passages);
      expect(b.targetMet).toBe(false);
    });

    test('with no re-seeding allowed the plan is a single passage', () => {
      const plan = planExpansion(2e9, STANDARD_MEDIUM, withProtocolOverrides({ maxPassages: 0 }, FEWEST_VESSELS));

      expect(plan.passages).toHaveLength(1);
      expect(plan.passages[0].outputCells).toBe(1.68e9);
      expect(plan.targetMet).toBe(false);
    });
  });

  describe('guarantees', () => {
    const targets = [1e6, 8.4e6, 70e6, 333e6, 500e6, 5e9, 1e12];

    test.each(targets)('target %s: output grows and passages stay within the limit', (target) => {
      const plan = planExpansion(target, STANDARD_MEDIUM, FEWEST_VESSELS);

      expect(plan.passagesUsed).toBeLessThanOrEqual(plan.maxPassages);
      plan.passages.forEach((p, i) => {
        expect(Number.isInteger(p.vesselCount)).toBe(true);
        expect(p.vesselCount).toBeGreaterThanOrEqual(1);
        expect(p.outputCells).toBeGreaterThanOrEqual(p.inputCells);
        if (i > 0) {
          expect(p.outputCells).toBeGreaterThan(plan.passages[i - 1].outputCells);
          expect(p.startDay).toBe(plan.passages[i - 1].endDay);
          expect(p.inputCells).toBe(plan.passages[i - 1].outputCells);
        }
      });
    });

    test('repeated runs produce identical plans', () => {
      expect(planExpansion(500e6, STANDARD_MEDIUM, FEWEST_VESSELS)).toEqual(
        planExpansion(500e6, STANDARD_MEDIUM, FEWEST_VESSELS)
      );
    });
  });

  describe('configuration errors', () => {
    test.each([
      ['zero seeding', { ...STANDARD_MEDIUM, seedingCells: 0 }],
      ['negative confluent', { ...STANDARD_MEDIUM, confluentCells: -1 }],
      ['no growth', { ...STANDARD_MEDIUM, confluentCells: 2.1e6 }],
    ])('%s', (_name, vessel) => {
      expect(() => planExpansion(70e6, vessel, FEWEST_VESSELS)).toThrow(ConfigurationError);
    });

    test('safety factor below 1', () => {
      expect(() =>
        planExpansion(70e6, STANDARD_MEDIUM, withProtocolOverrides({ safetyFactor: 0.9 }, FEWEST_VESSELS))
      ).toThrow(ConfigurationError);
    });

    test('non-positive target', () => {
      expect(() => planExpansion(0, STANDARD_MEDIUM, FEWEST_VESSELS)).toThrow(ConfigurationError);
    });

    test('zero-length passage schedule', () => {
      const settings = withProtocolOverrides(
        { schedule: { ...FEWEST_VESSELS.schedule, subsequentPassageDays: 0 } },
        FEWEST_VESSELS
      );
      expect(() => planExpansion(70e6, STANDARD_MEDIUM, settings)).toThrow(ConfigurationError);
    });

    test.each([
      ['equal durations', 5, 5],
      ['first passage shorter', 4, 5],
    ])('%s', (_name, firstPassageDays, subsequentPassageDays) => {
      const settings = withProtocolOverrides(
        { schedule: { ...FEWEST_VESSELS.schedule, firstPassageDays, subsequentPassageDays } },
        FEWEST_VESSELS
      );
      expect(() => planExpansion(70e6, STANDARD_MEDIUM, settings)).toThrow(/must run longer/);
    });
  });
});

describe('reseedVesselCount', () => {
  test('pads the harvest by the safety factor and rounds up', () => {
    expect(reseedVesselCount(8.4e6, STANDARD_MEDIUM, 1.2)).toBe(5);
    expect(reseedVesselCount(42e6, STANDARD_MEDIUM, 1.2)).toBe(24);
  });

  test('never drops below one vessel', () => {
    expect(reseedVesselCount(0, STANDARD_MEDIUM, 1.2)).toBe(1);
  });
});

describe('estimateMinimumInitialVessels', () => {
  test('single-passage estimate', () => {
    expect(estimateMinimumInitialVessels(70e6, STANDARD_MEDIUM, 200)).toBe(9);
  });

  test('capped at the search bound', () => {
    expect(estimateMinimumInitialVessels(1e12, STANDARD_MEDIUM, 200)).toBe(200);
  });
});
