/**
 * Expansion Planner
 *
 * Bounded search for the initial vessel count (N0). Each candidate is
 * simulated passage by passage: harvest every vessel at confluence, then
 * re-seed into ceil(harvest / seeding × safetyFactor) vessels.
 *
 * Strategies:
 *   fewest-vessels  - smallest N0, then earliest passage meeting the target
 *   fewest-passages - fewest re-seedings, then smallest N0 for that count
 *
 * When no N0 in range reaches the target, the plan for the upper bound is
 * returned with targetMet = false.
 */

import type {
  ExpansionPlan,
  PassageRecord,
  PassageSchedule,
  ProtocolSettings,
  VesselType,
} from '../types/expansion';
import { ConfigurationError, isPositiveFinite } from './errors';
import { mediumChangesForPassage, passageDurationDays, validateSchedule } from './passageSchedule';

const ROUNDING_TOLERANCE = 1e-9;

export type PlannerSettings = Pick<
  ProtocolSettings,
  'maxPassages' | 'safetyFactor' | 'maxInitialVessels' | 'strategy' | 'schedule'
>;

export interface PassageStep {
  vesselCount: number;
  inputCells: number;
  outputCells: number;
}

export function planExpansion(targetCells: number, vessel: VesselType, settings: PlannerSettings): ExpansionPlan {
  validatePlannerInputs(targetCells, vessel, settings);

  const found =
    settings.strategy === 'fewest-passages'
      ? searchFewestPassages(targetCells, vessel, settings)
      : searchFewestVessels(targetCells, vessel, settings);

  if (found) {
    return buildPlan(found.n0, found.steps, true, targetCells, vessel, settings);
  }

  const n0 = settings.maxInitialVessels;
  const steps = simulatePassages(n0, vessel, targetCells, settings.maxPassages, settings.safetyFactor);
  console.warn(
    `Target of ${targetCells} cells not reachable with up to ${n0} ${vessel.id} vessels in ${settings.maxPassages} passages`
  );
  return buildPlan(n0, steps, false, targetCells, vessel, settings);
}

/**
 * Vessels re-seeded from a harvest, padded by the safety factor
 */
export function reseedVesselCount(harvestedCells: number, vessel: VesselType, safetyFactor: number): number {
  return Math.max(1, ceilTolerant((harvestedCells / vessel.seedingCells) * safetyFactor));
}

/**
 * Single-passage vessel count, ignoring re-seeding. Reporting only; the
 * planner always simulates.
 */
export function estimateMinimumInitialVessels(targetCells: number, vessel: VesselType, maxInitialVessels: number): number {
  return Math.min(maxInitialVessels, Math.max(1, ceilTolerant(targetCells / vessel.confluentCells)));
}

/**
 * Simulate from N0 vessels, stopping at the first passage that meets the
 * target or after maxPassages re-seedings.
 */
export function simulatePassages(
  n0: number,
  vessel: VesselType,
  targetCells: number,
  maxPassages: number,
  safetyFactor: number
): PassageStep[] {
  const steps: PassageStep[] = [
    { vesselCount: n0, inputCells: n0 * vessel.seedingCells, outputCells: n0 * vessel.confluentCells },
  ];

  while (steps.length - 1 < maxPassages) {
    const previous = steps[steps.length - 1];
    if (previous.outputCells >= targetCells) break;

    const vesselCount = reseedVesselCount(previous.outputCells, vessel, safetyFactor);
    steps.push({
      vesselCount,
      inputCells: previous.outputCells,
      outputCells: vesselCount * vessel.confluentCells,
    });
  }

  return steps;
}

/* ---------------- search strategies ---------------- */

function searchFewestVessels(
  targetCells: number,
  vessel: VesselType,
  settings: PlannerSettings
): { n0: number; steps: PassageStep[] } | null {
  for (let n0 = 1; n0 <= settings.maxInitialVessels; n0++) {
    const steps = simulatePassages(n0, vessel, targetCells, settings.maxPassages, settings.safetyFactor);
    if (lastOutput(steps) >= targetCells) {
      return { n0, steps };
    }
  }
  return null;
}

function searchFewestPassages(
  targetCells: number,
  vessel: VesselType,
  settings: PlannerSettings
): { n0: number; steps: PassageStep[] } | null {
  for (let passages = 0; passages <= settings.maxPassages; passages++) {
    for (let n0 = 1; n0 <= settings.maxInitialVessels; n0++) {
      const steps = simulatePassages(n0, vessel, targetCells, passages, settings.safetyFactor);
      if (lastOutput(steps) >= targetCells) {
        return { n0, steps };
      }
    }
  }
  return null;
}

/* ---------------- helpers ---------------- */

function buildPlan(
  n0: number,
  steps: PassageStep[],
  targetMet: boolean,
  targetCells: number,
  vessel: VesselType,
  settings: PlannerSettings
): ExpansionPlan {
  const passages = toPassageRecords(steps, settings.schedule);

  return {
    vessel,
    targetCells,
    initialVesselCount: n0,
    passages,
    passagesUsed: passages.length - 1,
    targetMet,
    metAtPassage: targetMet ? passages.length - 1 : null,
    strategy: settings.strategy,
    maxPassages: settings.maxPassages,
    safetyFactor: settings.safetyFactor,
    searchedUpTo: settings.maxInitialVessels,
  };
}

function toPassageRecords(steps: PassageStep[], schedule: PassageSchedule): PassageRecord[] {
  const records: PassageRecord[] = [];
  let day = 0;

  steps.forEach((step, index) => {
    const durationDays = passageDurationDays(index, schedule);
    records.push({
      index,
      vesselCount: step.vesselCount,
      inputCells: step.inputCells,
      outputCells: step.outputCells,
      durationDays,
      mediumChanges: mediumChangesForPassage(index, durationDays, schedule.mediumChanges),
      startDay: day,
      endDay: day + durationDays,
    });
    day += durationDays;
  });

  return records;
}

function lastOutput(steps: PassageStep[]): number {
  return steps[steps.length - 1].outputCells;
}

function ceilTolerant(value: number): number {
  return Math.ceil(value - ROUNDING_TOLERANCE);
}

function validatePlannerInputs(targetCells: number, vessel: VesselType, settings: PlannerSettings): void {
  if (!isPositiveFinite(targetCells)) {
    throw new ConfigurationError(`Target cell count must be positive (got ${targetCells}).`);
  }
  if (!isPositiveFinite(vessel.seedingCells) || !isPositiveFinite(vessel.confluentCells)) {
    throw new ConfigurationError(
      `Vessel ${vessel.id} seeding (${vessel.seedingCells}) and confluent (${vessel.confluentCells}) counts must be positive.`
    );
  }
  if (vessel.confluentCells <= vessel.seedingCells) {
    throw new ConfigurationError(`Vessel ${vessel.id} confluent count must exceed its seeding count.`);
  }
  if (!Number.isFinite(settings.safetyFactor) || settings.safetyFactor < 1) {
    throw new ConfigurationError(`Safety factor must be at least 1 (got ${settings.safetyFactor}).`);
  }
  if (!Number.isInteger(settings.maxPassages) || settings.maxPassages < 0) {
    throw new ConfigurationError(`Maximum passages must be a non-negative integer (got ${settings.maxPassages}).`);
  }
  if (!Number.isInteger(settings.maxInitialVessels) || settings.maxInitialVessels < 1) {
    throw new ConfigurationError(`Vessel search bound must be a positive integer (got ${settings.maxInitialVessels}).`);
  }
  validateSchedule(settings.schedule);
}
