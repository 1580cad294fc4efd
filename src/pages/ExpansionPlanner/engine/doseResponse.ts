/**
 * GVHD dose-response reference
 *
 * Expected response rises (or falls) linearly across a grade's recommended
 * dose range. Used for reporting next to the plan; the planner ignores it.
 */

import type { DoseResponseReference, EquipmentCatalog, GvhdGrade } from '../types/expansion';
import { ConfigurationError } from './errors';
import { clamp, linspace } from '../../../utils/inputParsing';

export interface DoseResponsePoint {
  dosePerKg: number;
  responsePct: number;
}

export function referenceForGrade(catalog: EquipmentCatalog, grade: GvhdGrade): DoseResponseReference {
  const ref = Object.prototype.hasOwnProperty.call(catalog.doseResponse, grade) ? catalog.doseResponse[grade] : undefined;
  if (!ref) {
    throw new ConfigurationError(`No dose-response reference for ${grade}.`);
  }
  return ref;
}

/**
 * Linear interpolation, held flat outside the reference range
 */
export function responseAtDose(ref: DoseResponseReference, dosePerKg: number): number {
  const [low, high] = ref.responsePct;
  const span = ref.maxDosePerKg - ref.minDosePerKg;
  const t = clamp((dosePerKg - ref.minDosePerKg) / span, 0, 1);
  return low + (high - low) * t;
}

export function isDoseWithinReference(ref: DoseResponseReference, dosePerKg: number): boolean {
  return dosePerKg >= ref.minDosePerKg && dosePerKg <= ref.maxDosePerKg;
}

export function doseResponseCurve(ref: DoseResponseReference, points = 100): DoseResponsePoint[] {
  return linspace(ref.minDosePerKg, ref.maxDosePerKg, points).map((dosePerKg) => ({
    dosePerKg,
    responsePct: responseAtDose(ref, dosePerKg),
  }));
}
