/**
 * Invariant: Equipment Catalog Integrity
 *
 * Capacity data must describe positive growth. A zero seeding count or a
 * confluent count at or below seeding would stall the vessel search, so these
 * are errors and the run is refused before planning starts.
 */

import type { EquipmentCatalog } from '../types/expansion';
import type { Violation } from './types';
import { ConfigurationError, isPositiveFinite } from '../engine/errors';
import { catalogEntry } from '../catalog/lookup';

export function inv_vesselCapacities(catalog: EquipmentCatalog): Violation[] {
  const violations: Violation[] = [];

  for (const [key, vessel] of Object.entries(catalog.vessels)) {
    const fields = {
      surfaceAreaCm2: vessel.surfaceAreaCm2,
      seedingCells: vessel.seedingCells,
      confluentCells: vessel.confluentCells,
      mediumVolumeMl: vessel.mediumVolumeMl,
    };

    for (const [field, value] of Object.entries(fields)) {
      if (!isPositiveFinite(value)) {
        violations.push({
          type: 'vessel_non_positive_value',
          severity: 'error',
          message: `Vessel ${key} has ${field} = ${value}; must be a positive number.`,
          suggestion: 'Fix the catalog entry before planning.',
          details: { vesselId: key, field, value },
        });
      }
    }

    if (
      isPositiveFinite(vessel.seedingCells) &&
      isPositiveFinite(vessel.confluentCells) &&
      vessel.confluentCells <= vessel.seedingCells
    ) {
      violations.push({
        type: 'vessel_no_growth',
        severity: 'error',
        message: `Vessel ${key} confluent count (${vessel.confluentCells}) does not exceed seeding count (${vessel.seedingCells}).`,
        suggestion: 'Confluent capacity must be larger than the seeding count.',
        details: { vesselId: key },
      });
    }

    const [minMl, maxMl] = vessel.mediumVolumeRangeMl;
    if (vessel.mediumVolumeMl < minMl || vessel.mediumVolumeMl > maxMl) {
      violations.push({
        type: 'vessel_medium_out_of_range',
        severity: 'warning',
        message: `Vessel ${key} default medium volume ${vessel.mediumVolumeMl} mL is outside [${minMl}, ${maxMl}] mL.`,
        details: { vesselId: key },
      });
    }

    if (vessel.id !== key) {
      violations.push({
        type: 'vessel_id_mismatch',
        severity: 'warning',
        message: `Vessel stored under "${key}" declares id "${vessel.id}".`,
        details: { vesselId: key },
      });
    }
  }

  return violations;
}

export function inv_separatorYields(catalog: EquipmentCatalog): Violation[] {
  const violations: Violation[] = [];

  for (const [key, separator] of Object.entries(catalog.separators)) {
    if (!isPositiveFinite(separator.cellsPerMl)) {
      violations.push({
        type: 'separator_non_positive_yield',
        severity: 'error',
        message: `Separator ${key} yield is ${separator.cellsPerMl} cells/mL; must be positive.`,
        suggestion: 'Choose another separator profile or correct its yield.',
        details: { separatorId: key },
      });
    }
  }

  return violations;
}

export function inv_doseReferences(catalog: EquipmentCatalog): Violation[] {
  const violations: Violation[] = [];

  for (const ref of Object.values(catalog.doseResponse)) {
    if (!(ref.minDosePerKg < ref.maxDosePerKg)) {
      violations.push({
        type: 'dose_reference_empty_range',
        severity: 'error',
        message: `${ref.grade} dose range [${ref.minDosePerKg}, ${ref.maxDosePerKg}] is empty.`,
        details: { grade: ref.grade },
      });
    }
  }

  return violations;
}

export function inv_fallbacksPresent(catalog: EquipmentCatalog): Violation[] {
  const violations: Violation[] = [];

  if (catalogEntry(catalog.vessels, catalog.fallbackVesselId) === undefined) {
    violations.push({
      type: 'fallback_vessel_missing',
      severity: 'error',
      message: `Fallback vessel "${catalog.fallbackVesselId}" is not in the catalog.`,
      details: { vesselId: catalog.fallbackVesselId },
    });
  }

  if (catalogEntry(catalog.separators, catalog.fallbackSeparatorId) === undefined) {
    violations.push({
      type: 'fallback_separator_missing',
      severity: 'error',
      message: `Fallback separator "${catalog.fallbackSeparatorId}" is not in the catalog.`,
      details: { separatorId: catalog.fallbackSeparatorId },
    });
  }

  return violations;
}

/**
 * Run all catalog invariants
 */
export function checkEquipmentCatalog(catalog: EquipmentCatalog): Violation[] {
  return [
    ...inv_fallbacksPresent(catalog),
    ...inv_vesselCapacities(catalog),
    ...inv_separatorYields(catalog),
    ...inv_doseReferences(catalog),
  ];
}

/**
 * Throw a ConfigurationError when the catalog has any error-level violation
 */
export function assertValidCatalog(catalog: EquipmentCatalog): void {
  const violations = checkEquipmentCatalog(catalog);
  const errors = violations.filter((v) => v.severity === 'error');

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Equipment catalog is invalid: ${errors.map((v) => v.message).join(' ')}`,
      errors
    );
  }
}
