/**
 * Default equipment catalog
 *
 * Flask capacities follow the lab's culture sheet: seeding density × growth
 * area at seeding, and harvest at 80% of a 15,000 cells/cm² confluent monolayer.
 * Catalogs are plain values; pass a different one to plan against another lab's
 * equipment.
 */

import type {
  DoseResponseReference,
  EquipmentCatalog,
  GvhdGrade,
  NumericRange,
  SeparatorProfile,
  VesselType,
} from '../types/expansion';

export const CONFLUENCY_DENSITY_CELLS_PER_CM2 = 15000;
export const HARVEST_CONFLUENCY = 0.8;

export const VESSEL_IDS = {
  T25: 'T25',
  T75: 'T75',
  T175: 'T175',
  STANDARD_MEDIUM: 'standard-medium',
} as const;

export const SEPARATOR_IDS = {
  STANDARD: 'apheresis-standard',
  HIGH_YIELD: 'apheresis-high-yield',
  REFERENCE: 'reference-unit',
} as const;

/**
 * Build a flask entry from its growth area and seeding density
 */
export function vesselFromDensity(
  id: string,
  label: string,
  surfaceAreaCm2: number,
  seedingDensityPerCm2: number,
  mediumVolumeRangeMl: NumericRange
): VesselType {
  return {
    id,
    label,
    surfaceAreaCm2,
    seedingCells: surfaceAreaCm2 * seedingDensityPerCm2,
    confluentCells: surfaceAreaCm2 * CONFLUENCY_DENSITY_CELLS_PER_CM2 * HARVEST_CONFLUENCY,
    mediumVolumeMl: mediumVolumeRangeMl[0],
    mediumVolumeRangeMl,
  };
}

const VESSELS: Record<string, VesselType> = {
  [VESSEL_IDS.T25]: vesselFromDensity(VESSEL_IDS.T25, 'T25 flask', 25, 3000, [5, 10]),
  [VESSEL_IDS.T75]: vesselFromDensity(VESSEL_IDS.T75, 'T75 flask', 75, 3000, [15, 20]),
  [VESSEL_IDS.T175]: vesselFromDensity(VESSEL_IDS.T175, 'T175 flask', 175, 2500, [30, 40]),
  [VESSEL_IDS.STANDARD_MEDIUM]: {
    id: VESSEL_IDS.STANDARD_MEDIUM,
    label: 'Standard medium vessel',
    surfaceAreaCm2: 700,
    seedingCells: 2.1e6,
    confluentCells: 8.4e6,
    mediumVolumeMl: 15,
    mediumVolumeRangeMl: [15, 20],
  },
};

// 1×10⁶ MSCs per 50 mL of collected PBSC
const SEPARATORS: Record<string, SeparatorProfile> = {
  [SEPARATOR_IDS.STANDARD]: { id: SEPARATOR_IDS.STANDARD, label: 'Standard apheresis', cellsPerMl: 2e4 },
  [SEPARATOR_IDS.HIGH_YIELD]: { id: SEPARATOR_IDS.HIGH_YIELD, label: 'High-yield apheresis', cellsPerMl: 4e4 },
  [SEPARATOR_IDS.REFERENCE]: { id: SEPARATOR_IDS.REFERENCE, label: 'Reference (1×10⁶ per mL)', cellsPerMl: 1e6 },
};

export const GVHD_GRADES: readonly GvhdGrade[] = ['Grade I', 'Grade II', 'Grade III-IV'];

const DOSE_RESPONSE: Record<GvhdGrade, DoseResponseReference> = {
  'Grade I': { grade: 'Grade I', minDosePerKg: 0.5, maxDosePerKg: 1.0, responsePct: [60, 80] },
  'Grade II': { grade: 'Grade II', minDosePerKg: 1.0, maxDosePerKg: 1.5, responsePct: [50, 70] },
  'Grade III-IV': { grade: 'Grade III-IV', minDosePerKg: 1.5, maxDosePerKg: 2.0, responsePct: [40, 60] },
};

export const DEFAULT_EQUIPMENT_CATALOG: EquipmentCatalog = {
  vessels: VESSELS,
  separators: SEPARATORS,
  doseResponse: DOSE_RESPONSE,
  fallbackVesselId: VESSEL_IDS.T75,
  fallbackSeparatorId: SEPARATOR_IDS.STANDARD,
};

/**
 * Extend or replace parts of a catalog (e.g. a lab's own flasks)
 */
export function createEquipmentCatalog(
  overrides: Partial<EquipmentCatalog>,
  base: EquipmentCatalog = DEFAULT_EQUIPMENT_CATALOG
): EquipmentCatalog {
  return {
    vessels: { ...base.vessels, ...overrides.vessels },
    separators: { ...base.separators, ...overrides.separators },
    doseResponse: { ...base.doseResponse, ...overrides.doseResponse },
    fallbackVesselId: overrides.fallbackVesselId ?? base.fallbackVesselId,
    fallbackSeparatorId: overrides.fallbackSeparatorId ?? base.fallbackSeparatorId,
  };
}
