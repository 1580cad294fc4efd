/**
 * Expansion planning types
 *
 * Cell counts are absolute cells, volumes are mL, durations are days.
 * Doses are expressed in ×10⁶ cells per kg of patient weight.
 */

export type NumericRange = readonly [min: number, max: number];

/* ---------------- equipment catalog ---------------- */

export interface VesselType {
  readonly id: string;
  readonly label: string;
  readonly surfaceAreaCm2: number;
  readonly seedingCells: number;       // cells seeded per vessel
  readonly confluentCells: number;     // cells harvested per vessel at confluence
  readonly mediumVolumeMl: number;     // per vessel per change
  readonly mediumVolumeRangeMl: NumericRange;
}

export interface SeparatorProfile {
  readonly id: string;
  readonly label: string;
  readonly cellsPerMl: number;
}

export type GvhdGrade = 'Grade I' | 'Grade II' | 'Grade III-IV';

export interface DoseResponseReference {
  readonly grade: GvhdGrade;
  readonly minDosePerKg: number;
  readonly maxDosePerKg: number;
  readonly responsePct: NumericRange;  // response at min dose, at max dose
}

export interface EquipmentCatalog {
  readonly vessels: Readonly<Record<string, VesselType>>;
  readonly separators: Readonly<Record<string, SeparatorProfile>>;
  readonly doseResponse: Readonly<Record<GvhdGrade, DoseResponseReference>>;
  readonly fallbackVesselId: string;
  readonly fallbackSeparatorId: string;
}

export interface CatalogLookup<T> {
  entry: T;
  usedFallback: boolean;
}

/* ---------------- protocol settings ---------------- */

export type PlanningStrategy = 'fewest-vessels' | 'fewest-passages';

export type MediumChangePolicy =
  | { kind: 'fixed'; firstPassage: number; subsequentPassage: number }
  | { kind: 'interval'; everyDays: number };

export interface PassageSchedule {
  firstPassageDays: number;
  subsequentPassageDays: number;
  mediumChanges: MediumChangePolicy;
}

export type WeightRangeId = 'adult' | 'pediatric';

export interface ProtocolSettings {
  maxPassages: number;          // re-seedings after the initial seeding
  safetyFactor: number;
  maxInitialVessels: number;    // upper bound of the N0 search
  strategy: PlanningStrategy;
  schedule: PassageSchedule;
  primingFraction: number;
  collectionFloorMl: number;
  weightRangesKg: Readonly<Record<WeightRangeId, NumericRange>>;
  doseRangePerKg: NumericRange;
}

/* ---------------- planning results ---------------- */

export interface DoseTargetRequest {
  weightKg: number;
  dosePerKg: number;
  weightRange?: WeightRangeId;
}

export interface DoseTarget {
  readonly weightKg: number;
  readonly dosePerKg: number;
  readonly cells: number;
  readonly collectionVolumeMl: number;
  readonly collectionFloorApplied: boolean;
}

export interface PassageRecord {
  readonly index: number;       // 0 = initial seeding
  readonly vesselCount: number;
  readonly inputCells: number;
  readonly outputCells: number;
  readonly durationDays: number;
  readonly mediumChanges: number;
  readonly startDay: number;
  readonly endDay: number;
}

export interface ExpansionPlan {
  readonly vessel: VesselType;
  readonly targetCells: number;
  readonly initialVesselCount: number;
  readonly passages: readonly PassageRecord[];
  readonly passagesUsed: number;
  readonly targetMet: boolean;
  readonly metAtPassage: number | null;
  readonly strategy: PlanningStrategy;
  readonly maxPassages: number;
  readonly safetyFactor: number;
  readonly searchedUpTo: number;
}

export interface PassageMedium {
  readonly index: number;
  readonly mediumMl: number;
}

export interface ResourceSummary {
  readonly totalDays: number;
  readonly totalMediumMl: number;
  readonly primingVolumeMl: number;
  readonly mediumVolumePerVesselMl: number;
  readonly mediumByPassage: readonly PassageMedium[];
}

export interface TrajectorySample {
  readonly day: number;
  readonly cells: number;
  readonly passageIndex: number;
}

export type DegenerateReason = 'zero_duration' | 'zero_input' | 'zero_output';

export interface TrajectorySegment {
  readonly passageIndex: number;
  readonly startDay: number;
  readonly endDay: number;
  readonly inputCells: number;
  readonly outputCells: number;
  readonly rate: number;        // per day; 0 on a flat segment
  readonly degenerate: DegenerateReason | null;
}

export interface ExpansionInputs {
  weightKg: number;
  dosePerKg: number;
  vesselId: string;
  separatorId: string;
  priming: boolean;
  gvhdGrade: GvhdGrade;
  mediumVolumeMl?: number;
  weightRange?: WeightRangeId;
  mediumChanges?: MediumChangePolicy;   // replaces the protocol's medium policy for this run
}
