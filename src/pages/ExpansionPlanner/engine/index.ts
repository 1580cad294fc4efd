/**
 * Expansion planning engine
 *
 * One call plans one run: resolve the dose target, search the vessel plan,
 * account for resources, then build the growth trajectory and dose reference.
 * Nothing is shared between runs.
 */

export * from './errors';
export * from './targetResolver';
export * from './expansionPlanner';
export * from './passageSchedule';
export * from './resourceAccountant';
export * from './trajectorySimulator';
export * from './doseResponse';

import type {
  CatalogLookup,
  DoseResponseReference,
  DoseTarget,
  EquipmentCatalog,
  ExpansionInputs,
  ExpansionPlan,
  MediumChangePolicy,
  ProtocolSettings,
  ResourceSummary,
  SeparatorProfile,
  TrajectorySample,
  TrajectorySegment,
  VesselType,
} from '../types/expansion';
import { DEFAULT_EQUIPMENT_CATALOG } from '../catalog/equipmentCatalog';
import { resolveSeparator, resolveVessel } from '../catalog/lookup';
import { assertValidCatalog, checkExpansionPlan } from '../invariants';
import type { Violation } from '../invariants';
import { PROTOCOL_SETTINGS } from '../../../config/protocol';
import { resolveDoseTarget } from './targetResolver';
import { estimateMinimumInitialVessels, planExpansion } from './expansionPlanner';
import { summarizeResources } from './resourceAccountant';
import { describeSegments, trajectoryFromSegments } from './trajectorySimulator';
import { isDoseWithinReference, referenceForGrade, responseAtDose } from './doseResponse';

export interface ExpansionReport {
  target: DoseTarget;
  vessel: CatalogLookup<VesselType>;
  separator: CatalogLookup<SeparatorProfile>;
  plan: ExpansionPlan;
  mediumPolicy: MediumChangePolicy;
  resources: ResourceSummary;
  trajectory: Iterable<TrajectorySample>;
  segments: TrajectorySegment[];
  singlePassageVesselEstimate: number;
  doseReference: DoseResponseReference;
  doseWithinReference: boolean;
  responseAtDosePct: number;
  planViolations: Violation[];
}

export function runExpansionPlanning(
  inputs: ExpansionInputs,
  catalog: EquipmentCatalog = DEFAULT_EQUIPMENT_CATALOG,
  settings: ProtocolSettings = PROTOCOL_SETTINGS
): ExpansionReport {
  assertValidCatalog(catalog);

  const vessel = resolveVessel(catalog, inputs.vesselId);
  const separator = resolveSeparator(catalog, inputs.separatorId);

  const target = resolveDoseTarget(
    { weightKg: inputs.weightKg, dosePerKg: inputs.dosePerKg, weightRange: inputs.weightRange },
    separator.entry,
    settings
  );

  const schedule = inputs.mediumChanges
    ? { ...settings.schedule, mediumChanges: inputs.mediumChanges }
    : settings.schedule;
  const plan = planExpansion(target.cells, vessel.entry, { ...settings, schedule });
  const resources = summarizeResources(plan, {
    mediumVolumeMl: inputs.mediumVolumeMl,
    priming: inputs.priming,
    primingFraction: settings.primingFraction,
  });

  const planViolations = checkExpansionPlan(plan);
  if (planViolations.length > 0) {
    console.error('Expansion plan failed integrity checks:', planViolations);
  }

  const doseReference = referenceForGrade(catalog, inputs.gvhdGrade);
  const segments = describeSegments(plan);

  return {
    target,
    vessel,
    separator,
    plan,
    mediumPolicy: schedule.mediumChanges,
    resources,
    trajectory: trajectoryFromSegments(segments),
    segments,
    singlePassageVesselEstimate: estimateMinimumInitialVessels(target.cells, vessel.entry, settings.maxInitialVessels),
    doseReference,
    doseWithinReference: isDoseWithinReference(doseReference, inputs.dosePerKg),
    responseAtDosePct: responseAtDose(doseReference, inputs.dosePerKg),
    planViolations,
  };
}
