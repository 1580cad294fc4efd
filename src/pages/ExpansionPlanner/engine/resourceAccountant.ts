/**
 * Resource Accountant
 *
 * Duration and consumables for a finished plan. Medium per passage is
 * vessels × volume per vessel × changes in that passage.
 */

import type { ExpansionPlan, PassageMedium, ResourceSummary } from '../types/expansion';
import { ConfigurationError, assertWithinRange } from './errors';

export interface ResourceOptions {
  mediumVolumeMl?: number;   // per vessel per change; defaults to the vessel's
  priming?: boolean;
  primingFraction: number;
}

export function summarizeResources(plan: ExpansionPlan, options: ResourceOptions): ResourceSummary {
  const mediumVolumeMl = options.mediumVolumeMl ?? plan.vessel.mediumVolumeMl;
  assertWithinRange('mediumVolumeMl', mediumVolumeMl, plan.vessel.mediumVolumeRangeMl);

  if (!Number.isFinite(options.primingFraction) || options.primingFraction < 0) {
    throw new ConfigurationError(`Priming fraction must be non-negative (got ${options.primingFraction}).`);
  }

  const mediumByPassage: PassageMedium[] = plan.passages.map((p) => ({
    index: p.index,
    mediumMl: p.vesselCount * mediumVolumeMl * p.mediumChanges,
  }));

  const totalDays = plan.passages.reduce((sum, p) => sum + p.durationDays, 0);
  const totalMediumMl = mediumByPassage.reduce((sum, m) => sum + m.mediumMl, 0);
  const primingVolumeMl = options.priming
    ? options.primingFraction * plan.initialVesselCount * mediumVolumeMl
    : 0;

  return {
    totalDays,
    totalMediumMl,
    primingVolumeMl,
    mediumVolumePerVesselMl: mediumVolumeMl,
    mediumByPassage,
  };
}
