/**
 * Target Resolver
 *
 * Turns a patient weight and a dose per kg into the absolute number of cells to
 * manufacture, and the PBSC volume to collect for them.
 */

import type { DoseTarget, DoseTargetRequest, ProtocolSettings, SeparatorProfile } from '../types/expansion';
import { ConfigurationError, assertWithinRange, isPositiveFinite } from './errors';

export const CELLS_PER_DOSE_UNIT = 1e6; // dose is ×10⁶ cells/kg

export function resolveDoseTarget(
  request: DoseTargetRequest,
  separator: SeparatorProfile,
  settings: Pick<ProtocolSettings, 'collectionFloorMl' | 'weightRangesKg' | 'doseRangePerKg'>
): DoseTarget {
  if (!isPositiveFinite(separator.cellsPerMl)) {
    throw new ConfigurationError(
      `Separator ${separator.id} yield must be positive (got ${separator.cellsPerMl} cells/mL).`
    );
  }

  const weightRange = settings.weightRangesKg[request.weightRange ?? 'adult'];
  assertWithinRange('weightKg', request.weightKg, weightRange);
  assertWithinRange('dosePerKg', request.dosePerKg, settings.doseRangePerKg);

  const cells = request.weightKg * request.dosePerKg * CELLS_PER_DOSE_UNIT;
  const requiredVolumeMl = cells / separator.cellsPerMl;
  const collectionFloorApplied = requiredVolumeMl < settings.collectionFloorMl;

  return {
    weightKg: request.weightKg,
    dosePerKg: request.dosePerKg,
    cells,
    collectionVolumeMl: collectionFloorApplied ? settings.collectionFloorMl : requiredVolumeMl,
    collectionFloorApplied,
  };
}
