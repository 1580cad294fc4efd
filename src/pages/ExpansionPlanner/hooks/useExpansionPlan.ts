/**
 * React hook wrapping one planning run per parameter change
 */

import { useMemo } from 'react';
import { runExpansionPlanning } from '../engine';
import type { ExpansionReport } from '../engine';
import type { ExpansionInputs, TrajectorySample } from '../types/expansion';

interface UseExpansionPlanResult {
  report: ExpansionReport | null;
  trajectory: TrajectorySample[];
  error: string | null;
}

export function useExpansionPlan(inputs: ExpansionInputs): UseExpansionPlanResult {
  const {
    weightKg, dosePerKg, vesselId, separatorId, priming, gvhdGrade, mediumVolumeMl, weightRange, mediumChanges,
  } = inputs;

  return useMemo(() => {
    try {
      const report = runExpansionPlanning({
        weightKg, dosePerKg, vesselId, separatorId, priming, gvhdGrade, mediumVolumeMl, weightRange, mediumChanges,
      });
      return { report, trajectory: Array.from(report.trajectory), error: null };
    } catch (err) {
      console.error('Expansion planning failed:', err);
      return {
        report: null,
        trajectory: [],
        error: err instanceof Error ? err.message : 'Unknown error',
      };
    }
  }, [weightKg, dosePerKg, vesselId, separatorId, priming, gvhdGrade, mediumVolumeMl, weightRange, mediumChanges]);
}
