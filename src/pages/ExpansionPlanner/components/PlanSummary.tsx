/**
 * Therapy parameters: headline metrics and the passage table
 */

import React from 'react';
import { AlertTriangle, CheckCircle2 } from 'lucide-react';
import type { ExpansionReport } from '../engine';
import { formatMillions } from '../utils/formatting';

interface PlanSummaryProps {
  report: ExpansionReport;
}

const Metric: React.FC<{ label: string; value: string; hint?: string }> = ({ label, value, hint }) => (
  <div className="bg-slate-800/50 border border-slate-700 rounded-xl p-4">
    <div className="text-xs text-slate-400 uppercase tracking-wider">{label}</div>
    <div className="text-2xl font-bold mt-1">{value}</div>
    {hint && <div className="text-xs text-slate-500 mt-1">{hint}</div>}
  </div>
);

const PlanSummary: React.FC<PlanSummaryProps> = ({ report }) => {
  const { target, plan, resources, doseReference, vessel } = report;

  return (
    <div className="space-y-4">
      {plan.targetMet ? (
        <div className="flex items-center gap-2 text-emerald-400 text-sm">
          <CheckCircle2 className="w-4 h-4" />
          Target of {formatMillions(target.cells)}×10⁶ cells reached at passage {plan.metAtPassage}
        </div>
      ) : (
        <div className="flex items-center gap-2 text-amber-400 text-sm">
          <AlertTriangle className="w-4 h-4" />
          Target not reachable within {plan.maxPassages} passages from up to {plan.searchedUpTo} vessels;
          showing the best attainable plan ({formatMillions(plan.passages[plan.passages.length - 1].outputCells)}×10⁶ cells)
        </div>
      )}

      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        <Metric
          label="PBSC volume needed"
          value={`${target.collectionVolumeMl.toFixed(0)} mL`}
          hint={target.collectionFloorApplied ? 'Minimum draw volume' : undefined}
        />
        <Metric
          label={`${vessel.entry.id} vessels to seed`}
          value={String(plan.initialVesselCount)}
          hint={vessel.usedFallback ? 'Unknown vessel, using fallback' : undefined}
        />
        <Metric label="Passages needed" value={String(plan.passagesUsed)} />
        <Metric label="Culture duration" value={`${resources.totalDays} days`} />
        <Metric label="Total medium" value={`${resources.totalMediumMl.toFixed(0)} mL`} />
        <Metric
          label="Recommended dose range"
          value={`${doseReference.minDosePerKg}–${doseReference.maxDosePerKg} ×10⁶/kg`}
          hint={report.doseWithinReference ? undefined : 'Desired dose is outside this range'}
        />
        {resources.primingVolumeMl > 0 && (
          <Metric label="Priming volume" value={`${resources.primingVolumeMl.toFixed(0)} mL`} />
        )}
      </div>

      <table className="w-full text-sm">
        <thead className="text-slate-400 text-left">
          <tr>
            <th className="py-2">Passage</th>
            <th>Days</th>
            <th>Vessels</th>
            <th>Seeded (×10⁶)</th>
            <th>Harvested (×10⁶)</th>
            <th>Medium changes</th>
            <th>Medium (mL)</th>
          </tr>
        </thead>
        <tbody>
          {plan.passages.map((p) => (
            <tr key={p.index} className="border-t border-slate-700">
              <td className="py-2">P{p.index}</td>
              <td>{p.startDay}–{p.endDay}</td>
              <td>{p.vesselCount}</td>
              <td>{formatMillions(p.inputCells)}</td>
              <td>{formatMillions(p.outputCells)}</td>
              <td>{p.mediumChanges}</td>
              <td>{resources.mediumByPassage[p.index]?.mediumMl.toFixed(0)}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};

export default PlanSummary;
