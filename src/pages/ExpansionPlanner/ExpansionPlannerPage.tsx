/**
 * MSC Expansion Planner - Main Page
 *
 * Patient parameters on the left; therapy parameters, growth projection and
 * dose-response reference on the right.
 */

import React, { useState } from 'react';
import { FlaskConical, TrendingUp, ClipboardList } from 'lucide-react';
import ParameterPanel from './components/ParameterPanel';
import PlanSummary from './components/PlanSummary';
import GrowthCurveChart from './components/GrowthCurveChart';
import DoseResponseChart from './components/DoseResponseChart';
import ProtocolNotes from './components/ProtocolNotes';
import { useExpansionPlan } from './hooks/useExpansionPlan';
import { SEPARATOR_IDS, VESSEL_IDS } from './catalog/equipmentCatalog';
import type { ExpansionInputs } from './types/expansion';

const INITIAL_INPUTS: ExpansionInputs = {
  weightKg: 70,
  dosePerKg: 1.0,
  vesselId: VESSEL_IDS.T75,
  separatorId: SEPARATOR_IDS.STANDARD,
  priming: false,
  gvhdGrade: 'Grade I',
  weightRange: 'adult',
};

const ExpansionPlannerPage: React.FC = () => {
  const [inputs, setInputs] = useState<ExpansionInputs>(INITIAL_INPUTS);
  const { report, trajectory, error } = useExpansionPlan(inputs);

  return (
    <div className="min-h-screen bg-slate-900 text-white">
      <div className="bg-slate-800/50 backdrop-blur-sm border-b border-slate-700 sticky top-0 z-50">
        <div className="container mx-auto px-6 py-4">
          <h1 className="text-3xl font-bold flex items-center gap-2">
            <FlaskConical className="w-7 h-7 text-violet-400" />
            <span>MSC Expansion Planner</span>
          </h1>
          <p className="text-slate-400 mt-1">Culture plan for a GVHD dose target</p>
        </div>
      </div>

      <div className="container mx-auto px-6 py-8 grid grid-cols-1 lg:grid-cols-4 gap-6">
        <ParameterPanel inputs={inputs} onChange={setInputs} />

        <div className="lg:col-span-3 space-y-8">
          {error && (
            <div className="bg-red-900/30 border border-red-700 text-red-300 rounded-lg p-4">{error}</div>
          )}

          {report && (
            <>
              <section>
                <h2 className="text-xl font-semibold mb-4 flex items-center gap-2">
                  <ClipboardList className="w-5 h-5" /> Therapy Parameters
                </h2>
                <PlanSummary report={report} />
              </section>

              <section>
                <h2 className="text-xl font-semibold mb-4 flex items-center gap-2">
                  <TrendingUp className="w-5 h-5" /> Biological Projections
                </h2>
                <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
                  <div className="bg-slate-800/50 border border-slate-700 rounded-xl p-4">
                    <h3 className="font-semibold mb-2">MSC Growth Curve</h3>
                    <GrowthCurveChart samples={trajectory} targetCells={report.target.cells} />
                  </div>
                  <div className="bg-slate-800/50 border border-slate-700 rounded-xl p-4">
                    <h3 className="font-semibold mb-2">GVHD {report.doseReference.grade} Response Curve</h3>
                    <DoseResponseChart reference={report.doseReference} desiredDosePerKg={inputs.dosePerKg} />
                  </div>
                </div>
              </section>

              <section>
                <h2 className="text-xl font-semibold mb-4">Protocol Details</h2>
                <ProtocolNotes report={report} />
              </section>
            </>
          )}
        </div>
      </div>
    </div>
  );
};

export default ExpansionPlannerPage;
