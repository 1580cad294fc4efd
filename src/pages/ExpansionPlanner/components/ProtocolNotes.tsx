import React from 'react';
import type { ExpansionReport } from '../engine';
import type { MediumChangePolicy } from '../types/expansion';
import { CONFLUENCY_DENSITY_CELLS_PER_CM2, HARVEST_CONFLUENCY } from '../catalog/equipmentCatalog';
import { formatMillions } from '../utils/formatting';

const QC_RELEASE_CRITERIA = [
  'Viability >90% (Trypan Blue)',
  'CD73+/CD90+/CD105+ >95%',
  'CD45- <2%',
  'Sterility testing required',
];

function describeMediumPolicy(policy: MediumChangePolicy): string {
  switch (policy.kind) {
    case 'fixed':
      return `${policy.firstPassage} changes in the first passage, ${policy.subsequentPassage} in each later passage`;
    case 'interval':
      return `Every ${policy.everyDays} days`;
  }
}

const ProtocolNotes: React.FC<{ report: ExpansionReport }> = ({ report }) => {
  const vessel = report.vessel.entry;
  const seedingDensity = Math.round(vessel.seedingCells / vessel.surfaceAreaCm2);

  return (
    <div className="grid grid-cols-1 md:grid-cols-2 gap-6 text-sm text-slate-300">
      <div>
        <h3 className="font-semibold text-white mb-2">Culture Specifications</h3>
        <ul className="list-disc list-inside space-y-1">
          <li>Seeding density: {seedingDensity} cells/cm²</li>
          <li>
            Harvest confluency: {(HARVEST_CONFLUENCY * 100).toFixed(0)}% of{' '}
            {CONFLUENCY_DENSITY_CELLS_PER_CM2} cells/cm²
          </li>
          <li>Maximum cells per {vessel.id}: {formatMillions(vessel.confluentCells)}×10⁶</li>
          <li>Re-seeding safety factor: {report.plan.safetyFactor}×</li>
          <li>Media changes: {describeMediumPolicy(report.mediumPolicy)}</li>
        </ul>
      </div>
      <div>
        <h3 className="font-semibold text-white mb-2">Quality Control</h3>
        <ul className="list-disc list-inside space-y-1">
          {QC_RELEASE_CRITERIA.map((item) => (
            <li key={item}>{item}</li>
          ))}
        </ul>
      </div>
    </div>
  );
};

export default ProtocolNotes;
