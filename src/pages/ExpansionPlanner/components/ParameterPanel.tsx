/**
 * Patient and culture parameters
 */

import React, { useEffect, useState } from 'react';
import { DEFAULT_EQUIPMENT_CATALOG, GVHD_GRADES } from '../catalog/equipmentCatalog';
import { PROTOCOL_SETTINGS } from '../../../config/protocol';
import { commitNumberText } from '../../../utils/inputParsing';
import type { ExpansionInputs, MediumChangePolicy, NumericRange, WeightRangeId } from '../types/expansion';

interface ParameterPanelProps {
  inputs: ExpansionInputs;
  onChange: (inputs: ExpansionInputs) => void;
}

const labelClass = 'text-xs font-semibold text-violet-400 uppercase tracking-wider';
const fieldClass =
  'w-full bg-slate-900 border border-slate-700 text-white rounded-lg px-3 py-2 focus:outline-none focus:ring-2 focus:ring-violet-500';

const MEDIUM_CHANGE_INTERVAL_DAYS = [1, 2, 3, 4];
const PROTOCOL_POLICY = 'protocol';

/**
 * Free text while editing; parsed and clamped on blur or Enter
 */
const CommittedNumberInput: React.FC<{
  value: number;
  range: NumericRange;
  onCommit: (value: number) => void;
}> = ({ value, range, onCommit }) => {
  const [text, setText] = useState(String(value));

  useEffect(() => {
    setText(String(value));
  }, [value]);

  const commit = () => {
    const next = commitNumberText(text, value, range);
    setText(String(next));
    if (next !== value) onCommit(next);
  };

  return (
    <input
      type="number"
      min={range[0]}
      max={range[1]}
      value={text}
      onChange={(e) => setText(e.target.value)}
      onBlur={commit}
      onKeyDown={(e) => {
        if (e.key === 'Enter') commit();
      }}
      className={fieldClass}
    />
  );
};

function policyFromSelect(value: string): MediumChangePolicy | undefined {
  const everyDays = Number(value);
  return MEDIUM_CHANGE_INTERVAL_DAYS.includes(everyDays) ? { kind: 'interval', everyDays } : undefined;
}

const ParameterPanel: React.FC<ParameterPanelProps> = ({ inputs, onChange }) => {
  const catalog = DEFAULT_EQUIPMENT_CATALOG;
  const vessel = catalog.vessels[inputs.vesselId] ?? catalog.vessels[catalog.fallbackVesselId];
  const weightRange = PROTOCOL_SETTINGS.weightRangesKg[inputs.weightRange ?? 'adult'];
  const [doseMin, doseMax] = PROTOCOL_SETTINGS.doseRangePerKg;
  const [mediumMin, mediumMax] = vessel.mediumVolumeRangeMl;

  const update = (patch: Partial<ExpansionInputs>) => onChange({ ...inputs, ...patch });

  return (
    <div className="bg-slate-800/50 border border-slate-700 rounded-xl p-5 space-y-5">
      <h2 className="text-lg font-semibold">Patient Parameters</h2>

      <div className="space-y-2">
        <label className={labelClass}>Weight range</label>
        <select
          value={inputs.weightRange ?? 'adult'}
          onChange={(e) => {
            const weightRange: WeightRangeId = e.target.value === 'pediatric' ? 'pediatric' : 'adult';
            const [min, max] = PROTOCOL_SETTINGS.weightRangesKg[weightRange];
            update({ weightRange, weightKg: Math.min(max, Math.max(min, inputs.weightKg)) });
          }}
          className={fieldClass}
        >
          <option value="adult">Adult ({PROTOCOL_SETTINGS.weightRangesKg.adult.join('–')} kg)</option>
          <option value="pediatric">Pediatric ({PROTOCOL_SETTINGS.weightRangesKg.pediatric.join('–')} kg)</option>
        </select>
      </div>

      <div className="space-y-2">
        <label className={labelClass}>Weight (kg)</label>
        <CommittedNumberInput
          value={inputs.weightKg}
          range={weightRange}
          onCommit={(weightKg) => update({ weightKg })}
        />
      </div>

      <div className="space-y-2">
        <label className={labelClass}>GVHD grade</label>
        <select
          value={inputs.gvhdGrade}
          onChange={(e) => {
            const grade = GVHD_GRADES.find((g) => g === e.target.value);
            if (grade) update({ gvhdGrade: grade });
          }}
          className={fieldClass}
        >
          {GVHD_GRADES.map((grade) => (
            <option key={grade} value={grade}>{grade}</option>
          ))}
        </select>
      </div>

      <div className="space-y-2">
        <label className={labelClass}>Desired dose: {inputs.dosePerKg.toFixed(1)} ×10⁶ MSCs/kg</label>
        <input
          type="range"
          min={doseMin}
          max={doseMax}
          step={0.1}
          value={inputs.dosePerKg}
          onChange={(e) => update({ dosePerKg: parseFloat(e.target.value) })}
          className="w-full accent-violet-500"
        />
      </div>

      <h2 className="text-lg font-semibold pt-2">Culture Parameters</h2>

      <div className="space-y-2">
        <label className={labelClass}>Vessel</label>
        <select
          value={vessel.id}
          onChange={(e) => {
            const next = catalog.vessels[e.target.value];
            if (next) update({ vesselId: next.id, mediumVolumeMl: next.mediumVolumeMl });
          }}
          className={fieldClass}
        >
          {Object.values(catalog.vessels).map((v) => (
            <option key={v.id} value={v.id}>{v.label}</option>
          ))}
        </select>
      </div>

      <div className="space-y-2">
        <label className={labelClass}>
          Medium per {vessel.id}: {inputs.mediumVolumeMl ?? vessel.mediumVolumeMl} mL
        </label>
        <input
          type="range"
          min={mediumMin}
          max={mediumMax}
          step={1}
          value={inputs.mediumVolumeMl ?? vessel.mediumVolumeMl}
          onChange={(e) => update({ mediumVolumeMl: parseFloat(e.target.value) })}
          className="w-full accent-violet-500"
        />
      </div>

      <div className="space-y-2">
        <label className={labelClass}>Separator</label>
        <select
          value={inputs.separatorId}
          onChange={(e) => update({ separatorId: e.target.value })}
          className={fieldClass}
        >
          {Object.values(catalog.separators).map((s) => (
            <option key={s.id} value={s.id}>{s.label}</option>
          ))}
        </select>
      </div>

      <div className="space-y-2">
        <label className={labelClass}>Media changes</label>
        <select
          value={inputs.mediumChanges?.kind === 'interval' ? String(inputs.mediumChanges.everyDays) : PROTOCOL_POLICY}
          onChange={(e) => update({ mediumChanges: policyFromSelect(e.target.value) })}
          className={fieldClass}
        >
          <option value={PROTOCOL_POLICY}>Protocol schedule</option>
          {MEDIUM_CHANGE_INTERVAL_DAYS.map((days) => (
            <option key={days} value={days}>Every {days} day{days === 1 ? '' : 's'}</option>
          ))}
        </select>
      </div>

      <label className="flex items-center gap-2 text-sm text-slate-300">
        <input
          type="checkbox"
          checked={inputs.priming}
          onChange={(e) => update({ priming: e.target.checked })}
          className="accent-violet-500"
        />
        Prepare priming volume
      </label>
    </div>
  );
};

export default ParameterPanel;
