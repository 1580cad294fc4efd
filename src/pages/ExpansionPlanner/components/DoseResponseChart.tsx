import React, { useMemo } from 'react';
import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, ReferenceLine, ResponsiveContainer } from 'recharts';
import { doseResponseCurve } from '../engine';
import type { DoseResponseReference } from '../types/expansion';

interface DoseResponseChartProps {
  reference: DoseResponseReference;
  desiredDosePerKg: number;
}

const DoseResponseChart: React.FC<DoseResponseChartProps> = ({ reference, desiredDosePerKg }) => {
  const curveData = useMemo(() => doseResponseCurve(reference), [reference]);

  return (
    <div style={{ width: '100%', height: '300px', minHeight: '300px' }}>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={curveData} margin={{ top: 20, right: 20, bottom: 20, left: 20 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#334155" vertical={false} />
          <XAxis
            dataKey="dosePerKg"
            type="number"
            domain={[reference.minDosePerKg, reference.maxDosePerKg]}
            stroke="#94a3b8"
            tickFormatter={(val: number) => val.toFixed(2)}
            label={{ value: 'Dose (×10⁶ MSCs/kg)', position: 'bottom', offset: 0, fill: '#94a3b8' }}
          />
          <YAxis
            domain={[0, 100]}
            stroke="#94a3b8"
            label={{ value: 'Response probability (%)', angle: -90, position: 'insideLeft', fill: '#94a3b8' }}
          />
          <Tooltip formatter={(value) => [typeof value === 'number' ? `${value.toFixed(0)}%` : value, 'Response']} />
          <ReferenceLine x={desiredDosePerKg} stroke="#ef4444" strokeDasharray="5 5" label="Desired dose" />
          <Line type="linear" dataKey="responsePct" stroke="#3b82f6" strokeWidth={2} dot={false} />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
};

export default DoseResponseChart;
