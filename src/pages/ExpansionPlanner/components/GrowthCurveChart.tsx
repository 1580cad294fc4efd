import React, { useMemo } from 'react';
import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, ReferenceLine, ResponsiveContainer } from 'recharts';
import type { TrajectorySample } from '../types/expansion';
import { toMillions } from '../utils/formatting';

interface GrowthCurveChartProps {
  samples: TrajectorySample[];
  targetCells: number;
}

const GrowthCurveChart: React.FC<GrowthCurveChartProps> = ({ samples, targetCells }) => {
  const data = useMemo(
    () => samples.map((s) => ({ day: s.day, cells: toMillions(s.cells), passage: s.passageIndex })),
    [samples]
  );

  return (
    <div style={{ width: '100%', height: '300px', minHeight: '300px' }}>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data} margin={{ top: 20, right: 20, bottom: 20, left: 20 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#334155" vertical={false} />
          <XAxis
            dataKey="day"
            type="number"
            domain={['dataMin', 'dataMax']}
            stroke="#94a3b8"
            label={{ value: 'Culture days', position: 'bottom', offset: 0, fill: '#94a3b8' }}
          />
          <YAxis
            stroke="#94a3b8"
            label={{ value: 'MSC count (×10⁶)', angle: -90, position: 'insideLeft', fill: '#94a3b8' }}
          />
          <Tooltip
            formatter={(value) => [typeof value === 'number' ? `${value.toFixed(1)}×10⁶` : value, 'Cells']}
            labelFormatter={(day: number) => `Day ${day.toFixed(1)}`}
          />
          <ReferenceLine y={toMillions(targetCells)} stroke="#ef4444" strokeDasharray="5 5" label="Target dose" />
          <Line type="monotone" dataKey="cells" stroke="#22c55e" strokeWidth={2} dot={false} />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
};

export default GrowthCurveChart;
