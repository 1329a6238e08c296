import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { TableSummary } from '../types/api';

interface TableRowChartProps {
  data: TableSummary[];
  isLoading: boolean;
}

export function TableRowChart({ data, isLoading }: TableRowChartProps) {
  return (
    <div className="card bg-base-100 shadow-xl p-4" data-testid="table-row-chart">
      <h3 className="text-lg font-semibold mb-2">Rows per Table</h3>
      {isLoading ? (
        <div className="skeleton h-48 w-full" />
      ) : data.length === 0 ? (
        <p className="text-sm text-base-content/70">No tables yet.</p>
      ) : (
        <div className="w-full" style={{ height: 240 }}>
          <ResponsiveContainer width="100%" height="100%">
            <BarChart data={data} margin={{ top: 16, right: 16, bottom: 0, left: 0 }}>
              <CartesianGrid strokeDasharray="3 3" strokeOpacity={0.2} />
              <XAxis dataKey="name" stroke="currentColor" fontSize={12} />
              <YAxis stroke="currentColor" fontSize={12} allowDecimals={false} />
              <Tooltip contentStyle={{ backgroundColor: '#1f2937', border: 'none' }} />
              <Bar dataKey="rowCount" name="Rows" fill="#2563eb" />
            </BarChart>
          </ResponsiveContainer>
        </div>
      )}
    </div>
  );
}
