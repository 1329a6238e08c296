import { useState } from 'react';
import { DataTable } from '../components/DataTable';
import { TableRowChart } from '../components/TableRowChart';
import { TABLE_BROWSE_LIMIT } from '../config/constants';
import { useApiQuery } from '../hooks/useApiQuery';
import { TableRowsResponseSchema, TablesResponseSchema } from '../types/api';
import { formatNumber } from '../utils/format';

function TableRows({ name }: { name: string }) {
  const { data, error, isLoading } = useApiQuery(
    `/api/db/tables/${encodeURIComponent(name)}?limit=${TABLE_BROWSE_LIMIT}`,
    TableRowsResponseSchema
  );

  if (error) {
    return <div className="alert alert-error text-sm">{error}</div>;
  }
  if (isLoading || !data) {
    return <div className="skeleton h-24 w-full" />;
  }

  return (
    <div className="space-y-2">
      <DataTable columns={data.columns} rows={data.rows} emptyMessage="This table is empty." testId="table-rows" />
      {data.truncated && (
        <p className="text-sm text-warning">Showing the first {TABLE_BROWSE_LIMIT} rows.</p>
      )}
    </div>
  );
}

export function DbBrowserPage() {
  const { data, error, isLoading } = useApiQuery('/api/db/tables', TablesResponseSchema);
  const [selected, setSelected] = useState<string | null>(null);
  const tables = data?.tables ?? [];

  return (
    <div className="space-y-6" data-testid="page-db-browser">
      <h2 className="text-2xl font-semibold">Database Browser</h2>
      {error && <div className="alert alert-error text-sm">{error}</div>}

      <section className="grid grid-cols-1 lg:grid-cols-3 gap-6">
        <div className="card bg-base-100 shadow-xl p-4">
          <h3 className="text-lg font-semibold mb-2">Tables</h3>
          <ul className="menu">
            {tables.map(table => (
              <li key={table.name}>
                <button
                  type="button"
                  className={table.name === selected ? 'active' : undefined}
                  onClick={() => setSelected(table.name)}
                >
                  {table.name} ({formatNumber(table.rowCount)})
                </button>
              </li>
            ))}
          </ul>
        </div>
        <div className="lg:col-span-2">
          <TableRowChart data={tables} isLoading={isLoading} />
        </div>
      </section>

      <section className="card bg-base-100 shadow-xl p-4">
        <h3 className="text-lg font-semibold mb-2">{selected ?? 'Select a table'}</h3>
        {selected && <TableRows key={selected} name={selected} />}
      </section>
    </div>
  );
}
