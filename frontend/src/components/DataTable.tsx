import type { CellValue } from '../types/api';

interface DataTableProps {
  columns: string[];
  rows: Array<Record<string, CellValue>>;
  emptyMessage?: string;
  testId?: string;
}

function renderCell(value: CellValue | undefined) {
  if (value === null || value === undefined) {
    return <span className="text-base-content/50">NULL</span>;
  }
  return String(value);
}

export function DataTable({ columns, rows, emptyMessage = 'No rows.', testId }: DataTableProps) {
  if (rows.length === 0) {
    return <p className="text-sm text-base-content/70">{emptyMessage}</p>;
  }

  return (
    <div className="overflow-x-auto" data-testid={testId}>
      <table className="table table-zebra table-sm">
        <thead>
          <tr>
            {columns.map(column => (
              <th key={column}>{column}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, index) => (
            <tr key={index}>
              {columns.map(column => (
                <td key={column}>{renderCell(row[column])}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
