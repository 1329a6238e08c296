import { useState, type FormEvent } from 'react';
import { DataTable } from '../components/DataTable';
import { QueryResultSchema, type QueryResult } from '../types/api';
import { errorMessage, postJson } from '../utils/api-client';

export function DbQueryPage() {
  const [sql, setSql] = useState('SELECT name FROM sqlite_master');
  const [result, setResult] = useState<QueryResult | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [isRunning, setIsRunning] = useState(false);

  const runQuery = async (event: FormEvent) => {
    event.preventDefault();
    setIsRunning(true);
    setError(null);

    try {
      setResult(await postJson('/api/db/query', { sql }, QueryResultSchema));
    } catch (err) {
      setResult(null);
      setError(errorMessage(err));
    } finally {
      setIsRunning(false);
    }
  };

  return (
    <div className="space-y-6" data-testid="page-db-query">
      <h2 className="text-2xl font-semibold">Database Query</h2>

      <form className="card bg-base-100 shadow-xl p-4 space-y-3" onSubmit={event => void runQuery(event)}>
        <label className="form-control">
          <span className="label-text">Read-only SQL</span>
          <textarea
            className="textarea textarea-bordered font-mono"
            rows={5}
            value={sql}
            onChange={e => setSql(e.target.value)}
          />
        </label>
        <div>
          <button type="submit" className="btn btn-primary" disabled={isRunning || !sql.trim()}>
            Run Query
          </button>
        </div>
      </form>

      {error && (
        <div role="alert" className="alert alert-error text-sm">
          {error}
        </div>
      )}

      {result && (
        <section className="card bg-base-100 shadow-xl p-4 space-y-2">
          <DataTable columns={result.columns} rows={result.rows} emptyMessage="Query returned no rows." />
          {result.truncated && (
            <p className="text-sm text-warning">Result truncated to {result.rows.length} rows.</p>
          )}
        </section>
      )}
    </div>
  );
}
