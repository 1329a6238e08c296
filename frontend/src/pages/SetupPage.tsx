import { useState, type FormEvent } from 'react';
import { useApiQuery } from '../hooks/useApiQuery';
import { AccountCreatedSchema, AccountDeletedSchema, AccountsResponseSchema } from '../types/api';
import { deleteJson, errorMessage, postJson } from '../utils/api-client';
import { formatUtcDateTime } from '../utils/format';

export function SetupPage() {
  const { data, error, isLoading, refresh } = useApiQuery('/api/accounts', AccountsResponseSchema);
  const [username, setUsername] = useState('');
  const [password, setPassword] = useState('');
  const [message, setMessage] = useState<string | null>(null);
  const [isSubmitting, setIsSubmitting] = useState(false);

  const createAccount = async (event: FormEvent) => {
    event.preventDefault();
    setIsSubmitting(true);
    setMessage(null);

    try {
      const { account } = await postJson('/api/accounts', { username, password }, AccountCreatedSchema);
      setUsername('');
      setPassword('');
      setMessage(`Account "${account.username}" created`);
      await refresh();
    } catch (err) {
      setMessage(errorMessage(err));
    } finally {
      setIsSubmitting(false);
    }
  };

  const deleteAccount = async (name: string) => {
    setMessage(null);

    try {
      const { deleted } = await deleteJson(`/api/accounts/${encodeURIComponent(name)}`, AccountDeletedSchema);
      setMessage(`Account "${deleted}" deleted`);
      await refresh();
    } catch (err) {
      setMessage(errorMessage(err));
    }
  };

  return (
    <div className="space-y-6" data-testid="page-setup">
      <h2 className="text-2xl font-semibold">Setup</h2>

      <section className="card bg-base-100 shadow-xl p-4 space-y-3">
        <h3 className="text-lg font-semibold">Accounts</h3>
        {error && <div className="alert alert-error text-sm">{error}</div>}
        {isLoading ? (
          <div className="skeleton h-16 w-full" />
        ) : !data || data.accounts.length === 0 ? (
          <p className="text-sm text-base-content/70">No accounts. The dashboard is open to everyone.</p>
        ) : (
          <table className="table table-sm">
            <thead>
              <tr>
                <th>Username</th>
                <th>Created</th>
                <th />
              </tr>
            </thead>
            <tbody>
              {data.accounts.map(account => (
                <tr key={account.username}>
                  <td>{account.username}</td>
                  <td>{formatUtcDateTime(account.createdAt)}</td>
                  <td>
                    <button
                      type="button"
                      className="btn btn-xs btn-outline btn-error"
                      aria-label={`Delete ${account.username}`}
                      onClick={() => void deleteAccount(account.username)}
                    >
                      Delete
                    </button>
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </section>

      <section className="card bg-base-100 shadow-xl p-4">
        <h3 className="text-lg font-semibold mb-2">Add Account</h3>
        <form className="flex flex-wrap gap-3 items-end" onSubmit={event => void createAccount(event)}>
          <label className="form-control">
            <span className="label-text">Username</span>
            <input
              className="input input-bordered"
              value={username}
              onChange={e => setUsername(e.target.value)}
              required
            />
          </label>
          <label className="form-control">
            <span className="label-text">Password</span>
            <input
              type="password"
              className="input input-bordered"
              value={password}
              onChange={e => setPassword(e.target.value)}
              required
            />
          </label>
          <button type="submit" className="btn btn-primary" disabled={isSubmitting}>
            Add Account
          </button>
        </form>
      </section>

      {message && (
        <div role="status" className="alert alert-info text-sm">
          {message}
        </div>
      )}
    </div>
  );
}
