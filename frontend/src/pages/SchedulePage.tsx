import { useState, type FormEvent } from 'react';
import { useApiQuery } from '../hooks/useApiQuery';
import { ScheduleCreatedSchema, ScheduleDeletedSchema, SchedulesResponseSchema } from '../types/api';
import { deleteJson, errorMessage, postJson } from '../utils/api-client';
import { formatUtcDateTime, formatWindow } from '../utils/format';

const DEFAULT_DURATION_MINUTES = 60;

export function SchedulePage() {
  const { data, error, isLoading, refresh } = useApiQuery('/api/schedules', SchedulesResponseSchema);
  const [name, setName] = useState('');
  const [startTime, setStartTime] = useState('00:00');
  const [durationMinutes, setDurationMinutes] = useState(DEFAULT_DURATION_MINUTES);
  const [enabled, setEnabled] = useState(true);
  const [message, setMessage] = useState<string | null>(null);

  const createSchedule = async (event: FormEvent) => {
    event.preventDefault();
    setMessage(null);

    try {
      const { schedule } = await postJson(
        '/api/schedules',
        { name, startTime, durationMinutes, enabled },
        ScheduleCreatedSchema
      );
      setName('');
      setMessage(`Schedule "${schedule.name}" created`);
      await refresh();
    } catch (err) {
      setMessage(errorMessage(err));
    }
  };

  const deleteSchedule = async (id: number) => {
    setMessage(null);

    try {
      await deleteJson(`/api/schedules/${id}`, ScheduleDeletedSchema);
      setMessage(`Schedule ${id} deleted`);
      await refresh();
    } catch (err) {
      setMessage(errorMessage(err));
    }
  };

  return (
    <div className="space-y-6" data-testid="page-schedule">
      <h2 className="text-2xl font-semibold">Schedule</h2>

      <section className="card bg-base-100 shadow-xl p-4 space-y-3">
        <h3 className="text-lg font-semibold">Capture Windows</h3>
        {error && <div className="alert alert-error text-sm">{error}</div>}
        {isLoading ? (
          <div className="skeleton h-16 w-full" />
        ) : !data || data.schedules.length === 0 ? (
          <p className="text-sm text-base-content/70">No schedules yet.</p>
        ) : (
          <table className="table table-sm">
            <thead>
              <tr>
                <th>Name</th>
                <th>Window</th>
                <th>Status</th>
                <th>Next start</th>
                <th />
              </tr>
            </thead>
            <tbody>
              {data.schedules.map(schedule => (
                <tr key={schedule.id}>
                  <td>{schedule.name}</td>
                  <td>{formatWindow(schedule.startTime, schedule.durationMinutes)}</td>
                  <td>{schedule.enabled ? 'Enabled' : 'Disabled'}</td>
                  <td>{schedule.enabled ? formatUtcDateTime(schedule.nextStart, '--') : '--'}</td>
                  <td>
                    <button
                      type="button"
                      className="btn btn-xs btn-outline btn-error"
                      aria-label={`Delete ${schedule.name}`}
                      onClick={() => void deleteSchedule(schedule.id)}
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
        <h3 className="text-lg font-semibold mb-2">Add Schedule</h3>
        <form className="flex flex-wrap gap-3 items-end" onSubmit={event => void createSchedule(event)}>
          <label className="form-control">
            <span className="label-text">Name</span>
            <input className="input input-bordered" value={name} onChange={e => setName(e.target.value)} required />
          </label>
          <label className="form-control">
            <span className="label-text">Start (UTC)</span>
            <input
              type="time"
              className="input input-bordered"
              value={startTime}
              onChange={e => setStartTime(e.target.value)}
              required
            />
          </label>
          <label className="form-control">
            <span className="label-text">Duration (minutes)</span>
            <input
              type="number"
              min={1}
              max={1440}
              className="input input-bordered"
              value={durationMinutes}
              onChange={e => setDurationMinutes(Number(e.target.value))}
              required
            />
          </label>
          <label className="label cursor-pointer gap-2">
            <input
              type="checkbox"
              className="checkbox"
              checked={enabled}
              onChange={e => setEnabled(e.target.checked)}
            />
            <span className="label-text">Enabled</span>
          </label>
          <button type="submit" className="btn btn-primary">
            Add Schedule
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
