import { StatsCard } from '../components/StatsCard';
import { useConsoleStatus } from '../hooks/useConsoleStatus';
import { formatCountdown, formatNumber, formatUptime, formatUtcDateTime, formatWindow } from '../utils/format';

interface ConsolePageProps {
  refreshMs: number;
}

export function ConsolePage({ refreshMs }: ConsolePageProps) {
  const { data, error, isLoading } = useConsoleStatus(refreshMs);
  const next = data?.nextSchedule ?? null;

  return (
    <div className="space-y-6" data-testid="page-console">
      <h2 className="text-2xl font-semibold">Console</h2>

      {error && (
        <div className="alert alert-error">
          <span>{error}</span>
        </div>
      )}

      <section className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-5 gap-4" data-testid="console-stats">
        <StatsCard
          title="Uptime"
          value={formatUptime(data?.uptimeSeconds)}
          description={`Since ${formatUtcDateTime(data?.startedAt, '--')}`}
          isLoading={isLoading}
        />
        <StatsCard
          title="Timer Ticks"
          value={formatNumber(data?.ticksReceived)}
          description={`Last tick #${data?.lastTick ?? '--'}`}
          tone="secondary"
          isLoading={isLoading}
        />
        <StatsCard
          title="Last Tick"
          value={formatUtcDateTime(data?.lastTickAt)}
          tone="info"
          isLoading={isLoading}
        />
        <StatsCard title="Accounts" value={formatNumber(data?.accountCount)} tone="success" isLoading={isLoading} />
        <StatsCard
          title="Schedules"
          value={formatNumber(data?.scheduleCount)}
          description={next ? `Next: ${next.name} ${formatCountdown(next.startsAt)}` : 'Nothing scheduled'}
          tone="warning"
          isLoading={isLoading}
        />
      </section>

      <section className="card bg-base-100 shadow-xl p-4" data-testid="active-schedules">
        <h3 className="text-lg font-semibold mb-2">Active Capture Windows</h3>
        {!data || data.activeSchedules.length === 0 ? (
          <p className="text-sm text-base-content/70">No capture window is open.</p>
        ) : (
          <ul className="space-y-1">
            {data.activeSchedules.map(schedule => (
              <li key={schedule.id}>
                <span className="font-medium">{schedule.name}</span>{' '}
                <span className="text-sm text-base-content/70">
                  {formatWindow(schedule.startTime, schedule.durationMinutes)}
                </span>
              </li>
            ))}
          </ul>
        )}
      </section>
    </div>
  );
}
