const numberFormatter = new Intl.NumberFormat('en-US');

export function formatNumber(value?: number | null): string {
  if (value === null || value === undefined) {
    return '--';
  }

  return numberFormatter.format(value);
}

export function formatUtcDateTime(iso: string | null | undefined, fallback = 'Never'): string {
  if (!iso) {
    return fallback;
  }

  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return 'Invalid date';
  }

  const month = date.toLocaleString('en-US', { month: 'short', timeZone: 'UTC' });
  const day = date.toLocaleString('en-US', { day: '2-digit', timeZone: 'UTC' });
  const year = date.getUTCFullYear();
  const hours = date.getUTCHours().toString().padStart(2, '0');
  const minutes = date.getUTCMinutes().toString().padStart(2, '0');
  const seconds = date.getUTCSeconds().toString().padStart(2, '0');

  return `${month} ${day}, ${year} ${hours}:${minutes}:${seconds} UTC`;
}

export function formatCountdown(
  targetIso: string | null | undefined,
  now: Date = new Date()
): string {
  if (!targetIso) {
    return 'Unknown';
  }

  const target = new Date(targetIso);
  if (Number.isNaN(target.getTime())) {
    return 'Unknown';
  }

  const diffMs = target.getTime() - now.getTime();
  if (diffMs <= 0) {
    return 'due now';
  }

  const totalMinutes = Math.floor(diffMs / (60 * 1000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  return `in ${hours}h ${minutes}m`;
}

/** Uptime as "42s", "5m 3s" or "2h 10m" */
export function formatUptime(totalSeconds: number | null | undefined): string {
  if (totalSeconds === null || totalSeconds === undefined || totalSeconds < 0) {
    return '--';
  }

  const seconds = Math.floor(totalSeconds);
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m ${seconds % 60}s`;
  }

  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

/** "22:00 UTC, 90 min" */
export function formatWindow(startTime: string, durationMinutes: number): string {
  return `${startTime} UTC, ${durationMinutes} min`;
}
