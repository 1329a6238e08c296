import type { ReactNode } from 'react';

interface StatsCardProps {
  title: string;
  value: ReactNode;
  description?: ReactNode;
  tone?: 'primary' | 'secondary' | 'info' | 'warning' | 'error' | 'success';
  /** Show a placeholder instead of the value */
  isLoading?: boolean;
}

const toneClassMap: Record<NonNullable<StatsCardProps['tone']>, string> = {
  primary: 'text-primary',
  secondary: 'text-secondary',
  info: 'text-info',
  warning: 'text-warning',
  error: 'text-error',
  success: 'text-success',
};

export function StatsCard({ title, value, description, tone = 'primary', isLoading = false }: StatsCardProps) {
  return (
    <div className="stat bg-base-100 shadow-xl rounded-box p-4 space-y-2">
      <div className="stat-title text-sm text-base-content/70">{title}</div>
      <div className={`stat-value ${toneClassMap[tone]}`}>{isLoading ? '--' : value}</div>
      {description && <div className="stat-desc text-sm text-base-content/60">{description}</div>}
    </div>
  );
}
