import { ConsoleStatusSchema } from '../types/api';
import { useApiQuery } from './useApiQuery';

export function useConsoleStatus(refreshMs: number) {
  return useApiQuery('/api/console/status', ConsoleStatusSchema, { autoRefreshMs: refreshMs });
}
