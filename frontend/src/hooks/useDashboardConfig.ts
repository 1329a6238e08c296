import { PublicConfigSchema } from '../types/api';
import { useApiQuery } from './useApiQuery';

export function useDashboardConfig() {
  return useApiQuery('/api/config', PublicConfigSchema);
}
