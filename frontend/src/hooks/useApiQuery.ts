import { useCallback, useEffect, useRef, useState } from 'react';
import { ApiError, errorMessage, fetchJson, type ResponseSchema } from '../utils/api-client';

interface UseApiQueryOptions {
  autoRefreshMs?: number;
  immediate?: boolean;
}

interface ApiQueryState<T> {
  data: T | null;
  error: string | null;
  isFetching: boolean;
}

/**
 * Fetch and validate a JSON endpoint, optionally polling it.
 * `schema` must be a stable (module-level) reference.
 */
export function useApiQuery<T>(url: string, schema: ResponseSchema<T>, options: UseApiQueryOptions = {}) {
  const { autoRefreshMs = 0, immediate = true } = options;
  const controllerRef = useRef<AbortController | null>(null);
  const [state, setState] = useState<ApiQueryState<T>>({
    data: null,
    error: null,
    isFetching: false,
  });

  const fetchData = useCallback(async () => {
    controllerRef.current?.abort();
    const controller = new AbortController();
    controllerRef.current = controller;

    setState(prev => ({ ...prev, isFetching: true }));

    try {
      const data = await fetchJson(url, schema, { signal: controller.signal });
      setState({ data, error: null, isFetching: false });
    } catch (error) {
      // Skip abort errors - they are intentional
      if (error instanceof ApiError && error.code === 'ABORTED') {
        return;
      }

      setState(prev => ({ ...prev, error: errorMessage(error), isFetching: false }));
    }
  }, [url, schema]);

  useEffect(() => {
    if (immediate) {
      void fetchData();
    }

    if (autoRefreshMs <= 0) {
      return undefined;
    }

    const intervalId = window.setInterval(() => {
      void fetchData();
    }, autoRefreshMs);

    return () => window.clearInterval(intervalId);
  }, [autoRefreshMs, fetchData, immediate]);

  useEffect(() => () => controllerRef.current?.abort(), []);

  return {
    ...state,
    isLoading: !state.data && !state.error,
    refresh: fetchData,
  };
}
