import { z } from 'zod';
import { ErrorResponseSchema, type ErrorResponse } from '../types/api';

export class ApiError extends Error {
  status?: number;
  code?: string;

  constructor(
    message: string,
    status?: number,
    code?: string
  ) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

/** Any zod schema whose parsed output is T */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface JsonRequestInit extends Omit<RequestInit, 'headers'> {
  headers?: Record<string, string>;
}

function describeFailure(status: number, payload: ErrorResponse | null, statusText: string): string {
  // Provide user-friendly error messages for common status codes
  if (status === 401) {
    return 'Authentication required. Please check your credentials.';
  }
  if (status === 403) {
    return 'Access forbidden. You do not have permission.';
  }
  if (status === 429) {
    return 'Too many requests. Please try again later.';
  }
  if (status >= 500) {
    return 'Server error. Please try again later.';
  }
  if (status === 404) {
    return payload?.message ?? 'Resource not found.';
  }

  return payload?.message ?? payload?.error ?? (statusText || `Request failed (${status})`);
}

function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }

  // Handle network errors
  if (err instanceof TypeError) {
    return new ApiError('Network error. Please check your connection.', undefined, 'NETWORK_ERROR');
  }

  if (err instanceof Error && err.name === 'AbortError') {
    return new ApiError('Request was cancelled.', undefined, 'ABORTED');
  }

  const message = err instanceof Error ? err.message : '';
  return new ApiError(message || 'An unexpected error occurred', undefined, 'UNKNOWN_ERROR');
}

export async function fetchJson<T>(
  input: RequestInfo | URL,
  schema: ResponseSchema<T>,
  init?: JsonRequestInit
): Promise<T> {
  const mergedInit: RequestInit = {
    ...init,
    headers: {
      Accept: 'application/json',
      ...(init?.headers ?? {}),
    },
  };

  try {
    const response = await fetch(input, mergedInit);
    const isJson = response.headers.get('content-type')?.includes('application/json') ?? false;
    const payload: unknown = isJson ? await response.json() : await response.text();

    if (!response.ok) {
      const parsedError = ErrorResponseSchema.safeParse(payload);
      throw new ApiError(
        describeFailure(response.status, parsedError.success ? parsedError.data : null, response.statusText),
        response.status,
        'HTTP_ERROR'
      );
    }

    // Validate response with Zod schema
    const result = schema.safeParse(payload);
    if (!result.success) {
      console.error('API response validation failed:', result.error.issues);
      throw new ApiError(
        `Invalid API response format: ${result.error.issues.map(issue => issue.message).join(', ')}`,
        undefined,
        'VALIDATION_ERROR'
      );
    }

    return result.data;
  } catch (err) {
    throw toApiError(err);
  }
}

export function postJson<T>(input: string, body: unknown, schema: ResponseSchema<T>): Promise<T> {
  return fetchJson(input, schema, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

export function deleteJson<T>(input: string, schema: ResponseSchema<T>): Promise<T> {
  return fetchJson(input, schema, { method: 'DELETE' });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
