/**
 * Cross-origin headers for the dashboard API, used when the Vite dev
 * server or another origin calls it with Basic credentials.
 */

const ALLOWED_METHODS = 'GET, POST, DELETE, OPTIONS';
const ALLOWED_HEADERS = 'Content-Type, Authorization';
const PREFLIGHT_MAX_AGE_SECONDS = 600;

/**
 * Credentialed requests cannot use a wildcard origin, so an allowed
 * caller's Origin is reflected. Any other origin, and same-origin
 * requests, get no origin headers.
 */
export function buildCorsHeaders(
  request: Request,
  allowedOrigins: readonly string[] = []
): Record<string, string> {
  const origin = request.headers.get('Origin');

  const headers: Record<string, string> = {
    'Access-Control-Allow-Methods': ALLOWED_METHODS,
    'Access-Control-Allow-Headers': ALLOWED_HEADERS,
  };

  if (origin && allowedOrigins.includes(origin)) {
    headers['Access-Control-Allow-Origin'] = origin;
    headers['Access-Control-Allow-Credentials'] = 'true';
    headers['Vary'] = 'Origin';
  }

  return headers;
}

/** 204 answer to an OPTIONS preflight */
export function preflightResponse(request: Request, allowedOrigins: readonly string[] = []): Response {
  return new Response(null, {
    status: 204,
    headers: {
      ...buildCorsHeaders(request, allowedOrigins),
      'Access-Control-Max-Age': String(PREFLIGHT_MAX_AGE_SECONDS),
    },
  });
}
