import { vi } from 'vitest';

export interface RecordedRequest {
  url: string;
  method: string;
  body: unknown;
}

type RouteReply = { status?: number; body: unknown } | Error;
type RouteHandler = (request: RecordedRequest) => RouteReply;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function urlOf(input: RequestInfo | URL): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

/**
 * Stub global fetch with handlers keyed by "METHOD /path". Unmatched
 * requests get a 404 JSON body; every request is recorded.
 */
export function mockApi(routes: Record<string, RouteHandler>) {
  const requests: RecordedRequest[] = [];

  const fetchMock = vi.fn(async (input: RequestInfo | URL, init?: RequestInit) => {
    const request: RecordedRequest = {
      url: urlOf(input),
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);

    const handler = routes[`${request.method} ${request.url}`];
    if (!handler) {
      return jsonResponse({ error: 'Not found', path: request.url }, 404);
    }

    const reply = handler(request);
    if (reply instanceof Error) {
      throw reply;
    }
    return jsonResponse(reply.body, reply.status ?? 200);
  });

  vi.stubGlobal('fetch', fetchMock);
  return { fetchMock, requests };
}
