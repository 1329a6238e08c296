/**
 * HTTP entry for the dashboard: health check, Basic auth, JSON API,
 * built assets and the index document for every other path.
 */

import type { ApiHandler } from './api/api-handler.js';
import type { AuthGate } from './auth/auth-gate.js';
import { extractBasicCredentials, unauthorizedResponse } from './auth/basic-auth.js';
import { logError, toError } from './errors/index.js';
import {
  indexDocumentResponse,
  readIndexTemplate,
  renderIndexDocument,
  resolveAssetPath,
  serveStaticAsset,
} from './static/server.js';
import type { AssetMap } from './static/types.js';

export interface AppDeps {
  apiHandler: ApiHandler;
  /** null when authentication is disabled */
  authGate: AuthGate | null;
  assets: AssetMap;
  title: string;
  debug: boolean;
}

export interface FetchHandler {
  fetch(request: Request): Promise<Response>;
}

function jsonResponse(data: unknown, status: number): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function isApiPath(pathname: string): boolean {
  return pathname === '/api' || pathname.startsWith('/api/');
}

export function createApp(deps: AppDeps): FetchHandler {
  const indexDocument = renderIndexDocument(readIndexTemplate(deps.assets), deps.title);

  async function route(request: Request, url: URL): Promise<Response> {
    // Health check endpoint
    if (url.pathname === '/health') {
      return jsonResponse({ status: 'ok' }, 200);
    }

    // Preflight requests never carry credentials
    if (request.method === 'OPTIONS' && isApiPath(url.pathname)) {
      return deps.apiHandler.handleRequest(request);
    }

    if (deps.authGate) {
      const credentials = extractBasicCredentials(request);
      if (!credentials) {
        return unauthorizedResponse('Missing credentials');
      }
      const allowed = await deps.authGate.authorize(credentials.username, credentials.password);
      if (!allowed) {
        return unauthorizedResponse('Invalid credentials');
      }
    }

    if (isApiPath(url.pathname)) {
      return deps.apiHandler.handleRequest(request);
    }

    // Built dashboard assets
    const assetPath = resolveAssetPath(url.pathname, deps.assets);
    if (assetPath) {
      return serveStaticAsset(request, deps.assets[assetPath]);
    }

    // Every other page path gets the titled index document; the dashboard routes client-side
    if (request.method === 'GET' || request.method === 'HEAD') {
      return indexDocumentResponse(request, indexDocument);
    }

    return jsonResponse({ error: 'Not found' }, 404);
  }

  return {
    async fetch(request: Request): Promise<Response> {
      const url = new URL(request.url);
      const started = Date.now();
      let response: Response;

      try {
        response = await route(request, url);
      } catch (error) {
        logError(toError(error), { method: request.method, path: url.pathname });
        response = jsonResponse({ error: 'Internal server error' }, 500);
      }

      if (deps.debug) {
        console.log(`${request.method} ${url.pathname} ${response.status} ${Date.now() - started}ms`);
      }

      return response;
    },
  };
}
