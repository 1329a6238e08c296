/**
 * Serves the built dashboard (frontend/dist) and the index document
 */

import { createHash } from 'node:crypto';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { extname, join, relative, sep } from 'node:path';
import type { AssetMap, StaticAsset } from './types.js';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json',
  '.map': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
  '.woff2': 'font/woff2',
  '.txt': 'text/plain; charset=utf-8',
};

const IMMUTABLE_CACHE = 'public, max-age=31536000, immutable';
const REVALIDATE_CACHE = 'no-cache';

function listFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true }).flatMap(entry => {
    const fullPath = join(dir, entry.name);
    return entry.isDirectory() ? listFiles(fullPath) : [fullPath];
  });
}

function computeEtag(body: Uint8Array): string {
  return `"${createHash('sha256').update(body).digest('hex').slice(0, 32)}"`;
}

export function createAsset(urlPath: string, contents: Uint8Array): StaticAsset {
  return {
    body: new Uint8Array(contents).buffer,
    contentType: CONTENT_TYPES[extname(urlPath).toLowerCase()] ?? 'application/octet-stream',
    etag: computeEtag(contents),
    // Vite fingerprints everything it emits under /assets/
    cacheControl: urlPath.startsWith('/assets/') ? IMMUTABLE_CACHE : REVALIDATE_CACHE,
  };
}

/**
 * Read every file of the built dashboard into memory, keyed by URL path.
 * A missing directory yields an empty map.
 */
export function loadStaticAssets(dir: string): AssetMap {
  if (!existsSync(dir)) {
    console.warn(`Dashboard assets not found at ${dir}; serving the fallback index document`);
    return {};
  }

  const assets: AssetMap = {};
  for (const file of listFiles(dir)) {
    const urlPath = `/${relative(dir, file).split(sep).join('/')}`;
    assets[urlPath] = createAsset(urlPath, readFileSync(file));
  }
  return assets;
}

/** Normalize incoming path to a static asset key if available. */
export function resolveAssetPath(pathname: string, assets: AssetMap): string | null {
  if (!pathname || pathname === '/' || pathname === '/index.html') {
    return null;
  }

  if (Object.prototype.hasOwnProperty.call(assets, pathname)) {
    return pathname;
  }

  return null;
}

/** Create HTTP response for a static asset (supports conditional requests). */
export function serveStaticAsset(request: Request, asset: StaticAsset): Response {
  const etagMatches = headerContainsTag(request.headers.get('If-None-Match'), asset.etag);
  const headers = buildHeaders(asset);

  if (etagMatches) {
    return new Response(null, { status: 304, headers });
  }

  const body = request.method === 'HEAD' ? null : asset.body;

  return new Response(body, {
    status: 200,
    headers,
  });
}

function headerContainsTag(headerValue: string | null, tag: string): boolean {
  if (!headerValue) {
    return false;
  }

  return headerValue
    .split(',')
    .map(value => value.trim())
    .includes(tag);
}

function buildHeaders(asset: StaticAsset): Headers {
  return new Headers({
    'Content-Type': asset.contentType,
    'Cache-Control': asset.cacheControl,
    ETag: asset.etag,
  });
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const FALLBACK_INDEX = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width" />
    <title></title>
  </head>
  <body>
    <div id="root"></div>
  </body>
</html>
`;

/**
 * Index document with its title replaced. Without a built template the
 * fallback shell is used.
 */
export function renderIndexDocument(template: string | null, title: string): string {
  const source = template ?? FALLBACK_INDEX;
  const titleTag = `<title>${escapeHtml(title)}</title>`;

  if (/<title>[\s\S]*?<\/title>/i.test(source)) {
    return source.replace(/<title>[\s\S]*?<\/title>/i, titleTag);
  }

  if (/<\/head>/i.test(source)) {
    return source.replace(/<\/head>/i, `${titleTag}</head>`);
  }

  return source;
}

export function readIndexTemplate(assets: AssetMap): string | null {
  const index = assets['/index.html'];
  return index ? new TextDecoder().decode(index.body) : null;
}

export function indexDocumentResponse(request: Request, document: string): Response {
  return new Response(request.method === 'HEAD' ? null : document, {
    status: 200,
    headers: {
      'Content-Type': 'text/html; charset=utf-8',
      'Cache-Control': REVALIDATE_CACHE,
    },
  });
}
