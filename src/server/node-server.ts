/**
 * Runs a web-standard fetch handler on node:http
 */

import { createServer, type IncomingHttpHeaders } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { FetchHandler } from '../app.js';
import { logError, toError } from '../errors/index.js';

export interface RequestSource extends AsyncIterable<Buffer | string> {
  url?: string;
  method?: string;
  headers: IncomingHttpHeaders;
}

export interface ResponseSink {
  statusCode: number;
  headersSent: boolean;
  setHeader(name: string, value: string | string[]): unknown;
  end(chunk?: Buffer): unknown;
}

export interface RunningServer {
  url: string;
  close(): Promise<void>;
}

async function readBody(source: RequestSource): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function toWebRequest(source: RequestSource, origin: string): Promise<Request> {
  const url = new URL(source.url ?? '/', origin);
  const method = (source.method ?? 'GET').toUpperCase();
  const headers = new Headers();

  for (const [name, value] of Object.entries(source.headers)) {
    if (Array.isArray(value)) {
      value.forEach(item => headers.append(name, item));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const hasBody = method !== 'GET' && method !== 'HEAD';
  return new Request(url, {
    method,
    headers,
    body: hasBody ? await readBody(source) : undefined,
  });
}

export async function writeWebResponse(response: Response, sink: ResponseSink): Promise<void> {
  sink.statusCode = response.status;

  const cookies = response.headers.getSetCookie();
  response.headers.forEach((value, name) => {
    if (name !== 'set-cookie') {
      sink.setHeader(name, value);
    }
  });
  if (cookies.length > 0) {
    sink.setHeader('set-cookie', cookies);
  }

  const body = response.body ? Buffer.from(await response.arrayBuffer()) : undefined;
  sink.end(body);
}

/** Port actually bound; differs from the requested one when that was 0. */
export function boundPort(address: AddressInfo | string | null, requested: number): number {
  return address !== null && typeof address === 'object' ? address.port : requested;
}

export function startServer(
  handler: FetchHandler,
  options: { host: string; port: number }
): Promise<RunningServer> {
  const origin = `http://${options.host}:${options.port}`;

  const server = createServer((req, res) => {
    toWebRequest(req, origin)
      .then(request => handler.fetch(request))
      .then(response => writeWebResponse(response, res))
      .catch(error => {
        logError(toError(error), { method: req.method, path: req.url });
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end();
      });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve({
        url: `http://${options.host}:${boundPort(server.address(), options.port)}`,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close(error => (error ? rejectClose(error) : resolveClose()));
          }),
      });
    });
  });
}
