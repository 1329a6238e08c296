/**
 * JSON API used by the dashboard pages
 */

import { z } from 'zod';
import type { CapturerDao, Schedule } from '../db/capturer-dao.js';
import type { TimerDispatcher } from '../events/timer-dispatcher.js';
import type { ScheduleMonitor } from '../monitoring/schedule-monitor.js';
import type { PublicConfig } from '../config/config.js';
import { createCredential } from '../auth/password.js';
import { buildCorsHeaders, preflightResponse } from '../utils/cors.js';
import { getNextWindowStart, isValidStartTime } from '../utils/schedule-window.js';
import {
  ConflictError,
  NotFoundError,
  UnsupportedMediaTypeError,
  ValidationError,
  logError,
  statusForError,
  toError,
} from '../errors/index.js';

export const DEFAULT_TABLE_LIMIT = 100;
export const MAX_TABLE_LIMIT = 500;

const TimerTickSchema = z.object({
  n: z.number().int().min(0),
});

const NewAccountSchema = z.object({
  username: z
    .string()
    .trim()
    .min(1, 'username is required')
    .max(64)
    .regex(/^[A-Za-z0-9_.-]+$/, 'username may only contain letters, digits, ".", "_" and "-"'),
  password: z.string().min(8, 'password must be at least 8 characters').max(256),
});

const NewScheduleSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(100),
  startTime: z.string().refine(isValidStartTime, 'startTime must be HH:MM (UTC)'),
  durationMinutes: z.number().int().min(1).max(1440),
  enabled: z.boolean().default(true),
});

const QuerySchema = z.object({
  sql: z.string().min(1, 'sql is required').max(10_000),
});

type HttpMethod = 'GET' | 'POST' | 'DELETE';

interface RouteResult {
  status?: number;
  body: unknown;
}

type RouteHandler = (request: Request, params: Record<string, string>) => Promise<RouteResult> | RouteResult;

interface Route {
  method: HttpMethod;
  pattern: RegExp;
  paramNames: string[];
  handler: RouteHandler;
}

function compileRoute(method: HttpMethod, path: string, handler: RouteHandler): Route {
  const paramNames: string[] = [];
  const source = path.replace(/:([A-Za-z]+)/g, (_match, name: string) => {
    paramNames.push(name);
    return '([^/]+)';
  });
  return { method, pattern: new RegExp(`^${source}$`), paramNames, handler };
}

function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new ValidationError(`Malformed path parameter: ${value}`);
  }
}

function isJsonContentType(value: string | null): boolean {
  return value !== null && value.split(';')[0].trim().toLowerCase() === 'application/json';
}

/**
 * Bodies must be declared as JSON; form and text/plain posts would skip
 * the browser's CORS preflight.
 */
async function readJson<T extends z.ZodTypeAny>(request: Request, schema: T): Promise<z.output<T>> {
  if (!isJsonContentType(request.headers.get('Content-Type'))) {
    throw new UnsupportedMediaTypeError('Request body must be sent as application/json');
  }

  let payload: unknown;
  try {
    payload = await request.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(issue => issue.message).join(', '), {
      issues: result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}

export interface ApiHandlerDeps {
  dao: CapturerDao;
  dispatcher: TimerDispatcher;
  monitor: ScheduleMonitor;
  publicConfig: PublicConfig;
  debug: boolean;
  /** Cross-origin callers whose Origin is reflected; empty allows same-origin only */
  corsOrigins?: readonly string[];
  clock?: () => Date;
}

/**
 * API request handler
 */
export class ApiHandler {
  private routes: Route[];
  private clock: () => Date;
  private corsOrigins: readonly string[];

  constructor(private deps: ApiHandlerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.corsOrigins = deps.corsOrigins ?? [];
    this.routes = [
      compileRoute('GET', '/api/config', () => ({ body: this.deps.publicConfig })),
      compileRoute('POST', '/api/timer', request => this.handleTimer(request)),
      compileRoute('GET', '/api/console/status', () => this.handleConsoleStatus()),
      compileRoute('GET', '/api/accounts', () => ({ body: { accounts: this.deps.dao.listAccounts() } })),
      compileRoute('POST', '/api/accounts', request => this.handleCreateAccount(request)),
      compileRoute('DELETE', '/api/accounts/:username', (_request, params) =>
        this.handleDeleteAccount(params.username)
      ),
      compileRoute('GET', '/api/schedules', () => this.handleListSchedules()),
      compileRoute('POST', '/api/schedules', request => this.handleCreateSchedule(request)),
      compileRoute('DELETE', '/api/schedules/:id', (_request, params) => this.handleDeleteSchedule(params.id)),
      compileRoute('GET', '/api/db/tables', () => ({ body: { tables: this.deps.dao.listTables() } })),
      compileRoute('GET', '/api/db/tables/:name', (request, params) => this.handleBrowseTable(request, params.name)),
      compileRoute('POST', '/api/db/query', request => this.handleQuery(request)),
    ];
  }

  /**
   * Handle API requests
   */
  async handleRequest(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const path = url.pathname;

    if (request.method === 'OPTIONS') {
      return preflightResponse(request, this.corsOrigins);
    }

    try {
      const match = this.match(request.method, path);
      if (!match) {
        return this.jsonResponse(request, { error: 'Not found', path }, 404);
      }

      const result = await match.route.handler(request, match.params);
      return this.jsonResponse(request, result.body, result.status ?? 200);
    } catch (error) {
      const status = statusForError(error);
      const err = toError(error);

      if (status === 500) {
        logError(err, { method: request.method, path });
        return this.jsonResponse(
          request,
          {
            error: 'Internal server error',
            ...(this.deps.debug ? { message: err.message } : {}),
          },
          500
        );
      }

      return this.jsonResponse(request, { error: err.name, message: err.message }, status);
    }
  }

  private match(method: string, path: string): { route: Route; params: Record<string, string> } | null {
    for (const route of this.routes) {
      if (route.method !== method) {
        continue;
      }
      const result = route.pattern.exec(path);
      if (!result) {
        continue;
      }
      const params: Record<string, string> = {};
      route.paramNames.forEach((name, index) => {
        params[name] = decodeParam(result[index + 1]);
      });
      return { route, params };
    }
    return null;
  }

  /**
   * Handle POST /api/timer
   */
  private async handleTimer(request: Request): Promise<RouteResult> {
    const { n } = await readJson(request, TimerTickSchema);
    return { body: { n: this.deps.dispatcher.tick(n) } };
  }

  /**
   * Handle GET /api/console/status
   */
  private handleConsoleStatus(): RouteResult {
    const { dao, monitor } = this.deps;
    const schedules = dao.listSchedules();

    return {
      body: {
        status: 'ok',
        ...monitor.getSnapshot(),
        accountCount: dao.countAccounts(),
        scheduleCount: schedules.length,
        nextSchedule: this.findNextSchedule(schedules),
      },
    };
  }

  private findNextSchedule(schedules: Schedule[]): { id: number; name: string; startsAt: string } | null {
    const now = this.clock();
    let next: { id: number; name: string; startsAt: string } | null = null;

    for (const schedule of schedules) {
      if (!schedule.enabled) {
        continue;
      }
      const startsAt = getNextWindowStart(schedule.startTime, now);
      if (!next || startsAt < next.startsAt) {
        next = { id: schedule.id, name: schedule.name, startsAt };
      }
    }

    return next;
  }

  /**
   * Handle POST /api/accounts
   */
  private async handleCreateAccount(request: Request): Promise<RouteResult> {
    const { username, password } = await readJson(request, NewAccountSchema);
    const credential = await createCredential(password);
    const account = this.deps.dao.insertAccount(username, credential.passwordHex, credential.saltHex);

    console.log(`Account "${username}" created`);
    return { status: 201, body: { account } };
  }

  /**
   * Handle DELETE /api/accounts/:username
   */
  private handleDeleteAccount(username: string): RouteResult {
    const { dao, publicConfig } = this.deps;

    if (!dao.queryAccount(username)) {
      throw new NotFoundError(`Account "${username}" does not exist`, { username });
    }

    if (publicConfig.authEnabled && dao.countAccounts() === 1) {
      throw new ConflictError('Cannot delete the last account while authentication is enabled');
    }

    dao.deleteAccount(username);
    console.log(`Account "${username}" deleted`);
    return { body: { deleted: username } };
  }

  /**
   * Handle GET /api/schedules
   */
  private handleListSchedules(): RouteResult {
    const now = this.clock();
    const schedules = this.deps.dao.listSchedules().map(schedule => ({
      ...schedule,
      nextStart: getNextWindowStart(schedule.startTime, now),
    }));

    return { body: { schedules } };
  }

  /**
   * Handle POST /api/schedules
   */
  private async handleCreateSchedule(request: Request): Promise<RouteResult> {
    const input = await readJson(request, NewScheduleSchema);
    const schedule = this.deps.dao.insertSchedule({ ...input, startTime: input.startTime.trim() });

    return { status: 201, body: { schedule } };
  }

  /**
   * Handle DELETE /api/schedules/:id
   */
  private handleDeleteSchedule(idParam: string): RouteResult {
    const id = Number(idParam);
    if (!Number.isInteger(id) || id < 1) {
      throw new ValidationError(`Invalid schedule id: ${idParam}`);
    }

    if (!this.deps.dao.deleteSchedule(id)) {
      throw new NotFoundError(`Schedule ${id} does not exist`, { id });
    }

    return { body: { deleted: id } };
  }

  /**
   * Handle GET /api/db/tables/:name
   */
  private handleBrowseTable(request: Request, name: string): RouteResult {
    const url = new URL(request.url);
    const limitParam = url.searchParams.get('limit');
    const limit = limitParam ? parseInt(limitParam, 10) : DEFAULT_TABLE_LIMIT;

    // Validate limit
    if (isNaN(limit) || limit < 1 || limit > MAX_TABLE_LIMIT) {
      throw new ValidationError(`Invalid limit parameter (1-${MAX_TABLE_LIMIT})`);
    }

    return { body: { table: name, ...this.deps.dao.browseTable(name, limit) } };
  }

  /**
   * Handle POST /api/db/query
   */
  private async handleQuery(request: Request): Promise<RouteResult> {
    const { sql } = await readJson(request, QuerySchema);
    return { body: this.deps.dao.runReadOnlyQuery(sql) };
  }

  /**
   * Create JSON response with CORS headers
   */
  private jsonResponse(request: Request, data: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(data, null, 2), {
      status,
      headers: {
        'Content-Type': 'application/json',
        ...buildCorsHeaders(request, this.corsOrigins),
      },
    });
  }
}
