/**
 * Runtime configuration read from environment variables.
 *
 * Every key has a default so the dashboard starts with an empty environment.
 * Intervals are given in seconds and exposed in milliseconds.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

export const DASHBOARD_TITLE = 'Bagfiles Capturer';

const TRUE_VALUES = new Set(['true', '1', 'yes']);

function booleanFlag(defaultValue: boolean) {
  return z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform(value => TRUE_VALUES.has(value))
    .default(String(defaultValue));
}

/** Origin of an http(s) URL given without path, query or fragment */
function parseOrigin(value: string): string | null {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }
  if (url.pathname !== '/' || url.search !== '' || url.hash !== '') {
    return null;
  }
  return url.origin;
}

// Comma-separated; empty means only same-origin callers
const OriginListSchema = z
  .string()
  .default('')
  .transform(value =>
    value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  )
  .pipe(
    z.array(
      z
        .string()
        .refine(item => parseOrigin(item) !== null, item => ({
          message: `"${item}" is not an origin such as http://host:port`,
        }))
        .transform(item => parseOrigin(item) ?? item)
    )
  );

const EnvSchema = z.object({
  CAPTURER_WEB_HOST: z.string().trim().min(1).default('0.0.0.0'),
  CAPTURER_WEB_PORT: z.coerce.number().int().min(1).max(65535).default(8050),
  CAPTURER_WEB_DEBUG_MODE: booleanFlag(true),
  CAPTURER_WEB_AUTH: booleanFlag(false),
  CAPTURER_CORS_ORIGINS: OriginListSchema,
  CAPTURER_SYSTEM_TIMER: z.coerce.number().positive().default(1),
  CAPTURER_CONSOLE_REFRESH: z.coerce.number().positive().default(5),
  CAPTURER_DB_PATH: z.string().trim().min(1).default('capturer.db'),
  CAPTURER_STATIC_DIR: z.string().trim().min(1).default('frontend/dist'),
  CAPTURER_SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(2000),
});

export interface CapturerConfig {
  web: {
    host: string;
    port: number;
    debugMode: boolean;
    auth: boolean;
    /** Cross-origin callers allowed to use the API with credentials */
    corsOrigins: string[];
  };
  system: {
    timerIntervalMs: number;
  };
  console: {
    refreshMs: number;
  };
  databasePath: string;
  staticDir: string;
  shutdownGraceMs: number;
}

/**
 * Subset of the configuration the browser is allowed to see
 */
export interface PublicConfig {
  title: string;
  timerIntervalMs: number;
  consoleRefreshMs: number;
  authEnabled: boolean;
}

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CapturerConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  const parsed = result.data;

  return {
    web: {
      host: parsed.CAPTURER_WEB_HOST,
      port: parsed.CAPTURER_WEB_PORT,
      debugMode: parsed.CAPTURER_WEB_DEBUG_MODE,
      auth: parsed.CAPTURER_WEB_AUTH,
      corsOrigins: parsed.CAPTURER_CORS_ORIGINS,
    },
    system: {
      timerIntervalMs: secondsToMs(parsed.CAPTURER_SYSTEM_TIMER),
    },
    console: {
      refreshMs: secondsToMs(parsed.CAPTURER_CONSOLE_REFRESH),
    },
    databasePath: parsed.CAPTURER_DB_PATH,
    staticDir: parsed.CAPTURER_STATIC_DIR,
    shutdownGraceMs: parsed.CAPTURER_SHUTDOWN_GRACE_MS,
  };
}

export function toPublicConfig(config: CapturerConfig, authEnabled: boolean): PublicConfig {
  return {
    title: DASHBOARD_TITLE,
    timerIntervalMs: config.system.timerIntervalMs,
    consoleRefreshMs: config.console.refreshMs,
    authEnabled,
  };
}
