/**
 * Composition root for the Bagfiles Capturer dashboard
 *
 * Wires the database, event callbacks, schedule monitor, authentication
 * and HTTP handler from a loaded configuration.
 */

import { ApiHandler } from './api/api-handler.js';
import { createApp, type FetchHandler } from './app.js';
import { AuthGate } from './auth/auth-gate.js';
import { DASHBOARD_TITLE, toPublicConfig, type CapturerConfig } from './config/config.js';
import { CapturerDao } from './db/capturer-dao.js';
import { openDatabase, type CapturerDatabase } from './db/database.js';
import { CallbackRegistry } from './events/callback-registry.js';
import { TimerDispatcher } from './events/timer-dispatcher.js';
import { ScheduleMonitor } from './monitoring/schedule-monitor.js';
import { loadStaticAssets } from './static/server.js';
import type { AssetMap } from './static/types.js';

export interface Services {
  db: CapturerDatabase;
  dao: CapturerDao;
  registry: CallbackRegistry;
  dispatcher: TimerDispatcher;
  monitor: ScheduleMonitor;
  authEnabled: boolean;
  app: FetchHandler;
}

export interface ServiceOverrides {
  db?: CapturerDatabase;
  assets?: AssetMap;
  clock?: () => Date;
}

/**
 * Authentication is active only when it is switched on and at least one
 * account exists to log in with. Decided once, at startup.
 */
export function isAuthEnabled(config: CapturerConfig, accountCount: number): boolean {
  return config.web.auth && accountCount > 0;
}

export function createServices(config: CapturerConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? (() => new Date());
  const db = overrides.db ?? openDatabase(config.databasePath);
  const dao = new CapturerDao(db, clock);

  const registry = new CallbackRegistry();
  const dispatcher = new TimerDispatcher(registry, clock);
  const monitor = new ScheduleMonitor(dao, registry, clock);
  monitor.start();

  const authEnabled = isAuthEnabled(config, dao.countAccounts());
  if (config.web.auth && !authEnabled) {
    console.warn('Authentication is enabled but no accounts exist; the dashboard is open');
  }

  const apiHandler = new ApiHandler({
    dao,
    dispatcher,
    monitor,
    publicConfig: toPublicConfig(config, authEnabled),
    debug: config.web.debugMode,
    corsOrigins: config.web.corsOrigins,
    clock,
  });

  const app = createApp({
    apiHandler,
    authGate: authEnabled ? new AuthGate(dao) : null,
    assets: overrides.assets ?? loadStaticAssets(config.staticDir),
    title: DASHBOARD_TITLE,
    debug: config.web.debugMode,
  });

  return { db, dao, registry, dispatcher, monitor, authEnabled, app };
}
