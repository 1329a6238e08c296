/**
 * Process entry: load configuration, serve the dashboard, stop on SIGINT/SIGTERM
 */

import { loadConfig } from './config/config.js';
import { logError, toError } from './errors/index.js';
import { createServices } from './index.js';
import { createStopHandler, installSignalHandlers } from './server/lifecycle.js';
import { startServer } from './server/node-server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const services = createServices(config);

  const server = await startServer(services.app, config.web);
  console.log(`Bagfiles Capturer dashboard listening on ${server.url}`);
  if (config.web.debugMode) {
    console.log('Debug mode is on: requests are logged and error details are returned');
  }

  const stop = createStopHandler({
    graceMs: config.shutdownGraceMs,
    closers: [() => server.close(), () => services.monitor.stop(), () => services.db.close()],
  });
  installSignalHandlers(stop);
}

main().catch(error => {
  logError(toError(error), { phase: 'startup' });
  process.exit(1);
});
