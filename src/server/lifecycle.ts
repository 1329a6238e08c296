/**
 * Graceful shutdown for the dashboard process
 */

import { setTimeout as delay } from 'node:timers/promises';
import { logError, toError } from '../errors/index.js';

export type Closer = () => Promise<void> | void;

export interface StopHandlerOptions {
  /** Wait before closing, so in-flight requests can finish */
  graceMs: number;
  closers: Closer[];
  exit?: (code: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export type StopHandler = (signal?: string) => Promise<void>;

/**
 * Build the stop routine. Repeated signals share the first shutdown.
 */
export function createStopHandler(options: StopHandlerOptions): StopHandler {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  let stopping: Promise<void> | null = null;

  async function run(signal: string | undefined): Promise<void> {
    console.log(`Stopping dashboard server (${signal ?? 'requested'})`);
    await sleep(options.graceMs);

    for (const close of options.closers) {
      try {
        await close();
      } catch (error) {
        logError(toError(error), { phase: 'shutdown' });
      }
    }

    console.log('Dashboard server stopped');
    exit(0);
  }

  return signal => {
    if (!stopping) {
      stopping = run(signal);
    }
    return stopping;
  };
}

export function installSignalHandlers(
  stop: StopHandler,
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
): () => void {
  const listener = (signal: NodeJS.Signals) => {
    stop(signal).catch(error => logError(toError(error), { signal }));
  };

  for (const signal of signals) {
    process.on(signal, listener);
  }

  return () => {
    for (const signal of signals) {
      process.off(signal, listener);
    }
  };
}
