import type { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { USAGE, loadConfig } from './config.js';
import { StartupError } from './errors.js';
import { createLogger } from './logger.js';
import { MetricsServer, SHUTDOWN_SIGNALS, waitForShutdownSignal } from './lifecycle.js';
import type { PipelineDeps } from './pipeline.js';

export interface RunDeps extends Omit<PipelineDeps, 'log'> {
  /** Built from --log-level when omitted. */
  logger?: Logger;
  signals?: EventEmitter;
  stdout?: (text: string) => void;
  /** Called once the listener is bound. */
  onListening?: (server: MetricsServer) => void;
}

/**
 * Parse settings, serve until a termination signal arrives, then drain and stop.
 * Resolves with the process exit code.
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env, deps: RunDeps = {}): Promise<number> {
  let logger = deps.logger ?? createLogger();
  let server: MetricsServer;
  // Listen for signals before binding so one arriving mid-start still shuts down cleanly
  const abandon = new AbortController();
  const signalled = waitForShutdownSignal(deps.signals, SHUTDOWN_SIGNALS, abandon.signal);
  try {
    const parsed = loadConfig(argv, env);
    if (parsed.kind === 'help') {
      abandon.abort();
      (deps.stdout ?? ((t: string) => process.stdout.write(t)))(USAGE);
      return 0;
    }
    const { config } = parsed;
    if (!deps.logger) logger = createLogger(config.logLevel);

    server = new MetricsServer(config, { ...deps, logger });
    await server.start();
  } catch (err) {
    abandon.abort();
    if (!(err instanceof StartupError)) throw err;
    logger.error({ err, kind: err.kind }, 'terminating due to error');
    return 1;
  }

  deps.onListening?.(server);
  const signal = await signalled;
  logger.info({ signal }, 'terminating due to signal');
  await server.shutdown();
  return 0;
}
