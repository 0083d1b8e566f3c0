import type { EventEmitter } from 'node:events';
import type { AddressInfo } from 'node:net';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { createServer, type LifecycleState, type ServerOpts } from './createServer.js';
import { ListenError, describeCause } from './errors.js';
import { loadTlsMaterial } from './tls.js';
import type { ServerConfig } from './config.js';

export type { LifecycleState };

export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGHUP', 'SIGTERM'] as const;
export type ShutdownSignal = typeof SHUTDOWN_SIGNALS[number];

export interface MetricsServerOpts extends Omit<ServerOpts, 'logger' | 'tls' | 'getState'> {
  logger: FastifyBaseLogger;
}

/**
 * Created -> Listening -> ShuttingDown -> Stopped. No way back: a stopped server is not restarted.
 */
export class MetricsServer {
  private current: LifecycleState = 'created';
  private app: FastifyInstance | undefined;
  private startPromise: Promise<AddressInfo> | undefined;
  private shutdownPromise: Promise<void> | undefined;
  private bound: AddressInfo | undefined;

  constructor(
    private readonly config: ServerConfig,
    private readonly opts: MetricsServerOpts,
  ) {}

  get state(): LifecycleState {
    return this.current;
  }

  get address(): AddressInfo | undefined {
    return this.bound;
  }

  /** For in-process requests (tests) once started. */
  get instance(): FastifyInstance | undefined {
    return this.app;
  }

  /**
   * Load TLS material, build the app and bind the listener. Resolves once bound;
   * serving continues in the background.
   */
  start(): Promise<AddressInfo> {
    if (this.startPromise) {
      return Promise.reject(new Error(this.current === 'created'
        ? 'server start already in progress or failed'
        : `cannot start server in state ${this.current}`));
    }
    if (this.current !== 'created') {
      return Promise.reject(new Error(`cannot start server in state ${this.current}`));
    }
    this.startPromise = this.doStart();
    return this.startPromise;
  }

  private async doStart(): Promise<AddressInfo> {
    const { config, opts } = this;
    const log = opts.logger;
    const tls = config.tls ? loadTlsMaterial(config.tls) : undefined;

    const app = await createServer(config, { ...opts, tls, getState: () => this.current });
    try {
      await app.listen({ host: config.listen.host, port: config.listen.port });
    } catch (err) {
      await app.close().catch((closeErr: unknown) => log.warn({ err: closeErr }, 'failed to release app after listen error'));
      throw new ListenError(config.listenAddress, err);
    }

    const addr = app.server.address();
    if (!addr || typeof addr === 'string') {
      await app.close();
      throw new ListenError(config.listenAddress, new Error('listener has no TCP address'));
    }
    this.app = app;
    this.bound = addr;
    this.current = 'listening';
    log.info({ use_tls: Boolean(tls), listen_at: `${addr.address}:${addr.port}` }, 'listening for incoming connections');
    return addr;
  }

  /**
   * Stop accepting connections and let in-flight requests finish within the grace period,
   * then drop whatever is left. Errors are logged, never thrown.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) this.shutdownPromise = this.doShutdown();
    return this.shutdownPromise;
  }

  private async doShutdown(): Promise<void> {
    const log = this.opts.logger;
    // A start still binding must finish before there is a listener to close
    if (this.startPromise) await Promise.allSettled([this.startPromise]);
    const app = this.app;
    if (this.current === 'created' || !app) {
      this.current = 'stopped';
      return;
    }
    this.current = 'shutting_down';
    log.info('shutting down server');

    const graceMs = this.config.shutdownGraceMs;
    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });
    try {
      const closing = app.close();
      const outcome = await Promise.race([closing.then(() => 'drained' as const), graceElapsed]);
      if (outcome === 'timeout') {
        log.warn({ grace_ms: graceMs }, 'grace period elapsed; closing remaining connections');
        app.server.closeAllConnections();
        await closing;
      }
    } catch (err) {
      log.warn({ err: describeCause(err) }, 'error during shutdown');
    } finally {
      clearTimeout(timer);
      this.current = 'stopped';
    }
  }
}

/**
 * Resolve with the first termination signal received. Listeners are removed afterwards,
 * so later signals fall back to the default behaviour. Aborting `cancel` detaches them
 * without resolving.
 */
export function waitForShutdownSignal(
  source: EventEmitter = process,
  signals: readonly ShutdownSignal[] = SHUTDOWN_SIGNALS,
  cancel?: AbortSignal,
): Promise<ShutdownSignal> {
  return new Promise((resolve) => {
    const handlers = new Map<ShutdownSignal, () => void>();
    const detach = () => {
      for (const [s, h] of handlers) source.off(s, h);
      cancel?.removeEventListener('abort', detach);
    };
    if (cancel?.aborted) return;
    for (const sig of signals) {
      const onSignal = () => {
        detach();
        resolve(sig);
      };
      handlers.set(sig, onSignal);
      source.on(sig, onSignal);
    }
    cancel?.addEventListener('abort', detach, { once: true });
  });
}
