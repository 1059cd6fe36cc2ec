/**
 * Server Entrypoint
 *
 * Builds the dispatcher's HTTP app (commit intake, worker protocol, display
 * API) and runs it on @hono/node-server.
 */

import * as path from 'path';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';
import { cors } from 'hono/cors';
import { Dispatcher } from '../ci/dispatcher';
import { FileResultStore, InMemoryResultStore } from '../ci/results';
import type { ResultStore } from '../ci/results';
import { HttpWorkerTransport } from '../ci/transport';
import type { WorkerTransport } from '../ci/transport';
import { eventBus } from '../events/bus';
import type { EventBus } from '../events/bus';
import { registerLogHandlers } from '../events/handlers/log';
import type { EnvConfig } from './config';
import { logger as rootLogger, requestLogger } from './logger';
import type { AppEnv, Logger } from './logger';
import { handleError } from './middleware/validation';
import { createCommitRoutes } from './routes/commits';
import { createResultRoutes } from './routes/results';
import { createWorkerRoutes } from './routes/workers';

const VERSION = '1.0.0';

export interface DispatcherAppOptions {
  /** Interval workers are told to heartbeat at */
  heartbeatIntervalMs: number;
  logger?: Logger;
}

/**
 * Running dispatcher server
 */
export interface DispatcherServer {
  app: Hono<AppEnv>;
  server: ServerType;
  dispatcher: Dispatcher;
  store: ResultStore;
  /** Stop scheduling and close the HTTP server */
  stop: () => Promise<void>;
}

/**
 * Create and configure the Hono app
 */
export function createDispatcherApp(
  dispatcher: Dispatcher,
  store: ResultStore,
  options: DispatcherAppOptions
): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const log = options.logger ?? rootLogger;

  // Heartbeats arrive every couple of seconds per worker
  app.use('*', requestLogger(log, { skip: (p) => p === '/health' || p.endsWith('/heartbeat') }));

  // The status display is served from elsewhere and only reads
  app.use('/api/data', cors({ origin: '*', allowMethods: ['GET'] }));
  app.use('/api/summary', cors({ origin: '*', allowMethods: ['GET'] }));

  app.get('/health', (c) => {
    const pool = dispatcher.pool.stats();
    return c.json({
      status: pool.total > 0 ? 'ok' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      workers: pool,
    });
  });

  app.get('/api/status', (c) => c.json(dispatcher.snapshot()));

  app.route('/api/commits', createCommitRoutes(dispatcher));
  app.route('/api/workers', createWorkerRoutes(dispatcher, { heartbeatIntervalMs: options.heartbeatIntervalMs }));
  app.route('/api', createResultRoutes(store));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError(handleError);

  return app;
}

export interface StartDispatcherOptions {
  transport?: WorkerTransport;
  store?: ResultStore;
  events?: EventBus;
  logger?: Logger;
}

/**
 * Start the dispatcher: result store, scheduling loop and HTTP server
 */
export function startDispatcherServer(env: EnvConfig, options: StartDispatcherOptions = {}): DispatcherServer {
  const log = options.logger ?? rootLogger;
  const events = options.events ?? eventBus;

  const store =
    options.store ??
    (env.RESULTS_DIR
      ? new FileResultStore(path.resolve(env.RESULTS_DIR), { historyLimit: env.RESULT_HISTORY, logger: log })
      : new InMemoryResultStore({ historyLimit: env.RESULT_HISTORY }));

  if (!options.store && !env.RESULTS_DIR) {
    log.warn('RESULTS_DIR not set - results are kept in memory only');
  }

  const dispatcher = new Dispatcher(
    {
      repoRef: env.REPO_REF,
      heartbeatTimeoutMs: env.HEARTBEAT_TIMEOUT_MS,
      heartbeatCheckIntervalMs: env.HEARTBEAT_CHECK_INTERVAL_MS,
      jobTimeoutMs: env.JOB_TIMEOUT_MS,
      maxAttempts: env.MAX_ATTEMPTS,
    },
    {
      transport: options.transport ?? new HttpWorkerTransport(),
      store,
      events,
      logger: log,
    }
  );

  const handlerIds = registerLogHandlers(events, log);
  const app = createDispatcherApp(dispatcher, store, { heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS, logger: log });

  dispatcher.start();
  const server = serve({
    fetch: app.fetch,
    port: env.DISPATCHER_PORT,
    hostname: env.DISPATCHER_HOST,
  });

  log.info('Dispatcher listening', {
    url: `http://${env.DISPATCHER_HOST}:${env.DISPATCHER_PORT}`,
    repoRef: env.REPO_REF,
    resultsDir: env.RESULTS_DIR,
  });

  return {
    app,
    server,
    dispatcher,
    store,
    stop: async () => {
      dispatcher.stop();
      for (const id of handlerIds) {
        events.off(id);
      }
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      log.info('Dispatcher stopped');
    },
  };
}
