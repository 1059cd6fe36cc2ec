/**
 * REST API routes used by test-runner workers
 */

import { Hono } from 'hono';
import { Errors } from '../../core/errors';
import type { Dispatcher } from '../../ci/dispatcher';
import { ErrorReportSchema, HeartbeatSchema, RegisterWorkerSchema, ResultReportSchema } from '../../ci/types';
import type { RegisterWorkerResponse } from '../../ci/types';
import type { AppEnv } from '../logger';
import { readJson } from '../middleware/validation';

export function createWorkerRoutes(dispatcher: Dispatcher, options: { heartbeatIntervalMs: number }): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  /**
   * POST /api/workers
   * Register a worker reachable at `address`
   */
  app.post('/', async (c) => {
    const { address } = await readJson(c, RegisterWorkerSchema, 'worker registration');
    const worker = dispatcher.register(address);
    const response: RegisterWorkerResponse = {
      worker_id: worker.id,
      heartbeat_interval_ms: options.heartbeatIntervalMs,
    };
    return c.json(response, 201);
  });

  /**
   * POST /api/workers/:id/heartbeat
   */
  app.post('/:id/heartbeat', async (c) => {
    const workerId = c.req.param('id');
    const { busy } = await readJson(c, HeartbeatSchema, 'heartbeat', { allowEmpty: true });

    if (!dispatcher.pool.get(workerId)) {
      const error = Errors.unknownWorker(workerId);
      return c.json(
        { error: error.message, code: error.code, evicted: dispatcher.pool.wasEvicted(workerId) },
        404
      );
    }

    dispatcher.heartbeat(workerId, { busy });
    return c.body(null, 204);
  });

  /**
   * POST /api/workers/:id/results
   * Results of the attempt the worker was running
   */
  app.post('/:id/results', async (c) => {
    const report = await readJson(c, ResultReportSchema, 'result report');
    dispatcher.reportResults(c.req.param('id'), report);
    return c.body(null, 204);
  });

  /**
   * POST /api/workers/:id/errors
   * The worker could not execute the attempt
   */
  app.post('/:id/errors', async (c) => {
    const report = await readJson(c, ErrorReportSchema, 'error report');
    dispatcher.reportError(c.req.param('id'), report);
    return c.body(null, 204);
  });

  return app;
}
