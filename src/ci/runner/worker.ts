/**
 * Worker Runtime
 *
 * A worker runs one job at a time. The dispatcher pushes assignments to
 * `POST /run`; the worker heartbeats on its own timer, runs the suite through
 * its TestExecutor and reports the outcome back.
 */

import { Hono } from 'hono';
import { describeError } from '../../core/errors';
import { errorMeta, logger as rootLogger, requestLogger } from '../../server/logger';
import type { AppEnv, Logger } from '../../server/logger';
import { handleError, readJson } from '../../server/middleware/validation';
import { AssignmentSchema } from '../types';
import type { Assignment, TestResult } from '../types';
import { decodeAssignment, encodeResult } from '../wire';
import { RuntimeStatus } from './types';
import type { DispatcherApi, TestExecutor, WorkerRuntimeConfig } from './types';

const DEFAULT_HEARTBEAT_INTERVAL_MS = 2000;

export interface WorkerRuntimeDeps {
  client: DispatcherApi;
  executor: TestExecutor;
  logger?: Logger;
}

export class WorkerRuntime {
  private client: DispatcherApi;
  private executor: TestExecutor;
  private log: Logger;

  private workerId: string | null = null;
  private heartbeatIntervalMs: number;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private current: Assignment | null = null;
  private inflight: Promise<void> | null = null;

  constructor(private readonly config: WorkerRuntimeConfig, deps: WorkerRuntimeDeps) {
    this.client = deps.client;
    this.executor = deps.executor;
    this.log = (deps.logger ?? rootLogger).child({ component: 'worker', address: config.address });
    this.heartbeatIntervalMs = config.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  }

  get id(): string | null {
    return this.workerId;
  }

  get status(): RuntimeStatus {
    if (!this.workerId) return RuntimeStatus.OFFLINE;
    return this.current ? RuntimeStatus.BUSY : RuntimeStatus.IDLE;
  }

  get currentAssignment(): Assignment | null {
    return this.current;
  }

  /**
   * Register with the dispatcher and start heartbeating
   */
  async start(): Promise<string> {
    const workerId = await this.register();
    this.scheduleHeartbeats();
    return workerId;
  }

  stop(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  async register(): Promise<string> {
    const response = await this.client.register(this.config.address);
    this.workerId = response.worker_id;

    if (response.heartbeat_interval_ms !== this.heartbeatIntervalMs) {
      this.heartbeatIntervalMs = response.heartbeat_interval_ms;
      if (this.heartbeatTimer) this.scheduleHeartbeats();
    }

    this.log.info('Registered with dispatcher', {
      workerId: this.workerId,
      dispatcher: this.client.url,
      heartbeatIntervalMs: this.heartbeatIntervalMs,
    });
    return this.workerId;
  }

  /**
   * Send one heartbeat; a dispatcher that forgot this worker gets a fresh
   * registration
   */
  async heartbeat(): Promise<void> {
    if (!this.workerId) {
      await this.register();
      return;
    }

    const known = await this.client.heartbeat(this.workerId, this.current !== null);
    if (!known) {
      this.log.warn('Dispatcher no longer knows this worker, registering again', { workerId: this.workerId });
      await this.register();
    }
  }

  /**
   * Take an assignment. Returns false when a job is already running.
   */
  accept(assignment: Assignment): boolean {
    if (this.current) return false;

    this.current = assignment;
    this.inflight = this.execute(assignment).finally(() => {
      this.current = null;
      this.inflight = null;
    });
    return true;
  }

  /**
   * Resolves once the running job, if any, has been reported
   */
  async whenIdle(): Promise<void> {
    if (this.inflight) await this.inflight;
  }

  private scheduleHeartbeats(): void {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = setInterval(() => {
      this.heartbeat().catch((error: unknown) => {
        this.log.error('Heartbeat failed', errorMeta(error));
      });
    }, this.heartbeatIntervalMs);
  }

  private async execute(assignment: Assignment): Promise<void> {
    const log = this.log.child({ jobId: assignment.jobId, commitId: assignment.commitId, attempt: assignment.attempt });
    log.info('Running tests');

    let results: TestResult[];
    try {
      results = await this.executor.run(assignment);
    } catch (error) {
      log.warn('Execution failed', errorMeta(error));
      await this.reportError(assignment, describeError(error), log);
      return;
    }

    try {
      await this.client.reportResults(this.requireId(), {
        job_id: assignment.jobId,
        attempt: assignment.attempt,
        commit_id: assignment.commitId,
        results: results.map(encodeResult),
      });
      log.info('Reported results', { results: results.length });
    } catch (error) {
      log.error('Reporting results failed', errorMeta(error));
    }
  }

  private async reportError(assignment: Assignment, reason: string, log: Logger): Promise<void> {
    try {
      await this.client.reportError(this.requireId(), {
        job_id: assignment.jobId,
        attempt: assignment.attempt,
        commit_id: assignment.commitId,
        reason,
      });
    } catch (error) {
      log.error('Reporting execution error failed', errorMeta(error));
    }
  }

  private requireId(): string {
    if (!this.workerId) {
      throw new Error('Worker is not registered');
    }
    return this.workerId;
  }
}

// =============================================================================
// HTTP App
// =============================================================================

/**
 * Endpoints the dispatcher calls on a worker
 */
export function createWorkerApp(runtime: WorkerRuntime, logger: Logger = rootLogger): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use('*', requestLogger(logger, { skip: (p) => p === '/ping' }));

  app.get('/ping', (c) => {
    return c.json({ status: runtime.status, worker_id: runtime.id });
  });

  app.post('/run', async (c) => {
    const message = await readJson(c, AssignmentSchema, 'assignment');
    const accepted = runtime.accept(decodeAssignment(message));
    if (!accepted) {
      return c.json({ error: 'Worker is busy', job_id: runtime.currentAssignment?.jobId ?? null }, 409);
    }
    return c.json({ accepted: true, job_id: message.job_id }, 202);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError(handleError);

  return app;
}
