/**
 * CI Dispatcher
 *
 * Owns the job queue and the worker pool and drives both through their
 * lifecycles: binds queued jobs to idle workers, watches heartbeats and job
 * deadlines, retries failed attempts and records every outcome in the result
 * store.
 *
 * Every transition below is synchronous. A job or worker record is never read
 * in one tick and written in another, so interleaved HTTP requests, timers and
 * delivery callbacks always observe whole transitions.
 */

import { CiError, ErrorCode, Errors, describeError, isCiError } from '../core/errors';
import { eventBus as defaultBus } from '../events/bus';
import type { EventBus } from '../events/bus';
import type { EventInput } from '../events/types';
import { logger as rootLogger, errorMeta } from '../server/logger';
import type { Logger } from '../server/logger';
import { JobQueue } from './queue';
import type { EnqueueOutcome, QueueStats } from './queue';
import type { ResultStore } from './results';
import { summarize } from './summary';
import type { WorkerTransport } from './transport';
import { JobState, ResultKind } from './types';
import type { Assignment, ErrorReport, Job, ResultReport, ResultSet, WorkerRecord } from './types';
import { WorkerPool } from './worker-pool';
import type { PoolStats } from './worker-pool';
import { decodeResult } from './wire';

// =============================================================================
// Configuration
// =============================================================================

export interface DispatcherConfig {
  /** Repository every commit is built from */
  repoRef: string;
  /** A worker silent for longer than this is evicted */
  heartbeatTimeoutMs: number;
  /** How often heartbeats are checked */
  heartbeatCheckIntervalMs: number;
  /** Deadline for a single attempt once delivered */
  jobTimeoutMs: number;
  /** Attempts per job before it fails for good */
  maxAttempts: number;
}

export interface DispatcherDeps {
  transport: WorkerTransport;
  store: ResultStore;
  events?: EventBus;
  logger?: Logger;
  /** Clock used for heartbeats */
  now?: () => number;
}

/** Test name carried by the synthetic result of a job that ran out of retries */
export const DISPATCH_TEST_NAME = 'ci:dispatch';

export const RETRIES_EXHAUSTED = 'retries exhausted';

/** What a worker says about itself in a heartbeat */
export interface WorkerStatus {
  busy?: boolean;
}

export interface WorkerView {
  id: string;
  address: string;
  state: WorkerRecord['state'];
  currentJob: string | null;
  lastHeartbeat: string;
}

export interface JobView {
  id: string;
  commitId: string;
  sequence: number;
  state: Job['state'];
  attemptCount: number;
  assignedWorker: string | null;
  lastFailure: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface DispatcherSnapshot {
  workers: WorkerView[];
  jobs: JobView[];
  queue: QueueStats;
  pool: PoolStats;
}

// =============================================================================
// Dispatcher
// =============================================================================

export class Dispatcher {
  readonly queue: JobQueue;
  readonly pool: WorkerPool;

  private readonly transport: WorkerTransport;
  private readonly store: ResultStore;
  private readonly events: EventBus;
  private readonly log: Logger;

  private deadlines = new Map<string, NodeJS.Timeout>();
  private sweepInterval: NodeJS.Timeout | null = null;
  private pumping = false;
  private pumpAgain = false;

  constructor(private readonly config: DispatcherConfig, deps: DispatcherDeps) {
    this.transport = deps.transport;
    this.store = deps.store;
    this.events = deps.events ?? defaultBus;
    this.log = (deps.logger ?? rootLogger).child({ component: 'dispatcher' });
    this.queue = new JobQueue(deps.store.highestSequence() + 1);
    for (const set of deps.store.list()) {
      this.queue.remember({ id: set.commitId, sequence: set.sequence, repoRef: config.repoRef });
    }
    this.pool = new WorkerPool(deps.now);
  }

  /**
   * Start the heartbeat sweep
   */
  start(): void {
    if (this.sweepInterval) return;
    this.log.info('Starting dispatcher', {
      repoRef: this.config.repoRef,
      maxAttempts: this.config.maxAttempts,
      jobTimeoutMs: this.config.jobTimeoutMs,
      heartbeatTimeoutMs: this.config.heartbeatTimeoutMs,
    });
    this.sweepInterval = setInterval(() => {
      this.guard('heartbeat sweep', () => this.checkHeartbeats());
    }, this.config.heartbeatCheckIntervalMs);
  }

  /**
   * Stop the sweep and drop every pending job deadline
   */
  stop(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
    for (const timer of this.deadlines.values()) {
      clearTimeout(timer);
    }
    this.deadlines.clear();
  }

  // ===========================================================================
  // Commits
  // ===========================================================================

  /**
   * Accept a commit notification. Re-delivery of a commit that is already
   * queued or running is a no-op.
   */
  submit(commitId: string, repoRef?: string): EnqueueOutcome {
    if (repoRef !== undefined && repoRef !== this.config.repoRef) {
      throw Errors.unknownRepository(repoRef, this.config.repoRef);
    }

    const outcome = this.queue.enqueue(commitId, this.config.repoRef);
    if (outcome.accepted) {
      this.publish({
        type: 'ci.job.queued',
        payload: { jobId: outcome.job.id, commitId, sequence: outcome.job.commit.sequence },
      });
      this.pump();
    } else {
      this.publish({ type: 'ci.job.duplicate', payload: { jobId: outcome.job.id, commitId } });
    }
    return outcome;
  }

  // ===========================================================================
  // Workers
  // ===========================================================================

  /**
   * Add a worker to the pool. A worker registering again from the same
   * address has lost whatever it was doing, so its old record is evicted.
   */
  register(address: string): WorkerRecord {
    const stale = this.pool.findByAddress(address);
    if (stale) {
      this.evict(stale, 'worker registered again');
    }

    const worker = this.pool.add(address);
    this.publish({ type: 'ci.worker.registered', payload: { workerId: worker.id, address } });
    this.pump();
    return worker;
  }

  /**
   * Refresh a worker's heartbeat. A worker that was left running an abandoned
   * attempt becomes available again once it reports itself not busy.
   */
  heartbeat(workerId: string, status: WorkerStatus = {}): WorkerRecord {
    const worker = this.pool.touch(workerId);
    if (status.busy === false && this.pool.isDraining(worker)) {
      this.pool.markIdle(worker);
      this.pump();
    }
    return worker;
  }

  /**
   * Evict every worker whose heartbeat is overdue; returns the evicted ones
   */
  checkHeartbeats(): WorkerRecord[] {
    const silent = this.pool.silentSince(this.config.heartbeatTimeoutMs);
    for (const worker of silent) {
      this.evict(worker, `no heartbeat for more than ${this.config.heartbeatTimeoutMs}ms`);
    }
    if (silent.length > 0) {
      this.pump();
    }
    return silent;
  }

  // ===========================================================================
  // Reports
  // ===========================================================================

  /**
   * Record the results of a finished attempt
   */
  reportResults(workerId: string, report: ResultReport): ResultSet {
    const { job, worker } = this.claim(workerId, report.job_id, report.attempt, report.commit_id);

    const resultSet: ResultSet = {
      commitId: job.commit.id,
      sequence: job.commit.sequence,
      results: report.results.map(decodeResult),
      producedAt: new Date(),
    };
    this.store.put(resultSet);

    this.clearDeadline(job.id);
    this.queue.complete(job);
    this.queue.release(job);
    this.pool.markIdle(worker);

    const summary = summarize(resultSet);
    this.publish({
      type: 'ci.job.completed',
      payload: {
        jobId: job.id,
        commitId: job.commit.id,
        workerId,
        attempt: job.attemptCount,
        passed: summary.passed,
        failures: summary.failures,
        errors: summary.errors,
      },
    });

    this.pump();
    return resultSet;
  }

  /**
   * The worker could not execute the attempt
   */
  reportError(workerId: string, report: ErrorReport): void {
    const { job, worker } = this.claim(workerId, report.job_id, report.attempt, report.commit_id);

    this.clearDeadline(job.id);
    this.pool.markIdle(worker);
    this.retryOrFail(job, `execution error on ${workerId}: ${report.reason}`);
    this.pump();
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  snapshot(): DispatcherSnapshot {
    return {
      workers: this.pool.list().map((worker) => ({
        id: worker.id,
        address: worker.address,
        state: worker.state,
        currentJob: worker.currentJob ?? null,
        lastHeartbeat: new Date(worker.lastHeartbeat).toISOString(),
      })),
      jobs: this.queue.list().map((job) => ({
        id: job.id,
        commitId: job.commit.id,
        sequence: job.commit.sequence,
        state: job.state,
        attemptCount: job.attemptCount,
        assignedWorker: job.assignedWorker ?? null,
        lastFailure: job.lastFailure ?? null,
        createdAt: job.createdAt.toISOString(),
        updatedAt: job.updatedAt.toISOString(),
      })),
      queue: this.queue.stats(),
      pool: this.pool.stats(),
    };
  }

  // ===========================================================================
  // Assignment
  // ===========================================================================

  /**
   * Assign queued jobs while idle workers remain
   */
  private pump(): void {
    if (this.pumping) {
      this.pumpAgain = true;
      return;
    }

    this.pumping = true;
    try {
      do {
        this.pumpAgain = false;
        while (this.queue.hasQueued()) {
          const worker = this.pool.pickIdle();
          if (!worker) break;
          const job = this.queue.dequeue();
          if (!job) break;
          this.launch(job, worker);
        }
      } while (this.pumpAgain);
    } finally {
      this.pumping = false;
    }
  }

  private launch(job: Job, worker: WorkerRecord): void {
    this.queue.markRunning(job, worker.id);
    this.pool.markBusy(worker, job.id);

    const assignment: Assignment = {
      jobId: job.id,
      attempt: job.attemptCount,
      commitId: job.commit.id,
      repoRef: job.commit.repoRef,
    };

    this.deadlines.set(
      job.id,
      setTimeout(() => {
        this.guard('job deadline', () => this.onDeadline(assignment));
      }, this.config.jobTimeoutMs)
    );

    this.publish({
      type: 'ci.job.assigned',
      payload: { jobId: job.id, commitId: job.commit.id, workerId: worker.id, attempt: assignment.attempt },
    });

    this.transport.deliver(worker, assignment).catch((error: unknown) => {
      this.guard('delivery failure', () => this.onDeliveryFailed(assignment, worker.id, error));
    });
  }

  private onDeliveryFailed(assignment: Assignment, workerId: string, error: unknown): void {
    const job = this.currentAttempt(assignment);
    if (!job || job.assignedWorker !== workerId) return;

    this.clearDeadline(job.id);
    const cause = describeError(error);
    const worker = this.pool.get(workerId);

    if (isCiError(error, ErrorCode.WORKER_UNREACHABLE) && worker) {
      this.evict(worker, cause);
    } else if (isCiError(error, ErrorCode.WORKER_BUSY)) {
      if (worker) this.pool.markDraining(worker);
      this.queue.defer(job, `${workerId} is still running another job`);
      this.publish({
        type: 'ci.job.deferred',
        payload: { jobId: job.id, commitId: job.commit.id, workerId, attempt: job.attemptCount },
      });
    } else {
      if (worker) this.pool.markIdle(worker);
      this.retryOrFail(job, `delivery to ${workerId} failed: ${cause}`);
    }
    this.pump();
  }

  private onDeadline(assignment: Assignment): void {
    this.deadlines.delete(assignment.jobId);
    const job = this.currentAttempt(assignment);
    if (!job) return;

    const worker = job.assignedWorker ? this.pool.get(job.assignedWorker) : undefined;
    if (worker && worker.currentJob === job.id) {
      this.pool.markDraining(worker);
    }
    this.retryOrFail(job, `job timed out after ${this.config.jobTimeoutMs}ms`);
    this.pump();
  }

  // ===========================================================================
  // Failure handling
  // ===========================================================================

  /**
   * Requeue a failed attempt, or fail the job with a visible error result once
   * it has used all its attempts
   */
  private retryOrFail(job: Job, cause: string): void {
    if (job.attemptCount >= this.config.maxAttempts) {
      this.queue.fail(job, cause);
      this.store.put({
        commitId: job.commit.id,
        sequence: job.commit.sequence,
        results: [{ testName: DISPATCH_TEST_NAME, kind: ResultKind.ERROR, reasons: [RETRIES_EXHAUSTED, cause] }],
        producedAt: new Date(),
      });
      this.queue.release(job);
      this.publish({
        type: 'ci.job.failed',
        payload: { jobId: job.id, commitId: job.commit.id, attempts: job.attemptCount, cause },
      });
      return;
    }

    this.queue.requeue(job, cause);
    this.publish({
      type: 'ci.job.retried',
      payload: { jobId: job.id, commitId: job.commit.id, attempt: job.attemptCount, cause },
    });
  }

  /**
   * Drop a worker from the pool and retry whatever it was running
   */
  private evict(worker: WorkerRecord, reason: string): void {
    const jobId = worker.currentJob;
    this.pool.evict(worker);
    this.publish({
      type: 'ci.worker.evicted',
      payload: { workerId: worker.id, address: worker.address, reason, jobId },
    });

    if (!jobId) return;
    const job = this.queue.get(jobId);
    if (job && job.state === JobState.RUNNING && job.assignedWorker === worker.id) {
      this.clearDeadline(job.id);
      this.retryOrFail(job, `worker ${worker.id} unreachable: ${reason}`);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Check that a report belongs to the attempt its worker is running
   */
  private claim(workerId: string, jobId: string, attempt: number, commitId: string): { job: Job; worker: WorkerRecord } {
    const worker = this.pool.get(workerId);
    if (!worker) {
      throw Errors.unknownWorker(workerId);
    }

    let reason: string | undefined;
    const job = this.queue.get(jobId);
    if (worker.currentJob !== jobId) {
      reason = 'worker is not running this job';
    } else if (!job || job.state !== JobState.RUNNING) {
      reason = 'job is not running';
    } else if (job.attemptCount !== attempt) {
      reason = `attempt ${attempt} was superseded by attempt ${job.attemptCount}`;
    } else if (job.commit.id !== commitId) {
      reason = `job builds ${job.commit.id}, not ${commitId}`;
    }

    if (reason !== undefined || !job) {
      const rejected = reason ?? 'job is not running';
      if (this.pool.isDraining(worker)) {
        // the abandoned attempt is over, so the worker is free
        this.pool.markIdle(worker);
        this.pump();
      }
      this.publish({ type: 'ci.report.rejected', payload: { workerId, jobId, reason: rejected } });
      throw Errors.staleReport(workerId, jobId, rejected);
    }

    return { job, worker };
  }

  private currentAttempt(assignment: Assignment): Job | undefined {
    const job = this.queue.get(assignment.jobId);
    if (!job || job.state !== JobState.RUNNING || job.attemptCount !== assignment.attempt) {
      return undefined;
    }
    return job;
  }

  private clearDeadline(jobId: string): void {
    const timer = this.deadlines.get(jobId);
    if (timer) {
      clearTimeout(timer);
      this.deadlines.delete(jobId);
    }
  }

  private publish(event: EventInput): void {
    this.events.emit(event).catch((error: unknown) => {
      this.log.error('Event publication failed', { type: event.type, ...errorMeta(error) });
    });
  }

  /**
   * Run a timer or callback body; failures are logged since there is no caller
   * to hand them to
   */
  private guard(what: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      const code = error instanceof CiError ? error.code : undefined;
      this.log.error(`Dispatcher ${what} failed`, { code, ...errorMeta(error) });
    }
  }
}
