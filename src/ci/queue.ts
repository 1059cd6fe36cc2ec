/**
 * CI Job Queue
 *
 * Ordered backlog of build requests, one job per commit. Ordering is by the
 * commit's sequence; a requeued job returns to the position its sequence
 * dictates rather than the back of the line.
 */

import { randomUUID } from 'crypto';
import { Errors } from '../core/errors';
import { JobState, isTerminal } from './types';
import type { Commit, Job } from './types';

export type EnqueueOutcome =
  | { accepted: true; job: Job }
  | { accepted: false; reason: 'duplicate_active_job'; job: Job };

export interface QueueStats {
  queued: number;
  assigned: number;
  running: number;
  completed: number;
  failed: number;
}

export class JobQueue {
  private jobs = new Map<string, Job>();
  /** commit id → id of its non-terminal job */
  private activeByCommit = new Map<string, string>();
  /** Every commit ever observed, so rebuilds keep their sequence */
  private commits = new Map<string, Commit>();
  /** Queued job ids ordered by commit sequence */
  private pending: string[] = [];
  private nextSequence: number;

  /**
   * @param firstSequence - sequence given to the first new commit; a restarted
   * dispatcher continues after the highest sequence it has results for
   */
  constructor(firstSequence = 1) {
    this.nextSequence = firstSequence;
  }

  /**
   * Record a commit observed before a restart so a rebuild keeps its sequence
   */
  remember(commit: Commit): void {
    if (this.commits.has(commit.id)) return;
    this.commits.set(commit.id, commit);
    this.nextSequence = Math.max(this.nextSequence, commit.sequence + 1);
  }

  /**
   * Accept a commit, or reject it when a job for it is still in flight
   */
  enqueue(commitId: string, repoRef: string): EnqueueOutcome {
    const activeId = this.activeByCommit.get(commitId);
    if (activeId) {
      const active = this.jobs.get(activeId);
      if (active && !isTerminal(active)) {
        return { accepted: false, reason: 'duplicate_active_job', job: active };
      }
    }

    let commit = this.commits.get(commitId);
    if (!commit) {
      commit = { id: commitId, sequence: this.nextSequence++, repoRef };
      this.commits.set(commitId, commit);
    }

    const now = new Date();
    const job: Job = {
      id: randomUUID(),
      commit,
      state: JobState.QUEUED,
      attemptCount: 1,
      createdAt: now,
      updatedAt: now,
    };

    this.jobs.set(job.id, job);
    this.activeByCommit.set(commitId, job.id);
    this.insertPending(job);

    return { accepted: true, job };
  }

  /**
   * Take the next queued job, moving it to `assigned`
   */
  dequeue(): Job | undefined {
    const jobId = this.pending.shift();
    if (!jobId) return undefined;

    const job = this.require(jobId);
    this.transition(job, JobState.QUEUED, JobState.ASSIGNED);
    return job;
  }

  /**
   * Bind an assigned job to the worker that will run it
   */
  markRunning(job: Job, workerId: string): void {
    this.transition(job, JobState.ASSIGNED, JobState.RUNNING);
    job.assignedWorker = workerId;
  }

  /**
   * Put a failed attempt back in line for another try
   */
  requeue(job: Job, cause: string): void {
    this.unassign(job, cause, job.attemptCount + 1);
  }

  /**
   * Put back an attempt that never started; it keeps its number
   */
  defer(job: Job, cause: string): void {
    this.unassign(job, cause, job.attemptCount);
  }

  complete(job: Job): void {
    this.transition(job, JobState.RUNNING, JobState.COMPLETED);
  }

  fail(job: Job, cause: string): void {
    if (job.state !== JobState.RUNNING && job.state !== JobState.ASSIGNED) {
      throw Errors.invalidTransition(job.id, job.state, JobState.FAILED);
    }
    job.state = JobState.FAILED;
    job.lastFailure = cause;
    job.updatedAt = new Date();
  }

  /**
   * Forget a terminal job once its results are recorded
   */
  release(job: Job): void {
    if (!isTerminal(job)) {
      throw Errors.invalidTransition(job.id, job.state, 'released');
    }
    this.jobs.delete(job.id);
    if (this.activeByCommit.get(job.commit.id) === job.id) {
      this.activeByCommit.delete(job.commit.id);
    }
  }

  get(jobId: string): Job | undefined {
    return this.jobs.get(jobId);
  }

  findActiveByCommit(commitId: string): Job | undefined {
    const jobId = this.activeByCommit.get(commitId);
    return jobId ? this.jobs.get(jobId) : undefined;
  }

  hasQueued(): boolean {
    return this.pending.length > 0;
  }

  /**
   * Jobs currently tracked, ordered by commit sequence
   */
  list(): Job[] {
    return [...this.jobs.values()].sort((a, b) => a.commit.sequence - b.commit.sequence);
  }

  stats(): QueueStats {
    const stats: QueueStats = { queued: 0, assigned: 0, running: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      stats[job.state]++;
    }
    return stats;
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw Errors.jobNotFound(jobId);
    return job;
  }

  private transition(job: Job, from: JobState, to: JobState): void {
    if (job.state !== from) {
      throw Errors.invalidTransition(job.id, job.state, to);
    }
    job.state = to;
    job.updatedAt = new Date();
  }

  private unassign(job: Job, cause: string, attemptCount: number): void {
    if (job.state !== JobState.RUNNING && job.state !== JobState.ASSIGNED) {
      throw Errors.invalidTransition(job.id, job.state, JobState.QUEUED);
    }
    job.state = JobState.QUEUED;
    job.attemptCount = attemptCount;
    job.assignedWorker = undefined;
    job.lastFailure = cause;
    job.updatedAt = new Date();
    this.insertPending(job);
  }

  private insertPending(job: Job): void {
    const sequence = job.commit.sequence;
    let index = this.pending.length;
    while (index > 0) {
      const before = this.jobs.get(this.pending[index - 1]);
      if (!before || before.commit.sequence <= sequence) break;
      index--;
    }
    this.pending.splice(index, 0, job.id);
  }
}
