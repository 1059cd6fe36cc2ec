/**
 * CI Dispatch Types
 *
 * Domain records owned by the dispatcher plus the zod schemas for every
 * payload that crosses a process boundary (commit source, worker, display).
 */

import { z } from 'zod';

// =============================================================================
// Results
// =============================================================================

/**
 * Outcome of a single named test
 */
export const ResultKind = {
  PASS: 'pass',
  FAIL: 'fail',
  ERROR: 'error',
} as const;

export type ResultKind = typeof ResultKind[keyof typeof ResultKind];

export interface TestResult {
  testName: string;
  kind: ResultKind;
  /** Diagnostic trail, outermost cause first. Empty for passes. */
  reasons: string[];
}

export interface ResultSet {
  commitId: string;
  /** Sequence of the commit the set belongs to */
  sequence: number;
  results: TestResult[];
  producedAt: Date;
}

// =============================================================================
// Commits and Jobs
// =============================================================================

export interface Commit {
  readonly id: string;
  /** Arrival order, assigned once by the queue */
  readonly sequence: number;
  readonly repoRef: string;
}

export const JobState = {
  QUEUED: 'queued',
  ASSIGNED: 'assigned',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type JobState = typeof JobState[keyof typeof JobState];

export const TERMINAL_JOB_STATES: readonly JobState[] = [JobState.COMPLETED, JobState.FAILED];

export interface Job {
  readonly id: string;
  readonly commit: Commit;
  state: JobState;
  /** Number of the current attempt, starting at 1 */
  attemptCount: number;
  assignedWorker?: string;
  /** Cause of the most recent failed attempt */
  lastFailure?: string;
  readonly createdAt: Date;
  updatedAt: Date;
}

export function isTerminal(job: Job): boolean {
  return TERMINAL_JOB_STATES.includes(job.state);
}

// =============================================================================
// Workers
// =============================================================================

export const WorkerState = {
  IDLE: 'idle',
  BUSY: 'busy',
  UNREACHABLE: 'unreachable',
} as const;

export type WorkerState = typeof WorkerState[keyof typeof WorkerState];

export interface WorkerRecord {
  readonly id: string;
  /** Registration order, used to break selection ties */
  readonly ordinal: number;
  readonly address: string;
  state: WorkerState;
  currentJob?: string;
  /** Epoch milliseconds of the last heartbeat received */
  lastHeartbeat: number;
  /** Monotonic stamp taken each time the worker becomes idle */
  idleSince: number;
  readonly registeredAt: Date;
}

/**
 * Job handed to a worker
 */
export interface Assignment {
  jobId: string;
  attempt: number;
  commitId: string;
  repoRef: string;
}

// =============================================================================
// Wire Schemas
// =============================================================================

const nonEmpty = z.string().trim().min(1);

/**
 * Single test outcome as it travels between worker, dispatcher and display
 */
export const WireResultSchema = z.object({
  type: z.enum(['pass', 'fail', 'error']),
  test_name: nonEmpty,
  reasons: z.array(z.string()).default([]),
});

export type WireResult = z.infer<typeof WireResultSchema>;

export const WireResultSetSchema = z.object({
  commit_id: nonEmpty,
  results: z.array(WireResultSchema),
});

export type WireResultSet = z.infer<typeof WireResultSetSchema>;

/**
 * CommitSource → dispatcher notification
 */
export const CommitNotificationSchema = z.object({
  commit_id: nonEmpty,
  repo_ref: nonEmpty.optional(),
});

export type CommitNotification = z.infer<typeof CommitNotificationSchema>;

export const RegisterWorkerSchema = z.object({
  address: z.string().url(),
});

export type RegisterWorkerRequest = z.infer<typeof RegisterWorkerSchema>;

export const HeartbeatSchema = z.object({
  /** Worker clock, informational only */
  timestamp: z.number().optional(),
  /** Whether the worker is running a job right now */
  busy: z.boolean().optional(),
});

export type HeartbeatRequest = z.infer<typeof HeartbeatSchema>;

/**
 * Dispatcher → worker job delivery
 */
export const AssignmentSchema = z.object({
  job_id: nonEmpty,
  attempt: z.number().int().positive(),
  commit_id: nonEmpty,
  repo_ref: nonEmpty,
});

export type AssignmentMessage = z.infer<typeof AssignmentSchema>;

/**
 * Worker → dispatcher completion
 */
export const ResultReportSchema = WireResultSetSchema.extend({
  job_id: nonEmpty,
  attempt: z.number().int().positive(),
});

export type ResultReport = z.infer<typeof ResultReportSchema>;

/**
 * Worker → dispatcher execution error
 */
export const ErrorReportSchema = z.object({
  job_id: nonEmpty,
  attempt: z.number().int().positive(),
  commit_id: nonEmpty,
  reason: nonEmpty,
});

export type ErrorReport = z.infer<typeof ErrorReportSchema>;

export const RegisterWorkerResponseSchema = z.object({
  worker_id: z.string(),
  heartbeat_interval_ms: z.number(),
});

export type RegisterWorkerResponse = z.infer<typeof RegisterWorkerResponseSchema>;

/**
 * Output accepted from a worker's test command: a bare result array or an
 * object carrying one under `results`
 */
export const TestReportSchema = z.union([
  z.array(WireResultSchema),
  z.object({ results: z.array(WireResultSchema) }),
]);

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
