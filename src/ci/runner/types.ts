/**
 * Worker Runtime Types
 *
 * Types shared by the worker process: how a job is executed and how the
 * worker talks to the dispatcher.
 */

import { z } from 'zod';
import type { Assignment, ErrorReport, RegisterWorkerResponse, ResultReport, TestResult } from '../types';

// =============================================================================
// Execution
// =============================================================================

/**
 * Runs the test suite of a repository at one commit. Resolves with the
 * results, including failing and erroring tests; rejects only when the suite
 * could not be run at all.
 */
export interface TestExecutor {
  run(assignment: Assignment): Promise<TestResult[]>;
}

export interface ShellExecutorConfig {
  /** Clone the worker builds in; created from the repository if missing */
  workDir: string;
  /** Shell command printing the results as JSON on stdout */
  testCommand: string;
  /** Kill the test command after this long */
  timeoutMs?: number;
}

// =============================================================================
// Dispatcher API
// =============================================================================

/**
 * The part of the dispatcher's HTTP API a worker uses
 */
export interface DispatcherApi {
  readonly url: string;
  register(address: string): Promise<RegisterWorkerResponse>;
  /** Resolves false when the dispatcher no longer knows the worker */
  heartbeat(workerId: string, busy: boolean): Promise<boolean>;
  reportResults(workerId: string, report: ResultReport): Promise<void>;
  reportError(workerId: string, report: ErrorReport): Promise<void>;
}

// =============================================================================
// Runtime Status
// =============================================================================

export const RuntimeStatus = {
  /** Not registered with the dispatcher */
  OFFLINE: 'offline',
  IDLE: 'idle',
  BUSY: 'busy',
} as const;

export type RuntimeStatus = typeof RuntimeStatus[keyof typeof RuntimeStatus];

export interface WorkerRuntimeConfig {
  /** Base URL the dispatcher reaches this worker at */
  address: string;
  /** Used until the dispatcher announces its own interval */
  heartbeatIntervalMs?: number;
}

// =============================================================================
// Dispatcher Responses
// =============================================================================

export const CommitAcceptedSchema = z.object({
  job_id: z.string(),
  sequence: z.number().int(),
  duplicate: z.boolean().default(false),
});

export type CommitAccepted = z.infer<typeof CommitAcceptedSchema>;

export const SummaryResponseSchema = z.object({
  commit_id: z.string(),
  total: z.number(),
  passed: z.number(),
  failures: z.number(),
  errors: z.number(),
  headline: z.string(),
});

export type SummaryResponse = z.infer<typeof SummaryResponseSchema>;

const CountsSchema = z.record(z.string(), z.number());

export const StatusResponseSchema = z.object({
  workers: z.array(
    z.object({
      id: z.string(),
      address: z.string(),
      state: z.string(),
      currentJob: z.string().nullable(),
      lastHeartbeat: z.string(),
    })
  ),
  jobs: z.array(
    z.object({
      id: z.string(),
      commitId: z.string(),
      sequence: z.number(),
      state: z.string(),
      attemptCount: z.number(),
      assignedWorker: z.string().nullable(),
      lastFailure: z.string().nullable(),
    })
  ),
  queue: CountsSchema,
  pool: CountsSchema,
});

export type StatusResponse = z.infer<typeof StatusResponseSchema>;
