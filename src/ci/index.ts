/**
 * CI Dispatch Entry Point
 *
 * Commit-triggered test execution across a pool of workers:
 *
 * - **Queue**: one job per commit, FIFO by arrival sequence
 * - **Dispatcher**: assigns jobs to the least-recently-idle worker, tracks
 *   heartbeats and deadlines, retries failed attempts
 * - **Results**: one result set per commit, the latest by sequence served to
 *   the status display
 * - **Sources**: commit observers feeding the dispatcher
 * - **Runner**: the worker process
 */

export * from './types';
export { JobQueue, type EnqueueOutcome, type QueueStats } from './queue';
export { WorkerPool, type PoolStats } from './worker-pool';
export {
  Dispatcher,
  DISPATCH_TEST_NAME,
  RETRIES_EXHAUSTED,
  type DispatcherConfig,
  type DispatcherDeps,
  type DispatcherSnapshot,
  type JobView,
  type WorkerView,
} from './dispatcher';
export { HttpWorkerTransport, type WorkerTransport } from './transport';
export { InMemoryResultStore, FileResultStore, type ResultStore, type ResultStoreOptions } from './results';
export { summarize, type ResultSummary } from './summary';
export { decodeResult, encodeResult, encodeResultSet, encodeAssignment, decodeAssignment } from './wire';
export { JsonHttpClient, NetworkError, type HttpResponse } from './http';
export * from './sources';
export * from './runner';
