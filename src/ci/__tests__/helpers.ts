/**
 * Shared fakes for dispatcher tests
 */

import { Dispatcher } from '../dispatcher';
import type { DispatcherConfig } from '../dispatcher';
import { InMemoryResultStore } from '../results';
import type { WorkerTransport } from '../transport';
import type { Assignment, ResultReport, WireResult, WorkerRecord } from '../types';
import { EventBus } from '../../events/bus';

export interface Delivery {
  workerId: string;
  assignment: Assignment;
}

/**
 * Records deliveries; `failNext` makes upcoming deliveries reject
 */
export class FakeTransport implements WorkerTransport {
  deliveries: Delivery[] = [];
  private failures: Error[] = [];

  failNext(error: Error): void {
    this.failures.push(error);
  }

  async deliver(worker: WorkerRecord, assignment: Assignment): Promise<void> {
    this.deliveries.push({ workerId: worker.id, assignment: { ...assignment } });
    const failure = this.failures.shift();
    if (failure) throw failure;
  }

  last(): Delivery {
    const delivery = this.deliveries[this.deliveries.length - 1];
    if (!delivery) throw new Error('nothing was delivered');
    return delivery;
  }
}

export const TEST_REPO = '/srv/git/app.git';

export const defaultConfig: DispatcherConfig = {
  repoRef: TEST_REPO,
  heartbeatTimeoutMs: 10000,
  heartbeatCheckIntervalMs: 1000,
  jobTimeoutMs: 60000,
  maxAttempts: 3,
};

export function createDispatcher(config: Partial<DispatcherConfig> = {}) {
  const transport = new FakeTransport();
  const store = new InMemoryResultStore();
  const events = new EventBus();
  const dispatcher = new Dispatcher({ ...defaultConfig, ...config }, { transport, store, events });
  return { dispatcher, transport, store, events };
}

export function resultReport(assignment: Assignment, results: WireResult[] = passing()): ResultReport {
  return {
    job_id: assignment.jobId,
    attempt: assignment.attempt,
    commit_id: assignment.commitId,
    results,
  };
}

export function passing(...names: string[]): WireResult[] {
  const tests = names.length > 0 ? names : ['test_math.TestAdd.test_add'];
  return tests.map((name): WireResult => ({ type: 'pass', test_name: name, reasons: [] }));
}

/**
 * Let rejected deliveries reach the dispatcher
 */
export async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}
