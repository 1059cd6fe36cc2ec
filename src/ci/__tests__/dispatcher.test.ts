/**
 * Dispatcher Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ErrorCode, Errors, isCiError } from '../../core/errors';
import { Dispatcher } from '../dispatcher';
import { FileResultStore } from '../results';
import { EventBus } from '../../events/bus';
import { FakeTransport, TEST_REPO, createDispatcher, defaultConfig, flush, passing, resultReport } from './helpers';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function eventTypes(events: EventBus): string[] {
  return events.getRecentEvents().map((event) => event.type);
}

describe('Dispatcher', () => {
  let dispatcher: Dispatcher | undefined;

  afterEach(() => {
    dispatcher?.stop();
    dispatcher = undefined;
    vi.useRealTimers();
  });

  describe('submit', () => {
    it('should queue a commit once while its job is active', () => {
      const setup = createDispatcher();
      dispatcher = setup.dispatcher;

      const first = dispatcher.submit('9fceb02');
      const second = dispatcher.submit('9fceb02');

      expect(first.accepted).toBe(true);
      expect(second.accepted).toBe(false);
      expect(second.job.id).toBe(first.job.id);
      expect(dispatcher.queue.stats().queued).toBe(1);
      expect(eventTypes(setup.events)).toEqual(['ci.job.queued', 'ci.job.duplicate']);
    });

    it('should reject commits from another repository', () => {
      const setup = createDispatcher();
      dispatcher = setup.dispatcher;
      const d = dispatcher;

      const error = thrown(() => d.submit('9fceb02', '/srv/git/other.git'));

      expect(isCiError(error, ErrorCode.UNKNOWN_REPOSITORY)).toBe(true);
      expect(d.queue.list()).toEqual([]);
      expect(d.submit('9fceb02', TEST_REPO).accepted).toBe(true);
    });

    it('should build the same commit again after it completed', () => {
      const { dispatcher: d, transport } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.submit('9fceb02');
      d.reportResults('worker-1', resultReport(transport.last().assignment));

      const rebuild = d.submit('9fceb02');

      expect(rebuild.accepted).toBe(true);
      expect(rebuild.job.commit.sequence).toBe(1);
      expect(transport.deliveries).toHaveLength(2);
    });
  });

  describe('assignment', () => {
    it('should give each of three workers two of six jobs', () => {
      const { dispatcher: d, transport, store } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.register('http://localhost:8902');
      d.register('http://localhost:8903');

      for (const commit of ['c1', 'c2', 'c3', 'c4', 'c5', 'c6']) {
        d.submit(commit);
      }

      for (let i = 0; i < transport.deliveries.length; i++) {
        const { workerId, assignment } = transport.deliveries[i];
        d.reportResults(workerId, resultReport(assignment));
      }

      const perWorker = new Map<string, number>();
      for (const { workerId } of transport.deliveries) {
        perWorker.set(workerId, (perWorker.get(workerId) ?? 0) + 1);
      }

      expect(transport.deliveries.map((d) => d.assignment.commitId)).toEqual(['c1', 'c2', 'c3', 'c4', 'c5', 'c6']);
      expect(Object.fromEntries(perWorker)).toEqual({ 'worker-1': 2, 'worker-2': 2, 'worker-3': 2 });
      expect(store.list().map((set) => set.commitId)).toEqual(['c1', 'c2', 'c3', 'c4', 'c5', 'c6']);
    });

    it('should never hand a busy worker a second job', () => {
      const { dispatcher: d, transport } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');

      d.submit('c1');
      d.submit('c2');

      expect(transport.deliveries).toHaveLength(1);
      expect(d.snapshot().jobs.map((job) => job.state)).toEqual(['running', 'queued']);
      expect(d.pool.stats()).toEqual({ total: 1, idle: 0, busy: 1 });
    });

    it('should assign waiting jobs as soon as a worker registers', () => {
      const { dispatcher: d, transport } = createDispatcher();
      dispatcher = d;
      d.submit('c1');

      expect(transport.deliveries).toHaveLength(0);

      d.register('http://localhost:8901');

      expect(transport.last()).toEqual({
        workerId: 'worker-1',
        assignment: { jobId: expect.any(String), attempt: 1, commitId: 'c1', repoRef: TEST_REPO },
      });
    });
  });

  describe('reportResults', () => {
    it('should store the results and count them in the completion event', () => {
      const { dispatcher: d, transport, store, events } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.submit('c1');

      const set = d.reportResults(
        'worker-1',
        resultReport(transport.last().assignment, [
          { type: 'pass', test_name: 'test_add', reasons: ['ignored'] },
          { type: 'fail', test_name: 'test_sub', reasons: ['AssertionError: 1 != 2'] },
          { type: 'error', test_name: 'test_div', reasons: ['ZeroDivisionError'] },
        ])
      );

      expect(set.results).toEqual([
        { testName: 'test_add', kind: 'pass', reasons: [] },
        { testName: 'test_sub', kind: 'fail', reasons: ['AssertionError: 1 != 2'] },
        { testName: 'test_div', kind: 'error', reasons: ['ZeroDivisionError'] },
      ]);
      expect(store.get('c1')).toBe(set);
      expect(d.pool.get('worker-1')?.state).toBe('idle');
      expect(d.queue.list()).toEqual([]);

      const completed = events.getRecentEvents().find((e) => e.type === 'ci.job.completed');
      expect(completed?.payload).toEqual({
        jobId: transport.last().assignment.jobId,
        commitId: 'c1',
        workerId: 'worker-1',
        attempt: 1,
        passed: 1,
        failures: 1,
        errors: 1,
      });
    });

    it('should keep the highest sequence as latest whatever the completion order', () => {
      const { dispatcher: d, transport, store } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.register('http://localhost:8902');
      d.submit('aaa');
      d.submit('bbb');

      const [first, second] = transport.deliveries;
      d.reportResults(second.workerId, resultReport(second.assignment));
      d.reportResults(first.workerId, resultReport(first.assignment));

      expect(store.latest()?.commitId).toBe('bbb');
      expect(store.latest()?.sequence).toBe(2);
    });

    it('should reject reports from unknown workers', () => {
      const { dispatcher: d, transport } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.submit('c1');

      const error = thrown(() => d.reportResults('worker-9', resultReport(transport.last().assignment)));

      expect(isCiError(error, ErrorCode.UNKNOWN_WORKER)).toBe(true);
      expect(d.snapshot().jobs[0].state).toBe('running');
    });

    it('should reject a report naming a different commit', () => {
      const { dispatcher: d, transport, events } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.submit('c1');
      const report = { ...resultReport(transport.last().assignment), commit_id: 'c2' };

      const error = thrown(() => d.reportResults('worker-1', report));

      expect(isCiError(error, ErrorCode.STALE_REPORT)).toBe(true);
      const rejected = events.getRecentEvents().find((e) => e.type === 'ci.report.rejected');
      expect(rejected?.payload).toEqual({
        workerId: 'worker-1',
        jobId: report.job_id,
        reason: 'job builds c1, not c2',
      });
    });
  });

  describe('retries', () => {
    it('should fail a job after three attempts with a visible error result', () => {
      const { dispatcher: d, transport, store, events } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      const { job } = d.submit('c1');

      for (let attempt = 1; attempt <= 3; attempt++) {
        const { assignment } = transport.last();
        d.reportError('worker-1', {
          job_id: assignment.jobId,
          attempt: assignment.attempt,
          commit_id: 'c1',
          reason: 'checkout failed',
        });
      }

      expect(transport.deliveries.map((d) => d.assignment.attempt)).toEqual([1, 2, 3]);
      expect(store.get('c1')?.results).toEqual([
        {
          testName: 'ci:dispatch',
          kind: 'error',
          reasons: ['retries exhausted', 'execution error on worker-1: checkout failed'],
        },
      ]);
      expect(d.queue.get(job.id)).toBeUndefined();
      expect(d.pool.get('worker-1')?.state).toBe('idle');

      const failed = events.getRecentEvents().find((e) => e.type === 'ci.job.failed');
      expect(failed?.payload).toEqual({
        jobId: job.id,
        commitId: 'c1',
        attempts: 3,
        cause: 'execution error on worker-1: checkout failed',
      });
    });

    it('should retry when the attempt deadline passes and reject the late report', () => {
      vi.useFakeTimers();
      const { dispatcher: d, transport, store } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.submit('c1');
      const late = transport.last().assignment;

      vi.advanceTimersByTime(60000);

      expect(transport.deliveries).toHaveLength(1);
      expect(d.snapshot().jobs[0]).toMatchObject({ state: 'queued', attemptCount: 2 });
      expect(d.snapshot().jobs[0].lastFailure).toBe('job timed out after 60000ms');
      expect(d.snapshot().workers[0]).toMatchObject({ state: 'busy', currentJob: null });

      const error = thrown(() => d.reportResults('worker-1', resultReport(late)));
      expect(isCiError(error, ErrorCode.STALE_REPORT)).toBe(true);
      expect(error instanceof Error ? error.message : '').toContain('worker is not running this job');

      const retry = transport.last().assignment;
      expect(retry.attempt).toBe(2);
      d.reportResults('worker-1', resultReport(retry, passing('test_add')));
      expect(store.get('c1')?.results).toEqual([{ testName: 'test_add', kind: 'pass', reasons: [] }]);
    });

    it('should fail a job whose every attempt times out', () => {
      vi.useFakeTimers();
      const { dispatcher: d, transport, store, events } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      const { job } = d.submit('c1');

      vi.advanceTimersByTime(60000);
      d.heartbeat('worker-1', { busy: false });
      vi.advanceTimersByTime(60000);
      d.heartbeat('worker-1', { busy: false });
      vi.advanceTimersByTime(60000);

      expect(transport.deliveries.map((x) => x.assignment.attempt)).toEqual([1, 2, 3]);
      expect(store.get('c1')?.results).toEqual([
        { testName: 'ci:dispatch', kind: 'error', reasons: ['retries exhausted', 'job timed out after 60000ms'] },
      ]);
      expect(d.queue.get(job.id)).toBeUndefined();

      const failed = events.getRecentEvents().find((e) => e.type === 'ci.job.failed');
      expect(failed?.payload).toEqual({
        jobId: job.id,
        commitId: 'c1',
        attempts: 3,
        cause: 'job timed out after 60000ms',
      });
    });

    it('should evict a worker that cannot be reached and requeue its job', async () => {
      const { dispatcher: d, transport } = createDispatcher();
      dispatcher = d;
      transport.failNext(Errors.workerUnreachable('http://localhost:8901', 'connect ECONNREFUSED'));
      d.register('http://localhost:8901');
      d.submit('c1');

      await flush();

      const job = d.queue.findActiveByCommit('c1');
      expect(d.pool.stats().total).toBe(0);
      expect(job?.state).toBe('queued');
      expect(job?.attemptCount).toBe(2);
      expect(job?.lastFailure).toBe(
        'worker worker-1 unreachable: Worker at http://localhost:8901 is unreachable: connect ECONNREFUSED'
      );
    });

    it('should hold a refused job without spending an attempt until the worker is free', async () => {
      const { dispatcher: d, transport, events } = createDispatcher();
      dispatcher = d;
      transport.failNext(Errors.workerBusy('worker-1'));
      d.register('http://localhost:8901');
      const { job } = d.submit('c1');

      await flush();

      expect(transport.deliveries).toHaveLength(1);
      expect(job).toMatchObject({
        state: 'queued',
        attemptCount: 1,
        lastFailure: 'worker-1 is still running another job',
      });
      expect(d.pool.get('worker-1')?.state).toBe('busy');
      expect(eventTypes(events)).toContain('ci.job.deferred');

      d.heartbeat('worker-1', { busy: true });
      expect(transport.deliveries).toHaveLength(1);

      d.heartbeat('worker-1', { busy: false });
      expect(transport.deliveries.map((x) => [x.workerId, x.assignment.attempt])).toEqual([
        ['worker-1', 1],
        ['worker-1', 1],
      ]);
      expect(job.state).toBe('running');
    });

    it('should not spend attempts on a worker that registered again while still busy', async () => {
      vi.useFakeTimers();
      const { dispatcher: d, transport, store } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      const first = d.submit('c1').job;
      const second = d.submit('c2').job;
      transport.failNext(Errors.workerBusy('worker-2'));

      d.register('http://localhost:8901');
      await flush();
      vi.advanceTimersByTime(60000);

      expect(transport.deliveries.map((x) => [x.workerId, x.assignment.commitId, x.assignment.attempt])).toEqual([
        ['worker-1', 'c1', 1],
        ['worker-2', 'c1', 2],
      ]);
      expect(first).toMatchObject({ state: 'queued', attemptCount: 2 });
      expect(second).toMatchObject({ state: 'queued', attemptCount: 1 });
      expect(store.get('c1')).toBeUndefined();
      expect(store.get('c2')).toBeUndefined();

      d.heartbeat('worker-2', { busy: false });

      expect(transport.last()).toEqual({
        workerId: 'worker-2',
        assignment: { jobId: first.id, attempt: 2, commitId: 'c1', repoRef: TEST_REPO },
      });
    });

    it('should ignore a delivery failure for an attempt that was already retried', async () => {
      vi.useFakeTimers();
      const { dispatcher: d, transport } = createDispatcher({ jobTimeoutMs: 1000 });
      dispatcher = d;
      transport.failNext(Errors.requestFailed('POST', 'http://localhost:8901/run', 500, 'boom'));
      d.register('http://localhost:8901');
      d.submit('c1');

      vi.advanceTimersByTime(1000);
      await flush();

      const job = d.queue.findActiveByCommit('c1');
      expect(job?.state).toBe('queued');
      expect(job?.attemptCount).toBe(2);
      expect(job?.lastFailure).toBe('job timed out after 1000ms');

      d.heartbeat('worker-1', { busy: false });

      expect(transport.deliveries.map((x) => x.assignment.attempt)).toEqual([1, 2]);
      expect(job?.state).toBe('running');
    });
  });

  describe('workers', () => {
    it('should evict a silent worker and requeue its job', () => {
      vi.useFakeTimers();
      const { dispatcher: d, transport } = createDispatcher();
      dispatcher = d;
      d.start();
      d.register('http://localhost:8901');
      d.submit('c1');

      vi.advanceTimersByTime(10000);
      expect(d.pool.get('worker-1')).toBeDefined();

      vi.advanceTimersByTime(1000);

      const snapshot = d.snapshot();
      expect(snapshot.workers).toEqual([]);
      expect(snapshot.jobs).toHaveLength(1);
      expect(snapshot.jobs[0].state).toBe('queued');
      expect(snapshot.jobs[0].attemptCount).toBe(2);
      expect(snapshot.jobs[0].lastFailure).toBe('worker worker-1 unreachable: no heartbeat for more than 10000ms');
      expect(isCiError(thrown(() => d.heartbeat('worker-1')), ErrorCode.UNKNOWN_WORKER)).toBe(true);

      d.register('http://localhost:8902');

      expect(transport.deliveries.map((x) => [x.workerId, x.assignment.attempt])).toEqual([
        ['worker-1', 1],
        ['worker-2', 2],
      ]);
    });

    it('should keep workers that heartbeat', () => {
      vi.useFakeTimers();
      const { dispatcher: d } = createDispatcher();
      dispatcher = d;
      d.start();
      d.register('http://localhost:8901');

      vi.advanceTimersByTime(6000);
      d.heartbeat('worker-1');
      vi.advanceTimersByTime(6000);

      expect(d.pool.get('worker-1')?.state).toBe('idle');
    });

    it('should replace the record of a worker registering again from the same address', () => {
      const { dispatcher: d, transport, events } = createDispatcher();
      dispatcher = d;
      d.register('http://localhost:8901');
      d.submit('c1');

      const again = d.register('http://localhost:8901');

      expect(again.id).toBe('worker-2');
      expect(d.pool.wasEvicted('worker-1')).toBe(true);
      expect(transport.last()).toEqual({
        workerId: 'worker-2',
        assignment: expect.objectContaining({ commitId: 'c1', attempt: 2 }),
      });
      const evicted = events.getRecentEvents().find((e) => e.type === 'ci.worker.evicted');
      expect(evicted?.payload).toEqual({
        workerId: 'worker-1',
        address: 'http://localhost:8901',
        reason: 'worker registered again',
        jobId: transport.deliveries[0].assignment.jobId,
      });
    });
  });

  describe('restart', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ci-restart-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function start(): { d: Dispatcher; transport: FakeTransport; store: FileResultStore } {
      const transport = new FakeTransport();
      const store = new FileResultStore(dir);
      const d = new Dispatcher(defaultConfig, { transport, store, events: new EventBus() });
      d.register('http://localhost:8901');
      return { d, transport, store };
    }

    function build(setup: { d: Dispatcher; transport: FakeTransport }, commitId: string): number {
      const { job } = setup.d.submit(commitId);
      setup.d.reportResults('worker-1', resultReport(setup.transport.last().assignment));
      return job.commit.sequence;
    }

    it('should keep the sequence of a commit built before the restart', () => {
      const before = start();
      build(before, 'aaa');
      build(before, 'bbb');
      before.d.stop();

      const after = start();
      dispatcher = after.d;

      expect(build(after, 'aaa')).toBe(1);
      expect(after.store.latest()?.commitId).toBe('bbb');
      expect(build(after, 'ccc')).toBe(3);
      expect(after.store.latest()?.commitId).toBe('ccc');
    });
  });
});
