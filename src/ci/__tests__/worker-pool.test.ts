/**
 * Worker Pool Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { WorkerPool } from '../worker-pool';

describe('WorkerPool', () => {
  let clock: number;
  let pool: WorkerPool;

  beforeEach(() => {
    clock = 1000;
    pool = new WorkerPool(() => clock);
  });

  it('should number workers in registration order', () => {
    const a = pool.add('http://localhost:8901');
    const b = pool.add('http://localhost:8902');

    expect(a.id).toBe('worker-1');
    expect(b.id).toBe('worker-2');
    expect(a.state).toBe('idle');
    expect(a.lastHeartbeat).toBe(1000);
  });

  it('should pick the worker that has been idle longest', () => {
    const a = pool.add('http://localhost:8901');
    const b = pool.add('http://localhost:8902');
    const c = pool.add('http://localhost:8903');

    pool.markBusy(a, 'job-1');
    pool.markBusy(b, 'job-2');
    pool.markIdle(b);
    pool.markIdle(a);

    expect(pool.pickIdle()?.id).toBe(c.id);
    pool.markBusy(c, 'job-3');
    expect(pool.pickIdle()?.id).toBe(b.id);
  });

  it('should refuse to make a busy worker busy again', () => {
    const a = pool.add('http://localhost:8901');
    pool.markBusy(a, 'job-1');

    expect(() => pool.markBusy(a, 'job-2')).toThrow("Worker 'worker-1' is already running a job");
    expect(a.currentJob).toBe('job-1');
  });

  it('should report no idle worker when all are busy', () => {
    const a = pool.add('http://localhost:8901');
    pool.markBusy(a, 'job-1');

    expect(pool.pickIdle()).toBeUndefined();
    expect(pool.stats()).toEqual({ total: 1, idle: 0, busy: 1 });
  });

  it('should find workers whose heartbeat is older than the timeout', () => {
    const a = pool.add('http://localhost:8901');
    const b = pool.add('http://localhost:8902');

    clock = 9000;
    pool.touch(b.id);
    clock = 12000;

    expect(pool.silentSince(10000).map((w) => w.id)).toEqual([a.id]);
  });

  it('should forget evicted workers but remember their ids', () => {
    const a = pool.add('http://localhost:8901');
    pool.evict(a);

    expect(a.state).toBe('unreachable');
    expect(pool.get(a.id)).toBeUndefined();
    expect(pool.wasEvicted(a.id)).toBe(true);
    expect(() => pool.touch(a.id)).toThrow("Worker 'worker-1' is not registered");
  });

  it('should only remember the most recently evicted ids', () => {
    const small = new WorkerPool(() => clock, 2);
    for (const port of [8901, 8902, 8903]) {
      small.evict(small.add(`http://localhost:${port}`));
    }

    expect(['worker-1', 'worker-2', 'worker-3'].map((id) => small.wasEvicted(id))).toEqual([false, true, true]);
  });

  it('should keep a draining worker out of selection until it is idle again', () => {
    const a = pool.add('http://localhost:8901');
    pool.markBusy(a, 'job-1');
    pool.markDraining(a);

    expect(pool.isDraining(a)).toBe(true);
    expect(a.currentJob).toBeUndefined();
    expect(pool.pickIdle()).toBeUndefined();
    expect(pool.stats()).toEqual({ total: 1, idle: 0, busy: 1 });

    pool.markIdle(a);

    expect(pool.isDraining(a)).toBe(false);
    expect(pool.pickIdle()).toBe(a);
  });

  it('should look workers up by address', () => {
    pool.add('http://localhost:8901');
    const b = pool.add('http://localhost:8902');

    expect(pool.findByAddress('http://localhost:8902')).toBe(b);
    expect(pool.findByAddress('http://localhost:9999')).toBeUndefined();
  });
});
