/**
 * Worker Pool
 *
 * Registry of test-runner workers known to the dispatcher. Selection is
 * least-recently-idle: the idle worker that has waited longest gets the next
 * job, which degrades to round-robin when jobs complete at the same pace.
 */

import { Errors } from '../core/errors';
import { WorkerState } from './types';
import type { WorkerRecord } from './types';

export interface PoolStats {
  total: number;
  idle: number;
  busy: number;
}

/** Evicted ids remembered so their heartbeats can be told apart from strangers */
const DEFAULT_EVICTED_LIMIT = 1000;

export class WorkerPool {
  private workers = new Map<string, WorkerRecord>();
  /** Insertion ordered; the oldest ids are forgotten first */
  private evicted = new Set<string>();
  private nextOrdinal = 1;
  private idleClock = 0;

  constructor(
    private readonly now: () => number = () => Date.now(),
    private readonly evictedLimit = DEFAULT_EVICTED_LIMIT
  ) {}

  add(address: string): WorkerRecord {
    const ordinal = this.nextOrdinal++;
    const worker: WorkerRecord = {
      id: `worker-${ordinal}`,
      ordinal,
      address,
      state: WorkerState.IDLE,
      lastHeartbeat: this.now(),
      idleSince: ++this.idleClock,
      registeredAt: new Date(),
    };
    this.workers.set(worker.id, worker);
    return worker;
  }

  get(workerId: string): WorkerRecord | undefined {
    return this.workers.get(workerId);
  }

  require(workerId: string): WorkerRecord {
    const worker = this.workers.get(workerId);
    if (!worker) throw Errors.unknownWorker(workerId);
    return worker;
  }

  findByAddress(address: string): WorkerRecord | undefined {
    for (const worker of this.workers.values()) {
      if (worker.address === address) return worker;
    }
    return undefined;
  }

  wasEvicted(workerId: string): boolean {
    return this.evicted.has(workerId);
  }

  touch(workerId: string): WorkerRecord {
    const worker = this.require(workerId);
    worker.lastHeartbeat = this.now();
    return worker;
  }

  /**
   * Idle worker that has been waiting longest, ties broken by registration order
   */
  pickIdle(): WorkerRecord | undefined {
    let best: WorkerRecord | undefined;
    for (const worker of this.workers.values()) {
      if (worker.state !== WorkerState.IDLE) continue;
      if (
        !best ||
        worker.idleSince < best.idleSince ||
        (worker.idleSince === best.idleSince && worker.ordinal < best.ordinal)
      ) {
        best = worker;
      }
    }
    return best;
  }

  markBusy(worker: WorkerRecord, jobId: string): void {
    if (worker.state !== WorkerState.IDLE) {
      throw Errors.workerBusy(worker.id);
    }
    worker.state = WorkerState.BUSY;
    worker.currentJob = jobId;
  }

  /**
   * The worker is still running an attempt the dispatcher no longer tracks.
   * It stays out of selection until it reports back or says it is idle.
   */
  markDraining(worker: WorkerRecord): void {
    worker.state = WorkerState.BUSY;
    worker.currentJob = undefined;
  }

  isDraining(worker: WorkerRecord): boolean {
    return worker.state === WorkerState.BUSY && worker.currentJob === undefined;
  }

  markIdle(worker: WorkerRecord): void {
    worker.state = WorkerState.IDLE;
    worker.currentJob = undefined;
    worker.idleSince = ++this.idleClock;
  }

  /**
   * Mark a worker unreachable and drop it from the pool
   */
  evict(worker: WorkerRecord): void {
    worker.state = WorkerState.UNREACHABLE;
    this.workers.delete(worker.id);
    this.evicted.add(worker.id);
    for (const id of this.evicted) {
      if (this.evicted.size <= this.evictedLimit) break;
      this.evicted.delete(id);
    }
  }

  /**
   * Workers whose last heartbeat is older than the timeout
   */
  silentSince(timeoutMs: number): WorkerRecord[] {
    const cutoff = this.now() - timeoutMs;
    return [...this.workers.values()].filter((worker) => worker.lastHeartbeat < cutoff);
  }

  list(): WorkerRecord[] {
    return [...this.workers.values()].sort((a, b) => a.ordinal - b.ordinal);
  }

  stats(): PoolStats {
    let idle = 0;
    let busy = 0;
    for (const worker of this.workers.values()) {
      if (worker.state === WorkerState.IDLE) idle++;
      else if (worker.state === WorkerState.BUSY) busy++;
    }
    return { total: this.workers.size, idle, busy };
  }
}
