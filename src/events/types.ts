/**
 * Event Types for the Event Bus
 *
 * Emitted by the dispatcher on every job and worker transition. Subscribers
 * log them or feed them to anything else interested in pipeline progress.
 */

// ============ BASE EVENT ============

export interface BaseEvent {
  id: string;
  timestamp: Date;
}

// ============ JOB EVENTS ============

export interface JobQueuedEvent extends BaseEvent {
  type: 'ci.job.queued';
  payload: {
    jobId: string;
    commitId: string;
    sequence: number;
  };
}

export interface JobDuplicateEvent extends BaseEvent {
  type: 'ci.job.duplicate';
  payload: {
    jobId: string;
    commitId: string;
  };
}

export interface JobAssignedEvent extends BaseEvent {
  type: 'ci.job.assigned';
  payload: {
    jobId: string;
    commitId: string;
    workerId: string;
    attempt: number;
  };
}

export interface JobCompletedEvent extends BaseEvent {
  type: 'ci.job.completed';
  payload: {
    jobId: string;
    commitId: string;
    workerId: string;
    attempt: number;
    passed: number;
    failures: number;
    errors: number;
  };
}

export interface JobRetriedEvent extends BaseEvent {
  type: 'ci.job.retried';
  payload: {
    jobId: string;
    commitId: string;
    attempt: number;
    cause: string;
  };
}

export interface JobDeferredEvent extends BaseEvent {
  type: 'ci.job.deferred';
  payload: {
    jobId: string;
    commitId: string;
    workerId: string;
    attempt: number;
  };
}

export interface JobFailedEvent extends BaseEvent {
  type: 'ci.job.failed';
  payload: {
    jobId: string;
    commitId: string;
    attempts: number;
    cause: string;
  };
}

// ============ WORKER EVENTS ============

export interface WorkerRegisteredEvent extends BaseEvent {
  type: 'ci.worker.registered';
  payload: {
    workerId: string;
    address: string;
  };
}

export interface WorkerEvictedEvent extends BaseEvent {
  type: 'ci.worker.evicted';
  payload: {
    workerId: string;
    address: string;
    reason: string;
    jobId?: string;
  };
}

export interface ReportRejectedEvent extends BaseEvent {
  type: 'ci.report.rejected';
  payload: {
    workerId: string;
    jobId: string;
    reason: string;
  };
}

// ============ UNION TYPE ============

export type AppEvent =
  | JobQueuedEvent
  | JobDuplicateEvent
  | JobAssignedEvent
  | JobCompletedEvent
  | JobRetriedEvent
  | JobDeferredEvent
  | JobFailedEvent
  | WorkerRegisteredEvent
  | WorkerEvictedEvent
  | ReportRejectedEvent;

export type EventType = AppEvent['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * What a publisher supplies; the bus stamps id and timestamp
 */
export type EventInput = DistributiveOmit<AppEvent, 'id' | 'timestamp'>;
