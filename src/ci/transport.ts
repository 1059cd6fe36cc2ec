/**
 * Worker Transport
 *
 * How the dispatcher hands an assignment to a worker. Delivery only; the
 * outcome comes back later through the dispatcher's report endpoints.
 */

import { Errors } from '../core/errors';
import { JsonHttpClient, NetworkError } from './http';
import type { Assignment, WorkerRecord } from './types';
import { encodeAssignment } from './wire';

export interface WorkerTransport {
  /**
   * Resolve once the worker accepted the job. Rejects with WORKER_UNREACHABLE
   * when the worker cannot be contacted and WORKER_BUSY when it refuses.
   */
  deliver(worker: WorkerRecord, assignment: Assignment): Promise<void>;
}

export class HttpWorkerTransport implements WorkerTransport {
  constructor(private readonly timeoutMs = 10000) {}

  async deliver(worker: WorkerRecord, assignment: Assignment): Promise<void> {
    const client = new JsonHttpClient(worker.address, this.timeoutMs);

    let status: number;
    let body: unknown;
    try {
      ({ status, body } = await client.send('POST', '/run', encodeAssignment(assignment)));
    } catch (error) {
      if (error instanceof NetworkError) {
        throw Errors.workerUnreachable(worker.address, error.message);
      }
      throw error;
    }

    if (status === 409) {
      throw Errors.workerBusy(worker.id);
    }
    if (status >= 400) {
      throw Errors.requestFailed('POST', `${client.url}/run`, status, JSON.stringify(body));
    }
  }
}
