/**
 * Dispatcher API client used by workers, commit sources and the CLI
 */

import type { z } from 'zod';
import { Errors } from '../../core/errors';
import { JsonHttpClient } from '../http';
import { RegisterWorkerResponseSchema, formatIssues } from '../types';
import type { ErrorReport, RegisterWorkerResponse, ResultReport } from '../types';
import { CommitAcceptedSchema, StatusResponseSchema, SummaryResponseSchema } from './types';
import type { CommitAccepted, DispatcherApi, StatusResponse, SummaryResponse } from './types';

function decode<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw Errors.invalidPayload(what, formatIssues(parsed.error));
  }
  return parsed.data;
}

export class DispatcherClient implements DispatcherApi {
  private http: JsonHttpClient;

  constructor(baseUrl: string, timeoutMs = 10000) {
    this.http = new JsonHttpClient(baseUrl, timeoutMs);
  }

  get url(): string {
    return this.http.url;
  }

  async register(address: string): Promise<RegisterWorkerResponse> {
    const body = await this.http.request('POST', '/api/workers', { address });
    return decode(RegisterWorkerResponseSchema, body, 'registration response');
  }

  async heartbeat(workerId: string, busy: boolean): Promise<boolean> {
    const path = `/api/workers/${encodeURIComponent(workerId)}/heartbeat`;
    const response = await this.http.send('POST', path, { timestamp: Date.now(), busy });
    if (response.status === 404) return false;
    if (response.status >= 400) {
      throw Errors.requestFailed('POST', `${this.url}${path}`, response.status, JSON.stringify(response.body));
    }
    return true;
  }

  async reportResults(workerId: string, report: ResultReport): Promise<void> {
    await this.http.request('POST', `/api/workers/${encodeURIComponent(workerId)}/results`, report);
  }

  async reportError(workerId: string, report: ErrorReport): Promise<void> {
    await this.http.request('POST', `/api/workers/${encodeURIComponent(workerId)}/errors`, report);
  }

  async notifyCommit(commitId: string, repoRef?: string): Promise<CommitAccepted> {
    const body = await this.http.request('POST', '/api/commits', { commit_id: commitId, repo_ref: repoRef });
    return decode(CommitAcceptedSchema, body, 'commit response');
  }

  /**
   * Summary of the latest build, or null before the first one
   */
  async summary(): Promise<SummaryResponse | null> {
    const response = await this.http.send('GET', '/api/summary');
    if (response.status === 404) return null;
    if (response.status >= 400) {
      throw Errors.requestFailed('GET', `${this.url}/api/summary`, response.status, JSON.stringify(response.body));
    }
    return decode(SummaryResponseSchema, response.body, 'summary response');
  }

  async status(): Promise<StatusResponse> {
    const body = await this.http.request('GET', '/api/status');
    return decode(StatusResponseSchema, body, 'status response');
  }
}
