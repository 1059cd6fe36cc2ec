/**
 * Request validation and error mapping shared by the dispatcher and worker apps
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import { CiError, ErrorCode, Errors } from '../../core/errors';
import { formatIssues } from '../../ci/types';
import { errorMeta, logger as rootLogger } from '../logger';
import type { AppEnv } from '../logger';

/**
 * Parse and validate a JSON body. An empty body is read as `{}` when
 * `allowEmpty` is set.
 */
export async function readJson<T extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: T,
  what: string,
  options: { allowEmpty?: boolean } = {}
): Promise<z.output<T>> {
  const text = await c.req.text();

  let raw: unknown = {};
  if (text.trim() !== '' || !options.allowEmpty) {
    try {
      raw = JSON.parse(text);
    } catch {
      throw Errors.invalidPayload(what, ['body is not valid JSON']);
    }
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw Errors.invalidPayload(what, formatIssues(parsed.error));
  }
  return parsed.data;
}

type ErrorStatus = 400 | 404 | 409 | 500 | 502;

export function statusForError(code: ErrorCode): ErrorStatus {
  switch (code) {
    case ErrorCode.INVALID_PAYLOAD:
    case ErrorCode.UNKNOWN_REPOSITORY:
      return 400;
    case ErrorCode.UNKNOWN_WORKER:
    case ErrorCode.JOB_NOT_FOUND:
      return 404;
    case ErrorCode.STALE_REPORT:
    case ErrorCode.WORKER_BUSY:
    case ErrorCode.INVALID_TRANSITION:
      return 409;
    case ErrorCode.WORKER_UNREACHABLE:
    case ErrorCode.REQUEST_FAILED:
      return 502;
    default:
      return 500;
  }
}

/**
 * `app.onError` handler: coded errors become JSON with their status and
 * context fields (`issues` for a bad payload), anything else a logged 500
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  const log = c.get('logger') ?? rootLogger;

  if (err instanceof CiError) {
    const status = statusForError(err.code);
    const meta = { code: err.code, error: err.message };
    if (status >= 500) log.error('Request failed', meta);
    else log.warn('Request rejected', meta);
    return c.json({ ...err.context, error: err.message, code: err.code }, status);
  }

  log.error('Unhandled error', errorMeta(err));
  return c.json({ error: err.message }, 500);
}
