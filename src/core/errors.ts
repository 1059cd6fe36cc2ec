/**
 * Error handling for ci-dispatch
 * Provides structured errors with a stable code, hints and context
 */

/**
 * Error codes for different types of errors
 */
export enum ErrorCode {
  // Queue errors
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  INVALID_TRANSITION = 'INVALID_TRANSITION',

  // Worker errors
  UNKNOWN_WORKER = 'UNKNOWN_WORKER',
  WORKER_BUSY = 'WORKER_BUSY',
  WORKER_UNREACHABLE = 'WORKER_UNREACHABLE',

  // Protocol errors
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  STALE_REPORT = 'STALE_REPORT',
  UNKNOWN_REPOSITORY = 'UNKNOWN_REPOSITORY',

  // Execution errors
  CHECKOUT_FAILED = 'CHECKOUT_FAILED',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  INVALID_REPORT = 'INVALID_REPORT',

  // Transport errors
  REQUEST_FAILED = 'REQUEST_FAILED',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  [key: string]: unknown;
}

/**
 * Main error class for ci-dispatch
 */
export class CiError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    suggestions: string[] = [],
    context: ErrorContext = {}
  ) {
    super(message);
    this.name = 'CiError';
    this.code = code;
    this.suggestions = suggestions;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CiError);
    }
  }

  /**
   * Format error for terminal display
   *
   *   error: [Short, clear description]
   *
   *   hint:
   *     [Suggestion]
   */
  format(colors: boolean = true): string {
    const red = colors ? '\x1b[31m' : '';
    const yellow = colors ? '\x1b[33m' : '';
    const dim = colors ? '\x1b[2m' : '';
    const reset = colors ? '\x1b[0m' : '';

    let output = `${red}error${reset}: ${this.message}\n`;

    if (this.suggestions.length > 0) {
      output += `\n${yellow}hint${reset}:\n`;
      for (const suggestion of this.suggestions) {
        output += `  ${dim}${suggestion}${reset}\n`;
      }
    }

    return output;
  }

  toJSON(): { name: string; code: ErrorCode; message: string; suggestions: string[]; context: ErrorContext } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestions: this.suggestions,
      context: this.context,
    };
  }
}

export function isCiError(error: unknown, code?: ErrorCode): error is CiError {
  return error instanceof CiError && (code === undefined || error.code === code);
}

/**
 * Extract a one-line cause from anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  jobNotFound(jobId: string): CiError {
    return new CiError(`Job '${jobId}' not found`, ErrorCode.JOB_NOT_FOUND, [], { jobId });
  },

  invalidTransition(jobId: string, from: string, to: string): CiError {
    return new CiError(
      `Job '${jobId}' cannot move from ${from} to ${to}`,
      ErrorCode.INVALID_TRANSITION,
      [],
      { jobId, from, to }
    );
  },

  unknownWorker(workerId: string): CiError {
    return new CiError(
      `Worker '${workerId}' is not registered`,
      ErrorCode.UNKNOWN_WORKER,
      ['Register the worker again with POST /api/workers'],
      { workerId }
    );
  },

  workerBusy(workerId: string): CiError {
    return new CiError(`Worker '${workerId}' is already running a job`, ErrorCode.WORKER_BUSY, [], { workerId });
  },

  workerUnreachable(address: string, cause: string): CiError {
    return new CiError(
      `Worker at ${address} is unreachable: ${cause}`,
      ErrorCode.WORKER_UNREACHABLE,
      [],
      { address }
    );
  },

  invalidPayload(what: string, issues: string[]): CiError {
    return new CiError(
      `Invalid ${what}: ${issues.join('; ')}`,
      ErrorCode.INVALID_PAYLOAD,
      [],
      { issues }
    );
  },

  staleReport(workerId: string, jobId: string, reason: string): CiError {
    return new CiError(
      `Report from worker '${workerId}' for job '${jobId}' was rejected: ${reason}`,
      ErrorCode.STALE_REPORT,
      [],
      { workerId, jobId }
    );
  },

  unknownRepository(repoRef: string, expected: string): CiError {
    return new CiError(
      `Repository '${repoRef}' is not monitored by this dispatcher`,
      ErrorCode.UNKNOWN_REPOSITORY,
      [`This dispatcher builds ${expected}`],
      { repoRef, expected }
    );
  },

  checkoutFailed(commitId: string, stderr: string): CiError {
    return new CiError(
      `Could not check out ${commitId}: ${stderr.trim()}`,
      ErrorCode.CHECKOUT_FAILED,
      [],
      { commitId }
    );
  },

  executionFailed(message: string, context: ErrorContext = {}): CiError {
    return new CiError(message, ErrorCode.EXECUTION_FAILED, [], context);
  },

  invalidReport(message: string): CiError {
    return new CiError(
      `Test command produced an unreadable report: ${message}`,
      ErrorCode.INVALID_REPORT,
      ['The test command must print a JSON array of {type, test_name, reasons}'],
    );
  },

  requestFailed(method: string, url: string, status: number, body: string): CiError {
    return new CiError(
      `${method} ${url} failed with ${status}${body ? `: ${body}` : ''}`,
      ErrorCode.REQUEST_FAILED,
      [],
      { method, url, status }
    );
  },

  invalidConfig(issues: string[]): CiError {
    return new CiError(
      'Invalid environment configuration',
      ErrorCode.INVALID_CONFIG,
      issues,
    );
  },
};
