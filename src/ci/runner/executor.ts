/**
 * Test Executor
 *
 * Runs on the worker machine. Brings the worker's clone to the exact commit
 * of an assignment, runs the configured test command and reads its report.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Errors } from '../../core/errors';
import { logger as rootLogger } from '../../server/logger';
import type { Logger } from '../../server/logger';
import { executeCommand, shellInvocation } from '../../utils/process';
import type { CommandResult, CommandRunner } from '../../utils/process';
import { TestReportSchema, formatIssues } from '../types';
import type { Assignment, TestResult } from '../types';
import { decodeResult } from '../wire';
import type { ShellExecutorConfig, TestExecutor } from './types';

// =============================================================================
// Report Parsing
// =============================================================================

function tryJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Read the test command's stdout. The whole output may be the report, or its
 * last non-empty line when the command prints other output first.
 */
export function parseTestReport(stdout: string): TestResult[] {
  const trimmed = stdout.trim();
  if (trimmed === '') {
    throw Errors.invalidReport('no output');
  }

  let json = tryJson(trimmed);
  if (!json.ok) {
    const lines = trimmed.split('\n');
    json = tryJson(lines[lines.length - 1].trim());
  }
  if (!json.ok) {
    throw Errors.invalidReport('output is not JSON');
  }

  const parsed = TestReportSchema.safeParse(json.value);
  if (!parsed.success) {
    throw Errors.invalidReport(formatIssues(parsed.error).join('; '));
  }

  const results = Array.isArray(parsed.data) ? parsed.data : parsed.data.results;
  return results.map(decodeResult);
}

/**
 * Local paths are resolved against the worker's working directory; anything
 * that looks like a URL or scp-style remote is passed to git as is.
 */
function cloneSource(repoRef: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(repoRef) || /^[^/]+@[^/]+:/.test(repoRef)) {
    return repoRef;
  }
  return path.resolve(repoRef);
}

// =============================================================================
// Shell Executor
// =============================================================================

export class ShellTestExecutor implements TestExecutor {
  private log: Logger;

  constructor(
    private readonly config: ShellExecutorConfig,
    private readonly exec: CommandRunner = executeCommand,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'executor' });
  }

  async run(assignment: Assignment): Promise<TestResult[]> {
    const log = this.log.child({ jobId: assignment.jobId, commitId: assignment.commitId });
    const timer = log.startTimer('Test command finished');

    await this.checkout(assignment);

    const { command, args } = shellInvocation(this.config.testCommand);
    const result = await this.exec(command, args, {
      cwd: this.config.workDir,
      env: {
        CI_COMMIT_ID: assignment.commitId,
        CI_JOB_ID: assignment.jobId,
        CI_ATTEMPT: String(assignment.attempt),
      },
      timeoutMs: this.config.timeoutMs,
    });

    if (result.timedOut) {
      throw Errors.executionFailed(`Test command timed out after ${this.config.timeoutMs}ms`, {
        commitId: assignment.commitId,
      });
    }

    const results = parseTestReport(result.stdout);
    timer.end({ exitCode: result.exitCode, results: results.length });
    return results;
  }

  /**
   * Hard checkout of the assignment's commit; leftovers of earlier builds are
   * removed
   */
  private async checkout(assignment: Assignment): Promise<void> {
    const { commitId } = assignment;
    if (commitId.startsWith('-')) {
      throw Errors.checkoutFailed(commitId, 'not a commit id');
    }

    fs.mkdirSync(this.config.workDir, { recursive: true });

    if (!fs.existsSync(path.join(this.config.workDir, '.git'))) {
      this.log.info('Cloning repository', { repoRef: assignment.repoRef, workDir: this.config.workDir });
      await this.git(commitId, ['clone', '--quiet', cloneSource(assignment.repoRef), '.']);
    }

    await this.git(commitId, ['fetch', '--quiet', 'origin']);
    await this.git(commitId, ['checkout', '--force', '--quiet', commitId]);
    await this.git(commitId, ['clean', '-d', '-f', '-x', '--quiet']);
  }

  private async git(commitId: string, args: string[]): Promise<CommandResult> {
    const result = await this.exec('git', args, { cwd: this.config.workDir });
    if (result.exitCode !== 0) {
      throw Errors.checkoutFailed(commitId, result.stderr || `git ${args[0]} exited with ${result.exitCode}`);
    }
    return result;
  }
}
