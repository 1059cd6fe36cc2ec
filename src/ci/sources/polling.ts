/**
 * Polling commit source: pulls the observed clone on an interval and reports
 * HEAD whenever a pull moved it.
 */

import { Errors, describeError } from '../../core/errors';
import { errorMeta, logger as rootLogger } from '../../server/logger';
import type { Logger } from '../../server/logger';
import { executeCommand } from '../../utils/process';
import type { CommandRunner } from '../../utils/process';
import type { CommitSink, CommitSource } from './commit-source';

export interface PollingSourceConfig {
  /** Clone of the observed repository, owned by the observer */
  repoDir: string;
  intervalMs: number;
  repoRef?: string;
}

export class PollingCommitSource implements CommitSource {
  readonly kind = 'poll' as const;

  private log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private polling = false;
  /** Commit noticed but not yet delivered */
  private pending: string | null = null;

  constructor(
    private readonly config: PollingSourceConfig,
    private readonly exec: CommandRunner = executeCommand,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'observer', source: 'poll', repoDir: config.repoDir });
  }

  start(sink: CommitSink): void {
    if (this.timer) return;
    this.log.info('Watching repository', { intervalMs: this.config.intervalMs });
    this.timer = setInterval(() => this.tick(sink), this.config.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Deliver an outstanding commit, or pull and deliver the new HEAD
   */
  async check(sink: CommitSink): Promise<string | null> {
    if (this.pending) {
      return this.deliver(this.pending, sink);
    }

    const before = await this.head();
    await this.git(['reset', '--hard', '--quiet', 'HEAD'], 'reset');
    await this.git(['pull', '--quiet'], 'pull');
    const after = await this.head();

    if (after === before) return null;

    this.log.debug('New commit', { from: before, to: after });
    this.pending = after;
    return this.deliver(after, sink);
  }

  private tick(sink: CommitSink): void {
    if (this.polling) return;
    this.polling = true;
    this.check(sink)
      .catch((error: unknown) => {
        this.log.error('Poll failed', errorMeta(error));
      })
      .finally(() => {
        this.polling = false;
      });
  }

  private async deliver(commitId: string, sink: CommitSink): Promise<string | null> {
    try {
      await sink({ commitId, repoRef: this.config.repoRef });
    } catch (error) {
      this.log.warn('Could not deliver commit, will retry', { commitId, error: describeError(error) });
      return null;
    }
    this.pending = null;
    this.log.info('Delivered commit', { commitId });
    return commitId;
  }

  private async head(): Promise<string> {
    const stdout = await this.git(['rev-parse', 'HEAD'], 'rev-parse');
    return stdout.trim();
  }

  private async git(args: string[], step: string): Promise<string> {
    const result = await this.exec('git', args, { cwd: this.config.repoDir });
    if (result.exitCode !== 0) {
      throw Errors.executionFailed(`git ${step} failed in ${this.config.repoDir}: ${result.stderr.trim()}`, {
        repoDir: this.config.repoDir,
      });
    }
    return result.stdout;
  }
}
