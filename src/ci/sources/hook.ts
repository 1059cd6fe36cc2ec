/**
 * Hook commit source: a post-commit hook in the observed repository writes
 * the new commit id to a marker file, which this source drains.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { describeError } from '../../core/errors';
import { errorMeta, logger as rootLogger } from '../../server/logger';
import type { Logger } from '../../server/logger';
import type { CommitSink, CommitSource } from './commit-source';

export const MARKER_FILE = '.commit_id';

export interface HookSourceConfig {
  markerPath: string;
  /** How often the marker file is looked for */
  intervalMs: number;
  repoRef?: string;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readMarker(markerPath: string): Promise<string | null> {
  try {
    return await fs.readFile(markerPath, 'utf8');
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

/**
 * Script installed as `.git/hooks/post-commit`
 */
export function postCommitHook(markerPath: string): string {
  return `#!/bin/sh\ngit rev-parse HEAD > '${markerPath.replace(/'/g, `'\\''`)}'\n`;
}

/**
 * Install the post-commit hook into a repository; returns the hook's path
 */
export async function installPostCommitHook(repoDir: string, markerPath = path.join(repoDir, MARKER_FILE)): Promise<string> {
  const hookPath = path.join(repoDir, '.git', 'hooks', 'post-commit');
  await fs.mkdir(path.dirname(hookPath), { recursive: true });
  await fs.writeFile(hookPath, postCommitHook(path.resolve(markerPath)), { mode: 0o755 });
  return hookPath;
}

export class HookCommitSource implements CommitSource {
  readonly kind = 'hook' as const;

  private log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private checking = false;

  constructor(private readonly config: HookSourceConfig, logger: Logger = rootLogger) {
    this.log = logger.child({ component: 'observer', source: 'hook', marker: config.markerPath });
  }

  start(sink: CommitSink): void {
    if (this.timer) return;
    this.log.info('Waiting for post-commit notifications', { intervalMs: this.config.intervalMs });
    this.timer = setInterval(() => this.tick(sink), this.config.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Deliver the commit named in the marker file. The file is removed only
   * once delivery succeeded, and only if the hook has not replaced it since.
   */
  async check(sink: CommitSink): Promise<string | null> {
    const content = await readMarker(this.config.markerPath);
    if (content === null) return null;

    const commitId = content.split('\n')[0].trim();
    if (commitId === '') {
      await this.removeMarker(content);
      return null;
    }

    try {
      await sink({ commitId, repoRef: this.config.repoRef });
    } catch (error) {
      this.log.warn('Could not deliver commit, will retry', { commitId, error: describeError(error) });
      return null;
    }

    await this.removeMarker(content);
    this.log.info('Delivered commit', { commitId });
    return commitId;
  }

  private async removeMarker(expected: string): Promise<void> {
    const current = await readMarker(this.config.markerPath);
    if (current !== expected) return;
    try {
      await fs.unlink(this.config.markerPath);
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  private tick(sink: CommitSink): void {
    if (this.checking) return;
    this.checking = true;
    this.check(sink)
      .catch((error: unknown) => {
        this.log.error('Marker check failed', errorMeta(error));
      })
      .finally(() => {
        this.checking = false;
      });
  }
}
