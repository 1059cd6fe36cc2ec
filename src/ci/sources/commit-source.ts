/**
 * Commit Sources
 *
 * A commit source notices new commits in the observed repository and hands
 * them to a sink (normally the dispatcher's `POST /api/commits`). Delivery is
 * at-least-once: a commit whose delivery failed is offered again.
 */

import * as path from 'path';
import type { EnvConfig } from '../../server/config';
import type { Logger } from '../../server/logger';
import type { CommandRunner } from '../../utils/process';
import { HookCommitSource, MARKER_FILE } from './hook';
import { PollingCommitSource } from './polling';

export interface CommitNotice {
  commitId: string;
  repoRef?: string;
}

/** Rejects when the commit could not be handed over */
export type CommitSink = (notice: CommitNotice) => Promise<void>;

export interface CommitSource {
  readonly kind: 'poll' | 'hook';
  start(sink: CommitSink): void;
  stop(): void;
  /** Run one observation now; resolves with the delivered commit, if any */
  check(sink: CommitSink): Promise<string | null>;
}

export interface CommitSourceDeps {
  exec?: CommandRunner;
  logger?: Logger;
}

/**
 * Build the source selected by `COMMIT_SOURCE`
 */
export function createCommitSource(env: EnvConfig, deps: CommitSourceDeps = {}): CommitSource {
  const repoDir = path.resolve(env.OBSERVED_REPO_DIR);

  if (env.COMMIT_SOURCE === 'hook') {
    return new HookCommitSource(
      { markerPath: path.join(repoDir, MARKER_FILE), intervalMs: env.POLL_INTERVAL_MS, repoRef: env.REPO_REF },
      deps.logger
    );
  }

  return new PollingCommitSource(
    { repoDir, intervalMs: env.POLL_INTERVAL_MS, repoRef: env.REPO_REF },
    deps.exec,
    deps.logger
  );
}
