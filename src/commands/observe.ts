/**
 * Observe Command
 *
 * Watches the observed repository and reports new commits to the dispatcher.
 */

import * as path from 'path';
import { DispatcherClient } from '../ci/runner';
import { createCommitSource, installPostCommitHook, MARKER_FILE } from '../ci/sources';
import type { CommitSink } from '../ci/sources';
import { dispatcherUrl, loadConfig } from '../server/config';
import { configureLogger, logger } from '../server/logger';
import { colors } from '../utils/colors';
import { flagOverrides, parseArgs } from './args';

export const OBSERVE_HELP = `
ci-dispatch observe - Report new commits to the dispatcher

Usage: ci-dispatch observe [options]

Options:
  -h, --help                Show this help message
  -d, --dispatcher <url>    Dispatcher URL (DISPATCHER_URL)
  --source <poll|hook>      How commits are noticed (COMMIT_SOURCE, default: poll)
  --repo-dir <path>         Observed clone (OBSERVED_REPO_DIR)
  -r, --repo <ref>          Repository reference sent with each commit (REPO_REF)
  --interval <ms>           Check interval (POLL_INTERVAL_MS)
  --once                    Check once and exit
  --install-hook            Install the post-commit hook into --repo-dir and exit

Examples:
  ci-dispatch observe --repo-dir ./observed-clone
  ci-dispatch observe --source hook --repo-dir . --install-hook
`;

export async function handleObserve(args: string[]): Promise<void> {
  const { flags } = parseArgs(args);
  if (flags.help) {
    console.log(OBSERVE_HELP);
    return;
  }

  const env = loadConfig(
    flagOverrides(flags, {
      dispatcher: 'DISPATCHER_URL',
      source: 'COMMIT_SOURCE',
      'repo-dir': 'OBSERVED_REPO_DIR',
      repo: 'REPO_REF',
      interval: 'POLL_INTERVAL_MS',
    })
  );
  configureLogger({ level: env.LOG_LEVEL, format: env.LOG_FORMAT });

  if (flags['install-hook']) {
    const repoDir = path.resolve(env.OBSERVED_REPO_DIR);
    const hookPath = await installPostCommitHook(repoDir);
    console.log(colors.green('✓') + ` Installed ${hookPath}`);
    console.log(colors.dim(`Commits will be written to ${path.join(repoDir, MARKER_FILE)}`));
    return;
  }

  const client = new DispatcherClient(dispatcherUrl(env));
  const log = logger.child({ component: 'observer' });
  const sink: CommitSink = async (notice) => {
    const accepted = await client.notifyCommit(notice.commitId, notice.repoRef);
    log.info(accepted.duplicate ? 'Commit already queued' : 'Commit queued', {
      commitId: notice.commitId,
      jobId: accepted.job_id,
      sequence: accepted.sequence,
    });
  };

  const source = createCommitSource(env);

  if (flags.once) {
    const delivered = await source.check(sink);
    console.log(delivered ? colors.green('✓') + ` Dispatched ${delivered}` : colors.dim('No new commit'));
    return;
  }

  source.start(sink);
  console.log(colors.green('✓') + ` Observing ${env.OBSERVED_REPO_DIR} (${source.kind}) for ${client.url}`);
  console.log(colors.dim('Press Ctrl+C to stop'));

  const shutdown = () => {
    source.stop();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
