/**
 * Notify Command
 *
 * Send a single commit to the dispatcher, e.g. from a post-receive hook.
 */

import { DispatcherClient } from '../ci/runner';
import { Errors } from '../core/errors';
import { dispatcherUrl, loadConfig } from '../server/config';
import { executeCommand } from '../utils/process';
import { colors } from '../utils/colors';
import { flagOverrides, parseArgs } from './args';

export const NOTIFY_HELP = `
ci-dispatch notify - Queue a build of one commit

Usage: ci-dispatch notify [commit] [options]

Without a commit, HEAD of the current directory is sent.

Options:
  -h, --help                Show this help message
  -d, --dispatcher <url>    Dispatcher URL (DISPATCHER_URL)
  -r, --repo <ref>          Repository reference (REPO_REF)

Examples:
  ci-dispatch notify
  ci-dispatch notify 9fceb02 --dispatcher http://ci.local:8888
`;

async function currentHead(): Promise<string> {
  const result = await executeCommand('git', ['rev-parse', 'HEAD'], { cwd: process.cwd() });
  if (result.exitCode !== 0) {
    throw Errors.executionFailed(`Could not read HEAD: ${result.stderr.trim()}`);
  }
  return result.stdout.trim();
}

export async function handleNotify(args: string[]): Promise<void> {
  const { flags, positional } = parseArgs(args);
  if (flags.help) {
    console.log(NOTIFY_HELP);
    return;
  }

  const env = loadConfig(flagOverrides(flags, { dispatcher: 'DISPATCHER_URL', repo: 'REPO_REF' }));
  const commitId = positional[0] ?? (await currentHead());
  const repoRef = typeof flags.repo === 'string' ? flags.repo : undefined;

  const client = new DispatcherClient(dispatcherUrl(env));
  const accepted = await client.notifyCommit(commitId, repoRef);

  if (accepted.duplicate) {
    console.log(colors.yellow('•') + ` ${commitId} is already queued as job ${accepted.job_id}`);
  } else {
    console.log(colors.green('✓') + ` Dispatched ${commitId} as job ${accepted.job_id} (#${accepted.sequence})`);
  }
}
