/**
 * Status Command
 *
 * Latest build summary plus the dispatcher's workers and jobs.
 */

import { DispatcherClient } from '../ci/runner';
import { dispatcherUrl, loadConfig } from '../server/config';
import { colors } from '../utils/colors';
import { flagOverrides, parseArgs } from './args';

export const STATUS_HELP = `
ci-dispatch status - Show build and worker status

Usage: ci-dispatch status [options]

Options:
  -h, --help                Show this help message
  -d, --dispatcher <url>    Dispatcher URL (DISPATCHER_URL)
  --json                    Print the raw status as JSON
`;

const stateColor: Record<string, (s: string) => string> = {
  idle: colors.green,
  busy: colors.yellow,
  queued: colors.dim,
  running: colors.yellow,
  completed: colors.green,
  failed: colors.red,
};

function paint(state: string): string {
  return (stateColor[state] ?? ((s: string) => s))(state);
}

export async function handleStatus(args: string[]): Promise<void> {
  const { flags } = parseArgs(args);
  if (flags.help) {
    console.log(STATUS_HELP);
    return;
  }

  const env = loadConfig(flagOverrides(flags, { dispatcher: 'DISPATCHER_URL' }));
  const client = new DispatcherClient(dispatcherUrl(env));
  const [summary, status] = await Promise.all([client.summary(), client.status()]);

  if (flags.json) {
    console.log(JSON.stringify({ summary, status }, null, 2));
    return;
  }

  console.log(colors.bold('Latest build'));
  if (summary) {
    const headline = summary.errors > 0 ? colors.error : summary.failures > 0 ? colors.fail : colors.pass;
    console.log(`  ${summary.commit_id}  ${headline(summary.headline)}`);
    console.log(colors.dim(`  ${summary.passed} passed, ${summary.failures} failed, ${summary.errors} errors`));
  } else {
    console.log(colors.dim('  No results yet'));
  }

  console.log();
  console.log(colors.bold(`Workers (${status.workers.length})`));
  for (const worker of status.workers) {
    const job = worker.currentJob ? colors.dim(` job ${worker.currentJob}`) : '';
    console.log(`  ${worker.id.padEnd(12)} ${paint(worker.state).padEnd(6)} ${worker.address}${job}`);
  }
  if (status.workers.length === 0) {
    console.log(colors.dim('  No workers registered'));
  }

  const active = status.jobs.filter((job) => job.state !== 'completed' && job.state !== 'failed');
  console.log();
  console.log(colors.bold(`Jobs (${active.length} active)`));
  for (const job of active) {
    const worker = job.assignedWorker ? ` on ${job.assignedWorker}` : '';
    console.log(`  #${job.sequence} ${job.commitId}  ${paint(job.state)} attempt ${job.attemptCount}${worker}`);
    if (job.lastFailure) {
      console.log(colors.dim(`      last failure: ${job.lastFailure}`));
    }
  }
}
