/**
 * Dispatcher Command
 *
 * Runs the dispatcher: commit intake, worker scheduling and the result API.
 */

import { startDispatcherServer } from '../server';
import { loadConfig } from '../server/config';
import { configureLogger, errorMeta, logger } from '../server/logger';
import { colors } from '../utils/colors';
import { flagOverrides, parseArgs } from './args';

export const DISPATCHER_HELP = `
ci-dispatch dispatcher - Run the dispatcher

Usage: ci-dispatch dispatcher [options]

Options:
  -h, --help                Show this help message
  --host <host>             Interface to listen on (DISPATCHER_HOST)
  -p, --port <port>         Port to listen on (DISPATCHER_PORT, default: 8888)
  -r, --repo <ref>          Repository commits are built from (REPO_REF)
  --results-dir <path>      Keep result sets in this directory (RESULTS_DIR)
  --max-attempts <n>        Attempts per job before giving up (MAX_ATTEMPTS, default: 3)
  --job-timeout <ms>        Deadline for one attempt (JOB_TIMEOUT_MS)

Examples:
  ci-dispatch dispatcher --repo /srv/git/app.git --results-dir ./test_results
`;

export async function handleDispatcher(args: string[]): Promise<void> {
  const { flags } = parseArgs(args);
  if (flags.help) {
    console.log(DISPATCHER_HELP);
    return;
  }

  const env = loadConfig(
    flagOverrides(flags, {
      host: 'DISPATCHER_HOST',
      port: 'DISPATCHER_PORT',
      repo: 'REPO_REF',
      'results-dir': 'RESULTS_DIR',
      'max-attempts': 'MAX_ATTEMPTS',
      'job-timeout': 'JOB_TIMEOUT_MS',
    })
  );
  configureLogger({ level: env.LOG_LEVEL, format: env.LOG_FORMAT });

  const running = startDispatcherServer(env);

  console.log(colors.green('✓') + ` Dispatcher listening on http://${env.DISPATCHER_HOST}:${env.DISPATCHER_PORT}`);
  console.log(colors.dim(`Repository: ${env.REPO_REF}`));
  console.log(colors.dim(`Results: ${env.RESULTS_DIR ?? 'in memory'}`));
  console.log(colors.dim('Press Ctrl+C to stop'));

  const shutdown = () => {
    console.log('\nShutting down dispatcher...');
    running
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', errorMeta(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
