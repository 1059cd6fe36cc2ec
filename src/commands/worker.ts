/**
 * Worker Command
 *
 * Runs a test-runner worker: serves `POST /run`, registers with the
 * dispatcher and heartbeats until stopped.
 */

import * as path from 'path';
import { serve } from '@hono/node-server';
import { DispatcherClient, ShellTestExecutor, WorkerRuntime, createWorkerApp } from '../ci/runner';
import { dispatcherUrl, loadConfig, workerUrl } from '../server/config';
import { configureLogger } from '../server/logger';
import { colors } from '../utils/colors';
import { flagOverrides, parseArgs } from './args';

export const WORKER_HELP = `
ci-dispatch worker - Run a test-runner worker

Usage: ci-dispatch worker [options]

Options:
  -h, --help                Show this help message
  -d, --dispatcher <url>    Dispatcher URL (DISPATCHER_URL)
  --host <host>             Interface to listen on (WORKER_HOST)
  -p, --port <port>         Port to listen on (WORKER_PORT, default: 8900)
  --address <url>           URL the dispatcher reaches this worker at
                            (default: http://WORKER_HOST:WORKER_PORT)
  -w, --work-dir <path>     Clone to build in (WORKER_WORK_DIR)
  --test-command <cmd>      Command printing JSON results (TEST_COMMAND)

Examples:
  ci-dispatch worker --dispatcher http://ci.local:8888 --port 8901 --work-dir /tmp/clone-1
`;

export async function handleWorker(args: string[]): Promise<void> {
  const { flags } = parseArgs(args);
  if (flags.help) {
    console.log(WORKER_HELP);
    return;
  }

  const env = loadConfig(
    flagOverrides(flags, {
      dispatcher: 'DISPATCHER_URL',
      host: 'WORKER_HOST',
      port: 'WORKER_PORT',
      'work-dir': 'WORKER_WORK_DIR',
      'test-command': 'TEST_COMMAND',
    })
  );
  configureLogger({ level: env.LOG_LEVEL, format: env.LOG_FORMAT });

  const address = typeof flags.address === 'string' ? flags.address : workerUrl(env);
  const workDir = path.resolve(env.WORKER_WORK_DIR);

  const runtime = new WorkerRuntime(
    { address, heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS },
    {
      client: new DispatcherClient(dispatcherUrl(env)),
      executor: new ShellTestExecutor({ workDir, testCommand: env.TEST_COMMAND, timeoutMs: env.JOB_TIMEOUT_MS }),
    }
  );

  const server = serve({
    fetch: createWorkerApp(runtime).fetch,
    port: env.WORKER_PORT,
    hostname: env.WORKER_HOST,
  });

  let workerId: string;
  try {
    workerId = await runtime.start();
  } catch (error) {
    server.close();
    throw error;
  }

  console.log(colors.green('✓') + ` Worker ${colors.bold(workerId)} registered with ${dispatcherUrl(env)}`);
  console.log(colors.dim(`Address: ${address}`));
  console.log(colors.dim(`Work directory: ${workDir}`));
  console.log(colors.dim(`Test command: ${env.TEST_COMMAND}`));
  console.log(colors.dim('Press Ctrl+C to stop'));

  const shutdown = () => {
    console.log('\nShutting down worker...');
    runtime.stop();
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
