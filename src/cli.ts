#!/usr/bin/env node

import { handleDispatcher, DISPATCHER_HELP } from './commands/dispatcher';
import { handleNotify, NOTIFY_HELP } from './commands/notify';
import { handleObserve, OBSERVE_HELP } from './commands/observe';
import { handleStatus, STATUS_HELP } from './commands/status';
import { handleWorker, WORKER_HELP } from './commands/worker';
import { CiError } from './core/errors';
import { colorEnabled, colors } from './utils/colors';

const VERSION = '1.0.0';

const HELP = `
ci-dispatch - Commit-triggered distributed test execution

Usage: ci-dispatch <command> [options]

Commands:
  dispatcher              Run the dispatcher
  worker                  Run a test-runner worker
  observe                 Watch a repository and report new commits
  notify [commit]         Queue a build of one commit
  status                  Show the latest build, workers and jobs

Options:
  -h, --help              Show help (also: ci-dispatch <command> --help)
  -v, --version           Show version

Configuration is read from the environment and from .env in the working
directory; command-line flags take precedence.
`;

type Handler = (args: string[]) => Promise<void>;

const COMMANDS: Record<string, { handler: Handler; help: string }> = {
  dispatcher: { handler: handleDispatcher, help: DISPATCHER_HELP },
  worker: { handler: handleWorker, help: WORKER_HELP },
  observe: { handler: handleObserve, help: OBSERVE_HELP },
  notify: { handler: handleNotify, help: NOTIFY_HELP },
  status: { handler: handleStatus, help: STATUS_HELP },
};

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '-h' || command === '--help') {
    console.log(HELP);
    return;
  }

  if (command === '-v' || command === '--version') {
    console.log(`ci-dispatch version ${VERSION}`);
    return;
  }

  if (command === 'help') {
    const topic = args[1] ? COMMANDS[args[1]] : undefined;
    console.log(topic ? topic.help : HELP);
    return;
  }

  const entry = COMMANDS[command];
  if (!entry) {
    console.error(`ci-dispatch: '${command}' is not a command. See 'ci-dispatch --help'.`);
    process.exit(1);
  }

  await entry.handler(args.slice(1));
}

main().catch((error: unknown) => {
  if (error instanceof CiError) {
    console.error(error.format(colorEnabled));
  } else if (error instanceof Error) {
    console.error(colors.red('error: ') + error.message);
  } else {
    console.error(colors.red('error: ') + String(error));
  }
  process.exit(1);
});
