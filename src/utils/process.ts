/**
 * Child process helpers for the worker: git operations and the test command.
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import * as os from 'os';

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string | undefined>;
  /** Kill the process (SIGTERM, then SIGKILL) after this long */
  timeoutMs?: number;
  onOutput?: (line: string, isError: boolean) => void;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

/** Exit code reported for a process killed by its timeout */
export const TIMEOUT_EXIT_CODE = 124;

/**
 * Run a program without a shell. Never rejects: spawn errors come back as a
 * non-zero exit with the error on stderr.
 */
export const executeCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const child: ChildProcess = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let timeoutHandle: NodeJS.Timeout | undefined;
    let killHandle: NodeJS.Timeout | undefined;
    if (options.timeoutMs) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killHandle = setTimeout(() => child.kill('SIGKILL'), 5000);
      }, options.timeoutMs);
    }

    const emitLines = (text: string, isError: boolean) => {
      const onOutput = options.onOutput;
      if (!onOutput) return;
      text.split('\n').filter(Boolean).forEach((line) => onOutput(line, isError));
    };

    // decoded per stream so characters split across chunks survive
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (text: string) => {
      stdout += text;
      emitLines(text, false);
    });

    child.stderr?.on('data', (text: string) => {
      stderr += text;
      emitLines(text, true);
    });

    const finish = (result: CommandResult) => {
      if (timeoutHandle) clearTimeout(timeoutHandle);
      if (killHandle) clearTimeout(killHandle);
      resolve(result);
    };

    child.on('close', (code) => {
      finish({ exitCode: timedOut ? TIMEOUT_EXIT_CODE : (code ?? 1), stdout, stderr, timedOut });
    });

    child.on('error', (err) => {
      finish({ exitCode: 1, stdout, stderr: stderr + '\n' + err.message, timedOut });
    });
  });
};

/**
 * Program and arguments that run `script` through the platform shell
 */
export function shellInvocation(script: string): { command: string; args: string[] } {
  if (os.platform() === 'win32') {
    return { command: 'cmd.exe', args: ['/c', script] };
  }
  return { command: '/bin/sh', args: ['-c', script] };
}
