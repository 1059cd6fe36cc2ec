/**
 * Commit Source Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PollingCommitSource } from '../sources/polling';
import { HookCommitSource, MARKER_FILE, installPostCommitHook } from '../sources/hook';
import { createCommitSource } from '../sources/commit-source';
import type { CommitNotice } from '../sources/commit-source';
import { parseConfig } from '../../server/config';
import type { CommandResult, CommandRunner } from '../../utils/process';

const REPO = '/srv/git/app.git';

function ok(stdout = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '', timedOut: false };
}

/**
 * Fake git whose HEAD moves to the next entry of `heads` on every pull
 */
function fakeGit(heads: string[], failPull?: string) {
  const calls: string[] = [];
  let index = 0;
  const exec: CommandRunner = async (_command, args) => {
    calls.push(args.join(' '));
    if (args[0] === 'rev-parse') {
      return ok(`${heads[Math.min(index, heads.length - 1)]}\n`);
    }
    if (args[0] === 'pull') {
      if (failPull) return { exitCode: 1, stdout: '', stderr: `${failPull}\n`, timedOut: false };
      index++;
    }
    return ok();
  };
  return { exec, calls };
}

async function drain(): Promise<void> {
  for (let i = 0; i < 50; i++) await Promise.resolve();
}

function recordingSink() {
  const received: CommitNotice[] = [];
  let failures = 0;
  const sink = async (notice: CommitNotice): Promise<void> => {
    if (failures > 0) {
      failures--;
      throw new Error('dispatcher unavailable');
    }
    received.push(notice);
  };
  return {
    sink,
    received,
    failNext: (count = 1) => {
      failures += count;
    },
  };
}

describe('PollingCommitSource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report HEAD when a pull moved it', async () => {
    const git = fakeGit(['aaa111', 'bbb222']);
    const source = new PollingCommitSource({ repoDir: '/tmp/observed', intervalMs: 1000, repoRef: REPO }, git.exec);
    const { sink, received } = recordingSink();

    await expect(source.check(sink)).resolves.toBe('bbb222');

    expect(received).toEqual([{ commitId: 'bbb222', repoRef: REPO }]);
    expect(git.calls).toEqual(['rev-parse HEAD', 'reset --hard --quiet HEAD', 'pull --quiet', 'rev-parse HEAD']);
  });

  it('should report nothing when HEAD did not move', async () => {
    const git = fakeGit(['aaa111']);
    const source = new PollingCommitSource({ repoDir: '/tmp/observed', intervalMs: 1000 }, git.exec);
    const { sink, received } = recordingSink();

    await expect(source.check(sink)).resolves.toBeNull();
    expect(received).toEqual([]);
  });

  it('should offer an undelivered commit again before pulling', async () => {
    const git = fakeGit(['aaa111', 'bbb222', 'ccc333']);
    const source = new PollingCommitSource({ repoDir: '/tmp/observed', intervalMs: 1000 }, git.exec);
    const { sink, received, failNext } = recordingSink();
    failNext();

    await expect(source.check(sink)).resolves.toBeNull();
    await expect(source.check(sink)).resolves.toBe('bbb222');

    expect(received).toEqual([{ commitId: 'bbb222', repoRef: undefined }]);
    expect(git.calls.filter((call) => call.startsWith('pull'))).toHaveLength(1);
  });

  it('should fail the check when git fails', async () => {
    const git = fakeGit(['aaa111'], 'fatal: unable to access remote');
    const source = new PollingCommitSource({ repoDir: '/tmp/observed', intervalMs: 1000 }, git.exec);
    const { sink } = recordingSink();

    await expect(source.check(sink)).rejects.toThrow('git pull failed in /tmp/observed: fatal: unable to access remote');
  });

  it('should poll on its interval until stopped', async () => {
    vi.useFakeTimers();
    const git = fakeGit(['aaa111', 'bbb222', 'bbb222']);
    const source = new PollingCommitSource({ repoDir: '/tmp/observed', intervalMs: 5000 }, git.exec);
    const { sink, received } = recordingSink();

    source.start(sink);
    await vi.advanceTimersByTimeAsync(5000);
    await drain();
    expect(received.map((n) => n.commitId)).toEqual(['bbb222']);

    source.stop();
    await vi.advanceTimersByTimeAsync(20000);
    expect(git.calls.filter((call) => call.startsWith('pull'))).toHaveLength(1);
  });
});

describe('HookCommitSource', () => {
  let dir: string;
  let markerPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ci-hook-'));
    markerPath = path.join(dir, MARKER_FILE);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should do nothing without a marker file', async () => {
    const source = new HookCommitSource({ markerPath, intervalMs: 1000 });
    const { sink, received } = recordingSink();

    await expect(source.check(sink)).resolves.toBeNull();
    expect(received).toEqual([]);
  });

  it('should deliver the commit and remove the marker', async () => {
    fs.writeFileSync(markerPath, '9fceb02\n');
    const source = new HookCommitSource({ markerPath, intervalMs: 1000, repoRef: REPO });
    const { sink, received } = recordingSink();

    await expect(source.check(sink)).resolves.toBe('9fceb02');

    expect(received).toEqual([{ commitId: '9fceb02', repoRef: REPO }]);
    expect(fs.existsSync(markerPath)).toBe(false);
  });

  it('should keep the marker when delivery fails', async () => {
    fs.writeFileSync(markerPath, '9fceb02\n');
    const source = new HookCommitSource({ markerPath, intervalMs: 1000 });
    const { sink, failNext } = recordingSink();
    failNext();

    await expect(source.check(sink)).resolves.toBeNull();

    expect(fs.readFileSync(markerPath, 'utf8')).toBe('9fceb02\n');
    await expect(source.check(sink)).resolves.toBe('9fceb02');
  });

  it('should keep a marker the hook rewrote during delivery', async () => {
    fs.writeFileSync(markerPath, '9fceb02\n');
    const source = new HookCommitSource({ markerPath, intervalMs: 1000 });

    await source.check(async () => {
      fs.writeFileSync(markerPath, 'a1b2c3d\n');
    });

    expect(fs.readFileSync(markerPath, 'utf8')).toBe('a1b2c3d\n');
  });

  it('should discard an empty marker', async () => {
    fs.writeFileSync(markerPath, '\n');
    const source = new HookCommitSource({ markerPath, intervalMs: 1000 });
    const { sink, received } = recordingSink();

    await expect(source.check(sink)).resolves.toBeNull();
    expect(received).toEqual([]);
    expect(fs.existsSync(markerPath)).toBe(false);
  });

  it('should install a post-commit hook writing the marker', async () => {
    const hookPath = await installPostCommitHook(dir);

    expect(hookPath).toBe(path.join(dir, '.git', 'hooks', 'post-commit'));
    expect(fs.readFileSync(hookPath, 'utf8')).toBe(`#!/bin/sh\ngit rev-parse HEAD > '${path.resolve(markerPath)}'\n`);
  });
});

describe('createCommitSource', () => {
  it('should follow COMMIT_SOURCE', () => {
    expect(createCommitSource(parseConfig({ COMMIT_SOURCE: 'hook' })).kind).toBe('hook');
    expect(createCommitSource(parseConfig({})).kind).toBe('poll');
  });
});
