/**
 * Result Store
 *
 * Keeps the result set of every built commit. A new set for a commit replaces
 * the previous one, while `latest()` is decided by commit sequence, never by
 * arrival time, so a slow rebuild of an old commit cannot take over the
 * status page.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger as rootLogger, errorMeta } from '../server/logger';
import type { Logger } from '../server/logger';
import { WireResultSetSchema, formatIssues } from './types';
import type { ResultSet } from './types';
import { decodeResult, encodeResultSet } from './wire';

export interface ResultStore {
  /** Record a set, replacing any earlier set for the same commit */
  put(resultSet: ResultSet): void;
  get(commitId: string): ResultSet | undefined;
  /** Set whose commit has the highest sequence */
  latest(): ResultSet | undefined;
  /** Sets recorded for a commit, newest first */
  history(commitId: string): ResultSet[];
  /** Current set of every commit, ordered by sequence */
  list(): ResultSet[];
  highestSequence(): number;
}

export interface ResultStoreOptions {
  /** How many sets to remember per commit (at least 1) */
  historyLimit?: number;
}

export class InMemoryResultStore implements ResultStore {
  private sets = new Map<string, ResultSet[]>();
  private readonly historyLimit: number;

  constructor(options: ResultStoreOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? 10);
  }

  put(resultSet: ResultSet): void {
    const previous = this.sets.get(resultSet.commitId) ?? [];
    this.sets.set(resultSet.commitId, [resultSet, ...previous].slice(0, this.historyLimit));
  }

  get(commitId: string): ResultSet | undefined {
    return this.sets.get(commitId)?.[0];
  }

  latest(): ResultSet | undefined {
    let latest: ResultSet | undefined;
    for (const [current] of this.sets.values()) {
      if (current && (!latest || current.sequence > latest.sequence)) {
        latest = current;
      }
    }
    return latest;
  }

  history(commitId: string): ResultSet[] {
    return [...(this.sets.get(commitId) ?? [])];
  }

  list(): ResultSet[] {
    const current: ResultSet[] = [];
    for (const [set] of this.sets.values()) {
      if (set) current.push(set);
    }
    return current.sort((a, b) => a.sequence - b.sequence);
  }

  highestSequence(): number {
    return this.latest()?.sequence ?? 0;
  }
}

// =============================================================================
// File-backed store
// =============================================================================

const StoredResultSetSchema = WireResultSetSchema.extend({
  sequence: z.number().int().positive(),
  produced_at: z.string().datetime(),
});

type StoredResultSet = z.infer<typeof StoredResultSetSchema>;

/**
 * Result store that also writes the current set of each commit to
 * `<dir>/<commit>-<hash>.json` and reloads them on construction
 */
export class FileResultStore extends InMemoryResultStore {
  private readonly log: Logger;

  constructor(private readonly dir: string, options: ResultStoreOptions & { logger?: Logger } = {}) {
    super(options);
    this.log = (options.logger ?? rootLogger).child({ component: 'result-store' });
    fs.mkdirSync(dir, { recursive: true });
    this.load();
  }

  put(resultSet: ResultSet): void {
    super.put(resultSet);
    const stored: StoredResultSet = {
      ...encodeResultSet(resultSet),
      sequence: resultSet.sequence,
      produced_at: resultSet.producedAt.toISOString(),
    };
    fs.writeFileSync(this.fileFor(resultSet.commitId), JSON.stringify(stored, null, 2));
  }

  /**
   * The hash of the raw id keeps ids that sanitize alike in separate files
   */
  private fileFor(commitId: string): string {
    const safe = commitId.replace(/[^A-Za-z0-9._-]/g, '_');
    const hash = createHash('sha1').update(commitId).digest('hex').slice(0, 8);
    return path.join(this.dir, `${safe}-${hash}.json`);
  }

  private load(): void {
    const loaded: ResultSet[] = [];

    for (const name of fs.readdirSync(this.dir)) {
      if (!name.endsWith('.json')) continue;
      const file = path.join(this.dir, name);

      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
      } catch (error) {
        this.log.warn('Skipping unreadable result file', { file, ...errorMeta(error) });
        continue;
      }

      const parsed = StoredResultSetSchema.safeParse(raw);
      if (!parsed.success) {
        this.log.warn('Skipping malformed result file', { file, issues: formatIssues(parsed.error) });
        continue;
      }

      loaded.push({
        commitId: parsed.data.commit_id,
        sequence: parsed.data.sequence,
        results: parsed.data.results.map(decodeResult),
        producedAt: new Date(parsed.data.produced_at),
      });
    }

    for (const set of loaded.sort((a, b) => a.sequence - b.sequence)) {
      super.put(set);
    }

    if (loaded.length > 0) {
      this.log.info('Loaded stored results', { count: loaded.length, dir: this.dir });
    }
  }
}
