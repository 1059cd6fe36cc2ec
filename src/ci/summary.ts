/**
 * Result summary shown on the status page: counts per kind and a headline.
 */

import { ResultKind } from './types';
import type { ResultSet } from './types';

export interface ResultSummary {
  commitId: string;
  total: number;
  passed: number;
  failures: number;
  errors: number;
  headline: string;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export function summarize(set: ResultSet): ResultSummary {
  let passed = 0;
  let failures = 0;
  let errors = 0;

  for (const result of set.results) {
    if (result.kind === ResultKind.PASS) passed++;
    else if (result.kind === ResultKind.FAIL) failures++;
    else errors++;
  }

  let headline: string;
  if (errors === 0 && failures === 0) {
    headline = 'All tests passed';
  } else {
    const parts: string[] = [];
    if (errors > 0) parts.push(plural(errors, 'error'));
    if (failures > 0) parts.push(plural(failures, 'failure'));
    headline = `We found ${parts.join(' and ')}`;
  }

  return {
    commitId: set.commitId,
    total: set.results.length,
    passed,
    failures,
    errors,
    headline,
  };
}
