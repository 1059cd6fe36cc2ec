/**
 * Wire codec
 *
 * The wire speaks snake_case with a free-form looking `type` field; inside the
 * dispatcher results are the closed ResultKind variant. Conversion happens
 * here and nowhere else.
 */

import type { WireResult, WireResultSet, TestResult, ResultSet, Assignment, AssignmentMessage } from './types';

export function decodeResult(wire: WireResult): TestResult {
  return {
    testName: wire.test_name,
    kind: wire.type,
    reasons: wire.type === 'pass' ? [] : [...wire.reasons],
  };
}

export function encodeResult(result: TestResult): WireResult {
  return {
    type: result.kind,
    test_name: result.testName,
    reasons: [...result.reasons],
  };
}

export function encodeResultSet(set: ResultSet): WireResultSet {
  return {
    commit_id: set.commitId,
    results: set.results.map(encodeResult),
  };
}

export function encodeAssignment(assignment: Assignment): AssignmentMessage {
  return {
    job_id: assignment.jobId,
    attempt: assignment.attempt,
    commit_id: assignment.commitId,
    repo_ref: assignment.repoRef,
  };
}

export function decodeAssignment(message: AssignmentMessage): Assignment {
  return {
    jobId: message.job_id,
    attempt: message.attempt,
    commitId: message.commit_id,
    repoRef: message.repo_ref,
  };
}
