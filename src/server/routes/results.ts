/**
 * Read-only REST API routes for the status display
 */

import { Hono } from 'hono';
import type { ResultStore } from '../../ci/results';
import { summarize } from '../../ci/summary';
import { encodeResultSet } from '../../ci/wire';
import type { AppEnv } from '../logger';

export function createResultRoutes(store: ResultStore): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  /**
   * GET /api/data
   * Result set of the most recent commit, in the display's wire form
   */
  app.get('/data', (c) => {
    const latest = store.latest();
    if (!latest) {
      return c.json({ error: 'No results yet' }, 404);
    }
    return c.json(encodeResultSet(latest));
  });

  /**
   * GET /api/summary
   * Counts and headline for the most recent commit
   */
  app.get('/summary', (c) => {
    const latest = store.latest();
    if (!latest) {
      return c.json({ error: 'No results yet' }, 404);
    }
    const summary = summarize(latest);
    return c.json({
      commit_id: summary.commitId,
      total: summary.total,
      passed: summary.passed,
      failures: summary.failures,
      errors: summary.errors,
      headline: summary.headline,
    });
  });

  /**
   * GET /api/results
   * Every built commit, oldest first
   */
  app.get('/results', (c) => {
    return c.json(
      store.list().map((set) => ({
        commit_id: set.commitId,
        sequence: set.sequence,
        produced_at: set.producedAt.toISOString(),
        headline: summarize(set).headline,
      }))
    );
  });

  /**
   * GET /api/results/:commitId
   */
  app.get('/results/:commitId', (c) => {
    const set = store.get(c.req.param('commitId'));
    if (!set) {
      return c.json({ error: 'No results for this commit' }, 404);
    }
    return c.json(encodeResultSet(set));
  });

  /**
   * GET /api/results/:commitId/history
   * Earlier builds of the same commit, newest first
   */
  app.get('/results/:commitId/history', (c) => {
    const history = store.history(c.req.param('commitId'));
    if (history.length === 0) {
      return c.json({ error: 'No results for this commit' }, 404);
    }
    return c.json(
      history.map((set) => ({ ...encodeResultSet(set), produced_at: set.producedAt.toISOString() }))
    );
  });

  return app;
}
