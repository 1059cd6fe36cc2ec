/**
 * REST API routes for commit notifications (CommitSource → dispatcher)
 */

import { Hono } from 'hono';
import type { Dispatcher } from '../../ci/dispatcher';
import { CommitNotificationSchema } from '../../ci/types';
import type { AppEnv } from '../logger';
import { readJson } from '../middleware/validation';

export function createCommitRoutes(dispatcher: Dispatcher): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  /**
   * POST /api/commits
   * Queue a build for a commit. Delivery is at-least-once, so a commit that
   * is already queued or running is acknowledged without a second job.
   */
  app.post('/', async (c) => {
    const notification = await readJson(c, CommitNotificationSchema, 'commit notification');
    const outcome = dispatcher.submit(notification.commit_id, notification.repo_ref);

    if (!outcome.accepted) {
      return c.json({ job_id: outcome.job.id, sequence: outcome.job.commit.sequence, duplicate: true }, 200);
    }
    return c.json({ job_id: outcome.job.id, sequence: outcome.job.commit.sequence, duplicate: false }, 202);
  });

  return app;
}
