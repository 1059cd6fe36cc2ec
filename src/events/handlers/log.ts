/**
 * Pipeline Log Handler
 *
 * Writes every dispatcher event to the structured log.
 */

import { eventBus as defaultBus } from '../bus';
import type { EventBus } from '../bus';
import { logger as rootLogger } from '../../server/logger';
import type { Logger } from '../../server/logger';

/**
 * Register log subscribers; returns their subscription ids
 */
export function registerLogHandlers(bus: EventBus = defaultBus, logger: Logger = rootLogger): string[] {
  const log = logger.child({ component: 'pipeline' });

  return [
    bus.on('ci.job.queued', ({ payload }) => {
      log.info(`Queued ${payload.commitId}`, payload);
    }),
    bus.on('ci.job.duplicate', ({ payload }) => {
      log.debug(`Ignored duplicate notification for ${payload.commitId}`, payload);
    }),
    bus.on('ci.job.assigned', ({ payload }) => {
      log.info(`Assigned ${payload.commitId} to ${payload.workerId}`, payload);
    }),
    bus.on('ci.job.completed', ({ payload }) => {
      log.info(`Built ${payload.commitId}`, payload);
    }),
    bus.on('ci.job.retried', ({ payload }) => {
      log.warn(`Retrying ${payload.commitId}: ${payload.cause}`, payload);
    }),
    bus.on('ci.job.deferred', ({ payload }) => {
      log.info(`${payload.workerId} is still busy, ${payload.commitId} waits for another worker`, payload);
    }),
    bus.on('ci.job.failed', ({ payload }) => {
      log.error(`Gave up on ${payload.commitId}: ${payload.cause}`, payload);
    }),
    bus.on('ci.worker.registered', ({ payload }) => {
      log.info(`Worker ${payload.workerId} registered`, payload);
    }),
    bus.on('ci.worker.evicted', ({ payload }) => {
      log.warn(`Worker ${payload.workerId} evicted: ${payload.reason}`, payload);
    }),
    bus.on('ci.report.rejected', ({ payload }) => {
      log.warn(`Rejected report from ${payload.workerId}: ${payload.reason}`, payload);
    }),
  ];
}
