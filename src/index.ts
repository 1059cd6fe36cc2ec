/**
 * ci-dispatch - commit-triggered distributed test execution
 *
 * @example
 * ```typescript
 * import { Dispatcher, InMemoryResultStore, HttpWorkerTransport } from 'ci-dispatch';
 *
 * const dispatcher = new Dispatcher(
 *   { repoRef: '/srv/repo', heartbeatTimeoutMs: 10000, heartbeatCheckIntervalMs: 2000, jobTimeoutMs: 600000, maxAttempts: 3 },
 *   { transport: new HttpWorkerTransport(), store: new InMemoryResultStore() }
 * );
 * dispatcher.start();
 * dispatcher.submit('3f2a9c1');
 * ```
 */

export * from './ci';
export { CiError, ErrorCode, Errors, isCiError, describeError } from './core/errors';
export { EventBus, eventBus, createEvent, registerLogHandlers } from './events';
export type { AppEvent, EventType, EventInput } from './events';
export { loadConfig, parseConfig, getConfig, dispatcherUrl, workerUrl, type EnvConfig } from './server/config';
export { Logger, logger, configureLogger, requestLogger } from './server/logger';
export {
  createDispatcherApp,
  startDispatcherServer,
  type DispatcherServer,
  type DispatcherAppOptions,
  type StartDispatcherOptions,
} from './server';
