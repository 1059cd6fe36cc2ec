/**
 * Worker Runtime Module
 *
 * Everything that runs on a test-runner machine:
 *
 * - **WorkerRuntime**: registration, heartbeats, one job at a time
 * - **createWorkerApp**: the `POST /run` and `GET /ping` endpoints
 * - **ShellTestExecutor**: checkout of the commit and the test command
 * - **DispatcherClient**: HTTP client for the dispatcher's API
 *
 * ## Usage
 *
 * ```typescript
 * import { DispatcherClient, ShellTestExecutor, WorkerRuntime, createWorkerApp } from './ci/runner';
 *
 * const runtime = new WorkerRuntime(
 *   { address: 'http://localhost:8900' },
 *   {
 *     client: new DispatcherClient('http://localhost:8888'),
 *     executor: new ShellTestExecutor({ workDir: './worker-clone', testCommand: 'npm test --silent' }),
 *   }
 * );
 *
 * serve({ fetch: createWorkerApp(runtime).fetch, port: 8900 });
 * await runtime.start();
 * ```
 */

export * from './types';
export { DispatcherClient } from './client';
export { ShellTestExecutor, parseTestReport } from './executor';
export { WorkerRuntime, createWorkerApp, type WorkerRuntimeDeps } from './worker';
