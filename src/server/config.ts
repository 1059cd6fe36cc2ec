/**
 * Configuration & Environment Validation
 *
 * Validates the environment on startup and provides typed configuration to
 * the dispatcher, the workers and the commit observer.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { Errors } from '../core/errors';
import { formatIssues } from '../ci/types';

// =============================================================================
// Environment Schema
// =============================================================================

const milliseconds = (fallback: string) => z.string().default(fallback).pipe(z.coerce.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Dispatcher
  DISPATCHER_HOST: z.string().default('localhost'),
  DISPATCHER_PORT: z.string().default('8888').pipe(z.coerce.number().int().min(1).max(65535)),
  /** Where workers and observers reach the dispatcher; defaults to host:port */
  DISPATCHER_URL: z.string().url().optional(),
  REPO_REF: z.string().min(1).default('.'),

  // Scheduling
  HEARTBEAT_TIMEOUT_MS: milliseconds('10000'),
  HEARTBEAT_INTERVAL_MS: milliseconds('2000'),
  HEARTBEAT_CHECK_INTERVAL_MS: milliseconds('2000'),
  JOB_TIMEOUT_MS: milliseconds('600000'),
  MAX_ATTEMPTS: z.string().default('3').pipe(z.coerce.number().int().min(1)),

  // Results
  RESULTS_DIR: z.string().optional(),
  RESULT_HISTORY: z.string().default('10').pipe(z.coerce.number().int().min(1)),

  // Commit source
  COMMIT_SOURCE: z.enum(['poll', 'hook']).default('poll'),
  POLL_INTERVAL_MS: milliseconds('5000'),
  OBSERVED_REPO_DIR: z.string().default('.'),

  // Worker
  WORKER_HOST: z.string().default('localhost'),
  WORKER_PORT: z.string().default('8900').pipe(z.coerce.number().int().min(1).max(65535)),
  WORKER_WORK_DIR: z.string().default('./worker-clone'),
  TEST_COMMAND: z.string().default('npm test --silent'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

// =============================================================================
// Loading
// =============================================================================

let config: EnvConfig | null = null;

/**
 * Validate an environment. Throws INVALID_CONFIG listing every bad variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw Errors.invalidConfig(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load `.env` from the working directory, then validate `process.env` with
 * `overrides` (command-line flags) applied on top
 */
export function loadConfig(overrides: Record<string, string> = {}): EnvConfig {
  if (config && Object.keys(overrides).length === 0) return config;
  dotenv.config();
  config = parseConfig({ ...process.env, ...overrides });
  return config;
}

export function getConfig(): EnvConfig {
  return config ?? loadConfig();
}

// =============================================================================
// Configuration Helpers
// =============================================================================

export function dispatcherUrl(env: EnvConfig): string {
  return env.DISPATCHER_URL ?? `http://${env.DISPATCHER_HOST}:${env.DISPATCHER_PORT}`;
}

export function workerUrl(env: EnvConfig): string {
  return `http://${env.WORKER_HOST}:${env.WORKER_PORT}`;
}
