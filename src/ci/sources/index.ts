export * from './commit-source';
export { PollingCommitSource, type PollingSourceConfig } from './polling';
export { HookCommitSource, MARKER_FILE, installPostCommitHook, postCommitHook, type HookSourceConfig } from './hook';
