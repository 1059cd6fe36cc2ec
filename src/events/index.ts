/**
 * Events Module
 *
 * Event-driven reporting for the dispatch pipeline.
 */

export * from './types';
export { EventBus, eventBus, createEvent } from './bus';
export { registerLogHandlers } from './handlers/log';
