/**
 * Event Bus
 *
 * A simple in-process event bus for publishing and subscribing to events.
 * Handlers for one event run in parallel; a failing handler is logged and
 * never reaches the publisher.
 */

import { randomUUID } from 'crypto';
import { logger } from '../server/logger';
import type { AppEvent, EventType, EventInput } from './types';

type EventHandler<T extends AppEvent = AppEvent> = (event: T) => void | Promise<void>;

type EventOf<T extends EventType> = Extract<AppEvent, { type: T }>;

interface Subscription {
  id: string;
  handler: EventHandler;
}

function isEventOf<T extends EventType>(event: AppEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

export class EventBus {
  private subscriptions: Subscription[] = [];
  private eventLog: AppEvent[] = [];

  constructor(private readonly maxLogSize = 1000) {}

  /**
   * Subscribe to a specific event type
   */
  on<T extends EventType>(eventType: T, handler: EventHandler<EventOf<T>>): string {
    const id = randomUUID();
    this.subscriptions.push({
      id,
      handler: (event) => (isEventOf(event, eventType) ? handler(event) : undefined),
    });
    return id;
  }

  /**
   * Subscribe to all events
   */
  onAll(handler: EventHandler): string {
    const id = randomUUID();
    this.subscriptions.push({ id, handler });
    return id;
  }

  off(subscriptionId: string): boolean {
    const index = this.subscriptions.findIndex((s) => s.id === subscriptionId);
    if (index !== -1) {
      this.subscriptions.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Publish an event
   */
  async emit(input: EventInput): Promise<void> {
    const event = createEvent(input);

    this.eventLog.push(event);
    if (this.eventLog.length > this.maxLogSize) {
      this.eventLog.shift();
    }

    const results = await Promise.allSettled(
      this.subscriptions.map(async (s) => s.handler(event))
    );

    results.forEach((result) => {
      if (result.status === 'rejected') {
        logger.error(`[EventBus] Handler error for ${event.type}`, {
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });
  }

  /**
   * Get recent events (for debugging)
   */
  getRecentEvents(limit = 100): AppEvent[] {
    return this.eventLog.slice(-limit);
  }

  /**
   * Clear all subscriptions (for testing)
   */
  clear(): void {
    this.subscriptions = [];
    this.eventLog = [];
  }
}

// Singleton instance
export const eventBus = new EventBus();

export function createEvent(input: EventInput): AppEvent {
  return { ...input, id: randomUUID(), timestamp: new Date() };
}
