import { createLogger } from '@/adapters/logging/LoggerFactory';
import { EVENT_BUS_CONFIG } from '@/config/businessRules';

const logger = createLogger('EventBus');

export type EventPayload = Record<string, unknown>;

export interface BusEvent {
  topic: string;
  event: string;
  payload: EventPayload;
  publishedAt: Date;
}

export type BusListener = (event: BusEvent) => void;

/**
 * Topic-based publish/subscribe within the process
 */
export interface IEventBus {
  publish(topic: string, event: string, payload: EventPayload): BusEvent;
  /** Returns a function that removes the listener */
  subscribe(topic: string, listener: BusListener): () => void;
  /** Last event published on a topic, for status polling */
  latest(topic: string): BusEvent | null;
  /** Drop the retained event of a topic that has run its course */
  forget(topic: string): void;
  listenerCount(topic: string): number;
}

/**
 * In-memory event bus
 *
 * Topics in use:
 * - exporter:<adminUserId>: member CSV export progress
 * - post_saved:<postId>: autosave results of the post editor
 *
 * Listeners run synchronously in subscription order. A listener that throws
 * is logged and does not stop delivery to the others.
 *
 * Latest events are kept for at most maxRetainedTopics topics; past that the
 * least recently published topic without listeners is dropped.
 */
export class EventBus implements IEventBus {
  private listeners = new Map<string, Set<BusListener>>();
  private lastEvents = new Map<string, BusEvent>();

  constructor(private readonly maxRetainedTopics: number = EVENT_BUS_CONFIG.MAX_RETAINED_TOPICS) {}

  publish(topic: string, event: string, payload: EventPayload): BusEvent {
    const busEvent: BusEvent = { topic, event, payload, publishedAt: new Date() };
    // re-insert so Map order tracks publish recency
    this.lastEvents.delete(topic);
    this.lastEvents.set(topic, busEvent);
    this.trimRetained();

    const listeners = this.listeners.get(topic);
    if (!listeners) return busEvent;

    for (const listener of [...listeners]) {
      try {
        listener(busEvent);
      } catch (error) {
        logger.error({ error, topic, event }, 'Event listener failed');
      }
    }

    return busEvent;
  }

  subscribe(topic: string, listener: BusListener): () => void {
    let listeners = this.listeners.get(topic);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(topic, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.listeners.get(topic);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) {
        this.listeners.delete(topic);
      }
    };
  }

  latest(topic: string): BusEvent | null {
    return this.lastEvents.get(topic) ?? null;
  }

  forget(topic: string): void {
    this.lastEvents.delete(topic);
  }

  listenerCount(topic: string): number {
    return this.listeners.get(topic)?.size ?? 0;
  }

  private trimRetained(): void {
    if (this.lastEvents.size <= this.maxRetainedTopics) return;

    for (const topic of this.lastEvents.keys()) {
      if (this.listenerCount(topic) === 0) {
        this.lastEvents.delete(topic);
        if (this.lastEvents.size <= this.maxRetainedTopics) return;
      }
    }
  }
}
