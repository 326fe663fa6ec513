/**
 * @fileoverview Interface for the review event bus.
 *
 * The Coordinator and ReviewService depend on this interface; the
 * implementation lives in `events/eventBus`.
 *
 * @module interfaces/IEventBus
 */

import type { EventSource } from '../events/eventSource';
import type { EventListener, EventSubscription, SubscriptionFilter } from '../events/subscription';
import type { EventType, ReviewEvent } from '../events/types';

/**
 * Options for {@link IEventBus.subscribe}.
 */
export interface SubscribeOptions extends SubscriptionFilter {
  /** History events to replay first: a count, or `'all'`. Defaults to 0. */
  replay?: number | 'all';
  /** Push mode. Without a listener the handle is an async iterable. */
  listener?: EventListener;
  /** Queue bound for this subscriber; defaults to the bus setting. */
  maxQueueSize?: number;
}

export interface HistoryFilter {
  eventTypes?: readonly EventType[];
  sourceId?: string;
  /** Keep only the most recent `limit` matches. */
  limit?: number;
}

/**
 * Ordered publish/subscribe bus scoped to one review.
 */
export interface IEventBus {
  publish(event: ReviewEvent): ReviewEvent;
  source(sourceId: string): EventSource;
  subscribe(options?: SubscribeOptions): EventSubscription;
  unsubscribe(subscription: EventSubscription): void;
  getHistory(filter?: HistoryFilter): ReviewEvent[];
  close(): void;
  readonly isClosed: boolean;
}
