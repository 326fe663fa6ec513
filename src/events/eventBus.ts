/**
 * @fileoverview Ordered publish/subscribe bus for review events.
 *
 * One bus exists per review. Publishing freezes the event, checks its
 * per-source sequence, appends it to a bounded history and enqueues it on
 * every matching subscription. Subscriber code never runs inside `publish`:
 * each subscription drains its own queue on a separate task, so a slow or
 * failing subscriber cannot stall publication or other subscribers.
 *
 * @module events/eventBus
 */

import type { ILogger } from '../interfaces/ILogger';
import type { IEventBus, SubscribeOptions, HistoryFilter } from '../interfaces/IEventBus';
import { Logger } from '../core/logger';
import { EventOrderingError } from './errors';
import { EventSource } from './eventSource';
import { CloseReason, EventSubscription } from './subscription';
import type { EventType, ReviewEvent } from './types';

export const DEFAULT_HISTORY_SIZE = 1000;
export const DEFAULT_MAX_QUEUE_SIZE = 1000;

export interface EventBusOptions {
  /** Events kept for replay. */
  historySize?: number;
  /** Default per-subscriber queue bound. */
  maxQueueSize?: number;
  /** Time source for stamping events. */
  clock?: () => number;
  logger?: ILogger;
}

/**
 * Event bus with per-source ordering, bounded replay history and
 * independent per-subscriber delivery.
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 * const sub = bus.subscribe({ eventTypes: ['finding_discovered'] });
 * bus.source('security').emit({ eventType: 'thinking', payload });
 * for await (const event of sub) { ... }
 * ```
 */
export class EventBus implements IEventBus {
  private readonly historySize: number;
  private readonly maxQueueSize: number;
  private readonly clock: () => number;
  private readonly log: ILogger;

  private readonly subscriptions = new Set<EventSubscription>();
  private readonly history: ReviewEvent[] = [];
  private readonly lastSequence = new Map<string, number>();
  private readonly sources = new Map<string, EventSource>();
  private closed = false;
  private published = 0;

  constructor(options: EventBusOptions = {}) {
    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
    this.maxQueueSize = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? Logger.for('event-bus');
  }

  // ==========================================================================
  // PUBLISHING
  // ==========================================================================

  /**
   * Publish a stamped event to every matching subscriber.
   *
   * @throws {EventOrderingError} when `event.sequence` does not increase for
   *   its source
   */
  publish(event: ReviewEvent): ReviewEvent {
    const last = this.lastSequence.get(event.sourceId) ?? 0;
    if (event.sequence <= last) {
      throw new EventOrderingError(event.sourceId, event.sequence, last);
    }

    const frozen = Object.freeze(event);
    if (this.closed) {
      this.log.debug('Dropping event published after close', {
        eventType: event.eventType,
        sourceId: event.sourceId,
      });
      return frozen;
    }

    this.lastSequence.set(event.sourceId, event.sequence);
    this.published++;

    this.history.push(frozen);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }

    for (const subscription of [...this.subscriptions]) {
      if (!subscription.matches(frozen)) continue;
      if (!subscription.enqueue(frozen)) {
        subscription.close('overflow');
      }
    }

    return frozen;
  }

  /**
   * The single {@link EventSource} for `sourceId`, created on first use.
   */
  source(sourceId: string): EventSource {
    let source = this.sources.get(sourceId);
    if (!source) {
      source = new EventSource(sourceId, this, this.clock);
      this.sources.set(sourceId, source);
    }
    return source;
  }

  // ==========================================================================
  // SUBSCRIBING
  // ==========================================================================

  /**
   * Register a subscriber. It receives every matching event published from
   * now on, preceded by the last `replay` matching events from history.
   */
  subscribe(options: SubscribeOptions = {}): EventSubscription {
    const subscription = new EventSubscription({
      eventTypes: options.eventTypes,
      sourceId: options.sourceId,
      listener: options.listener,
      maxQueueSize: options.maxQueueSize ?? this.maxQueueSize,
      onClose: (sub, reason, error) => this.handleClose(sub, reason, error),
    });

    const replay = options.replay ?? 0;
    if (replay === 'all' || replay > 0) {
      const matching = this.history.filter(e => subscription.matches(e));
      subscription.preload(replay === 'all' ? matching : matching.slice(-replay));
    }

    if (this.closed) {
      subscription.end();
      return subscription;
    }

    this.subscriptions.add(subscription);
    this.log.debug('Subscriber registered', {
      subscriptionId: subscription.id,
      replay,
      subscribers: this.subscriptions.size,
    });
    return subscription;
  }

  /**
   * Stop delivery to a subscriber. Calling it again is a no-op.
   */
  unsubscribe(subscription: EventSubscription): void {
    subscription.close('unsubscribed');
  }

  /**
   * Stop accepting events and end every subscription once its queue drains.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const subscription of [...this.subscriptions]) {
      subscription.end();
    }
    this.log.debug('Event bus closed', { published: this.published });
  }

  // ==========================================================================
  // INSPECTION
  // ==========================================================================

  /**
   * Events from the replay history, oldest first.
   */
  getHistory(filter: HistoryFilter = {}): ReviewEvent[] {
    const types: ReadonlySet<EventType> | undefined = filter.eventTypes ? new Set(filter.eventTypes) : undefined;
    const matching = this.history.filter(e =>
      (filter.sourceId === undefined || e.sourceId === filter.sourceId) &&
      (types === undefined || types.has(e.eventType)),
    );
    return filter.limit !== undefined ? matching.slice(Math.max(0, matching.length - filter.limit)) : matching;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Events accepted since creation, including those evicted from history. */
  get publishedCount(): number {
    return this.published;
  }

  private handleClose(subscription: EventSubscription, reason: CloseReason, error?: unknown): void {
    this.subscriptions.delete(subscription);
    switch (reason) {
      case 'overflow':
        this.log.warn('Subscriber dropped: queue full', { subscriptionId: subscription.id });
        break;
      case 'listener-error':
        this.log.warn('Subscriber removed: listener failed', {
          subscriptionId: subscription.id,
          error: error instanceof Error ? error.message : String(error),
        });
        break;
      default:
        this.log.debug('Subscriber closed', { subscriptionId: subscription.id, reason });
    }
  }
}
