/**
 * @fileoverview One subscriber's bounded queue and delivery loop.
 *
 * A subscription works in one of two modes:
 * - push: a listener is called for each event, one at a time, from a drain
 *   loop scheduled with `setImmediate`. A listener that throws or rejects
 *   closes the subscription with reason `listener-error`.
 * - pull: the subscription is an async iterable; `for await` consumes the
 *   queue at its own pace.
 *
 * Either way publication only appends to the queue. A queue that reaches its
 * bound is reported to the bus, which closes the subscription with reason
 * `overflow`.
 *
 * @module events/subscription
 */

import { v4 as uuidv4 } from 'uuid';
import type { EventType, ReviewEvent } from './types';

/**
 * Why a subscription stopped receiving events.
 */
export type CloseReason = 'unsubscribed' | 'overflow' | 'listener-error' | 'bus-closed';

/**
 * Push-mode callback. A returned promise is awaited before the next event.
 */
export type EventListener = (event: ReviewEvent) => void | Promise<void>;

export interface SubscriptionFilter {
  eventTypes?: readonly EventType[];
  sourceId?: string;
}

export interface SubscriptionOptions extends SubscriptionFilter {
  maxQueueSize: number;
  listener?: EventListener;
  /** Called once when the subscription closes, for any reason. */
  onClose?: (subscription: EventSubscription, reason: CloseReason, error?: unknown) => void;
}

/**
 * Handle returned by `EventBus.subscribe`.
 */
export class EventSubscription implements AsyncIterable<ReviewEvent> {
  readonly id = uuidv4();

  private readonly eventTypes: ReadonlySet<EventType> | undefined;
  private readonly sourceId: string | undefined;
  private readonly maxQueueSize: number;
  private readonly listener: EventListener | undefined;
  private readonly onClose: SubscriptionOptions['onClose'];

  private readonly queue: ReviewEvent[] = [];
  /** Replayed events still at the head of the queue; not counted against the bound. */
  private replayed = 0;
  private readonly waiters: Array<(result: IteratorResult<ReviewEvent>) => void> = [];
  private draining = false;
  /** Set once no more events will be enqueued; queued ones still drain. */
  private ending = false;
  private reason: CloseReason | undefined;
  private resolveClosed: (reason: CloseReason) => void = () => undefined;

  /** Resolves with the close reason once the subscription has ended. */
  readonly closed: Promise<CloseReason>;

  constructor(options: SubscriptionOptions) {
    this.eventTypes = options.eventTypes && options.eventTypes.length > 0
      ? new Set(options.eventTypes)
      : undefined;
    this.sourceId = options.sourceId;
    this.maxQueueSize = options.maxQueueSize;
    this.listener = options.listener;
    this.onClose = options.onClose;
    this.closed = new Promise(resolve => {
      this.resolveClosed = resolve;
    });
  }

  /** Close reason, once closed. */
  get closeReason(): CloseReason | undefined {
    return this.reason;
  }

  get isClosed(): boolean {
    return this.reason !== undefined;
  }

  /** Events waiting for delivery. */
  get pending(): number {
    return this.queue.length;
  }

  matches(event: ReviewEvent): boolean {
    if (this.sourceId !== undefined && event.sourceId !== this.sourceId) return false;
    if (this.eventTypes && !this.eventTypes.has(event.eventType)) return false;
    return true;
  }

  /**
   * Append an event. Returns false when the queue is full; the caller
   * decides what to do with an overflowing subscriber.
   */
  enqueue(event: ReviewEvent): boolean {
    if (this.isClosed || this.ending) return true;
    if (this.queue.length - this.replayed >= this.maxQueueSize) return false;
    this.queue.push(event);
    this.scheduleDrain();
    return true;
  }

  /**
   * Append history events at registration time. Replay is bounded by the
   * history size, not by the queue bound.
   */
  preload(events: readonly ReviewEvent[]): void {
    this.queue.push(...events);
    this.replayed += events.length;
    this.scheduleDrain();
  }

  /**
   * Stop accepting events; end once the queued ones are delivered.
   */
  end(): void {
    if (this.isClosed || this.ending) return;
    this.ending = true;
    this.scheduleDrain();
  }

  /**
   * Close immediately, discarding undelivered events. Idempotent.
   */
  close(reason: CloseReason, error?: unknown): void {
    if (this.isClosed) return;
    this.reason = reason;
    this.queue.length = 0;
    this.replayed = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onClose?.(this, reason, error);
    this.resolveClosed(reason);
  }

  [Symbol.asyncIterator](): AsyncIterator<ReviewEvent> {
    if (this.listener) {
      throw new Error('A subscription with a listener cannot also be iterated');
    }
    return {
      next: () => this.next(),
      return: async () => {
        this.close('unsubscribed');
        return { value: undefined, done: true };
      },
    };
  }

  // ==========================================================================
  // DELIVERY
  // ==========================================================================

  private async next(): Promise<IteratorResult<ReviewEvent>> {
    const event = this.take();
    if (event) {
      if (this.ending && this.queue.length === 0) this.scheduleDrain();
      return { value: event, done: false };
    }
    if (this.isClosed) {
      return { value: undefined, done: true };
    }
    return new Promise<IteratorResult<ReviewEvent>>(resolve => this.waiters.push(resolve));
  }

  private take(): ReviewEvent | undefined {
    const event = this.queue.shift();
    if (event && this.replayed > 0) this.replayed--;
    return event;
  }

  private scheduleDrain(): void {
    if (this.draining || this.isClosed) return;
    this.draining = true;
    setImmediate(() => {
      this.drain().then(
        () => {
          this.draining = false;
          if (this.queue.length > 0 && this.canProgress()) this.scheduleDrain();
        },
        (err: unknown) => {
          this.draining = false;
          this.close('listener-error', err);
        },
      );
    });
  }

  private canProgress(): boolean {
    return this.listener !== undefined || this.waiters.length > 0;
  }

  private async drain(): Promise<void> {
    while (!this.isClosed && this.queue.length > 0) {
      if (this.listener) {
        const event = this.take();
        if (!event) break;
        try {
          await this.listener(event);
        } catch (err) {
          this.close('listener-error', err);
          return;
        }
        continue;
      }

      const waiter = this.waiters.shift();
      if (!waiter) break;
      const event = this.take();
      if (!event) {
        this.waiters.unshift(waiter);
        break;
      }
      waiter({ value: event, done: false });
    }

    if (this.ending && this.queue.length === 0) {
      this.close('bus-closed');
    }
  }
}
