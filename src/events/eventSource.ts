/**
 * @fileoverview Per-source event stamping.
 *
 * @module events/eventSource
 */

import type { EventBody, ReviewEvent } from './types';

/**
 * Receives stamped events. Implemented by the bus.
 */
export interface EventPublisher {
  publish(event: ReviewEvent): ReviewEvent;
}

/**
 * The single writer for one `sourceId`.
 *
 * Stamps each body with the next sequence number and the current time and
 * hands it to the bus, so events from one source are always published in
 * sequence order.
 */
export class EventSource {
  private lastSequence = 0;

  constructor(
    readonly sourceId: string,
    private readonly publisher: EventPublisher,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Sequence number of the most recently emitted event (0 before any). */
  get sequence(): number {
    return this.lastSequence;
  }

  emit(body: EventBody): ReviewEvent {
    const event: ReviewEvent = {
      ...body,
      sourceId: this.sourceId,
      sequence: this.lastSequence + 1,
      timestamp: this.clock(),
    };
    const published = this.publisher.publish(event);
    this.lastSequence = event.sequence;
    return published;
  }
}
