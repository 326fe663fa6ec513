/**
 * @fileoverview Event bus errors.
 *
 * @module events/errors
 */

/**
 * Thrown by `EventBus.publish` when an event's sequence is not greater than
 * the last one published for the same source.
 */
export class EventOrderingError extends Error {
  constructor(
    public readonly sourceId: string,
    public readonly sequence: number,
    public readonly lastSequence: number,
  ) {
    super(`Out-of-order event for source '${sourceId}': sequence ${sequence} after ${lastSequence}`);
    this.name = 'EventOrderingError';
  }
}
