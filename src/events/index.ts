/**
 * @fileoverview Events module exports.
 *
 * @module events
 */

export * from './types';
export { EventOrderingError } from './errors';
export { EventSource } from './eventSource';
export type { EventPublisher } from './eventSource';
export { EventSubscription } from './subscription';
export type { EventListener, CloseReason, SubscriptionFilter } from './subscription';
export { EventBus, DEFAULT_HISTORY_SIZE, DEFAULT_MAX_QUEUE_SIZE } from './eventBus';
export type { EventBusOptions } from './eventBus';
export { serializeEvent, serializeEventLine, toSnakeCase } from './serialize';
export type { WireValue } from './serialize';
