/**
 * @fileoverview Public entry point of the review orchestrator.
 *
 * @module review-orchestrator
 */

export * from './types';
export * from './events';
export * from './plan';
export * from './retry';
export * from './capabilities';
export * from './review';
export * from './core';
export type {
  ILogger,
  IConfigProvider,
  IEventBus,
  SubscribeOptions,
  HistoryFilter,
  ICapability,
  CapabilityContext,
  CapabilityDescriptor,
  CapabilityEmitter,
  CapabilityKind,
  CapabilityResult,
} from './interfaces';
export { createContainer } from './composition';
export type { CompositionOptions } from './composition';
