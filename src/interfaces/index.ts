/**
 * @fileoverview Central export for all interfaces.
 *
 * Import interfaces from this module for convenience:
 * ```typescript
 * import { ICapability, IEventBus } from './interfaces';
 * ```
 *
 * @module interfaces
 */

export type { ILogger, LogLevel } from './ILogger';
export type { IConfigProvider } from './IConfigProvider';
export type { IEventBus, SubscribeOptions, HistoryFilter } from './IEventBus';
export type {
  ICapability,
  CapabilityContext,
  CapabilityDescriptor,
  CapabilityEmitter,
  CapabilityKind,
  CapabilityResult,
} from './ICapability';
