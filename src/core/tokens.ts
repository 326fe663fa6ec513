/**
 * @fileoverview Service tokens for the dependency injection container.
 *
 * Each token is typed with the service it resolves to, so
 * `container.resolve(Tokens.ReviewService)` is a `ReviewService` without a
 * type argument.
 *
 * @module core/tokens
 */

import type { CapabilityRegistry as Registry } from '../capabilities/registry';
import type { IConfigProvider as ConfigProvider } from '../interfaces/IConfigProvider';
import type { RetrySupervisor as Supervisor } from '../retry/supervisor';
import type { ReviewService as Service } from '../review/reviewService';
import { createToken } from './container';
import type { Logger as ProcessLogger } from './logger';
import type { OrchestratorSettings } from './settings';

// ─── Ambient Services ──────────────────────────────────────────────────────

/**
 * Layered configuration (file + environment).
 */
export const IConfigProvider = createToken<ConfigProvider>('IConfigProvider');

/**
 * Validated settings assembled from {@link IConfigProvider}.
 */
export const Settings = createToken<OrchestratorSettings>('Settings');

/**
 * Process-wide logger, configured from {@link IConfigProvider}.
 */
export const Logger = createToken<ProcessLogger>('Logger');

// ─── Orchestration Services ────────────────────────────────────────────────

export const CapabilityRegistry = createToken<Registry>('CapabilityRegistry');

export const RetrySupervisor = createToken<Supervisor>('RetrySupervisor');

export const ReviewService = createToken<Service>('ReviewService');
