/**
 * @fileoverview Orchestrator settings assembled from an {@link IConfigProvider}.
 *
 * Every consumer reads its section from {@link OrchestratorSettings} rather
 * than from the provider directly, so that the whole configuration is
 * validated once, up front, with every problem listed.
 *
 * @module core/settings
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { LogLevel } from '../interfaces/ILogger';
import { compileSchema, validateWith } from './validation';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Retry policy fields shared by the global policy and per-capability
 * overrides.
 */
export interface RetryPolicySettings {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Symmetric jitter added to each backoff delay (0 disables). */
  jitterMs: number;
  /** Error names retried even when not recoverable by default. */
  retryOn: string[];
  /** Error names never retried. Wins over `retryOn`. */
  neverRetryOn: string[];
}

export interface RetrySettings extends RetryPolicySettings {
  /** Partial policies keyed by capability id. */
  capabilityOverrides: Record<string, Partial<RetryPolicySettings>>;
}

export interface ExecutionSettings {
  /** Upper bound on concurrently running steps of one fan-out batch. */
  maxParallel: number;
  /** Per-attempt timeout applied to every capability. */
  capabilityTimeoutMs: number;
  /** Per-capability timeout overrides keyed by capability id. */
  capabilityTimeouts: Record<string, number>;
}

export interface EventBusSettings {
  /** Events kept for replay. */
  historySize: number;
  /** Default per-subscriber queue bound. */
  maxQueueSize: number;
}

export interface ConsolidationSettings {
  /** Lines each location range is widened by before the overlap test. */
  lineTolerance: number;
}

export interface InputSettings {
  /** Maximum length of submitted code, in characters. */
  maxFileSize: number;
  /** Accepted filename extensions, e.g. `.py`. Empty accepts any. */
  supportedExtensions: string[];
}

export interface ServiceSettings {
  /** Finished reviews kept in memory before the oldest are evicted. */
  maxRetainedReviews: number;
}

export interface LoggingSettings {
  level: LogLevel;
  debugComponents: string[];
}

export interface OrchestratorSettings {
  retry: RetrySettings;
  execution: ExecutionSettings;
  eventBus: EventBusSettings;
  consolidation: ConsolidationSettings;
  input: InputSettings;
  service: ServiceSettings;
  logging: LoggingSettings;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_SETTINGS: OrchestratorSettings = {
  retry: {
    maxAttempts: 3,
    baseDelayMs: 400,
    maxDelayMs: 3000,
    jitterMs: 0,
    retryOn: [],
    neverRetryOn: [],
    capabilityOverrides: {},
  },
  execution: {
    maxParallel: 3,
    capabilityTimeoutMs: 120_000,
    capabilityTimeouts: {},
  },
  eventBus: {
    historySize: 1000,
    maxQueueSize: 1000,
  },
  consolidation: {
    lineTolerance: 0,
  },
  input: {
    maxFileSize: 100_000,
    supportedExtensions: ['.py'],
  },
  service: {
    maxRetainedReviews: 50,
  },
  logging: {
    level: 'info',
    debugComponents: [],
  },
};

/**
 * Thrown when assembled settings do not satisfy the settings schema.
 */
export class ConfigValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n- ${problems.join('\n- ')}`);
    this.name = 'ConfigValidationError';
  }
}

// ============================================================================
// SCHEMA
// ============================================================================

const nonNegativeInt = { type: 'integer', minimum: 0 } as const;
const positiveInt = { type: 'integer', minimum: 1 } as const;
const stringList = { type: 'array', items: { type: 'string' } } as const;

const policyProperties = {
  maxAttempts: positiveInt,
  baseDelayMs: nonNegativeInt,
  maxDelayMs: nonNegativeInt,
  jitterMs: nonNegativeInt,
  retryOn: stringList,
  neverRetryOn: stringList,
};

const settingsSchema = {
  type: 'object',
  required: ['retry', 'execution', 'eventBus', 'consolidation', 'input', 'service', 'logging'],
  additionalProperties: false,
  properties: {
    retry: {
      type: 'object',
      required: [...Object.keys(policyProperties), 'capabilityOverrides'],
      additionalProperties: false,
      properties: {
        ...policyProperties,
        capabilityOverrides: {
          type: 'object',
          additionalProperties: {
            type: 'object',
            additionalProperties: false,
            properties: policyProperties,
          },
        },
      },
    },
    execution: {
      type: 'object',
      required: ['maxParallel', 'capabilityTimeoutMs', 'capabilityTimeouts'],
      additionalProperties: false,
      properties: {
        maxParallel: positiveInt,
        capabilityTimeoutMs: positiveInt,
        capabilityTimeouts: { type: 'object', additionalProperties: positiveInt },
      },
    },
    eventBus: {
      type: 'object',
      required: ['historySize', 'maxQueueSize'],
      additionalProperties: false,
      properties: {
        historySize: nonNegativeInt,
        maxQueueSize: positiveInt,
      },
    },
    consolidation: {
      type: 'object',
      required: ['lineTolerance'],
      additionalProperties: false,
      properties: { lineTolerance: nonNegativeInt },
    },
    input: {
      type: 'object',
      required: ['maxFileSize', 'supportedExtensions'],
      additionalProperties: false,
      properties: {
        maxFileSize: positiveInt,
        supportedExtensions: stringList,
      },
    },
    service: {
      type: 'object',
      required: ['maxRetainedReviews'],
      additionalProperties: false,
      properties: { maxRetainedReviews: positiveInt },
    },
    logging: {
      type: 'object',
      required: ['level', 'debugComponents'],
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
        debugComponents: stringList,
      },
    },
  },
};

const validateSettings = compileSchema<OrchestratorSettings>(settingsSchema);

// ============================================================================
// LOADING
// ============================================================================

/**
 * Read every section from `provider`, falling back to
 * {@link DEFAULT_SETTINGS} key by key, and validate the result.
 *
 * @throws {ConfigValidationError} listing every invalid field
 */
export function loadSettings(provider: IConfigProvider): OrchestratorSettings {
  const d = DEFAULT_SETTINGS;
  const get = <T>(section: keyof OrchestratorSettings, key: string, fallback: T): T =>
    provider.getConfig(section, key, fallback);

  const assembled = {
    retry: {
      maxAttempts: get('retry', 'maxAttempts', d.retry.maxAttempts),
      baseDelayMs: get('retry', 'baseDelayMs', d.retry.baseDelayMs),
      maxDelayMs: get('retry', 'maxDelayMs', d.retry.maxDelayMs),
      jitterMs: get('retry', 'jitterMs', d.retry.jitterMs),
      retryOn: get('retry', 'retryOn', d.retry.retryOn),
      neverRetryOn: get('retry', 'neverRetryOn', d.retry.neverRetryOn),
      capabilityOverrides: get('retry', 'capabilityOverrides', d.retry.capabilityOverrides),
    },
    execution: {
      maxParallel: get('execution', 'maxParallel', d.execution.maxParallel),
      capabilityTimeoutMs: get('execution', 'capabilityTimeoutMs', d.execution.capabilityTimeoutMs),
      capabilityTimeouts: get('execution', 'capabilityTimeouts', d.execution.capabilityTimeouts),
    },
    eventBus: {
      historySize: get('eventBus', 'historySize', d.eventBus.historySize),
      maxQueueSize: get('eventBus', 'maxQueueSize', d.eventBus.maxQueueSize),
    },
    consolidation: {
      lineTolerance: get('consolidation', 'lineTolerance', d.consolidation.lineTolerance),
    },
    input: {
      maxFileSize: get('input', 'maxFileSize', d.input.maxFileSize),
      supportedExtensions: get('input', 'supportedExtensions', d.input.supportedExtensions),
    },
    service: {
      maxRetainedReviews: get('service', 'maxRetainedReviews', d.service.maxRetainedReviews),
    },
    logging: {
      level: get<string>('logging', 'level', d.logging.level),
      debugComponents: get('logging', 'debugComponents', d.logging.debugComponents),
    },
  };

  const check = validateWith(validateSettings, assembled);
  if (!check.valid) {
    throw new ConfigValidationError(check.problems);
  }
  return check.value;
}

/**
 * Effective retry policy for one capability: the global policy with that
 * capability's override applied on top.
 */
export function retryPolicyFor(settings: RetrySettings, capabilityId: string): RetryPolicySettings {
  const override = settings.capabilityOverrides[capabilityId] ?? {};
  return {
    maxAttempts: override.maxAttempts ?? settings.maxAttempts,
    baseDelayMs: override.baseDelayMs ?? settings.baseDelayMs,
    maxDelayMs: override.maxDelayMs ?? settings.maxDelayMs,
    jitterMs: override.jitterMs ?? settings.jitterMs,
    retryOn: override.retryOn ?? settings.retryOn,
    neverRetryOn: override.neverRetryOn ?? settings.neverRetryOn,
  };
}

/**
 * Per-attempt timeout for one capability.
 */
export function timeoutFor(settings: ExecutionSettings, capabilityId: string): number {
  return settings.capabilityTimeouts[capabilityId] ?? settings.capabilityTimeoutMs;
}
