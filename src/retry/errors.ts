/**
 * @fileoverview Capability error taxonomy.
 *
 * Every failure that crosses the RetrySupervisor is a {@link CapabilityError}
 * whose `recoverable` flag decides whether it may be retried. Foreign errors
 * are mapped with {@link classifyError}.
 *
 * @module retry/errors
 */

export interface CapabilityErrorOptions {
  recoverable: boolean;
  capabilityId?: string;
  cause?: unknown;
  /** Name of the foreign error this one was classified from. */
  originalName?: string;
}

/**
 * Base class for capability failures.
 */
export class CapabilityError extends Error {
  readonly recoverable: boolean;
  readonly capabilityId: string | undefined;
  readonly originalName: string | undefined;

  constructor(message: string, options: CapabilityErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CapabilityError';
    this.recoverable = options.recoverable;
    this.capabilityId = options.capabilityId;
    this.originalName = options.originalName;
  }

  /** Names used for retry allow/deny matching. */
  get matchNames(): string[] {
    return this.originalName && this.originalName !== this.name ? [this.name, this.originalName] : [this.name];
  }
}

// ============================================================================
// RECOVERABLE
// ============================================================================

/**
 * The attempt did not finish within its timeout.
 */
export class CapabilityTimeoutError extends CapabilityError {
  constructor(public readonly timeoutMs: number, capabilityId?: string) {
    super(`Capability timed out after ${timeoutMs}ms`, { recoverable: true, capabilityId });
    this.name = 'CapabilityTimeoutError';
  }
}

export class RateLimitError extends CapabilityError {
  constructor(message: string, options: Omit<CapabilityErrorOptions, 'recoverable'> = {}) {
    super(message, { ...options, recoverable: true });
    this.name = 'RateLimitError';
  }
}

/**
 * Transient I/O failure (connection reset, DNS hiccup, 5xx).
 */
export class TransientCapabilityError extends CapabilityError {
  constructor(message: string, options: Omit<CapabilityErrorOptions, 'recoverable'> = {}) {
    super(message, { ...options, recoverable: true });
    this.name = 'TransientCapabilityError';
  }
}

// ============================================================================
// NON-RECOVERABLE
// ============================================================================

/**
 * The capability cannot process the input it was given.
 */
export class MalformedInputError extends CapabilityError {
  constructor(message: string, options: Omit<CapabilityErrorOptions, 'recoverable'> = {}) {
    super(message, { ...options, recoverable: false });
    this.name = 'MalformedInputError';
  }
}

/**
 * The capability returned a result that does not match the result schema.
 */
export class SchemaViolationError extends CapabilityError {
  constructor(public readonly problems: string[], capabilityId?: string) {
    super(`Capability result failed validation:\n- ${problems.join('\n- ')}`, {
      recoverable: false,
      capabilityId,
    });
    this.name = 'SchemaViolationError';
  }
}

export class CapabilityCanceledError extends CapabilityError {
  constructor(capabilityId?: string) {
    super('Capability invocation canceled', { recoverable: false, capabilityId });
    this.name = 'CapabilityCanceledError';
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/** Node network error codes treated as transient. */
export const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'EPIPE',
]);

function readStringField(value: unknown, field: 'code' | 'name' | 'message'): string | undefined {
  if (typeof value === 'object' && value !== null && field in value) {
    const inner: unknown = Reflect.get(value, field);
    return typeof inner === 'string' ? inner : undefined;
  }
  return undefined;
}

function readStatus(value: unknown): number | undefined {
  if (typeof value === 'object' && value !== null) {
    for (const field of ['status', 'statusCode']) {
      const inner: unknown = Reflect.get(value, field);
      if (typeof inner === 'number') return inner;
    }
  }
  return undefined;
}

/**
 * Map any thrown value to a {@link CapabilityError}.
 *
 * - CapabilityError: returned unchanged
 * - Node network codes (`ECONNRESET`, `ETIMEDOUT`, ...): transient
 * - HTTP-style `status` 429: rate limit; 5xx: transient
 * - anything else: non-recoverable, keeping the original error name so that
 *   a policy's `retryOn` list can allow it
 */
export function classifyError(err: unknown, capabilityId?: string): CapabilityError {
  if (err instanceof CapabilityError) {
    return err;
  }

  const message = readStringField(err, 'message') ?? String(err);
  const originalName = readStringField(err, 'name');
  const code = readStringField(err, 'code');
  const options = { capabilityId, cause: err, originalName };

  if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
    return new TransientCapabilityError(`${code}: ${message}`, options);
  }

  const status = readStatus(err);
  if (status === 429) {
    return new RateLimitError(message, options);
  }
  if (status !== undefined && status >= 500 && status < 600) {
    return new TransientCapabilityError(`HTTP ${status}: ${message}`, options);
  }

  return new CapabilityError(message, { ...options, recoverable: false });
}
