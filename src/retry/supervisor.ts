/**
 * @fileoverview RetrySupervisor: bounded retries around one capability.
 *
 * `invoke` runs a capability up to `policy.maxAttempts` times:
 *
 * - Each attempt gets its own AbortSignal, aborted when the attempt times out
 *   or the caller cancels.
 * - The returned value is validated against the capability result schema.
 * - A retryable failure publishes one `agent_error` event under the
 *   capability's source, then sleeps for the backoff delay.
 * - Anything else ends the invocation. `invoke` never throws.
 *
 * @module retry/supervisor
 */

import type { EventSource } from '../events/eventSource';
import type {
  CapabilityContext,
  CapabilityEmitter,
  CapabilityResult,
  ICapability,
} from '../interfaces/ICapability';
import type { ILogger } from '../interfaces/ILogger';
import type { ReviewInput } from '../types';
import { Logger } from '../core/logger';
import { checkCapabilityResult } from '../capabilities/resultSchema';
import {
  CapabilityCanceledError,
  CapabilityError,
  CapabilityTimeoutError,
  SchemaViolationError,
  classifyError,
} from './errors';
import {
  RetryPolicy,
  SleepFunction,
  computeBackoffDelay,
  defaultSleep,
  isRetryable,
} from './policy';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Per-attempt wiring supplied by the caller.
 */
export interface AttemptBinding {
  context: CapabilityContext;
  emit: CapabilityEmitter;
}

export interface InvocationRequest {
  policy: RetryPolicy;
  /** The capability's own event source, used for retry telemetry. */
  source: EventSource;
  stepId: string;
  /** Builds the context and sink for one attempt. */
  bindAttempt: (attempt: number, signal: AbortSignal) => AttemptBinding;
  /** Per-attempt timeout. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export type InvocationOutcome =
  | { ok: true; result: CapabilityResult; attempts: number; retries: number }
  | {
      ok: false;
      error: CapabilityError;
      attempts: number;
      retries: number;
      recoverable: boolean;
      /** Every allowed attempt failed with a retryable error. */
      exhausted: boolean;
      canceled: boolean;
    };

export interface RetrySupervisorOptions {
  sleep?: SleepFunction;
  /** Uniform random source for jitter. */
  random?: () => number;
  logger?: ILogger;
}

// ============================================================================
// SUPERVISOR
// ============================================================================

export class RetrySupervisor {
  private readonly sleep: SleepFunction;
  private readonly random: () => number;
  private readonly log: ILogger;

  constructor(options: RetrySupervisorOptions = {}) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.log = options.logger ?? Logger.for('retry');
  }

  async invoke(capability: ICapability, input: ReviewInput, request: InvocationRequest): Promise<InvocationOutcome> {
    const { policy } = request;
    const capabilityId = capability.descriptor.id;
    const outer = request.signal ?? new AbortController().signal;
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let retries = 0;

    for (let attempt = 1; ; attempt++) {
      if (outer.aborted) {
        return this.canceled(capabilityId, attempt - 1, retries);
      }

      let error: CapabilityError;
      try {
        const result = await this.runAttempt(capability, input, request, attempt, outer);
        if (retries > 0) {
          this.log.info(`${capabilityId} succeeded after ${retries} retr${retries === 1 ? 'y' : 'ies'}`, {
            stepId: request.stepId,
          });
        }
        return { ok: true, result, attempts: attempt, retries };
      } catch (err) {
        error = outer.aborted ? new CapabilityCanceledError(capabilityId) : classifyError(err, capabilityId);
      }

      if (error instanceof CapabilityCanceledError) {
        return this.canceled(capabilityId, attempt, retries);
      }

      const retryable = isRetryable(error, policy);
      if (!retryable || attempt >= maxAttempts) {
        const exhausted = retryable && attempt >= maxAttempts;
        this.log.warn(`${capabilityId} failed after ${attempt} attempt(s): ${error.message}`, {
          stepId: request.stepId,
          errorType: error.name,
          exhausted,
        });
        return {
          ok: false,
          error,
          attempts: attempt,
          retries,
          recoverable: exhausted || error.recoverable,
          exhausted,
          canceled: false,
        };
      }

      const delayMs = computeBackoffDelay(policy, attempt + 1, this.random);
      request.source.emit({
        eventType: 'agent_error',
        payload: {
          stepId: request.stepId,
          attempt,
          agentId: capability.descriptor.agentId,
          maxAttempts,
          errorType: error.name,
          cause: error.message,
          recoverable: true,
          willRetry: true,
          delayMs,
        },
      });
      this.log.warn(`${capabilityId} retry ${attempt}/${maxAttempts} in ${delayMs}ms: ${error.message}`, {
        stepId: request.stepId,
      });
      retries++;

      try {
        await this.sleep(delayMs, outer);
      } catch {
        // Aborted during backoff
        return this.canceled(capabilityId, attempt, retries);
      }
    }
  }

  private canceled(capabilityId: string, attempts: number, retries: number): InvocationOutcome {
    this.log.info(`${capabilityId} canceled`, { attempts });
    return {
      ok: false,
      error: new CapabilityCanceledError(capabilityId),
      attempts,
      retries,
      recoverable: false,
      exhausted: false,
      canceled: true,
    };
  }

  /**
   * One attempt bounded by the timeout and the outer signal.
   *
   * @throws the attempt's failure, a {@link CapabilityTimeoutError}, a
   *   {@link CapabilityCanceledError} or a {@link SchemaViolationError}
   */
  private async runAttempt(
    capability: ICapability,
    input: ReviewInput,
    request: InvocationRequest,
    attempt: number,
    outer: AbortSignal,
  ): Promise<CapabilityResult> {
    const capabilityId = capability.descriptor.id;
    const controller = new AbortController();
    const { context, emit } = request.bindAttempt(attempt, controller.signal);

    let interruption: CapabilityError | undefined;
    let reject: (error: CapabilityError) => void = () => undefined;
    const interrupted = new Promise<never>((_, rejectInterrupted) => {
      reject = rejectInterrupted;
    });
    // Record the reason before aborting: the capability may reject in
    // response to the abort before the race sees the interruption.
    const interrupt = (error: CapabilityError): void => {
      interruption = error;
      controller.abort();
      reject(error);
    };
    const timer = setTimeout(() => {
      interrupt(new CapabilityTimeoutError(request.timeoutMs, capabilityId));
    }, request.timeoutMs);
    const onAbort = (): void => {
      interrupt(new CapabilityCanceledError(capabilityId));
    };
    outer.addEventListener('abort', onAbort, { once: true });

    const work = (async () => capability.analyze(input, context, emit))();
    // A late rejection from an interrupted attempt has already lost the race
    void work.catch((err: unknown) => {
      if (controller.signal.aborted) {
        this.log.debug(`${capabilityId} attempt ${attempt} settled after being interrupted`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    });

    let value: CapabilityResult;
    try {
      value = await Promise.race([work, interrupted]);
    } catch (err) {
      throw interruption ?? err;
    } finally {
      clearTimeout(timer);
      outer.removeEventListener('abort', onAbort);
    }

    const check = checkCapabilityResult(value);
    if (!check.valid) {
      throw new SchemaViolationError(check.problems, capabilityId);
    }
    return check.value;
  }
}
