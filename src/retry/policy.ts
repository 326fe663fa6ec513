/**
 * @fileoverview Retry policy, backoff delay and retry decision.
 *
 * @module retry/policy
 */

import type { RetryPolicySettings } from '../core/settings';
import { CapabilityError } from './errors';

/**
 * Policy applied to one capability invocation.
 */
export type RetryPolicy = RetryPolicySettings;

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 400,
  maxDelayMs: 3000,
  jitterMs: 0,
  retryOn: [],
  neverRetryOn: [],
});

/**
 * Delay before attempt `nextAttempt` (2 for the first retry):
 * `min(maxDelayMs, baseDelayMs * 2^(nextAttempt - 2))`, plus a jitter drawn
 * uniformly from `[-jitterMs, +jitterMs]`, never below 0.
 *
 * @param random - Uniform source in [0, 1)
 */
export function computeBackoffDelay(
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>,
  nextAttempt: number,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, nextAttempt - 2);
  const base = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  if (policy.jitterMs <= 0) {
    return base;
  }
  const jitter = (random() * 2 - 1) * policy.jitterMs;
  return Math.max(0, Math.round(base + jitter));
}

/**
 * Whether a failed attempt may be retried under `policy`.
 *
 * `neverRetryOn` wins; otherwise recoverable errors and errors named in
 * `retryOn` are retried. Cancellation is never retried.
 */
export function isRetryable(error: CapabilityError, policy: Pick<RetryPolicy, 'retryOn' | 'neverRetryOn'>): boolean {
  if (error.name === 'CapabilityCanceledError') {
    return false;
  }
  const names = error.matchNames;
  if (names.some(name => policy.neverRetryOn.includes(name))) {
    return false;
  }
  if (error.recoverable) {
    return true;
  }
  return names.some(name => policy.retryOn.includes(name));
}

/**
 * Sleep that rejects when `signal` aborts.
 */
export type SleepFunction = (ms: number, signal: AbortSignal) => Promise<void>;

export class SleepAbortedError extends Error {
  constructor() {
    super('Sleep aborted');
    this.name = 'SleepAbortedError';
  }
}

export const defaultSleep: SleepFunction = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(new SleepAbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new SleepAbortedError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
