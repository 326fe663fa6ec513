/**
 * @fileoverview Retry module exports.
 *
 * @module retry
 */

export * from './errors';
export {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  isRetryable,
  defaultSleep,
  SleepAbortedError,
} from './policy';
export type { RetryPolicy, SleepFunction } from './policy';
export { RetrySupervisor } from './supervisor';
export type {
  AttemptBinding,
  InvocationRequest,
  InvocationOutcome,
  RetrySupervisorOptions,
} from './supervisor';
