/**
 * @fileoverview Plan Core Types
 *
 * Defines the types of the step DAG that drives a review.
 *
 * Key Concepts:
 * - PlanSpec: ordered step specifications (input, and the form published in
 *   `plan_created`)
 * - Plan: immutable topology built from a spec
 * - StepExecutionState: mutable per-step state owned by the state machine
 * - StepStatus: valid states for a step
 *
 * @module plan/types
 */

// ============================================================================
// STEP STATUS
// ============================================================================

/**
 * Valid step status values.
 * Terminal states: completed, failed
 */
export type StepStatus =
  | 'pending'     // Waiting for dependencies
  | 'ready'       // Every dependency resolved, can be dispatched
  | 'running'     // Capability invocation in flight
  | 'completed'   // Capability returned a result
  | 'failed';     // Capability failed, or the step was canceled

/**
 * Terminal states - steps in these states never change again
 */
export const TERMINAL_STATES: readonly StepStatus[] = ['completed', 'failed'];

/**
 * Valid state transitions. `pending -> failed` and `ready -> failed` are
 * only taken on cancellation; the state machine enforces that.
 */
export const VALID_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  'pending':   ['ready', 'failed'],
  'ready':     ['running', 'failed'],
  'running':   ['completed', 'failed'],
  'completed': [],  // Terminal
  'failed':    [],  // Terminal
};

export function isTerminal(status: StepStatus): boolean {
  return TERMINAL_STATES.includes(status);
}

export function isValidTransition(from: StepStatus, to: StepStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

// ============================================================================
// SPECIFICATION (input)
// ============================================================================

/**
 * One step of a plan specification.
 */
export interface PlanStepSpec {
  /** Canonical id, unique within the plan. Never regenerated. */
  stepId: string;
  /** Registry id of the capability this step invokes. */
  capabilityId: string;
  /** Step ids that must resolve before this one is dispatched. */
  dependencies: string[];
  /** Whether the step may share a fan-out batch with other ready steps. */
  parallel: boolean;
  description?: string;
}

export interface PlanSpec {
  steps: PlanStepSpec[];
}

// ============================================================================
// PLAN (immutable topology)
// ============================================================================

export interface PlanStep {
  readonly stepId: string;
  readonly capabilityId: string;
  readonly dependencies: readonly string[];
  readonly parallel: boolean;
  readonly description?: string;
  /** Steps that list this one as a dependency. */
  readonly dependents: readonly string[];
}

export interface Plan {
  readonly planId: string;
  readonly steps: ReadonlyMap<string, PlanStep>;
  /** Step ids in specification order. */
  readonly order: readonly string[];
  /** Steps with no dependencies. */
  readonly roots: readonly string[];
  /** Steps nothing depends on. */
  readonly leaves: readonly string[];
  readonly createdAt: number;
}

// ============================================================================
// EXECUTION STATE
// ============================================================================

/** Why a step ended in `failed`. */
export type FailureReason = 'error' | 'canceled';

export interface StepExecutionState {
  status: StepStatus;
  /** Capability attempts made (retries included). */
  attempts: number;
  startedAt?: number;
  endedAt?: number;
  error?: string;
  failureReason?: FailureReason;
  /** At least one dependency failed. Set when the step becomes ready. */
  upstreamFailed: boolean;
  failedDependencies: string[];
  /** Monotonic per step. */
  version: number;
}

/**
 * Overall plan status derived from step states.
 */
export type PlanStatus = 'pending' | 'running' | 'completed' | 'partial' | 'failed';

export interface StepTransitionEvent {
  planId: string;
  stepId: string;
  from: StepStatus;
  to: StepStatus;
  timestamp: number;
  reason?: FailureReason;
}

export interface PlanCompletionEvent {
  planId: string;
  status: PlanStatus;
  completedSteps: string[];
  failedSteps: string[];
}
