/**
 * @fileoverview Plan Executor
 *
 * Drives one plan to completion:
 *
 * 1. Ask the scheduler for the next batch of ready steps.
 * 2. Move each step `ready -> running` and hand it to the dispatcher, at most
 *    `maxParallel` at a time.
 * 3. Wait for the whole batch (the barrier), record each outcome as
 *    `completed` or `failed`, and call the batch handler.
 * 4. Repeat until every step is resolved.
 *
 * A dispatcher that throws produces a `failed` outcome. Once the abort signal
 * fires no new step starts; every step not yet dispatched fails with reason
 * `canceled`.
 *
 * @module plan/executor
 */

import { EventEmitter } from 'events';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { PlanStateMachine } from './stateMachine';
import { Batch, selectBatch } from './scheduler';
import type { Plan, PlanStatus, PlanStep, StepTransitionEvent } from './types';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Raised for steps that never ran because the plan was canceled.
 */
export class StepCanceledError extends Error {
  constructor(public readonly stepId: string) {
    super(`Step '${stepId}' was canceled before dispatch`);
    this.name = 'StepCanceledError';
  }
}

/**
 * What a dispatcher learns about the step it runs.
 */
export interface StepContext {
  planId: string;
  batch: Batch;
  /** At least one dependency failed. */
  upstreamFailed: boolean;
  failedDependencies: string[];
  signal: AbortSignal;
}

/**
 * Dispatcher verdict for one step.
 */
export type DispatchResult<TResult> =
  | { ok: true; result: TResult; attempts: number }
  | { ok: false; error: Error; attempts: number; canceled?: boolean };

export type StepOutcome<TResult> = DispatchResult<TResult> & { stepId: string };

export type StepDispatcher<TResult> = (step: PlanStep, context: StepContext) => Promise<DispatchResult<TResult>>;

/**
 * Called once per batch, after every member has resolved and before the
 * next batch is selected.
 */
export type BatchHandler<TResult> = (batch: Batch, outcomes: StepOutcome<TResult>[]) => void | Promise<void>;

export interface PlanExecutorOptions<TResult> {
  dispatcher: StepDispatcher<TResult>;
  onBatchResolved?: BatchHandler<TResult>;
  /** Concurrency bound inside a fan-out batch. */
  maxParallel?: number;
  clock?: () => number;
  logger?: ILogger;
}

export interface PlanRunResult<TResult> {
  planId: string;
  status: PlanStatus;
  /** Outcomes keyed by step id, in resolution order. */
  outcomes: Map<string, StepOutcome<TResult>>;
  batches: Batch[];
  canceled: boolean;
}

/**
 * Events emitted by the executor
 */
export interface PlanExecutorEvents<TResult> {
  'transition': (event: StepTransitionEvent) => void;
  'batchStarted': (batch: Batch) => void;
  'batchResolved': (batch: Batch, outcomes: StepOutcome<TResult>[]) => void;
  'planResolved': (result: PlanRunResult<TResult>) => void;
}

// ============================================================================
// EXECUTOR
// ============================================================================

/**
 * Executes a plan's steps in dependency order with fan-out batches.
 *
 * Emits the events described by {@link PlanExecutorEvents}.
 */
export class PlanExecutor<TResult> extends EventEmitter {
  readonly stateMachine: PlanStateMachine;
  private readonly dispatcher: StepDispatcher<TResult>;
  private readonly onBatchResolved: BatchHandler<TResult> | undefined;
  private readonly maxParallel: number;
  private readonly log: ILogger;
  private started = false;

  constructor(readonly plan: Plan, options: PlanExecutorOptions<TResult>) {
    super();
    this.dispatcher = options.dispatcher;
    this.onBatchResolved = options.onBatchResolved;
    this.maxParallel = Math.max(1, options.maxParallel ?? Number.POSITIVE_INFINITY);
    this.log = options.logger ?? Logger.for('plan-executor');
    this.stateMachine = new PlanStateMachine(plan, options.clock);
    this.stateMachine.on('transition', (event: StepTransitionEvent) => this.emit('transition', event));
  }

  /**
   * Run the plan to completion. Can be called once.
   */
  async execute(signal: AbortSignal = new AbortController().signal): Promise<PlanRunResult<TResult>> {
    if (this.started) {
      throw new Error(`Plan ${this.plan.planId} has already been executed`);
    }
    this.started = true;

    const outcomes = new Map<string, StepOutcome<TResult>>();
    const batches: Batch[] = [];

    this.log.debug('Executing plan', { planId: this.plan.planId, steps: this.plan.order.length });

    while (!this.stateMachine.isResolved()) {
      if (signal.aborted) {
        this.cancelRemaining(outcomes);
        break;
      }

      const batch = selectBatch(this.plan, this.stateMachine, batches.length + 1);
      if (!batch) {
        // Unreachable for a validated acyclic plan
        throw new Error(`Plan ${this.plan.planId} stalled with unresolved steps`);
      }
      batches.push(batch);

      this.log.debug(`Dispatching batch ${batch.index} (${batch.mode})`, {
        planId: this.plan.planId,
        steps: batch.stepIds,
      });
      this.emit('batchStarted', batch);

      const batchOutcomes = await this.runBatch(batch, signal);
      for (const outcome of batchOutcomes) {
        outcomes.set(outcome.stepId, outcome);
      }

      this.emit('batchResolved', batch, batchOutcomes);
      if (this.onBatchResolved) {
        await this.onBatchResolved(batch, batchOutcomes);
      }
    }

    const result: PlanRunResult<TResult> = {
      planId: this.plan.planId,
      status: this.stateMachine.computePlanStatus(),
      outcomes,
      batches,
      canceled: signal.aborted,
    };
    this.emit('planResolved', result);
    return result;
  }

  private cancelRemaining(outcomes: Map<string, StepOutcome<TResult>>): void {
    const canceled = this.stateMachine.cancelPending();
    for (const stepId of canceled) {
      outcomes.set(stepId, { stepId, ok: false, error: new StepCanceledError(stepId), attempts: 0, canceled: true });
    }
    if (canceled.length > 0) {
      this.log.info('Plan canceled', { planId: this.plan.planId, canceledSteps: canceled });
    }
  }

  /**
   * Run every member of a batch with at most `maxParallel` in flight and
   * resolve once all have finished. Outcomes keep batch order.
   */
  private async runBatch(batch: Batch, signal: AbortSignal): Promise<StepOutcome<TResult>[]> {
    const results: Array<StepOutcome<TResult> | undefined> = new Array(batch.stepIds.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < batch.stepIds.length) {
        const position = next++;
        const stepId = batch.stepIds[position];
        results[position] = await this.runStep(stepId, batch, signal);
      }
    };

    const workers = Math.min(this.maxParallel, batch.stepIds.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    return results.filter((r): r is StepOutcome<TResult> => r !== undefined);
  }

  private async runStep(stepId: string, batch: Batch, signal: AbortSignal): Promise<StepOutcome<TResult>> {
    const step = this.plan.steps.get(stepId);
    const state = this.stateMachine.getStepState(stepId);
    if (!step || !state) {
      return { stepId, ok: false, error: new Error(`Unknown step: ${stepId}`), attempts: 0 };
    }

    if (signal.aborted) {
      this.stateMachine.transition(stepId, 'failed', { reason: 'canceled', error: 'Canceled before dispatch' });
      return { stepId, ok: false, error: new StepCanceledError(stepId), attempts: 0, canceled: true };
    }

    if (!this.stateMachine.transition(stepId, 'running')) {
      return { stepId, ok: false, error: new Error(`Step '${stepId}' could not be started`), attempts: 0 };
    }

    let result: DispatchResult<TResult>;
    try {
      result = await this.dispatcher(step, {
        planId: this.plan.planId,
        batch,
        upstreamFailed: state.upstreamFailed,
        failedDependencies: state.failedDependencies,
        signal,
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.warn(`Dispatcher threw for step ${stepId}`, { planId: this.plan.planId, error: error.message });
      result = { ok: false, error, attempts: 0 };
    }

    if (result.ok) {
      this.stateMachine.transition(stepId, 'completed', { attempts: result.attempts });
    } else {
      this.stateMachine.transition(stepId, 'failed', {
        attempts: result.attempts,
        error: result.error.message,
        reason: result.canceled ? 'canceled' : 'error',
      });
    }
    return { ...result, stepId };
  }
}
