/**
 * @fileoverview Plan State Machine
 *
 * The single source of truth for step execution state.
 * Enforces valid state transitions and emits events.
 *
 * Key Principles:
 * - State is stored in a Map<stepId, StepExecutionState>
 * - All transitions go through the state machine
 * - Invalid transitions are rejected and logged, never silently applied
 * - A failed step counts as resolved: its dependents still become ready,
 *   flagged with `upstreamFailed`
 *
 * @module plan/stateMachine
 */

import { EventEmitter } from 'events';
import {
  Plan,
  PlanStatus,
  StepStatus,
  StepExecutionState,
  StepTransitionEvent,
  PlanCompletionEvent,
  FailureReason,
  isValidTransition,
  isTerminal,
} from './types';
import { Logger } from '../core/logger';

const log = Logger.for('plan-state');

/**
 * Events emitted by the state machine
 */
export interface PlanStateMachineEvents {
  'transition': (event: StepTransitionEvent) => void;
  'stepReady': (planId: string, stepId: string) => void;
  'planComplete': (event: PlanCompletionEvent) => void;
}

/**
 * Extra fields applied together with a transition.
 */
export interface TransitionUpdates {
  error?: string;
  reason?: FailureReason;
  attempts?: number;
}

/**
 * Plan State Machine - manages execution state for one plan
 *
 * Emits the events described by {@link PlanStateMachineEvents}.
 */
export class PlanStateMachine extends EventEmitter {
  private readonly states = new Map<string, StepExecutionState>();
  private completed = false;

  constructor(
    private readonly plan: Plan,
    private readonly clock: () => number = Date.now,
  ) {
    super();
    for (const stepId of plan.order) {
      const step = plan.steps.get(stepId);
      this.states.set(stepId, {
        status: step && step.dependencies.length === 0 ? 'ready' : 'pending',
        attempts: 0,
        upstreamFailed: false,
        failedDependencies: [],
        version: 0,
      });
    }
  }

  get planId(): string {
    return this.plan.planId;
  }

  getStepStatus(stepId: string): StepStatus | undefined {
    return this.states.get(stepId)?.status;
  }

  /**
   * A copy of the step's execution state.
   */
  getStepState(stepId: string): StepExecutionState | undefined {
    const state = this.states.get(stepId);
    return state ? { ...state, failedDependencies: [...state.failedDependencies] } : undefined;
  }

  /**
   * Transition a step to a new status.
   *
   * `pending -> failed` and `ready -> failed` are accepted only with
   * `reason: 'canceled'`.
   *
   * @returns true if the transition was applied, false if rejected
   */
  transition(stepId: string, newStatus: StepStatus, updates: TransitionUpdates = {}): boolean {
    const state = this.states.get(stepId);
    if (!state) {
      log.error(`Cannot transition unknown step: ${stepId}`, { planId: this.plan.planId });
      return false;
    }

    const currentStatus = state.status;

    if (!isValidTransition(currentStatus, newStatus)) {
      log.warn(`Invalid transition rejected: ${stepId} ${currentStatus} -> ${newStatus}`, {
        planId: this.plan.planId,
      });
      return false;
    }

    if (newStatus === 'failed' && currentStatus !== 'running' && updates.reason !== 'canceled') {
      log.warn(`Invalid transition rejected: ${stepId} ${currentStatus} -> failed outside cancellation`, {
        planId: this.plan.planId,
      });
      return false;
    }

    state.status = newStatus;
    state.version++;
    if (updates.error !== undefined) state.error = updates.error;
    if (updates.attempts !== undefined) state.attempts = updates.attempts;
    if (newStatus === 'failed') state.failureReason = updates.reason ?? 'error';

    const now = this.clock();
    if (newStatus === 'running' && state.startedAt === undefined) {
      state.startedAt = now;
    }
    if (isTerminal(newStatus) && state.endedAt === undefined) {
      state.endedAt = now;
    }

    log.debug(`Step transition: ${stepId} ${currentStatus} -> ${newStatus}`, {
      planId: this.plan.planId,
    });

    const event: StepTransitionEvent = {
      planId: this.plan.planId,
      stepId,
      from: currentStatus,
      to: newStatus,
      timestamp: now,
      ...(newStatus === 'failed' ? { reason: state.failureReason } : {}),
    };
    this.emit('transition', event);

    if (isTerminal(newStatus)) {
      this.checkDependentsReady(stepId);
      this.checkPlanCompletion();
    }

    return true;
  }

  /**
   * Promote dependents of a resolved step whose dependencies are all
   * resolved.
   */
  private checkDependentsReady(resolvedStepId: string): void {
    const step = this.plan.steps.get(resolvedStepId);
    if (!step) return;

    for (const dependentId of step.dependents) {
      const dependentState = this.states.get(dependentId);
      if (dependentState?.status !== 'pending' || !this.areDependenciesResolved(dependentId)) {
        continue;
      }
      const failed = this.getFailedDependencies(dependentId);
      dependentState.upstreamFailed = failed.length > 0;
      dependentState.failedDependencies = failed;
      if (this.transition(dependentId, 'ready')) {
        this.emit('stepReady', this.plan.planId, dependentId);
      }
    }
  }

  /**
   * Every dependency of the step is `completed` or `failed`.
   */
  areDependenciesResolved(stepId: string): boolean {
    const step = this.plan.steps.get(stepId);
    if (!step) return false;
    return step.dependencies.every(depId => {
      const status = this.states.get(depId)?.status;
      return status !== undefined && isTerminal(status);
    });
  }

  getFailedDependencies(stepId: string): string[] {
    const step = this.plan.steps.get(stepId);
    if (!step) return [];
    return step.dependencies.filter(depId => this.states.get(depId)?.status === 'failed');
  }

  private checkPlanCompletion(): void {
    if (this.completed) return;
    const status = this.computePlanStatus();
    if (status === 'pending' || status === 'running') return;

    this.completed = true;
    const event: PlanCompletionEvent = {
      planId: this.plan.planId,
      status,
      completedSteps: this.getStepsByStatus('completed'),
      failedSteps: this.getStepsByStatus('failed'),
    };
    log.info(`Plan resolved: ${status}`, {
      planId: this.plan.planId,
      completed: event.completedSteps.length,
      failed: event.failedSteps.length,
    });
    this.emit('planComplete', event);
  }

  /**
   * Compute the overall plan status from step states.
   */
  computePlanStatus(): PlanStatus {
    const counts = this.getStatusCounts();
    const total = this.states.size;

    if (counts.completed + counts.failed < total) {
      return counts.running > 0 || counts.completed + counts.failed > 0 ? 'running' : 'pending';
    }
    if (counts.failed === 0) return 'completed';
    if (counts.completed === 0) return 'failed';
    return 'partial';
  }

  /**
   * All steps resolved.
   */
  isResolved(): boolean {
    for (const state of this.states.values()) {
      if (!isTerminal(state.status)) return false;
    }
    return true;
  }

  /**
   * Step ids in a given status, in plan order.
   */
  getStepsByStatus(status: StepStatus): string[] {
    return this.plan.order.filter(id => this.states.get(id)?.status === status);
  }

  /**
   * Ready steps in plan order.
   */
  getReadySteps(): string[] {
    return this.getStepsByStatus('ready');
  }

  getStatusCounts(): Record<StepStatus, number> {
    const counts: Record<StepStatus, number> = {
      pending: 0,
      ready: 0,
      running: 0,
      completed: 0,
      failed: 0,
    };
    for (const state of this.states.values()) {
      counts[state.status]++;
    }
    return counts;
  }

  /**
   * Fail every step that has not started, with reason `canceled`.
   * Running steps are left to finish.
   *
   * @returns ids of the steps canceled
   */
  cancelPending(): string[] {
    const canceled: string[] = [];
    for (const stepId of this.plan.order) {
      const status = this.states.get(stepId)?.status;
      if (status !== 'pending' && status !== 'ready') continue;
      if (this.transition(stepId, 'failed', { reason: 'canceled', error: 'Canceled before dispatch' })) {
        canceled.push(stepId);
      }
    }
    return canceled;
  }
}
