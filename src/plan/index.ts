/**
 * @fileoverview Plan module exports.
 *
 * @module plan
 */

export * from './types';
export { buildPlan, toPlanSpec, PlanValidationError } from './builder';
export type { BuildPlanOptions } from './builder';
export { PlanStateMachine } from './stateMachine';
export type { PlanStateMachineEvents, TransitionUpdates } from './stateMachine';
export { selectBatch } from './scheduler';
export type { Batch, BatchMode } from './scheduler';
export { PlanExecutor, StepCanceledError } from './executor';
export type {
  StepContext,
  DispatchResult,
  StepOutcome,
  StepDispatcher,
  BatchHandler,
  PlanExecutorOptions,
  PlanRunResult,
  PlanExecutorEvents,
} from './executor';
