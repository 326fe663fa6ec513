/**
 * @fileoverview Plan Scheduler
 *
 * Decides which ready steps form the next batch:
 * - If any ready step is `parallel`, every ready parallel step is dispatched
 *   together as one fan-out batch.
 * - Otherwise the first ready sequential step (plan order) runs alone.
 *
 * Parallel-ready steps win over sequential-ready ones in the same round.
 * The scheduler is stateless - it just picks steps based on current state.
 *
 * @module plan/scheduler
 */

import type { Plan } from './types';
import type { PlanStateMachine } from './stateMachine';

export type BatchMode = 'parallel' | 'sequential';

export interface Batch {
  /** 1-based position of the batch within the run. */
  index: number;
  mode: BatchMode;
  stepIds: string[];
}

/**
 * Select the next batch, or undefined when nothing is ready.
 */
export function selectBatch(plan: Plan, stateMachine: PlanStateMachine, index: number): Batch | undefined {
  const ready = stateMachine.getReadySteps();
  if (ready.length === 0) {
    return undefined;
  }

  const parallel = ready.filter(id => plan.steps.get(id)?.parallel === true);
  if (parallel.length > 0) {
    return { index, mode: 'parallel', stepIds: parallel };
  }

  return { index, mode: 'sequential', stepIds: [ready[0]] };
}
