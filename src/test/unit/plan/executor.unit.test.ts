/**
 * @fileoverview Unit tests for PlanExecutor batching, barriers and cancellation.
 */

import * as assert from 'assert';
import * as sinon from 'sinon';
import { buildPlan } from '../../../plan/builder';
import { PlanExecutor, StepCanceledError } from '../../../plan/executor';
import type { DispatchResult, StepContext, StepDispatcher } from '../../../plan/executor';
import type { Batch } from '../../../plan/scheduler';
import type { PlanSpec, PlanStep } from '../../../plan/types';
import { createStubLogger, flushImmediate } from '../mocks/testHelpers';

const reviewSpec: PlanSpec = {
  steps: [
    { stepId: 's1', capabilityId: 'security', dependencies: [], parallel: true },
    { stepId: 's2', capabilityId: 'bug', dependencies: [], parallel: true },
    { stepId: 's3', capabilityId: 'verify', dependencies: ['s1', 's2'], parallel: false },
  ],
};

suite('PlanExecutor', () => {
  let trace: string[];
  let contexts: Map<string, StepContext>;

  setup(() => {
    sinon.stub(console, 'error');
    sinon.stub(console, 'warn');
    trace = [];
    contexts = new Map();
  });

  teardown(() => {
    sinon.restore();
  });

  function tracingDispatcher(failing: ReadonlySet<string> = new Set()): StepDispatcher<string> {
    return async (step: PlanStep, context: StepContext): Promise<DispatchResult<string>> => {
      contexts.set(step.stepId, context);
      trace.push(`start:${step.stepId}`);
      await flushImmediate();
      trace.push(`end:${step.stepId}`);
      if (failing.has(step.stepId)) {
        return { ok: false, error: new Error(`${step.stepId} failed`), attempts: 3 };
      }
      return { ok: true, result: `${step.capabilityId}-result`, attempts: 1 };
    };
  }

  function executor(dispatcher: StepDispatcher<string>, extra: { maxParallel?: number } = {}) {
    return new PlanExecutor<string>(buildPlan(reviewSpec, { planId: 'p1' }), {
      dispatcher,
      logger: createStubLogger(),
      ...extra,
    });
  }

  test('fans out parallel roots, then runs the dependent after the barrier', async () => {
    const result = await executor(tracingDispatcher()).execute();

    assert.deepStrictEqual(trace, ['start:s1', 'start:s2', 'end:s1', 'end:s2', 'start:s3', 'end:s3']);
    assert.deepStrictEqual(result.batches, [
      { index: 1, mode: 'parallel', stepIds: ['s1', 's2'] },
      { index: 2, mode: 'sequential', stepIds: ['s3'] },
    ]);
    assert.strictEqual(result.status, 'completed');
    assert.strictEqual(result.canceled, false);
    assert.deepStrictEqual(result.outcomes.get('s3'), { ok: true, result: 'verify-result', attempts: 1, stepId: 's3' });
  });

  test('maxParallel bounds concurrency inside a batch', async () => {
    await executor(tracingDispatcher(), { maxParallel: 1 }).execute();

    assert.deepStrictEqual(trace.slice(0, 4), ['start:s1', 'end:s1', 'start:s2', 'end:s2']);
  });

  test('a failed dependency marks the dependent upstreamFailed but still runs it', async () => {
    const exec = executor(tracingDispatcher(new Set(['s1'])));

    const result = await exec.execute();

    assert.strictEqual(contexts.get('s3')?.upstreamFailed, true);
    assert.deepStrictEqual(contexts.get('s3')?.failedDependencies, ['s1']);
    assert.strictEqual(result.status, 'partial');
    assert.strictEqual(exec.stateMachine.getStepState('s1')?.attempts, 3);
    assert.strictEqual(exec.stateMachine.getStepState('s1')?.error, 's1 failed');
  });

  test('every step failing yields a failed plan', async () => {
    const result = await executor(tracingDispatcher(new Set(['s1', 's2', 's3']))).execute();
    assert.strictEqual(result.status, 'failed');
  });

  test('a throwing dispatcher produces a failed outcome', async () => {
    const result = await executor(async (step) => {
      if (step.stepId === 's2') throw new Error('dispatcher exploded');
      return { ok: true, result: 'ok', attempts: 1 };
    }).execute();

    const outcome = result.outcomes.get('s2');
    assert.ok(outcome && !outcome.ok);
    assert.strictEqual(outcome.error.message, 'dispatcher exploded');
    assert.strictEqual(outcome.attempts, 0);
  });

  test('the batch handler runs at each barrier before the next batch starts', async () => {
    const exec = new PlanExecutor<string>(buildPlan(reviewSpec), {
      dispatcher: tracingDispatcher(),
      logger: createStubLogger(),
      onBatchResolved: async (batch: Batch, outcomes) => {
        await flushImmediate();
        trace.push(`barrier:${batch.index}:${outcomes.map(o => o.stepId).join(',')}`);
      },
    });

    await exec.execute();

    assert.deepStrictEqual(trace, [
      'start:s1', 'start:s2', 'end:s1', 'end:s2', 'barrier:1:s1,s2', 'start:s3', 'end:s3', 'barrier:2:s3',
    ]);
  });

  test('aborting stops new dispatches and cancels remaining steps', async () => {
    const controller = new AbortController();
    const exec = executor(async (step) => {
      trace.push(step.stepId);
      if (step.stepId === 's1') controller.abort();
      return { ok: true, result: 'ok', attempts: 1 };
    }, { maxParallel: 1 });

    const result = await exec.execute(controller.signal);

    assert.deepStrictEqual(trace, ['s1']);
    assert.strictEqual(result.canceled, true);
    assert.strictEqual(result.status, 'partial');
    const s2 = result.outcomes.get('s2');
    assert.ok(s2 && !s2.ok);
    assert.ok(s2.error instanceof StepCanceledError);
    assert.strictEqual(s2.canceled, true);
    assert.strictEqual(exec.stateMachine.getStepState('s3')?.failureReason, 'canceled');
  });

  test('can only execute once', async () => {
    const exec = executor(tracingDispatcher());
    await exec.execute();

    await assert.rejects(exec.execute(), /has already been executed/);
  });
});
