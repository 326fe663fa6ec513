/**
 * @fileoverview Unit tests for RetrySupervisor attempts, backoff and cancellation.
 */

import * as assert from 'assert';
import * as sinon from 'sinon';
import { EventBus } from '../../../events/eventBus';
import {
  CapabilityCanceledError,
  CapabilityTimeoutError,
  RateLimitError,
  SchemaViolationError,
  TransientCapabilityError,
} from '../../../retry/errors';
import { DEFAULT_RETRY_POLICY, RetryPolicy, SleepAbortedError } from '../../../retry/policy';
import type { SleepFunction } from '../../../retry/policy';
import { InvocationRequest, RetrySupervisor } from '../../../retry/supervisor';
import type { CapabilityEventBody } from '../../../events/types';
import {
  SAMPLE_INPUT,
  ScriptedCapability,
  createStubLogger,
  emptyResult,
  flushImmediate,
  makeContext,
  makeFinding,
} from '../mocks/testHelpers';

suite('RetrySupervisor', () => {
  let bus: EventBus;
  let sleeps: number[];
  let supervisor: RetrySupervisor;
  let attemptSignals: AbortSignal[];

  const recordingSleep: SleepFunction = async (ms) => {
    sleeps.push(ms);
  };

  setup(() => {
    bus = new EventBus({ logger: createStubLogger() });
    sleeps = [];
    attemptSignals = [];
    supervisor = new RetrySupervisor({ sleep: recordingSleep, logger: createStubLogger() });
  });

  function request(overrides: Partial<InvocationRequest> = {}, policy: Partial<RetryPolicy> = {}): InvocationRequest {
    return {
      policy: { ...DEFAULT_RETRY_POLICY, ...policy },
      source: bus.source('security'),
      stepId: 's1',
      timeoutMs: 1000,
      bindAttempt: (attempt, signal) => {
        attemptSignals.push(signal);
        return {
          context: makeContext({ attempt, signal }),
          emit: (body: CapabilityEventBody) => {
            bus.source('security').emit(body);
          },
        };
      },
      ...overrides,
    };
  }

  function failingTimes(count: number, makeError: () => unknown): ScriptedCapability {
    let calls = 0;
    return new ScriptedCapability('security', async () => {
      calls++;
      if (calls <= count) throw makeError();
      return emptyResult({ summary: `attempt ${calls}` });
    });
  }

  function agentErrors() {
    return bus.getHistory({ eventTypes: ['agent_error'] }).flatMap(e => (e.eventType === 'agent_error' ? [e.payload] : []));
  }

  test('returns the first successful result', async () => {
    const capability = new ScriptedCapability('security');

    const outcome = await supervisor.invoke(capability, SAMPLE_INPUT, request());

    assert.deepStrictEqual(outcome, { ok: true, result: emptyResult(), attempts: 1, retries: 0 });
    assert.deepStrictEqual(agentErrors(), []);
  });

  test('retries transient failures with exponential backoff', async () => {
    const capability = failingTimes(2, () => new TransientCapabilityError('blip'));

    const outcome = await supervisor.invoke(capability, SAMPLE_INPUT, request());

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.attempts, 3);
    assert.strictEqual(outcome.retries, 2);
    assert.strictEqual(outcome.result.summary, 'attempt 3');
    assert.deepStrictEqual(sleeps, [400, 800]);
    assert.deepStrictEqual(capability.calls.map(c => c.attempt), [1, 2, 3]);
  });

  test('publishes one agent_error per retry under the capability source', async () => {
    await supervisor.invoke(failingTimes(1, () => new TransientCapabilityError('blip')), SAMPLE_INPUT, request());

    const [event] = bus.getHistory({ eventTypes: ['agent_error'] });
    assert.strictEqual(event.sourceId, 'security');
    assert.deepStrictEqual(agentErrors(), [{
      stepId: 's1',
      attempt: 1,
      agentId: 'security_agent',
      maxAttempts: 3,
      errorType: 'TransientCapabilityError',
      cause: 'blip',
      recoverable: true,
      willRetry: true,
      delayMs: 400,
    }]);
  });

  test('stops after maxAttempts and reports exhaustion', async () => {
    const capability = failingTimes(10, () => ({ code: 'ECONNRESET', message: 'socket hang up' }));

    const outcome = await supervisor.invoke(capability, SAMPLE_INPUT, request());

    assert.ok(!outcome.ok);
    assert.ok(outcome.error instanceof TransientCapabilityError);
    assert.strictEqual(outcome.error.message, 'ECONNRESET: socket hang up');
    assert.strictEqual(outcome.attempts, 3);
    assert.strictEqual(outcome.retries, 2);
    assert.strictEqual(outcome.exhausted, true);
    assert.strictEqual(outcome.recoverable, true);
    assert.strictEqual(agentErrors().length, 2);
  });

  test('does not retry non-recoverable errors', async () => {
    const capability = failingTimes(10, () => new TypeError('bad state'));

    const outcome = await supervisor.invoke(capability, SAMPLE_INPUT, request());

    assert.ok(!outcome.ok);
    assert.strictEqual(outcome.attempts, 1);
    assert.strictEqual(outcome.exhausted, false);
    assert.strictEqual(outcome.recoverable, false);
    assert.deepStrictEqual(sleeps, []);
  });

  test('retryOn and neverRetryOn adjust the decision', async () => {
    const allowed = await supervisor.invoke(
      failingTimes(1, () => new TypeError('bad state')),
      SAMPLE_INPUT,
      request({}, { retryOn: ['TypeError'] }),
    );
    const denied = await supervisor.invoke(
      failingTimes(1, () => new RateLimitError('slow down')),
      SAMPLE_INPUT,
      request({}, { neverRetryOn: ['RateLimitError'] }),
    );

    assert.strictEqual(allowed.ok, true);
    assert.strictEqual(allowed.attempts, 2);
    assert.strictEqual(denied.ok, false);
    assert.strictEqual(denied.attempts, 1);
  });

  test('rejects results that fail the result schema', async () => {
    const capability = new ScriptedCapability('security', async () =>
      emptyResult({ findings: [makeFinding({ confidence: 2 })] }),
    );

    const outcome = await supervisor.invoke(capability, SAMPLE_INPUT, request());

    assert.ok(!outcome.ok);
    assert.ok(outcome.error instanceof SchemaViolationError);
    assert.strictEqual(outcome.attempts, 1);
  });

  test('times out slow attempts and aborts their signal', async () => {
    const capability = new ScriptedCapability('security', (_input, context) =>
      new Promise((_resolve, reject) => {
        context.signal.addEventListener('abort', () => reject(new Error('stopped')));
      }),
    );

    const outcome = await supervisor.invoke(capability, SAMPLE_INPUT, request({ timeoutMs: 5 }, { maxAttempts: 2 }));

    assert.ok(!outcome.ok);
    assert.ok(outcome.error instanceof CapabilityTimeoutError);
    assert.strictEqual(outcome.error.message, 'Capability timed out after 5ms');
    assert.strictEqual(outcome.attempts, 2);
    assert.strictEqual(outcome.exhausted, true);
    assert.deepStrictEqual(attemptSignals.map(s => s.aborted), [true, true]);
  });

  test('cancellation during an attempt ends without retrying', async () => {
    const controller = new AbortController();
    const capability = new ScriptedCapability('security', (_input, context) =>
      new Promise((_resolve, reject) => {
        context.signal.addEventListener('abort', () => reject(new Error('stopped')));
      }),
    );

    const pending = supervisor.invoke(capability, SAMPLE_INPUT, request({ signal: controller.signal }));
    await flushImmediate();
    controller.abort();
    const outcome = await pending;

    assert.ok(!outcome.ok);
    assert.ok(outcome.error instanceof CapabilityCanceledError);
    assert.strictEqual(outcome.canceled, true);
    assert.strictEqual(outcome.attempts, 1);
    assert.strictEqual(capability.calls.length, 1);
  });

  test('cancellation during backoff ends the invocation', async () => {
    const controller = new AbortController();
    const abortingSleep = sinon.spy(async () => {
      controller.abort();
      throw new SleepAbortedError();
    });
    const local = new RetrySupervisor({ sleep: abortingSleep, logger: createStubLogger() });

    const outcome = await local.invoke(
      failingTimes(5, () => new TransientCapabilityError('blip')),
      SAMPLE_INPUT,
      request({ signal: controller.signal }),
    );

    assert.ok(!outcome.ok);
    assert.strictEqual(outcome.canceled, true);
    assert.strictEqual(outcome.attempts, 1);
    assert.strictEqual(outcome.retries, 1);
    sinon.assert.calledOnce(abortingSleep);
  });

  test('an already aborted signal makes no attempt', async () => {
    const controller = new AbortController();
    controller.abort();
    const capability = new ScriptedCapability('security');

    const outcome = await supervisor.invoke(capability, SAMPLE_INPUT, request({ signal: controller.signal }));

    assert.strictEqual(outcome.ok, false);
    assert.strictEqual(outcome.attempts, 0);
    assert.strictEqual(capability.calls.length, 0);
  });
});
