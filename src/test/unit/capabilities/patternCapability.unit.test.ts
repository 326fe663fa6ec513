/**
 * @fileoverview Unit tests for the rule-driven security and bug analyzers.
 */

import * as assert from 'assert';
import { BugCapability } from '../../../capabilities/bugCapability';
import { scanLines } from '../../../capabilities/patternCapability';
import { loadBundledRuleSet } from '../../../capabilities/rules';
import { SecurityCapability } from '../../../capabilities/securityCapability';
import type { CapabilityEventBody } from '../../../events/types';
import { CapabilityCanceledError } from '../../../retry/errors';
import { SAMPLE_INPUT, createStubLogger, makeContext } from '../mocks/testHelpers';

suite('Pattern capabilities', () => {
  let emitted: CapabilityEventBody[];
  const emit = (body: CapabilityEventBody): void => {
    emitted.push(body);
  };

  setup(() => {
    emitted = [];
  });

  suite('scanLines', () => {
    test('orders matches by line, then rule order', () => {
      const { rules } = loadBundledRuleSet('bug');
      const matches = scanLines('a = 1\nif x == None and y != None:\n    pass', rules);

      assert.deepStrictEqual(
        matches.map(m => [m.line, m.rule.id]),
        [[2, 'BUG001'], [2, 'BUG002']],
      );
    });

    test('handles CRLF line endings', () => {
      const { rules } = loadBundledRuleSet('bug');
      const matches = scanLines('ok\r\nif x == None:\r\n', rules);

      assert.deepStrictEqual(matches.map(m => [m.line, m.text]), [[2, 'if x == None:']]);
    });
  });

  suite('SecurityCapability', () => {
    test('reports a finding and a fix for each match', async () => {
      const capability = new SecurityCapability(undefined, createStubLogger());

      const result = await capability.analyze(SAMPLE_INPUT, makeContext({ stepId: 's1', attempt: 2 }), emit);

      assert.strictEqual(result.status, 'completed');
      assert.strictEqual(result.summary, '1 security issue(s), 1 fix(es) proposed');
      assert.strictEqual(result.findings.length, 1);
      const [finding] = result.findings;
      assert.deepStrictEqual(
        { ...finding, findingId: 'x' },
        {
          findingId: 'x',
          stepId: 's1',
          agentId: 'security_agent',
          category: 'security',
          findingType: 'command_injection',
          severity: 'critical',
          title: 'Shell command executed with os.system',
          description: 'os.system passes its argument to the shell, so any interpolated input can inject additional commands.',
          location: { file: 'sample.py', lineStart: 2, lineEnd: 2, codeSnippet: 'os.system(cmd)' },
          confidence: 0.9,
          ruleId: 'SEC002',
        },
      );

      const [fix] = result.fixes;
      assert.strictEqual(fix.findingId, finding.findingId);
      assert.strictEqual(fix.originalCode, 'os.system(cmd)');
      assert.strictEqual(fix.proposedCode, 'subprocess.run(shlex.split(cmd), check=True)');
      assert.strictEqual(fix.verificationStatus, 'pending');
    });

    test('emits progress events scoped to the step and attempt', async () => {
      const capability = new SecurityCapability(undefined, createStubLogger());

      await capability.analyze(SAMPLE_INPUT, makeContext({ stepId: 's1', attempt: 2 }), emit);

      assert.deepStrictEqual(emitted.map(e => e.eventType), [
        'agent_started',
        'thinking',
        'tool_call_start',
        'tool_call_result',
        'finding_discovered',
        'fix_proposed',
        'agent_completed',
      ]);
      assert.ok(emitted.every(e => e.payload.stepId === 's1' && e.payload.attempt === 2));

      const [started, thinking, , toolResult] = emitted;
      assert.ok(started.eventType === 'agent_started');
      assert.strictEqual(started.payload.task, 'Security vulnerability analysis: sample.py (3 lines)');
      assert.ok(thinking.eventType === 'thinking');
      assert.strictEqual(thinking.payload.content, 'Checking 3 lines against 9 security rules');
      assert.ok(toolResult.eventType === 'tool_call_result');
      assert.strictEqual(toolResult.payload.resultSummary, '1 match(es)');
    });

    test('refuses to start when already canceled', async () => {
      const controller = new AbortController();
      controller.abort();
      const capability = new SecurityCapability(undefined, createStubLogger());

      await assert.rejects(
        capability.analyze(SAMPLE_INPUT, makeContext({ signal: controller.signal }), emit),
        CapabilityCanceledError,
      );
      assert.deepStrictEqual(emitted, []);
    });
  });

  suite('BugCapability', () => {
    test('finds None comparisons and bare excepts', async () => {
      const capability = new BugCapability(undefined, createStubLogger());
      const code = ['try:', '    ok = x == None', 'except:', '    pass'].join('\n');

      const result = await capability.analyze({ code, filename: 'app.py' }, makeContext({ stepId: 's2' }), emit);

      assert.deepStrictEqual(
        result.findings.map(f => [f.ruleId, f.location.lineStart, f.agentId, f.stepId]),
        [['BUG001', 2, 'bug_agent', 's2'], ['BUG003', 3, 'bug_agent', 's2']],
      );
      assert.deepStrictEqual(result.fixes.map(f => f.proposedCode), ['    ok = x is None', 'except Exception:']);
    });

    test('clean code yields no findings', async () => {
      const capability = new BugCapability(undefined, createStubLogger());

      const result = await capability.analyze({ code: 'x = 1\n', filename: 'app.py' }, makeContext(), emit);

      assert.deepStrictEqual(result.findings, []);
      assert.strictEqual(result.summary, '0 bug issue(s), 0 fix(es) proposed');
    });
  });
});
