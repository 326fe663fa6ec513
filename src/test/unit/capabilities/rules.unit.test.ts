/**
 * @fileoverview Unit tests for rule set loading, validation and fix templates.
 */

import * as assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  RuleSetError,
  RuleSpec,
  applyRuleFix,
  compileRuleSet,
  loadBundledRuleSet,
  loadRuleSet,
} from '../../../capabilities/rules';

function rule(overrides: Partial<RuleSpec> = {}): RuleSpec {
  return {
    id: 'R1',
    category: 'bug',
    findingType: 'logic_error',
    severity: 'low',
    confidence: 0.9,
    pattern: '==\\s*None\\b',
    flags: '',
    title: 'Equality with None',
    description: 'Use is None',
    fix: { replacement: 'is None', explanation: 'Identity comparison' },
    ...overrides,
  };
}

suite('Rule sets', () => {
  suite('compileRuleSet', () => {
    test('compiles patterns and fix patterns', () => {
      const set = compileRuleSet({ name: 'bug', rules: [rule()] }, 'inline');

      assert.strictEqual(set.name, 'bug');
      assert.ok(set.rules[0].regex.test('if x == None:'));
      assert.ok(set.rules[0].fixRegex);
    });

    test('rejects duplicate rule ids', () => {
      assert.throws(
        () => compileRuleSet({ name: 'bug', rules: [rule(), rule()] }, 'inline'),
        (err: unknown) => {
          assert.ok(err instanceof RuleSetError);
          assert.strictEqual(err.message, "Invalid rule set (inline):\n- Duplicate rule id 'R1'");
          return true;
        },
      );
    });

    test('reports invalid regular expressions', () => {
      assert.throws(
        () => compileRuleSet({ name: 'bug', rules: [rule({ pattern: '(' })] }, 'inline'),
        (err: unknown) => {
          assert.ok(err instanceof RuleSetError);
          assert.strictEqual(err.details.length, 1);
          assert.match(err.details[0], /^Rule 'R1': Invalid regular expression/);
          return true;
        },
      );
    });

    test('validates the file shape', () => {
      assert.throws(
        () => compileRuleSet({ name: 'bug', rules: [rule({ flags: 'g' })] }, 'inline'),
        (err: unknown) => {
          assert.ok(err instanceof RuleSetError);
          assert.strictEqual(err.details.length, 1);
          assert.match(err.details[0], /\/rules\/0\/flags/);
          return true;
        },
      );
    });
  });

  suite('loading files', () => {
    test('loads the bundled rule sets', () => {
      const security = loadBundledRuleSet('security');
      const bug = loadBundledRuleSet('bug');

      assert.strictEqual(security.name, 'security');
      assert.strictEqual(security.rules[0].id, 'SEC001');
      assert.strictEqual(bug.name, 'bug');
      assert.ok(bug.rules.every(r => r.category === 'bug'));
    });

    test('reports unreadable and malformed files', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'review-rules-'));
      try {
        const broken = path.join(dir, 'broken.json');
        fs.writeFileSync(broken, '{ nope', 'utf8');

        assert.throws(() => loadRuleSet(path.join(dir, 'missing.json')), /Cannot read rule file/);
        assert.throws(() => loadRuleSet(broken), /Rule file is not valid JSON/);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  suite('applyRuleFix', () => {
    test('replaces the rule pattern in the line', () => {
      const [compiled] = compileRuleSet({ name: 'bug', rules: [rule()] }, 'inline').rules;
      assert.strictEqual(applyRuleFix(compiled, 'if x == None:'), 'if x is None:');
    });

    test('uses the fix search pattern and group references', () => {
      const [compiled] = compileRuleSet({
        name: 'security',
        rules: [rule({
          id: 'S1',
          category: 'security',
          pattern: '\\bos\\.system\\(',
          fix: {
            search: '\\bos\\.system\\((.*)\\)',
            replacement: 'subprocess.run(shlex.split($1), check=True)',
            explanation: 'No shell',
          },
        })],
      }, 'inline').rules;

      assert.strictEqual(
        applyRuleFix(compiled, '    os.system(cmd)'),
        '    subprocess.run(shlex.split(cmd), check=True)',
      );
    });

    test('returns undefined for rules without a fix', () => {
      const [compiled] = compileRuleSet({ name: 'bug', rules: [rule({ fix: undefined })] }, 'inline').rules;
      assert.strictEqual(applyRuleFix(compiled, 'x == None'), undefined);
    });
  });
});
