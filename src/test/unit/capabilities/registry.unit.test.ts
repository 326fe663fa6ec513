/**
 * @fileoverview Unit tests for the capability registry.
 */

import * as assert from 'assert';
import * as path from 'path';
import {
  CapabilityRegistry,
  DuplicateCapabilityError,
  createDefaultRegistry,
} from '../../../capabilities/registry';
import { RuleSetError } from '../../../capabilities/rules';
import { ScriptedCapability, createStubLogger, makeDescriptor } from '../mocks/testHelpers';

suite('CapabilityRegistry', () => {
  test('keeps registration order and splits by kind', () => {
    const registry = new CapabilityRegistry()
      .register(new ScriptedCapability('b'))
      .register(new ScriptedCapability(makeDescriptor('check', 'verifier')))
      .register(new ScriptedCapability('a'));

    assert.deepStrictEqual(registry.list().map(c => c.descriptor.id), ['b', 'check', 'a']);
    assert.deepStrictEqual(registry.analyzers().map(c => c.descriptor.id), ['b', 'a']);
    assert.deepStrictEqual(registry.verifiers().map(c => c.descriptor.id), ['check']);
    assert.strictEqual(registry.size, 3);
    assert.strictEqual(registry.has('a'), true);
    assert.strictEqual(registry.get('zzz'), undefined);
  });

  test('rejects a second capability with the same id', () => {
    const registry = new CapabilityRegistry().register(new ScriptedCapability('a'));

    assert.throws(() => registry.register(new ScriptedCapability('a')), (err: unknown) => {
      assert.ok(err instanceof DuplicateCapabilityError);
      assert.strictEqual(err.message, "Capability 'a' is already registered");
      return true;
    });
  });

  test('the default registry holds security, bug and verify', () => {
    const registry = createDefaultRegistry(undefined, createStubLogger());

    assert.deepStrictEqual(registry.list().map(c => [c.descriptor.id, c.descriptor.kind]), [
      ['security', 'analyzer'],
      ['bug', 'analyzer'],
      ['verify', 'verifier'],
    ]);
  });

  test('a missing rules directory fails loudly', () => {
    assert.throws(() => createDefaultRegistry(path.join(__dirname, 'no-such-dir')), RuleSetError);
  });
});
