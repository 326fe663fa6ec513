/**
 * @fileoverview Unit tests for composition.ts
 *
 * Covers:
 * - createContainer registers all expected services
 * - Singleton behaviour (same instance on repeated resolve)
 * - Settings come from the injected or the default provider
 * - Configuration errors surface from resolve
 */

import * as assert from 'assert';
import { CapabilityRegistry } from '../../capabilities/registry';
import { createContainer } from '../../composition';
import { ObjectConfigProvider } from '../../core/configProvider';
import { Logger } from '../../core/logger';
import { ConfigValidationError } from '../../core/settings';
import * as Tokens from '../../core/tokens';
import { RetrySupervisor } from '../../retry/supervisor';
import { ReviewService } from '../../review/reviewService';

suite('Composition', () => {
  teardown(() => {
    Logger.reset();
  });

  test('registers every service', () => {
    const container = createContainer({ configProvider: new ObjectConfigProvider() });

    for (const token of [
      Tokens.IConfigProvider,
      Tokens.Settings,
      Tokens.Logger,
      Tokens.CapabilityRegistry,
      Tokens.RetrySupervisor,
      Tokens.ReviewService,
    ]) {
      assert.ok(container.isRegistered<unknown>(token), `${String(token.key)} should be registered`);
    }
  });

  test('resolves concrete implementations as singletons', () => {
    const container = createContainer({ configProvider: new ObjectConfigProvider() });

    const service = container.resolve(Tokens.ReviewService);
    assert.ok(service instanceof ReviewService);
    assert.strictEqual(container.resolve(Tokens.ReviewService), service);
    assert.ok(container.resolve(Tokens.RetrySupervisor) instanceof RetrySupervisor);

    const registry = container.resolve(Tokens.CapabilityRegistry);
    assert.ok(registry instanceof CapabilityRegistry);
    assert.deepStrictEqual(registry.list().map(c => c.descriptor.id), ['security', 'bug', 'verify']);
  });

  test('settings come from the injected provider', () => {
    const container = createContainer({
      configProvider: new ObjectConfigProvider({ retry: { maxAttempts: 5 }, logging: { level: 'warn' } }),
    });

    assert.strictEqual(container.resolve(Tokens.Settings).retry.maxAttempts, 5);
    assert.strictEqual(container.resolve(Tokens.Logger), Logger.getInstance());
  });

  test('the default provider reads the environment', () => {
    const container = createContainer({
      configFile: 'no-such-config.json',
      env: { REVIEW_ORCHESTRATOR_EXECUTION_MAX_PARALLEL: '1' },
    });

    assert.strictEqual(container.resolve(Tokens.Settings).execution.maxParallel, 1);
  });

  test('invalid settings fail on resolve', () => {
    const container = createContainer({
      configProvider: new ObjectConfigProvider({ retry: { maxAttempts: 0 } }),
    });

    assert.throws(() => container.resolve(Tokens.ReviewService), ConfigValidationError);
  });
});
