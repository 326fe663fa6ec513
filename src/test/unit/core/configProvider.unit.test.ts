/**
 * @fileoverview Unit tests for the JSON + environment config providers.
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigFileError,
  JsonConfigProvider,
  ObjectConfigProvider,
  coerceEnvValue,
  envVarName,
  readConfigFile,
  toEnvSegment,
} from '../../../core/configProvider';

suite('Config Provider', () => {
  let tmpDir: string;

  setup(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'review-config-'));
  });

  teardown(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(tmpDir, 'config.json');
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  suite('environment names', () => {
    test('converts camelCase keys to SCREAMING_SNAKE', () => {
      assert.strictEqual(toEnvSegment('maxAttempts'), 'MAX_ATTEMPTS');
      assert.strictEqual(toEnvSegment('eventBus'), 'EVENT_BUS');
      assert.strictEqual(toEnvSegment('capabilityTimeoutMs'), 'CAPABILITY_TIMEOUT_MS');
    });

    test('prefixes section and key', () => {
      assert.strictEqual(envVarName('retry', 'maxAttempts'), 'REVIEW_ORCHESTRATOR_RETRY_MAX_ATTEMPTS');
    });
  });

  suite('coerceEnvValue', () => {
    test('parses numbers and rejects non-numeric strings', () => {
      assert.strictEqual(coerceEnvValue('5', 3), 5);
      assert.strictEqual(coerceEnvValue('abc', 3), undefined);
      assert.strictEqual(coerceEnvValue('  ', 3), undefined);
    });

    test('parses booleans', () => {
      assert.strictEqual(coerceEnvValue('true', false), true);
      assert.strictEqual(coerceEnvValue('0', true), false);
      assert.strictEqual(coerceEnvValue('yes', false), undefined);
    });

    test('parses lists from commas or JSON', () => {
      assert.deepStrictEqual(coerceEnvValue('a, b,,c', ['x']), ['a', 'b', 'c']);
      assert.deepStrictEqual(coerceEnvValue('["x"]', []), ['x']);
    });

    test('parses objects from JSON only', () => {
      assert.deepStrictEqual(coerceEnvValue('{"security":500}', {}), { security: 500 });
      assert.strictEqual(coerceEnvValue('[1]', {}), undefined);
      assert.strictEqual(coerceEnvValue('not json', {}), undefined);
    });
  });

  suite('ObjectConfigProvider', () => {
    test('returns configured values', () => {
      const provider = new ObjectConfigProvider({ retry: { maxAttempts: 5 } });
      assert.strictEqual(provider.getConfig('retry', 'maxAttempts', 3), 5);
    });

    test('falls back to the default for missing sections and keys', () => {
      const provider = new ObjectConfigProvider({ retry: {} });
      assert.strictEqual(provider.getConfig('retry', 'maxAttempts', 3), 3);
      assert.strictEqual(provider.getConfig('execution', 'maxParallel', 2), 2);
    });

    test('ignores values of the wrong shape', () => {
      const provider = new ObjectConfigProvider({ retry: { maxAttempts: '5', retryOn: 'x' } });
      assert.strictEqual(provider.getConfig('retry', 'maxAttempts', 3), 3);
      assert.deepStrictEqual(provider.getConfig<string[]>('retry', 'retryOn', []), []);
    });
  });

  suite('JsonConfigProvider', () => {
    test('reads values from the file', () => {
      const filePath = writeConfig(JSON.stringify({ retry: { maxAttempts: 5 } }));
      const provider = new JsonConfigProvider({ filePath, env: {} });
      assert.strictEqual(provider.getConfig('retry', 'maxAttempts', 3), 5);
      assert.strictEqual(provider.getConfig('retry', 'baseDelayMs', 400), 400);
    });

    test('environment overrides the file', () => {
      const filePath = writeConfig(JSON.stringify({ retry: { maxAttempts: 5 } }));
      const provider = new JsonConfigProvider({
        filePath,
        env: { REVIEW_ORCHESTRATOR_RETRY_MAX_ATTEMPTS: '7', REVIEW_ORCHESTRATOR_RETRY_BASE_DELAY_MS: '10' },
      });
      assert.strictEqual(provider.getConfig('retry', 'maxAttempts', 3), 7);
      assert.strictEqual(provider.getConfig('retry', 'baseDelayMs', 400), 10);
    });

    test('an unparseable environment value falls back to the file', () => {
      const filePath = writeConfig(JSON.stringify({ retry: { maxAttempts: 5 } }));
      const provider = new JsonConfigProvider({ filePath, env: { REVIEW_ORCHESTRATOR_RETRY_MAX_ATTEMPTS: 'many' } });
      assert.strictEqual(provider.getConfig('retry', 'maxAttempts', 3), 5);
    });

    test('a missing file yields defaults', () => {
      const provider = new JsonConfigProvider({ filePath: path.join(tmpDir, 'absent.json'), env: {} });
      assert.strictEqual(provider.getConfig('execution', 'maxParallel', 3), 3);
    });
  });

  suite('readConfigFile', () => {
    test('rejects malformed JSON', () => {
      const filePath = writeConfig('{ not json');
      assert.throws(() => readConfigFile(filePath), (err: unknown) => {
        assert.ok(err instanceof ConfigFileError);
        assert.strictEqual(err.filePath, filePath);
        assert.strictEqual(err.message, 'Config file must contain a JSON object');
        return true;
      });
    });

    test('rejects a top-level array', () => {
      const filePath = writeConfig('[1, 2]');
      assert.throws(() => readConfigFile(filePath), ConfigFileError);
    });
  });
});
