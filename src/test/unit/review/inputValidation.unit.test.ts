/**
 * @fileoverview Unit tests for review input validation.
 */

import * as assert from 'assert';
import type { InputSettings } from '../../../core/settings';
import { InputValidationError } from '../../../review/errors';
import { validateReviewInput } from '../../../review/inputValidation';

function problemsOf(value: unknown, settings: InputSettings): string[] {
  try {
    validateReviewInput(value, settings);
  } catch (err) {
    assert.ok(err instanceof InputValidationError);
    return err.problems;
  }
  assert.fail('expected InputValidationError');
}

suite('validateReviewInput', () => {
  const settings: InputSettings = { maxFileSize: 20, supportedExtensions: ['.py'] };

  test('returns valid input unchanged', () => {
    const input = { code: 'x = 1\n', filename: 'pkg/App.PY', language: 'python' };
    assert.deepStrictEqual(validateReviewInput(input, settings), input);
  });

  test('reports schema problems', () => {
    assert.deepStrictEqual(problemsOf({ code: '', filename: 'a.py', extra: 1 }, settings).sort(), [
      "Unknown property 'extra' at /",
      'Value at /code is too short (min 1 chars)',
    ]);
    assert.deepStrictEqual(problemsOf('print(1)', settings), ["Expected object at /, got string"]);
  });

  test('reports every content problem at once', () => {
    const problems = problemsOf({ code: ' '.repeat(21), filename: 'main.js' }, settings);

    assert.deepStrictEqual(problems, [
      'code: must not be blank',
      'code: 21 characters exceeds the limit of 20',
      "filename: unsupported extension '.js' (supported: .py)",
    ]);
  });

  test('names a missing extension', () => {
    assert.deepStrictEqual(problemsOf({ code: 'x', filename: 'Makefile' }, settings), [
      "filename: unsupported extension '(none)' (supported: .py)",
    ]);
  });

  test('an empty extension list accepts any filename', () => {
    const open: InputSettings = { maxFileSize: 20, supportedExtensions: [] };
    assert.strictEqual(validateReviewInput({ code: 'x', filename: 'main.js' }, open).filename, 'main.js');
  });

  test('the error message lists the problems', () => {
    assert.throws(
      () => validateReviewInput({ code: '\n', filename: 'a.py' }, settings),
      { message: 'Invalid review input:\n- code: must not be blank' },
    );
  });
});
