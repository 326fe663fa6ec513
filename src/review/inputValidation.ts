/**
 * @fileoverview Validation of submitted review input.
 *
 * @module review/inputValidation
 */

import * as path from 'path';
import { compileSchema, validateWith } from '../core/validation';
import type { InputSettings } from '../core/settings';
import type { ReviewInput } from '../types';
import { InputValidationError } from './errors';

const reviewInputSchema = {
  type: 'object',
  required: ['code', 'filename'],
  additionalProperties: false,
  properties: {
    code: { type: 'string', minLength: 1 },
    filename: { type: 'string', minLength: 1 },
    language: { type: 'string' },
  },
};

const validateInput = compileSchema<ReviewInput>(reviewInputSchema);

/**
 * Check a raw value against the input schema and the size and extension
 * limits.
 *
 * @throws {InputValidationError} listing every problem found
 */
export function validateReviewInput(value: unknown, settings: InputSettings): ReviewInput {
  const check = validateWith(validateInput, value);
  if (!check.valid) {
    throw new InputValidationError(check.problems);
  }

  const input = check.value;
  const problems: string[] = [];

  if (input.code.trim().length === 0) {
    problems.push('code: must not be blank');
  }
  if (input.code.length > settings.maxFileSize) {
    problems.push(`code: ${input.code.length} characters exceeds the limit of ${settings.maxFileSize}`);
  }

  const extension = path.extname(input.filename).toLowerCase();
  if (settings.supportedExtensions.length > 0 && !settings.supportedExtensions.includes(extension)) {
    problems.push(
      `filename: unsupported extension '${extension || '(none)'}' (supported: ${settings.supportedExtensions.join(', ')})`,
    );
  }

  if (problems.length > 0) {
    throw new InputValidationError(problems);
  }
  return input;
}
