/**
 * @fileoverview Shared JSON Schema validation using Ajv.
 *
 * One Ajv instance serves every schema in the orchestrator: review input,
 * capability results, rule files and settings. Callers compile a schema once
 * with {@link compileSchema} and run it with {@link validateWith}, which
 * returns a human-readable list of problems instead of raw Ajv errors.
 *
 * @module core/validation
 */

import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

// ============================================================================
// VALIDATOR SINGLETON
// ============================================================================

/**
 * Ajv configured for strict validation:
 * - allErrors: collect every problem, not just the first
 * - strict: reject unknown schema keywords
 * - removeAdditional / useDefaults / coerceTypes off: never mutate input
 */
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  removeAdditional: false,
  useDefaults: false,
  coerceTypes: false,
  verbose: true,
});

/**
 * Compile a schema against the shared Ajv instance. `T` is the type the
 * schema describes; a passing value is narrowed to it.
 */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

// ============================================================================
// VALIDATION RESULT
// ============================================================================

/**
 * Result of schema validation.
 */
export type SchemaCheck<T> =
  | { valid: true; value: T }
  | { valid: false; problems: string[] };

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format Ajv errors into one message per offending path and keyword.
 */
export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['Validation failed (no details available)'];
  }

  const messages: string[] = [];
  const seen = new Set<string>();

  for (const err of errors) {
    const path = err.instancePath || '/';

    const key = `${path}:${err.keyword}`;
    if (seen.has(key)) continue;
    seen.add(key);

    switch (err.keyword) {
      case 'required':
        messages.push(`Missing required field '${String(err.params.missingProperty)}' at ${path}`);
        break;
      case 'additionalProperties':
        messages.push(`Unknown property '${String(err.params.additionalProperty)}' at ${path}`);
        break;
      case 'type':
        messages.push(`Expected ${String(err.params.type)} at ${path}, got ${describeType(err.data)}`);
        break;
      case 'enum': {
        const allowed: unknown = err.params.allowedValues;
        const list = Array.isArray(allowed) ? allowed.map(String).join(', ') : 'unknown';
        messages.push(`Invalid value at ${path}: '${String(err.data)}'. Allowed: ${list}`);
        break;
      }
      case 'minLength':
        messages.push(`Value at ${path} is too short (min ${String(err.params.limit)} chars)`);
        break;
      case 'maxLength':
        messages.push(`Value at ${path} is too long (max ${String(err.params.limit)} chars)`);
        break;
      case 'minimum':
        messages.push(`Value at ${path} is too small (min ${String(err.params.limit)})`);
        break;
      case 'maximum':
        messages.push(`Value at ${path} is too large (max ${String(err.params.limit)})`);
        break;
      case 'minItems':
        messages.push(`Array at ${path} has too few items (min ${String(err.params.limit)})`);
        break;
      default:
        messages.push(`${err.keyword} error at ${path}: ${err.message ?? 'invalid'}`);
    }
  }

  return messages;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Run a compiled validator and return either the typed value or the
 * formatted problems.
 *
 * @example
 * ```ts
 * const check = validateWith(validateInput, raw);
 * if (!check.valid) {
 *   throw new InputValidationError(check.problems);
 * }
 * ```
 */
export function validateWith<T>(validate: ValidateFunction<T>, value: unknown): SchemaCheck<T> {
  if (validate(value)) {
    return { valid: true, value };
  }
  return { valid: false, problems: formatErrors(validate.errors) };
}
