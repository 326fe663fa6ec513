/**
 * @fileoverview Rule sets for the pattern-based capabilities.
 *
 * Rule files live in `rules/*.json` at the package root. Each file is
 * validated against {@link ruleSetSchema} and every pattern is compiled once
 * at load time.
 *
 * @module capabilities/rules
 */

import * as fs from 'fs';
import * as path from 'path';
import { compileSchema, validateWith } from '../core/validation';
import type { FindingCategory, Severity } from '../types';
import { FINDING_CATEGORIES, SEVERITIES } from '../types';

/** Directory holding the bundled rule files. */
export const DEFAULT_RULES_DIR = path.join(__dirname, '..', '..', 'rules');

// ============================================================================
// TYPES
// ============================================================================

export interface RuleFixSpec {
  /** Pattern replaced in the offending line; defaults to the rule pattern. */
  search?: string;
  /** Replacement string, `$1`-style group references allowed. */
  replacement: string;
  explanation: string;
}

export interface RuleSpec {
  id: string;
  category: FindingCategory;
  findingType: string;
  severity: Severity;
  confidence: number;
  pattern: string;
  /** RegExp flags. `g` and `y` are not allowed. */
  flags: string;
  title: string;
  description: string;
  fix?: RuleFixSpec;
}

export interface RuleSetFile {
  name: string;
  rules: RuleSpec[];
}

export interface CompiledRule extends RuleSpec {
  regex: RegExp;
  fixRegex?: RegExp;
}

export interface RuleSet {
  name: string;
  rules: CompiledRule[];
}

/**
 * A rule file is missing, malformed or has an invalid pattern.
 */
export class RuleSetError extends Error {
  constructor(message: string, public readonly source: string, public readonly details: string[] = []) {
    super(details.length > 0 ? `${message} (${source}):\n- ${details.join('\n- ')}` : `${message} (${source})`);
    this.name = 'RuleSetError';
  }
}

// ============================================================================
// SCHEMA
// ============================================================================

const ruleSetSchema = {
  type: 'object',
  required: ['name', 'rules'],
  additionalProperties: false,
  properties: {
    name: { type: 'string', minLength: 1 },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'category', 'findingType', 'severity', 'confidence', 'pattern', 'flags', 'title', 'description'],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          category: { type: 'string', enum: [...FINDING_CATEGORIES] },
          findingType: { type: 'string', minLength: 1 },
          severity: { type: 'string', enum: [...SEVERITIES] },
          confidence: { type: 'number', minimum: 0, maximum: 1 },
          pattern: { type: 'string', minLength: 1 },
          flags: { type: 'string', pattern: '^[imsu]*$' },
          title: { type: 'string' },
          description: { type: 'string' },
          fix: {
            type: 'object',
            required: ['replacement', 'explanation'],
            additionalProperties: false,
            properties: {
              search: { type: 'string', minLength: 1 },
              replacement: { type: 'string' },
              explanation: { type: 'string' },
            },
          },
        },
      },
    },
  },
};

const validateRuleSet = compileSchema<RuleSetFile>(ruleSetSchema);

// ============================================================================
// LOADING
// ============================================================================

/**
 * Validate and compile a parsed rule file.
 *
 * @param source - File path or label used in error messages
 */
export function compileRuleSet(raw: unknown, source: string): RuleSet {
  const check = validateWith(validateRuleSet, raw);
  if (!check.valid) {
    throw new RuleSetError('Invalid rule set', source, check.problems);
  }

  const problems: string[] = [];
  const seen = new Set<string>();
  const rules: CompiledRule[] = [];

  for (const spec of check.value.rules) {
    if (seen.has(spec.id)) {
      problems.push(`Duplicate rule id '${spec.id}'`);
      continue;
    }
    seen.add(spec.id);

    try {
      const regex = new RegExp(spec.pattern, spec.flags);
      const fixRegex = spec.fix ? new RegExp(spec.fix.search ?? spec.pattern, spec.flags) : undefined;
      rules.push({ ...spec, regex, ...(fixRegex ? { fixRegex } : {}) });
    } catch (err) {
      problems.push(`Rule '${spec.id}': ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (problems.length > 0) {
    throw new RuleSetError('Invalid rule set', source, problems);
  }
  return { name: check.value.name, rules };
}

/**
 * Read, validate and compile one rule file.
 */
export function loadRuleSet(filePath: string): RuleSet {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new RuleSetError(`Cannot read rule file: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new RuleSetError(`Rule file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }
  return compileRuleSet(raw, filePath);
}

/**
 * Load a bundled rule set by name (`security`, `bug`).
 */
export function loadBundledRuleSet(name: string, rulesDir: string = DEFAULT_RULES_DIR): RuleSet {
  return loadRuleSet(path.join(rulesDir, `${name}.json`));
}

/**
 * Apply a rule's fix to one line. Returns undefined for rules without a fix.
 */
export function applyRuleFix(rule: CompiledRule, line: string): string | undefined {
  if (!rule.fix || !rule.fixRegex) {
    return undefined;
  }
  return line.replace(rule.fixRegex, rule.fix.replacement);
}
