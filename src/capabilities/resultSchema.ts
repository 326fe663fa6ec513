/**
 * @fileoverview JSON schema of a capability result.
 *
 * Checked by the RetrySupervisor after every attempt so that nothing
 * malformed reaches consolidation.
 *
 * @module capabilities/resultSchema
 */

import { compileSchema, validateWith, SchemaCheck } from '../core/validation';
import type { CapabilityResult } from '../interfaces/ICapability';
import { FINDING_CATEGORIES, SEVERITIES } from '../types';

const nonEmptyString = { type: 'string', minLength: 1 } as const;
const confidence = { type: 'number', minimum: 0, maximum: 1 } as const;

export const findingSchema = {
  type: 'object',
  required: [
    'findingId', 'stepId', 'agentId', 'category', 'findingType', 'severity',
    'title', 'description', 'location', 'confidence',
  ],
  additionalProperties: false,
  properties: {
    findingId: nonEmptyString,
    stepId: nonEmptyString,
    agentId: nonEmptyString,
    category: { type: 'string', enum: [...FINDING_CATEGORIES] },
    findingType: nonEmptyString,
    severity: { type: 'string', enum: [...SEVERITIES] },
    title: { type: 'string' },
    description: { type: 'string' },
    location: {
      type: 'object',
      required: ['file', 'lineStart', 'lineEnd', 'codeSnippet'],
      additionalProperties: false,
      properties: {
        file: { type: 'string' },
        lineStart: { type: 'integer', minimum: 1 },
        lineEnd: { type: 'integer', minimum: 1 },
        codeSnippet: { type: 'string' },
      },
    },
    confidence,
    ruleId: { type: 'string' },
    mergedFindingIds: { type: 'array', items: { type: 'string' } },
  },
};

export const fixSchema = {
  type: 'object',
  required: [
    'fixId', 'findingId', 'agentId', 'originalCode', 'proposedCode',
    'explanation', 'confidence', 'verificationStatus',
  ],
  additionalProperties: false,
  properties: {
    fixId: nonEmptyString,
    findingId: nonEmptyString,
    agentId: nonEmptyString,
    originalCode: { type: 'string' },
    proposedCode: { type: 'string' },
    explanation: { type: 'string' },
    confidence,
    verificationStatus: { type: 'string', enum: ['pending', 'verified', 'unverified'] },
  },
};

export const capabilityResultSchema = {
  type: 'object',
  required: ['status', 'findings', 'fixes'],
  additionalProperties: false,
  properties: {
    status: { type: 'string', enum: ['completed', 'partial'] },
    findings: { type: 'array', items: findingSchema },
    fixes: { type: 'array', items: fixSchema },
    verifications: {
      type: 'array',
      items: {
        type: 'object',
        required: ['fixId', 'status', 'notes'],
        additionalProperties: false,
        properties: {
          fixId: nonEmptyString,
          status: { type: 'string', enum: ['verified', 'unverified'] },
          notes: { type: 'string' },
        },
      },
    },
    summary: { type: 'string' },
  },
};

const validateResult = compileSchema<CapabilityResult>(capabilityResultSchema);

/**
 * Validate an attempt's return value.
 */
export function checkCapabilityResult(value: unknown): SchemaCheck<CapabilityResult> {
  return validateWith(validateResult, value);
}
