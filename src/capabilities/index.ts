/**
 * @fileoverview Capability module exports.
 *
 * @module capabilities
 */

export { PatternCapability, scanLines } from './patternCapability';
export type { PatternMatch } from './patternCapability';
export { SecurityCapability, SECURITY_CAPABILITY_ID } from './securityCapability';
export { BugCapability, BUG_CAPABILITY_ID } from './bugCapability';
export { FixVerificationCapability, VERIFY_CAPABILITY_ID, verifyFix } from './fixVerificationCapability';
export { CapabilityRegistry, DuplicateCapabilityError, createDefaultRegistry } from './registry';
export {
  DEFAULT_RULES_DIR,
  RuleSetError,
  applyRuleFix,
  compileRuleSet,
  loadBundledRuleSet,
  loadRuleSet,
} from './rules';
export type { CompiledRule, RuleFixSpec, RuleSet, RuleSetFile, RuleSpec } from './rules';
export { capabilityResultSchema, checkCapabilityResult, findingSchema, fixSchema } from './resultSchema';
