/**
 * @fileoverview Security analyzer: injection, unsafe deserialization, weak
 * crypto and hardcoded secrets.
 *
 * @module capabilities/securityCapability
 */

import type { ILogger } from '../interfaces/ILogger';
import { PatternCapability } from './patternCapability';
import { loadBundledRuleSet, RuleSet } from './rules';

export const SECURITY_CAPABILITY_ID = 'security';

export class SecurityCapability extends PatternCapability {
  constructor(ruleSet: RuleSet = loadBundledRuleSet('security'), logger?: ILogger) {
    super(
      {
        id: SECURITY_CAPABILITY_ID,
        agentId: 'security_agent',
        kind: 'analyzer',
        description: 'Security vulnerability analysis',
      },
      ruleSet,
      logger,
    );
  }
}
