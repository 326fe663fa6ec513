/**
 * @fileoverview Bug analyzer: None comparisons, bare excepts, mutable
 * defaults, leaked file handles.
 *
 * @module capabilities/bugCapability
 */

import type { ILogger } from '../interfaces/ILogger';
import { PatternCapability } from './patternCapability';
import { loadBundledRuleSet, RuleSet } from './rules';

export const BUG_CAPABILITY_ID = 'bug';

export class BugCapability extends PatternCapability {
  constructor(ruleSet: RuleSet = loadBundledRuleSet('bug'), logger?: ILogger) {
    super(
      {
        id: BUG_CAPABILITY_ID,
        agentId: 'bug_agent',
        kind: 'analyzer',
        description: 'Bug detection',
      },
      ruleSet,
      logger,
    );
  }
}
