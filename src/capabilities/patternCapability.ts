/**
 * @fileoverview Line-oriented rule scanner shared by the bundled analyzers.
 *
 * Each line of the input is tested against every rule of a {@link RuleSet}.
 * A match becomes a {@link Finding}; a rule with a fix template also yields a
 * pending {@link Fix} for that line. Progress is reported through the
 * capability's own event sink.
 *
 * @module capabilities/patternCapability
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  CapabilityContext,
  CapabilityDescriptor,
  CapabilityEmitter,
  CapabilityResult,
  ICapability,
} from '../interfaces/ICapability';
import type { ILogger } from '../interfaces/ILogger';
import type { Finding, Fix, ReviewInput } from '../types';
import { Logger } from '../core/logger';
import { CapabilityCanceledError, MalformedInputError } from '../retry/errors';
import { applyRuleFix, CompiledRule, RuleSet } from './rules';

export interface PatternMatch {
  rule: CompiledRule;
  /** 1-based. */
  line: number;
  text: string;
}

/**
 * Find every (line, rule) match, ordered by line then rule order.
 */
export function scanLines(code: string, rules: readonly CompiledRule[]): PatternMatch[] {
  const matches: PatternMatch[] = [];
  const lines = code.split(/\r?\n/);
  lines.forEach((text, index) => {
    for (const rule of rules) {
      if (rule.regex.test(text)) {
        matches.push({ rule, line: index + 1, text });
      }
    }
  });
  return matches;
}

/**
 * Analyzer backed by a rule set.
 */
export class PatternCapability implements ICapability {
  protected readonly log: ILogger;

  constructor(
    readonly descriptor: CapabilityDescriptor,
    protected readonly ruleSet: RuleSet,
    logger?: ILogger,
  ) {
    this.log = logger ?? Logger.for('capabilities');
  }

  /** Rules available to this analyzer, for the verifier's lookup. */
  get rules(): readonly CompiledRule[] {
    return this.ruleSet.rules;
  }

  async analyze(input: ReviewInput, context: CapabilityContext, emit: CapabilityEmitter): Promise<CapabilityResult> {
    const { stepId, attempt } = context;
    const { agentId } = this.descriptor;

    if (context.signal.aborted) {
      throw new CapabilityCanceledError(this.descriptor.id);
    }
    if (typeof input.code !== 'string') {
      throw new MalformedInputError('Input code must be a string', { capabilityId: this.descriptor.id });
    }

    const lineCount = input.code.split(/\r?\n/).length;
    emit({
      eventType: 'agent_started',
      payload: {
        stepId,
        attempt,
        agentId,
        capabilityId: this.descriptor.id,
        task: `${this.descriptor.description}: ${input.filename} (${lineCount} lines)`,
      },
    });
    emit({
      eventType: 'thinking',
      payload: {
        stepId,
        attempt,
        agentId,
        content: `Checking ${lineCount} lines against ${this.ruleSet.rules.length} ${this.ruleSet.name} rules`,
      },
    });

    const toolCallId = uuidv4();
    const started = Date.now();
    emit({
      eventType: 'tool_call_start',
      payload: {
        stepId,
        attempt,
        agentId,
        toolCallId,
        toolName: 'search_pattern',
        args: { ruleSet: this.ruleSet.name, rules: this.ruleSet.rules.length, lines: lineCount },
      },
    });

    const matches = scanLines(input.code, this.ruleSet.rules);

    emit({
      eventType: 'tool_call_result',
      payload: {
        stepId,
        attempt,
        agentId,
        toolCallId,
        toolName: 'search_pattern',
        success: true,
        resultSummary: `${matches.length} match(es)`,
        durationMs: Date.now() - started,
      },
    });

    const findings: Finding[] = [];
    const fixes: Fix[] = [];
    for (const match of matches) {
      if (context.signal.aborted) {
        throw new CapabilityCanceledError(this.descriptor.id);
      }

      const finding = this.toFinding(match, input.filename, stepId);
      findings.push(finding);
      emit({ eventType: 'finding_discovered', payload: { stepId, attempt, finding } });

      const fix = this.toFix(match, finding);
      if (fix) {
        fixes.push(fix);
        emit({ eventType: 'fix_proposed', payload: { stepId, attempt, fix } });
      }
    }

    const summary = `${findings.length} ${this.ruleSet.name} issue(s), ${fixes.length} fix(es) proposed`;
    emit({
      eventType: 'agent_completed',
      payload: {
        stepId,
        attempt,
        agentId,
        status: 'completed',
        findingsCount: findings.length,
        fixesCount: fixes.length,
        summary,
      },
    });
    this.log.debug(`${this.descriptor.id}: ${summary}`, { stepId, attempt });

    return { status: 'completed', findings, fixes, summary };
  }

  private toFinding(match: PatternMatch, filename: string, stepId: string): Finding {
    const { rule } = match;
    return {
      findingId: uuidv4(),
      stepId,
      agentId: this.descriptor.agentId,
      category: rule.category,
      findingType: rule.findingType,
      severity: rule.severity,
      title: rule.title,
      description: rule.description,
      location: {
        file: filename,
        lineStart: match.line,
        lineEnd: match.line,
        codeSnippet: match.text.trim(),
      },
      confidence: rule.confidence,
      ruleId: rule.id,
    };
  }

  private toFix(match: PatternMatch, finding: Finding): Fix | undefined {
    const proposed = applyRuleFix(match.rule, match.text);
    if (proposed === undefined || !match.rule.fix) {
      return undefined;
    }
    return {
      fixId: uuidv4(),
      findingId: finding.findingId,
      agentId: this.descriptor.agentId,
      originalCode: match.text,
      proposedCode: proposed,
      explanation: match.rule.fix.explanation,
      confidence: match.rule.confidence,
      verificationStatus: 'pending',
    };
  }
}
