/**
 * @fileoverview Verifier that re-checks every pending fix proposed by the
 * analyzers.
 *
 * A fix is `verified` when its proposed code is non-empty, differs from the
 * original line and no longer matches the pattern of the rule that raised the
 * finding. Findings without a rule id only get the first two checks.
 *
 * @module capabilities/fixVerificationCapability
 */

import type {
  CapabilityContext,
  CapabilityDescriptor,
  CapabilityEmitter,
  CapabilityResult,
  ICapability,
} from '../interfaces/ICapability';
import type { ILogger } from '../interfaces/ILogger';
import type { Finding, Fix, FixVerification, ReviewInput } from '../types';
import { Logger } from '../core/logger';
import { CapabilityCanceledError } from '../retry/errors';
import type { CompiledRule, RuleSet } from './rules';

export const VERIFY_CAPABILITY_ID = 'verify';

/**
 * Check one fix against the rule that produced its finding.
 */
export function verifyFix(fix: Fix, rule: CompiledRule | undefined): FixVerification {
  const proposed = fix.proposedCode.trim();
  if (proposed.length === 0) {
    return { fixId: fix.fixId, status: 'unverified', notes: 'Proposed code is empty' };
  }
  if (proposed === fix.originalCode.trim()) {
    return { fixId: fix.fixId, status: 'unverified', notes: 'Proposed code is identical to the original' };
  }
  if (!rule) {
    return { fixId: fix.fixId, status: 'verified', notes: 'Structural checks passed; no rule to re-check' };
  }
  if (rule.regex.test(fix.proposedCode)) {
    return { fixId: fix.fixId, status: 'unverified', notes: `Proposed code still matches rule ${rule.id}` };
  }
  return { fixId: fix.fixId, status: 'verified', notes: `Proposed code no longer matches rule ${rule.id}` };
}

export class FixVerificationCapability implements ICapability {
  readonly descriptor: CapabilityDescriptor = {
    id: VERIFY_CAPABILITY_ID,
    agentId: 'fix_verifier',
    kind: 'verifier',
    description: 'Fix verification',
  };

  private readonly rulesById = new Map<string, CompiledRule>();
  private readonly log: ILogger;

  constructor(ruleSets: readonly RuleSet[], logger?: ILogger) {
    for (const set of ruleSets) {
      for (const rule of set.rules) {
        this.rulesById.set(rule.id, rule);
      }
    }
    this.log = logger ?? Logger.for('capabilities');
  }

  async analyze(_input: ReviewInput, context: CapabilityContext, emit: CapabilityEmitter): Promise<CapabilityResult> {
    const { stepId, attempt } = context;
    const { agentId } = this.descriptor;

    if (context.signal.aborted) {
      throw new CapabilityCanceledError(this.descriptor.id);
    }

    // Fixes may point at a finding that consolidation merged into another.
    const findings = new Map<string, Finding>();
    for (const finding of context.consolidatedFindings) {
      findings.set(finding.findingId, finding);
      for (const merged of finding.mergedFindingIds ?? []) {
        findings.set(merged, finding);
      }
    }

    const pending = context.proposedFixes.filter((fix) => fix.verificationStatus === 'pending');
    emit({
      eventType: 'agent_started',
      payload: {
        stepId,
        attempt,
        agentId,
        capabilityId: this.descriptor.id,
        task: `Verify ${pending.length} proposed fix(es)`,
      },
    });
    if (context.upstreamFailed) {
      emit({
        eventType: 'thinking',
        payload: {
          stepId,
          attempt,
          agentId,
          content: `Upstream steps failed (${context.failedDependencies.join(', ')}); verifying what was produced`,
        },
      });
    }

    const verifications: FixVerification[] = [];
    for (const fix of pending) {
      if (context.signal.aborted) {
        throw new CapabilityCanceledError(this.descriptor.id);
      }
      const ruleId = findings.get(fix.findingId)?.ruleId;
      const verification = verifyFix(fix, ruleId === undefined ? undefined : this.rulesById.get(ruleId));
      verifications.push(verification);
      emit({
        eventType: 'fix_verified',
        payload: {
          stepId,
          attempt,
          fixId: fix.fixId,
          findingId: fix.findingId,
          status: verification.status,
          notes: verification.notes,
        },
      });
    }

    const verified = verifications.filter((v) => v.status === 'verified').length;
    const summary = `${verified} of ${verifications.length} fix(es) verified`;
    emit({
      eventType: 'agent_completed',
      payload: { stepId, attempt, agentId, status: 'completed', findingsCount: 0, fixesCount: 0, summary },
    });
    this.log.debug(`verify: ${summary}`, { stepId, attempt });

    return { status: 'completed', findings: [], fixes: [], verifications, summary };
  }
}
