/**
 * @fileoverview Accepted fixes of one review and their verification state.
 *
 * A finding id names one finding for the whole review: a later finding
 * reusing the id with different content is rejected. A fix is accepted only
 * if its finding was discovered earlier in the same review. Verification moves a fix from `pending` to `verified` or
 * `unverified` once; a second verification is rejected.
 *
 * @module review/fixLedger
 */

import { isDeepStrictEqual } from 'util';
import type { Finding, Fix, FixVerification } from '../types';
import { ConsolidationError } from './errors';

export type LedgerDecision =
  | { accepted: true; fix: Fix }
  | { accepted: false; error: ConsolidationError };

/** `repeat` marks an identical copy of a finding already recorded. */
export type FindingDecision =
  | { accepted: true; repeat: boolean }
  | { accepted: false; error: ConsolidationError };

export class FixLedger {
  private readonly knownFindings = new Map<string, Finding>();
  private readonly fixes = new Map<string, Fix>();
  private rejected = 0;

  /** Record a discovered finding. */
  noteFinding(finding: Finding): FindingDecision {
    const known = this.knownFindings.get(finding.findingId);
    if (!known) {
      this.knownFindings.set(finding.findingId, finding);
      return { accepted: true, repeat: false };
    }
    if (isDeepStrictEqual(known, finding)) {
      return { accepted: true, repeat: true };
    }
    return {
      accepted: false,
      error: new ConsolidationError(`Finding id ${finding.findingId} is already used by another finding`, {
        findingId: finding.findingId,
      }),
    };
  }

  propose(fix: Fix): LedgerDecision {
    if (!this.knownFindings.has(fix.findingId)) {
      return this.reject(
        new ConsolidationError(`Fix ${fix.fixId} references unknown finding ${fix.findingId}`, {
          fixId: fix.fixId,
          findingId: fix.findingId,
        }),
      );
    }
    if (this.fixes.has(fix.fixId)) {
      return this.reject(
        new ConsolidationError(`Fix ${fix.fixId} was already proposed`, { fixId: fix.fixId, findingId: fix.findingId }),
      );
    }
    const accepted: Fix = { ...fix, verificationStatus: 'pending' };
    this.fixes.set(fix.fixId, accepted);
    return { accepted: true, fix: accepted };
  }

  verify(verification: FixVerification): LedgerDecision {
    const fix = this.fixes.get(verification.fixId);
    if (!fix) {
      return {
        accepted: false,
        error: new ConsolidationError(`Verification for unknown fix ${verification.fixId}`, { fixId: verification.fixId }),
      };
    }
    if (fix.verificationStatus !== 'pending') {
      return {
        accepted: false,
        error: new ConsolidationError(`Fix ${fix.fixId} is already ${fix.verificationStatus}`, {
          fixId: fix.fixId,
          findingId: fix.findingId,
        }),
      };
    }
    const updated: Fix = { ...fix, verificationStatus: verification.status };
    this.fixes.set(fix.fixId, updated);
    return { accepted: true, fix: updated };
  }

  /** Accepted fixes in proposal order. */
  list(): Fix[] {
    return [...this.fixes.values()];
  }

  countByStatus(status: Fix['verificationStatus']): number {
    let count = 0;
    for (const fix of this.fixes.values()) {
      if (fix.verificationStatus === status) count++;
    }
    return count;
  }

  /** Proposals turned away. Failed verifications are not counted. */
  get rejectedCount(): number {
    return this.rejected;
  }

  private reject(error: ConsolidationError): LedgerDecision {
    this.rejected++;
    return { accepted: false, error };
  }
}
