/**
 * @fileoverview Interface for pluggable analysis capabilities.
 *
 * A capability is one unit of review work (a security scan, a bug scan, fix
 * verification). The Coordinator invokes it through the RetrySupervisor and
 * gives it an `emit` sink bound to the capability's own event source.
 *
 * @module interfaces/ICapability
 */

import type { CapabilityEventBody } from '../events/types';
import type { Finding, Fix, FixVerification, ReviewInput } from '../types';

/**
 * Analyzers run in the fan-out batch; verifiers run after it.
 */
export type CapabilityKind = 'analyzer' | 'verifier';

export interface CapabilityDescriptor {
  /** Registry key, also used as the capability's event `sourceId`. */
  id: string;
  /** Agent name stamped on findings and fixes. */
  agentId: string;
  kind: CapabilityKind;
  description: string;
}

/**
 * What a capability receives for one attempt.
 */
export interface CapabilityContext {
  reviewId: string;
  planId: string;
  stepId: string;
  /** 1-based attempt number. */
  attempt: number;
  /** At least one dependency of this step failed. */
  upstreamFailed: boolean;
  failedDependencies: readonly string[];
  /** Results of the step's completed dependencies, keyed by step id. */
  dependencyResults: ReadonlyMap<string, CapabilityResult>;
  /** Consolidated findings as of the last batch barrier. */
  consolidatedFindings: readonly Finding[];
  /** Accepted fixes as of the last batch barrier. */
  proposedFixes: readonly Fix[];
  /** Aborted on cancellation or when the attempt times out. */
  signal: AbortSignal;
}

export interface CapabilityResult {
  status: 'completed' | 'partial';
  findings: Finding[];
  fixes: Fix[];
  verifications?: FixVerification[];
  summary?: string;
}

/**
 * Publishes an event under the capability's own source. Never blocks.
 */
export type CapabilityEmitter = (body: CapabilityEventBody) => void;

export interface ICapability {
  readonly descriptor: CapabilityDescriptor;

  analyze(input: ReviewInput, context: CapabilityContext, emit: CapabilityEmitter): Promise<CapabilityResult>;
}
