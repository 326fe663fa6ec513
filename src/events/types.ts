/**
 * @fileoverview Event envelope and payload types.
 *
 * Every lifecycle transition of a review is published as a {@link ReviewEvent}:
 * an immutable envelope stamped with the publishing source, a per-source
 * sequence number starting at 1, and an epoch-millisecond timestamp.
 *
 * Payloads are keyed by event type in {@link EventPayloads}; the
 * discriminated union {@link EventBody} lets consumers narrow on
 * `eventType` without casts.
 *
 * @module events/types
 */

import type { Finding, Fix } from '../types';
import type { PlanStepSpec } from '../plan/types';
import type { ReviewReport, ReviewStatus } from '../review/types';

// ============================================================================
// PAYLOADS
// ============================================================================

/** Fields every capability-scoped payload carries. */
export interface StepScope {
  stepId: string;
  attempt: number;
}

export interface ReviewStartedPayload {
  reviewId: string;
  filename: string;
  language?: string;
  codeLength: number;
}

export interface PlanCreatedPayload {
  reviewId: string;
  planId: string;
  steps: PlanStepSpec[];
}

export interface PlanStepStartedPayload {
  planId: string;
  stepId: string;
  capabilityId: string;
  upstreamFailed: boolean;
  failedDependencies: string[];
}

export interface PlanStepCompletedPayload {
  planId: string;
  stepId: string;
  capabilityId: string;
  status: 'completed' | 'failed';
  attempts: number;
  findingsCount: number;
  error?: string;
}

export interface AgentStartedPayload extends StepScope {
  agentId: string;
  capabilityId: string;
  task: string;
}

export interface AgentCompletedPayload extends StepScope {
  agentId: string;
  status: 'completed' | 'partial';
  findingsCount: number;
  fixesCount: number;
  summary?: string;
}

/**
 * Retry telemetry published by the supervisor before each backoff sleep.
 */
export interface AgentErrorPayload extends StepScope {
  agentId: string;
  maxAttempts: number;
  errorType: string;
  cause: string;
  recoverable: boolean;
  willRetry: boolean;
  delayMs: number;
}

export interface ThinkingPayload extends StepScope {
  agentId: string;
  content: string;
}

export interface ToolCallStartPayload extends StepScope {
  agentId: string;
  toolCallId: string;
  toolName: string;
  args: Record<string, string | number | boolean>;
}

export interface ToolCallResultPayload extends StepScope {
  agentId: string;
  toolCallId: string;
  toolName: string;
  success: boolean;
  resultSummary: string;
  durationMs: number;
}

export interface FindingDiscoveredPayload extends StepScope {
  finding: Finding;
}

export interface FixProposedPayload extends StepScope {
  fix: Fix;
}

export interface FixVerifiedPayload extends StepScope {
  fixId: string;
  findingId: string;
  status: 'verified' | 'unverified';
  notes: string;
}

export interface FixRejectedPayload {
  fixId: string;
  findingId: string;
  stepId: string;
  reason: string;
}

export interface FindingsConsolidatedPayload {
  planId: string;
  /** Step ids of the batch that just resolved. */
  batch: string[];
  totalFindings: number;
  newFindings: number;
  duplicatesRemoved: number;
  rejectedFixes: number;
  verifiedFixes: number;
}

export interface FinalReportPayload {
  report: ReviewReport;
}

export interface ReviewCompletedPayload {
  reviewId: string;
  status: ReviewStatus;
  totalFindings: number;
  durationMs: number;
  cancelled: boolean;
}

/**
 * Payload type for each event type.
 */
export interface EventPayloads {
  review_started: ReviewStartedPayload;
  plan_created: PlanCreatedPayload;
  plan_step_started: PlanStepStartedPayload;
  plan_step_completed: PlanStepCompletedPayload;
  agent_started: AgentStartedPayload;
  agent_completed: AgentCompletedPayload;
  agent_error: AgentErrorPayload;
  thinking: ThinkingPayload;
  tool_call_start: ToolCallStartPayload;
  tool_call_result: ToolCallResultPayload;
  finding_discovered: FindingDiscoveredPayload;
  fix_proposed: FixProposedPayload;
  fix_verified: FixVerifiedPayload;
  fix_rejected: FixRejectedPayload;
  findings_consolidated: FindingsConsolidatedPayload;
  final_report: FinalReportPayload;
  review_completed: ReviewCompletedPayload;
}

export type EventType = keyof EventPayloads;

export const EVENT_TYPES: readonly EventType[] = [
  'review_started',
  'plan_created',
  'plan_step_started',
  'plan_step_completed',
  'agent_started',
  'agent_completed',
  'agent_error',
  'thinking',
  'tool_call_start',
  'tool_call_result',
  'finding_discovered',
  'fix_proposed',
  'fix_verified',
  'fix_rejected',
  'findings_consolidated',
  'final_report',
  'review_completed',
];

// ============================================================================
// ENVELOPE
// ============================================================================

/**
 * Event type plus payload, before the source stamps it.
 */
export type EventBody = {
  [K in EventType]: { readonly eventType: K; readonly payload: EventPayloads[K] };
}[EventType];

/**
 * Envelope fields stamped by an {@link EventSource}.
 */
export interface EventMeta {
  readonly sourceId: string;
  /** Monotonic per source, starting at 1. */
  readonly sequence: number;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}

export type ReviewEvent = EventBody & EventMeta;

/** Event types a capability may emit through its sink. */
export type CapabilityEventType =
  | 'agent_started'
  | 'agent_completed'
  | 'thinking'
  | 'tool_call_start'
  | 'tool_call_result'
  | 'finding_discovered'
  | 'fix_proposed'
  | 'fix_verified';

export type CapabilityEventBody = Extract<EventBody, { eventType: CapabilityEventType }>;

const CAPABILITY_EVENT_TYPES: ReadonlySet<string> = new Set<CapabilityEventType>([
  'agent_started',
  'agent_completed',
  'thinking',
  'tool_call_start',
  'tool_call_result',
  'finding_discovered',
  'fix_proposed',
  'fix_verified',
]);

/**
 * Narrow an event to one event type.
 *
 * @example
 * ```ts
 * if (isEventOfType(event, 'finding_discovered')) {
 *   console.log(event.payload.finding.title);
 * }
 * ```
 */
export function isEventOfType<K extends EventType>(
  event: ReviewEvent,
  eventType: K,
): event is Extract<ReviewEvent, { eventType: K }> {
  return event.eventType === eventType;
}

/**
 * True for event bodies a capability is allowed to emit.
 */
export function isCapabilityEventBody(body: EventBody): body is CapabilityEventBody {
  return CAPABILITY_EVENT_TYPES.has(body.eventType);
}
