/**
 * @fileoverview Coordinator: runs one review from plan to final report.
 *
 * The coordinator owns the review's plan, the consolidated findings and the
 * fix ledger. It drives a {@link PlanExecutor}, invokes each step's
 * capability through the {@link RetrySupervisor}, consolidates at every
 * batch barrier and is the only writer of the final report.
 *
 * Events published under the `coordinator` source, in order:
 * `review_started`, `plan_created`, then per step `plan_step_started` /
 * `plan_step_completed`, per batch `fix_rejected`* and
 * `findings_consolidated`, and finally `final_report`, `review_completed`.
 * Capabilities publish under their own source id through a sink that drops
 * events claiming another step or a stale attempt.
 *
 * @module review/coordinator
 */

import { v4 as uuidv4 } from 'uuid';
import type { EventSource } from '../events/eventSource';
import { isCapabilityEventBody } from '../events/types';
import type { CapabilityEventBody } from '../events/types';
import type { CapabilityResult } from '../interfaces/ICapability';
import type { IEventBus } from '../interfaces/IEventBus';
import type { ILogger } from '../interfaces/ILogger';
import type { CapabilityRegistry } from '../capabilities/registry';
import { Logger } from '../core/logger';
import { OrchestratorSettings, retryPolicyFor, timeoutFor } from '../core/settings';
import { PlanValidationError, buildPlan, toPlanSpec } from '../plan/builder';
import { PlanExecutor } from '../plan/executor';
import type { DispatchResult, PlanRunResult, StepContext, StepOutcome } from '../plan/executor';
import type { Batch } from '../plan/scheduler';
import type { PlanStateMachine } from '../plan/stateMachine';
import type { Plan, PlanStatus, PlanStep } from '../plan/types';
import type { RetrySupervisor } from '../retry/supervisor';
import type { Finding, ReviewInput } from '../types';
import { consolidateFindings } from './consolidation';
import { AllCapabilitiesFailedError, ConsolidationError } from './errors';
import { FixLedger } from './fixLedger';
import { createPlanSpec } from './planFactory';
import { buildMetrics, sortFindings, summarize } from './report';
import type { ReviewError, ReviewOptions, ReviewReport, ReviewStatus, StepReport } from './types';

/** Source id of every coordinator event. */
export const COORDINATOR_SOURCE_ID = 'coordinator';

export interface CoordinatorDeps {
  registry: CapabilityRegistry;
  supervisor: RetrySupervisor;
  bus: IEventBus;
  settings: OrchestratorSettings;
  logger?: ILogger;
  clock?: () => number;
}

export interface RunOptions {
  reviewId?: string;
  signal?: AbortSignal;
}

function toReviewStatus(status: PlanStatus): ReviewStatus {
  return status === 'completed' || status === 'partial' ? status : 'failed';
}

/**
 * Runs a single review. Create one coordinator per review.
 */
export class Coordinator {
  private readonly registry: CapabilityRegistry;
  private readonly supervisor: RetrySupervisor;
  private readonly bus: IEventBus;
  private readonly settings: OrchestratorSettings;
  private readonly clock: () => number;
  private readonly log: ILogger;
  private readonly consolidationLog: ILogger;
  private readonly source: EventSource;

  private started = false;
  private consolidated: Finding[] = [];
  private readonly ledger = new FixLedger();
  private readonly results = new Map<string, CapabilityResult>();
  private readonly consolidationErrors: ReviewError[] = [];
  private duplicatesRemoved = 0;
  private retries = 0;

  constructor(deps: CoordinatorDeps) {
    this.registry = deps.registry;
    this.supervisor = deps.supervisor;
    this.bus = deps.bus;
    this.settings = deps.settings;
    this.clock = deps.clock ?? Date.now;
    this.log = deps.logger ?? Logger.for('coordinator');
    this.consolidationLog = deps.logger ?? Logger.for('consolidation');
    this.source = this.bus.source(COORDINATOR_SOURCE_ID);
  }

  /**
   * Build the plan for a review: the explicit plan if given, otherwise the
   * default analyzer fan-out followed by the verifiers.
   *
   * @throws {PlanValidationError}
   */
  createPlan(options: ReviewOptions = {}): Plan {
    const spec = options.plan ?? createPlanSpec(this.registry, options.capabilities);
    return buildPlan(spec, { isKnownCapability: (id) => this.registry.has(id), clock: this.clock });
  }

  /**
   * Plan and run a review.
   */
  async review(input: ReviewInput, options: ReviewOptions & RunOptions = {}): Promise<ReviewReport> {
    return this.run(input, this.createPlan(options), options);
  }

  /**
   * Run a review over a built plan. Closes the bus when done.
   *
   * @throws {PlanValidationError} if a step names a capability the registry
   * does not hold; nothing is published.
   */
  async run(input: ReviewInput, plan: Plan, options: RunOptions = {}): Promise<ReviewReport> {
    if (this.started) {
      throw new Error('Coordinator has already run a review');
    }
    const unknown = new Set<string>();
    for (const step of plan.steps.values()) {
      if (!this.registry.has(step.capabilityId)) unknown.add(step.capabilityId);
    }
    if (unknown.size > 0) {
      throw new PlanValidationError(
        'Unknown plan capability',
        [...unknown].map(id => `No capability registered as '${id}'`),
      );
    }
    this.started = true;

    const reviewId = options.reviewId ?? uuidv4();
    const signal = options.signal ?? new AbortController().signal;
    const startedAt = this.clock();

    try {
      this.source.emit({
        eventType: 'review_started',
        payload: { reviewId, filename: input.filename, language: input.language, codeLength: input.code.length },
      });
      this.source.emit({
        eventType: 'plan_created',
        payload: { reviewId, planId: plan.planId, steps: toPlanSpec(plan).steps },
      });
      this.log.info(`Review ${reviewId} started`, { planId: plan.planId, steps: plan.order.length });

      const executor = new PlanExecutor<CapabilityResult>(plan, {
        dispatcher: (step, context) => this.dispatch(input, reviewId, step, context),
        onBatchResolved: (batch, outcomes) => this.consolidate(plan, batch, outcomes),
        maxParallel: this.settings.execution.maxParallel,
        clock: this.clock,
      });
      const run = await executor.execute(signal);

      const report = this.assembleReport(reviewId, plan, run, executor.stateMachine, startedAt);
      this.source.emit({ eventType: 'final_report', payload: { report } });
      this.source.emit({
        eventType: 'review_completed',
        payload: {
          reviewId,
          status: report.status,
          totalFindings: report.metrics.totalFindings,
          durationMs: report.metrics.durationMs,
          cancelled: report.cancelled,
        },
      });
      this.log.info(`Review ${reviewId} ${report.status}: ${report.summary}`);
      return report;
    } catch (err) {
      this.log.error(`Review ${reviewId} aborted by an internal error`, err);
      throw err;
    } finally {
      this.bus.close();
    }
  }

  // ==========================================================================
  // DISPATCH
  // ==========================================================================

  private async dispatch(
    input: ReviewInput,
    reviewId: string,
    step: PlanStep,
    context: StepContext,
  ): Promise<DispatchResult<CapabilityResult>> {
    const capability = this.registry.get(step.capabilityId);
    if (!capability) {
      throw new Error(`Capability '${step.capabilityId}' is not registered`);
    }
    const capabilityId = capability.descriptor.id;

    this.source.emit({
      eventType: 'plan_step_started',
      payload: {
        planId: context.planId,
        stepId: step.stepId,
        capabilityId,
        upstreamFailed: context.upstreamFailed,
        failedDependencies: [...context.failedDependencies],
      },
    });

    const dependencyResults = new Map<string, CapabilityResult>();
    for (const dependency of step.dependencies) {
      const result = this.results.get(dependency);
      if (result) dependencyResults.set(dependency, result);
    }

    const capabilitySource = this.bus.source(capabilityId);
    let liveAttempt = 0;

    const outcome = await this.supervisor.invoke(capability, input, {
      policy: retryPolicyFor(this.settings.retry, capabilityId),
      source: capabilitySource,
      stepId: step.stepId,
      timeoutMs: timeoutFor(this.settings.execution, capabilityId),
      signal: context.signal,
      bindAttempt: (attempt, attemptSignal) => {
        liveAttempt = attempt;
        return {
          context: {
            reviewId,
            planId: context.planId,
            stepId: step.stepId,
            attempt,
            upstreamFailed: context.upstreamFailed,
            failedDependencies: [...context.failedDependencies],
            dependencyResults,
            consolidatedFindings: [...this.consolidated],
            proposedFixes: this.ledger.list(),
            signal: attemptSignal,
          },
          emit: (body) => {
            if (!this.accepts(body, step.stepId, attempt) || liveAttempt !== attempt || attemptSignal.aborted) {
              this.log.debug(`Dropped ${String(body.eventType)} from ${capabilityId}`, {
                stepId: step.stepId,
                attempt,
                liveAttempt,
              });
              return;
            }
            capabilitySource.emit(body);
          },
        };
      },
    });
    liveAttempt = 0;
    this.retries += outcome.retries;

    if (outcome.ok) {
      this.source.emit({
        eventType: 'plan_step_completed',
        payload: {
          planId: context.planId,
          stepId: step.stepId,
          capabilityId,
          status: 'completed',
          attempts: outcome.attempts,
          findingsCount: outcome.result.findings.length,
        },
      });
      return { ok: true, result: outcome.result, attempts: outcome.attempts };
    }

    this.source.emit({
      eventType: 'plan_step_completed',
      payload: {
        planId: context.planId,
        stepId: step.stepId,
        capabilityId,
        status: 'failed',
        attempts: outcome.attempts,
        findingsCount: 0,
        error: outcome.error.message,
      },
    });
    return { ok: false, error: outcome.error, attempts: outcome.attempts, canceled: outcome.canceled };
  }

  /**
   * A capability may only publish its own capability events for the step
   * and attempt it was bound to.
   */
  private accepts(body: CapabilityEventBody, stepId: string, attempt: number): boolean {
    return isCapabilityEventBody(body) && body.payload.stepId === stepId && body.payload.attempt === attempt;
  }

  // ==========================================================================
  // BATCH BARRIER
  // ==========================================================================

  private consolidate(plan: Plan, batch: Batch, outcomes: StepOutcome<CapabilityResult>[]): void {
    const incoming: Finding[] = [];
    let repeats = 0;
    for (const outcome of outcomes) {
      if (!outcome.ok) continue;
      this.results.set(outcome.stepId, outcome.result);
      for (const finding of outcome.result.findings) {
        const decision = this.ledger.noteFinding(finding);
        if (!decision.accepted) {
          this.recordConsolidationError(outcome.stepId, decision.error);
        } else if (decision.repeat) {
          repeats++;
        } else {
          incoming.push(finding);
        }
      }
    }

    const merged = consolidateFindings(this.consolidated, incoming, this.settings.consolidation.lineTolerance);
    const duplicatesRemoved = merged.duplicatesRemoved + repeats;
    this.consolidated = merged.findings;
    this.duplicatesRemoved += duplicatesRemoved;

    let rejectedFixes = 0;
    let verifiedFixes = 0;
    for (const outcome of outcomes) {
      if (!outcome.ok) continue;
      for (const fix of outcome.result.fixes) {
        const decision = this.ledger.propose(fix);
        if (!decision.accepted) {
          rejectedFixes++;
          this.rejectFix(outcome.stepId, decision.error);
        }
      }
      for (const verification of outcome.result.verifications ?? []) {
        const decision = this.ledger.verify(verification);
        if (!decision.accepted) {
          this.recordConsolidationError(outcome.stepId, decision.error);
        } else if (decision.fix.verificationStatus === 'verified') {
          verifiedFixes++;
        }
      }
    }

    this.source.emit({
      eventType: 'findings_consolidated',
      payload: {
        planId: plan.planId,
        batch: [...batch.stepIds],
        totalFindings: this.consolidated.length,
        newFindings: merged.added,
        duplicatesRemoved,
        rejectedFixes,
        verifiedFixes,
      },
    });
    this.consolidationLog.debug(`Batch ${batch.index} consolidated`, {
      planId: plan.planId,
      total: this.consolidated.length,
      added: merged.added,
      duplicatesRemoved,
    });
  }

  private rejectFix(stepId: string, error: ConsolidationError): void {
    this.source.emit({
      eventType: 'fix_rejected',
      payload: { fixId: error.fixId ?? '', findingId: error.findingId ?? '', stepId, reason: error.message },
    });
    this.recordConsolidationError(stepId, error);
  }

  private recordConsolidationError(stepId: string, error: ConsolidationError): void {
    this.consolidationLog.warn(error.message, { stepId, fixId: error.fixId, findingId: error.findingId });
    this.consolidationErrors.push({ errorType: error.name, message: error.message, stepId });
  }

  // ==========================================================================
  // REPORT
  // ==========================================================================

  private assembleReport(
    reviewId: string,
    plan: Plan,
    run: PlanRunResult<CapabilityResult>,
    stateMachine: PlanStateMachine,
    startedAt: number,
  ): ReviewReport {
    const steps = this.stepReports(plan, stateMachine);
    const status = toReviewStatus(run.status);

    const errors: ReviewError[] = [];
    for (const stepId of plan.order) {
      const outcome = run.outcomes.get(stepId);
      if (outcome && !outcome.ok) {
        errors.push({
          errorType: outcome.error.name,
          message: outcome.error.message,
          stepId,
          capabilityId: plan.steps.get(stepId)?.capabilityId,
        });
      }
    }
    errors.push(...this.consolidationErrors);

    if (status === 'failed' && !run.canceled) {
      const failure = new AllCapabilitiesFailedError(errors.map((e) => `${e.stepId ?? '-'}: ${e.message}`));
      this.log.error(failure.message);
      errors.push({ errorType: failure.name, message: failure.message });
    }

    const findings = status === 'failed' ? [] : sortFindings(this.consolidated);
    const finishedAt = this.clock();
    const metrics = buildMetrics({
      findings,
      steps,
      duplicatesRemoved: this.duplicatesRemoved,
      rejectedFixes: this.ledger.rejectedCount,
      verifiedFixes: this.ledger.countByStatus('verified'),
      unverifiedFixes: this.ledger.countByStatus('unverified'),
      retries: this.retries,
      durationMs: finishedAt - startedAt,
    });

    return {
      reviewId,
      planId: plan.planId,
      status,
      summary: summarize(status, metrics, run.canceled),
      findings,
      fixes: status === 'failed' ? [] : this.ledger.list(),
      steps,
      metrics,
      errors,
      cancelled: run.canceled,
      startedAt,
      finishedAt,
    };
  }

  private stepReports(plan: Plan, stateMachine: PlanStateMachine): StepReport[] {
    const reports: StepReport[] = [];
    for (const stepId of plan.order) {
      const step = plan.steps.get(stepId);
      const state = stateMachine.getStepState(stepId);
      if (!step || !state) continue;
      reports.push({
        stepId,
        capabilityId: step.capabilityId,
        status: state.status,
        attempts: state.attempts,
        findingsCount: this.results.get(stepId)?.findings.length ?? 0,
        upstreamFailed: state.upstreamFailed,
        ...(state.failureReason ? { failureReason: state.failureReason } : {}),
        ...(state.error ? { error: state.error } : {}),
      });
    }
    return reports;
  }
}
