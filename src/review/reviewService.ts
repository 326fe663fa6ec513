/**
 * @fileoverview Submission boundary for reviews.
 *
 * `submit` validates the input and the plan synchronously, then starts the
 * review on the next macrotask, so a caller can `subscribe` right after
 * `submit` and still see every event. Each review gets its own EventBus and
 * Coordinator. Finished reviews are kept until `service.maxRetainedReviews`
 * is exceeded, then evicted oldest first.
 *
 * @module review/reviewService
 */

import { v4 as uuidv4 } from 'uuid';
import type { CapabilityRegistry } from '../capabilities/registry';
import { Logger } from '../core/logger';
import type { OrchestratorSettings } from '../core/settings';
import { EventBus } from '../events/eventBus';
import type { EventSubscription } from '../events/subscription';
import type { ReviewEvent } from '../events/types';
import type { SubscribeOptions } from '../interfaces/IEventBus';
import type { ILogger } from '../interfaces/ILogger';
import type { Plan } from '../plan/types';
import type { RetrySupervisor } from '../retry/supervisor';
import type { ReviewInput } from '../types';
import { Coordinator } from './coordinator';
import { UnknownReviewError } from './errors';
import { validateReviewInput } from './inputValidation';
import type { ReviewOptions, ReviewReport, ReviewState } from './types';

export interface ReviewServiceDeps {
  registry: CapabilityRegistry;
  supervisor: RetrySupervisor;
  settings: OrchestratorSettings;
  logger?: ILogger;
  clock?: () => number;
}

/**
 * Snapshot of one submitted review.
 */
export interface ReviewSummary {
  reviewId: string;
  filename: string;
  state: ReviewState;
  submittedAt: number;
  finishedAt?: number;
  totalFindings?: number;
  error?: string;
}

interface ReviewRecord {
  reviewId: string;
  filename: string;
  state: ReviewState;
  submittedAt: number;
  finishedAt?: number;
  bus: EventBus;
  controller: AbortController;
  /** Settles when the review ends; never rejects. */
  done: Promise<void>;
  report?: ReviewReport;
  error?: Error;
}

export class ReviewService {
  private readonly reviews = new Map<string, ReviewRecord>();
  private readonly registry: CapabilityRegistry;
  private readonly supervisor: RetrySupervisor;
  private readonly settings: OrchestratorSettings;
  private readonly clock: () => number;
  private readonly log: ILogger;

  constructor(deps: ReviewServiceDeps) {
    this.registry = deps.registry;
    this.supervisor = deps.supervisor;
    this.settings = deps.settings;
    this.clock = deps.clock ?? Date.now;
    this.log = deps.logger ?? Logger.for('review-service');
  }

  /**
   * Validate and start a review.
   *
   * @throws {InputValidationError} for invalid input
   * @throws {PlanValidationError} for an invalid plan or unknown capability
   * @returns the review id
   */
  submit(input: unknown, options: ReviewOptions = {}): string {
    const reviewInput = validateReviewInput(input, this.settings.input);
    const reviewId = uuidv4();

    const bus = new EventBus({
      historySize: this.settings.eventBus.historySize,
      maxQueueSize: this.settings.eventBus.maxQueueSize,
      clock: this.clock,
    });
    const coordinator = new Coordinator({
      registry: this.registry,
      supervisor: this.supervisor,
      bus,
      settings: this.settings,
      clock: this.clock,
    });
    const plan = coordinator.createPlan(options);
    const controller = new AbortController();

    const record: ReviewRecord = {
      reviewId,
      filename: reviewInput.filename,
      state: 'queued',
      submittedAt: this.clock(),
      bus,
      controller,
      done: Promise.resolve(),
    };
    record.done = new Promise<void>((resolve) => setImmediate(resolve)).then(() =>
      this.execute(record, coordinator, reviewInput, plan),
    );
    this.reviews.set(reviewId, record);

    this.log.info(`Review ${reviewId} submitted`, { filename: reviewInput.filename, steps: plan.order.length });
    return reviewId;
  }

  /**
   * Subscribe to a review's events. Replays the whole history unless
   * `options.replay` says otherwise.
   */
  subscribe(reviewId: string, options: SubscribeOptions = {}): EventSubscription {
    return this.get(reviewId).bus.subscribe({ replay: 'all', ...options });
  }

  /**
   * Events published so far for a review.
   */
  getEvents(reviewId: string): ReviewEvent[] {
    return this.get(reviewId).bus.getHistory();
  }

  /**
   * Request cancellation. Returns false when the review already finished.
   */
  cancel(reviewId: string): boolean {
    const record = this.get(reviewId);
    if (record.finishedAt !== undefined) {
      return false;
    }
    if (!record.controller.signal.aborted) {
      this.log.info(`Review ${reviewId} cancellation requested`);
      record.controller.abort();
    }
    return true;
  }

  /**
   * Cancel every unfinished review and wait for all of them to end.
   */
  async shutdown(): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const record of this.reviews.values()) {
      if (record.finishedAt === undefined) {
        record.controller.abort();
        pending.push(record.done);
      }
    }
    await Promise.all(pending);
  }

  getStatus(reviewId: string): ReviewSummary {
    return this.summarize(this.get(reviewId));
  }

  /**
   * Resolve with the final report once the review ends.
   *
   * @throws the internal error when the review did not produce a report
   */
  async waitForReport(reviewId: string): Promise<ReviewReport> {
    const record = this.get(reviewId);
    await record.done;
    if (record.report) {
      return record.report;
    }
    throw record.error ?? new Error(`Review ${reviewId} ended without a report`);
  }

  /** Retained reviews in submission order. */
  listReviews(): ReviewSummary[] {
    return [...this.reviews.values()].map((r) => this.summarize(r));
  }

  private get(reviewId: string): ReviewRecord {
    const record = this.reviews.get(reviewId);
    if (!record) {
      throw new UnknownReviewError(reviewId);
    }
    return record;
  }

  private async execute(record: ReviewRecord, coordinator: Coordinator, input: ReviewInput, plan: Plan): Promise<void> {
    record.state = 'running';
    try {
      const report = await coordinator.run(input, plan, {
        reviewId: record.reviewId,
        signal: record.controller.signal,
      });
      record.report = report;
      record.state = report.status;
    } catch (err) {
      record.error = err instanceof Error ? err : new Error(String(err));
      record.state = 'error';
      this.log.error(`Review ${record.reviewId} failed`, record.error);
    } finally {
      record.finishedAt = this.clock();
      this.evictFinished();
    }
  }

  private evictFinished(): void {
    const finished = [...this.reviews.values()].filter((r) => r.finishedAt !== undefined);
    let excess = finished.length - this.settings.service.maxRetainedReviews;
    for (const record of finished) {
      if (excess <= 0) break;
      this.reviews.delete(record.reviewId);
      this.log.debug(`Evicted review ${record.reviewId}`);
      excess--;
    }
  }

  private summarize(record: ReviewRecord): ReviewSummary {
    return {
      reviewId: record.reviewId,
      filename: record.filename,
      state: record.state,
      submittedAt: record.submittedAt,
      ...(record.finishedAt !== undefined ? { finishedAt: record.finishedAt } : {}),
      ...(record.report ? { totalFindings: record.report.metrics.totalFindings } : {}),
      ...(record.error ? { error: record.error.message } : {}),
    };
  }
}
