#!/usr/bin/env node

/**
 * @fileoverview review-orchestrator command line.
 *
 * `review-orchestrator review <file>` runs the bundled analyzers over one
 * file. Progress events go to stderr as they arrive; the report goes to
 * stdout. With `--json`, stdout carries every event as NDJSON instead (the
 * report is inside the `final_report` event).
 *
 * Exit codes: 0 completed, 1 partial, 2 failed, 3 usage or configuration
 * error.
 *
 * @module cli
 */

import * as fs from 'fs';
import { Command, CommanderError } from 'commander';
import { RuleSetError } from './capabilities/rules';
import { createContainer } from './composition';
import { ConfigFileError, DEFAULT_CONFIG_FILE } from './core/configProvider';
import type { ServiceContainer } from './core/container';
import { ConfigValidationError } from './core/settings';
import * as Tokens from './core/tokens';
import { serializeEventLine } from './events/serialize';
import type { ReviewEvent } from './events/types';
import { PlanValidationError } from './plan/builder';
import { InputValidationError } from './review/errors';
import type { ReviewService } from './review/reviewService';
import type { ReviewReport, ReviewStatus } from './review/types';

export const EXIT_CODES: Record<ReviewStatus | 'usage', number> = {
  completed: 0,
  partial: 1,
  failed: 2,
  usage: 3,
};

/**
 * Where the CLI writes. Tests capture output through this.
 */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export interface ReviewCommandOptions {
  json?: boolean;
  config?: string;
  only?: string[];
  language?: string;
}

export interface ReviewCommandDeps {
  io?: CliIo;
  /** Prebuilt container; defaults to one from the `--config` file. */
  container?: ServiceContainer;
  signal?: AbortSignal;
}

// ── Formatting ───────────────────────────────────────────────

/**
 * One human-readable line per event.
 */
export function formatEvent(event: ReviewEvent): string {
  const prefix = `[${event.sourceId}#${event.sequence}] ${event.eventType}`;
  switch (event.eventType) {
    case 'review_started':
      return `${prefix}: ${event.payload.filename} (${event.payload.codeLength} chars)`;
    case 'plan_created':
      return `${prefix}: ${event.payload.steps.map((s) => `${s.stepId}=${s.capabilityId}`).join(', ')}`;
    case 'plan_step_started':
      return `${prefix}: ${event.payload.stepId} (${event.payload.capabilityId})`;
    case 'plan_step_completed':
      return `${prefix}: ${event.payload.stepId} ${event.payload.status} after ${event.payload.attempts} attempt(s)` +
        (event.payload.error ? `: ${event.payload.error}` : '');
    case 'agent_error':
      return `${prefix}: attempt ${event.payload.attempt}/${event.payload.maxAttempts} ${event.payload.errorType}, ` +
        `retrying in ${event.payload.delayMs}ms`;
    case 'finding_discovered': {
      const { finding } = event.payload;
      return `${prefix}: [${finding.severity}] ${finding.title} at line ${finding.location.lineStart}`;
    }
    case 'fix_verified':
      return `${prefix}: ${event.payload.fixId} ${event.payload.status}`;
    case 'fix_rejected':
      return `${prefix}: ${event.payload.reason}`;
    case 'findings_consolidated':
      return `${prefix}: ${event.payload.totalFindings} total, ${event.payload.duplicatesRemoved} duplicate(s) removed`;
    case 'review_completed':
      return `${prefix}: ${event.payload.status} in ${event.payload.durationMs}ms`;
    default:
      return prefix;
  }
}

/**
 * Plain-text report for stdout.
 */
export function formatReport(report: ReviewReport): string {
  const lines = [`Review ${report.reviewId}: ${report.status}`, report.summary, ''];

  for (const finding of report.findings) {
    const rule = finding.ruleId ? ` (${finding.ruleId})` : '';
    lines.push(`[${finding.severity.toUpperCase()}] ${finding.location.file}:${finding.location.lineStart} ${finding.title}${rule}`);
    lines.push(`    ${finding.location.codeSnippet}`);
    const merged = finding.mergedFindingIds?.length ?? 0;
    if (merged > 0) {
      lines.push(`    (${merged} duplicate(s) merged)`);
    }
  }

  if (report.fixes.length > 0) {
    lines.push('', `Fixes: ${report.fixes.length} (verified ${report.metrics.verifiedFixes}, unverified ${report.metrics.unverifiedFixes})`);
    for (const fix of report.fixes) {
      lines.push(`  ${fix.verificationStatus.padEnd(10)} ${fix.originalCode.trim()}  ->  ${fix.proposedCode.trim()}`);
    }
  }

  if (report.errors.length > 0) {
    lines.push('', 'Errors:');
    for (const error of report.errors) {
      lines.push(`  - ${error.stepId ? `${error.stepId}: ` : ''}${error.errorType}: ${error.message.split('\n')[0]}`);
    }
  }

  return lines.join('\n') + '\n';
}

function isUsageError(err: unknown): boolean {
  return (
    err instanceof InputValidationError ||
    err instanceof PlanValidationError ||
    err instanceof ConfigValidationError ||
    err instanceof ConfigFileError ||
    err instanceof RuleSetError
  );
}

// ── Command ──────────────────────────────────────────────────

/**
 * Run one review and return the process exit code.
 */
export async function runReviewCommand(
  file: string,
  options: ReviewCommandOptions,
  deps: ReviewCommandDeps = {},
): Promise<number> {
  const io = deps.io ?? processIo;

  let code: string;
  try {
    code = fs.readFileSync(file, 'utf8');
  } catch (err) {
    io.stderr(`Error: cannot read ${file}: ${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_CODES.usage;
  }

  let reviewId: string;
  let service: ReviewService;
  try {
    const container = deps.container ?? createContainer({ configFile: options.config });
    service = container.resolve(Tokens.ReviewService);
    reviewId = service.submit(
      { code, filename: file, ...(options.language ? { language: options.language } : {}) },
      { ...(options.only && options.only.length > 0 ? { capabilities: options.only } : {}) },
    );
  } catch (err) {
    if (isUsageError(err)) {
      io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
      return EXIT_CODES.usage;
    }
    throw err;
  }

  const onAbort = (): void => {
    service.cancel(reviewId);
  };
  deps.signal?.addEventListener('abort', onAbort, { once: true });

  const subscription = service.subscribe(reviewId, {
    listener: (event) => {
      if (options.json) {
        io.stdout(serializeEventLine(event) + '\n');
      } else {
        io.stderr(formatEvent(event) + '\n');
      }
    },
  });

  try {
    const report = await service.waitForReport(reviewId);
    await subscription.closed;
    if (!options.json) {
      io.stdout(formatReport(report));
    }
    return EXIT_CODES[report.status];
  } finally {
    deps.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Build the commander program. `onExit` receives the exit code of the
 * review command.
 */
export function createProgram(onExit: (code: number) => void, io: CliIo = processIo): Command {
  const program = new Command();

  program
    .name('review-orchestrator')
    .description('Multi-agent code review: parallel analyzers, retries, consolidation and an ordered event stream.')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    });

  program
    .command('review')
    .description('Review one source file')
    .argument('<file>', 'File to review')
    .option('--json', 'Write every event as NDJSON to stdout')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_FILE)
    .option('--only <ids...>', 'Run only these analyzer capabilities')
    .option('--language <name>', 'Language of the file')
    .action(async (file: string, opts: ReviewCommandOptions) => {
      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        onExit(await runReviewCommand(file, opts, { io, signal: controller.signal }));
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });

  return program;
}

/**
 * Parse argv and run. Resolves with the exit code.
 */
export async function main(argv: readonly string[] = process.argv, io: CliIo = processIo): Promise<number> {
  let exitCode = 0;
  const program = createProgram((code) => {
    exitCode = code;
  }, io);

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : EXIT_CODES.usage;
    }
    io.stderr(`Error: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    return EXIT_CODES.failed;
  }
  return exitCode;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`Fatal: ${String(err)}\n`);
      process.exitCode = EXIT_CODES.failed;
    },
  );
}
