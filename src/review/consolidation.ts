/**
 * @fileoverview Deterministic merge of batch findings into the consolidated
 * collection.
 *
 * Two findings are duplicates when they share category, normalized issue
 * type and normalized file, and their line ranges overlap once each is
 * widened by the line tolerance. Of a duplicate pair the survivor is the one
 * with higher confidence, then higher severity, then the one discovered
 * first. The survivor records the ids it absorbed in `mergedFindingIds`.
 *
 * @module review/consolidation
 */

import type { Finding } from '../types';
import { severityRank } from '../types';

export interface ConsolidationResult {
  /** The new consolidated collection. Inputs are not mutated. */
  findings: Finding[];
  /** Findings of the batch that were not duplicates. */
  added: number;
  duplicatesRemoved: number;
}

export function normalizeFindingType(findingType: string): string {
  return findingType.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function normalizeFile(file: string): string {
  return file.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/\/{2,}/g, '/');
}

/**
 * Key of the exact-match part of the similarity test.
 */
export function similarityKey(finding: Finding): string {
  return [
    finding.category,
    normalizeFindingType(finding.findingType),
    normalizeFile(finding.location.file),
  ].join('|');
}

export function rangesOverlap(a: Finding, b: Finding, lineTolerance: number): boolean {
  const aStart = a.location.lineStart - lineTolerance;
  const aEnd = a.location.lineEnd + lineTolerance;
  const bStart = b.location.lineStart - lineTolerance;
  const bEnd = b.location.lineEnd + lineTolerance;
  return aStart <= bEnd && bStart <= aEnd;
}

export function areDuplicates(a: Finding, b: Finding, lineTolerance: number): boolean {
  return similarityKey(a) === similarityKey(b) && rangesOverlap(a, b, lineTolerance);
}

/**
 * True when `candidate` should replace `incumbent`. The incumbent was
 * discovered first, so it wins full ties.
 */
function outranks(candidate: Finding, incumbent: Finding): boolean {
  if (candidate.confidence !== incumbent.confidence) {
    return candidate.confidence > incumbent.confidence;
  }
  return severityRank(candidate.severity) < severityRank(incumbent.severity);
}

function mergeIds(survivor: Finding, absorbed: Finding): string[] {
  const ids = [
    ...(survivor.mergedFindingIds ?? []),
    absorbed.findingId,
    ...(absorbed.mergedFindingIds ?? []),
  ];
  return [...new Set(ids)].filter((id) => id !== survivor.findingId);
}

/**
 * Merge `incoming` (a resolved batch's findings, in batch order) into
 * `existing`.
 */
export function consolidateFindings(
  existing: readonly Finding[],
  incoming: readonly Finding[],
  lineTolerance = 0,
): ConsolidationResult {
  const findings = [...existing];
  let added = 0;
  let duplicatesRemoved = 0;

  for (const finding of incoming) {
    const index = findings.findIndex((f) => areDuplicates(f, finding, lineTolerance));
    if (index === -1) {
      findings.push(finding);
      added++;
      continue;
    }

    const incumbent = findings[index];
    const survivor = outranks(finding, incumbent) ? finding : incumbent;
    const absorbed = survivor === finding ? incumbent : finding;
    findings[index] = { ...survivor, mergedFindingIds: mergeIds(survivor, absorbed) };
    duplicatesRemoved++;
  }

  return { findings, added, duplicatesRemoved };
}
