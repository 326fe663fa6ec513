/**
 * @fileoverview Plan Builder
 *
 * Builds an immutable Plan topology from a PlanSpec.
 * Handles:
 * - Keeping step ids verbatim from the spec
 * - Computing dependents (reverse edges)
 * - Identifying roots and leaves
 * - Validating the Plan (no cycles, valid references, known capabilities)
 *
 * @module plan/builder
 */

import { v4 as uuidv4 } from 'uuid';
import type { Plan, PlanSpec, PlanStep } from './types';

/**
 * Validation error thrown when a {@link PlanSpec} is invalid.
 *
 * @example
 * ```typescript
 * try {
 *   buildPlan(spec);
 * } catch (e) {
 *   if (e instanceof PlanValidationError) {
 *     console.error(e.details); // ["Duplicate stepId: 's1'", ...]
 *   }
 * }
 * ```
 */
export class PlanValidationError extends Error {
  /**
   * @param message - Summary error message.
   * @param details - Individual validation errors (one per issue).
   */
  constructor(message: string, public readonly details: string[] = []) {
    super(details.length > 0 ? `${message}:\n- ${details.join('\n- ')}` : message);
    this.name = 'PlanValidationError';
  }
}

export interface BuildPlanOptions {
  /** When given, every step's capability must satisfy it. */
  isKnownCapability?: (capabilityId: string) => boolean;
  /** Override the generated plan id. */
  planId?: string;
  clock?: () => number;
}

/**
 * Build a {@link Plan} from a {@link PlanSpec}.
 *
 * Every problem found is collected before throwing, so a caller sees all of
 * them at once.
 *
 * @throws {PlanValidationError} If the spec is empty, contains duplicate or
 *         missing step ids, unknown dependencies or capabilities, or a cycle.
 *
 * @example
 * ```typescript
 * const plan = buildPlan({
 *   steps: [
 *     { stepId: 's1', capabilityId: 'security', dependencies: [], parallel: true },
 *     { stepId: 's2', capabilityId: 'bug', dependencies: [], parallel: true },
 *     { stepId: 's3', capabilityId: 'verify', dependencies: ['s1', 's2'], parallel: false },
 *   ],
 * });
 * ```
 */
export function buildPlan(spec: PlanSpec, options: BuildPlanOptions = {}): Plan {
  const errors: string[] = [];
  const order: string[] = [];
  const specs = new Map<string, PlanSpec['steps'][number]>();

  // First pass: collect step ids
  for (const step of spec.steps) {
    if (!step.stepId) {
      errors.push(`Step is missing required 'stepId' field`);
      continue;
    }
    if (specs.has(step.stepId)) {
      errors.push(`Duplicate stepId: '${step.stepId}'`);
      continue;
    }
    specs.set(step.stepId, step);
    order.push(step.stepId);
  }

  // Second pass: validate references and compute reverse edges
  const dependents = new Map<string, string[]>(order.map(id => [id, []]));
  for (const id of order) {
    const step = specs.get(id);
    if (!step) continue;

    if (!step.capabilityId) {
      errors.push(`Step '${id}' is missing required 'capabilityId' field`);
    } else if (options.isKnownCapability && !options.isKnownCapability(step.capabilityId)) {
      errors.push(`Step '${id}' references unknown capability '${step.capabilityId}'`);
    }

    const seen = new Set<string>();
    for (const dep of step.dependencies) {
      if (seen.has(dep)) continue;
      seen.add(dep);
      if (dep === id) {
        errors.push(`Step '${id}' depends on itself`);
        continue;
      }
      const reverse = dependents.get(dep);
      if (!reverse) {
        errors.push(`Step '${id}' references unknown dependency '${dep}'`);
        continue;
      }
      reverse.push(id);
    }
  }

  if (order.length === 0) {
    errors.push('Plan must have at least one step');
  }

  const cycleError = detectCycles(order, id => specs.get(id)?.dependencies ?? []);
  if (cycleError) {
    errors.push(cycleError);
  }

  if (errors.length > 0) {
    throw new PlanValidationError('Invalid plan specification', errors);
  }

  const steps = new Map<string, PlanStep>();
  const roots: string[] = [];
  const leaves: string[] = [];
  for (const id of order) {
    const step = specs.get(id);
    if (!step) continue;
    const built: PlanStep = Object.freeze({
      stepId: step.stepId,
      capabilityId: step.capabilityId,
      dependencies: Object.freeze([...new Set(step.dependencies)]),
      parallel: step.parallel,
      description: step.description,
      dependents: Object.freeze(dependents.get(id) ?? []),
    });
    steps.set(id, built);
    if (built.dependencies.length === 0) roots.push(id);
    if (built.dependents.length === 0) leaves.push(id);
  }

  return {
    planId: options.planId ?? uuidv4(),
    steps,
    order: Object.freeze(order),
    roots: Object.freeze(roots),
    leaves: Object.freeze(leaves),
    createdAt: (options.clock ?? Date.now)(),
  };
}

/**
 * Convert a plan back to its ordered specification form.
 */
export function toPlanSpec(plan: Plan): PlanSpec {
  const steps: PlanSpec['steps'] = [];
  for (const id of plan.order) {
    const step = plan.steps.get(id);
    if (!step) continue;
    steps.push({
      stepId: step.stepId,
      capabilityId: step.capabilityId,
      dependencies: [...step.dependencies],
      parallel: step.parallel,
      ...(step.description !== undefined ? { description: step.description } : {}),
    });
  }
  return { steps };
}

/**
 * Detect cycles in the dependency graph using DFS.
 *
 * @returns Error message describing the cycle, or null if none
 */
function detectCycles(ids: readonly string[], dependenciesOf: (id: string) => readonly string[]): string | null {
  const known = new Set(ids);
  const visited = new Set<string>();
  const visiting = new Set<string>();
  const path: string[] = [];

  function dfs(id: string): string | null {
    if (visiting.has(id)) {
      const cyclePath = path.slice(path.indexOf(id));
      cyclePath.push(id);
      return `Circular dependency detected: ${cyclePath.join(' -> ')}`;
    }
    if (visited.has(id)) {
      return null;
    }

    visiting.add(id);
    path.push(id);

    for (const dep of dependenciesOf(id)) {
      // Unknown and self references are reported separately
      if (!known.has(dep) || dep === id) continue;
      const error = dfs(dep);
      if (error) return error;
    }

    path.pop();
    visiting.delete(id);
    visited.add(id);
    return null;
  }

  for (const id of ids) {
    const error = dfs(id);
    if (error) return error;
  }
  return null;
}
