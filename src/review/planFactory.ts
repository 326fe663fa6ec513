/**
 * @fileoverview Builds the default review plan from the registry.
 *
 * One parallel step per analyzer (`s1`, `s2`, ... in registration order),
 * then one sequential step per verifier depending on every analyzer step.
 *
 * @module review/planFactory
 */

import type { CapabilityRegistry } from '../capabilities/registry';
import { PlanValidationError } from '../plan/builder';
import type { PlanSpec, PlanStepSpec } from '../plan/types';

export function createPlanSpec(registry: CapabilityRegistry, only?: readonly string[]): PlanSpec {
  let analyzers = registry.analyzers();

  if (only && only.length > 0) {
    const known = new Set(analyzers.map((c) => c.descriptor.id));
    const unknown = only.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new PlanValidationError(
        'Unknown analyzer capability',
        unknown.map((id) => `No analyzer registered as '${id}'`),
      );
    }
    analyzers = analyzers.filter((c) => only.includes(c.descriptor.id));
  }

  const steps: PlanStepSpec[] = analyzers.map((capability, index) => ({
    stepId: `s${index + 1}`,
    capabilityId: capability.descriptor.id,
    dependencies: [],
    parallel: true,
    description: capability.descriptor.description,
  }));

  const analyzerSteps = steps.map((s) => s.stepId);
  for (const verifier of registry.verifiers()) {
    steps.push({
      stepId: `s${steps.length + 1}`,
      capabilityId: verifier.descriptor.id,
      dependencies: [...analyzerSteps],
      parallel: false,
      description: verifier.descriptor.description,
    });
  }

  return { steps };
}
