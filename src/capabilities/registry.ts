/**
 * @fileoverview Registry of capabilities keyed by capability id.
 *
 * @module capabilities/registry
 */

import type { ICapability } from '../interfaces/ICapability';
import type { ILogger } from '../interfaces/ILogger';
import { BugCapability } from './bugCapability';
import { FixVerificationCapability } from './fixVerificationCapability';
import { DEFAULT_RULES_DIR, loadBundledRuleSet } from './rules';
import { SecurityCapability } from './securityCapability';

export class DuplicateCapabilityError extends Error {
  constructor(public readonly capabilityId: string) {
    super(`Capability '${capabilityId}' is already registered`);
    this.name = 'DuplicateCapabilityError';
  }
}

/**
 * Registration order is preserved: plans list analyzers in the order they
 * were registered.
 */
export class CapabilityRegistry {
  private readonly capabilities = new Map<string, ICapability>();

  register(capability: ICapability): this {
    const { id } = capability.descriptor;
    if (this.capabilities.has(id)) {
      throw new DuplicateCapabilityError(id);
    }
    this.capabilities.set(id, capability);
    return this;
  }

  get(id: string): ICapability | undefined {
    return this.capabilities.get(id);
  }

  has(id: string): boolean {
    return this.capabilities.has(id);
  }

  list(): ICapability[] {
    return [...this.capabilities.values()];
  }

  analyzers(): ICapability[] {
    return this.list().filter((c) => c.descriptor.kind === 'analyzer');
  }

  verifiers(): ICapability[] {
    return this.list().filter((c) => c.descriptor.kind === 'verifier');
  }

  get size(): number {
    return this.capabilities.size;
  }
}

/**
 * Registry with the bundled security and bug analyzers and the fix verifier.
 */
export function createDefaultRegistry(rulesDir: string = DEFAULT_RULES_DIR, logger?: ILogger): CapabilityRegistry {
  const security = loadBundledRuleSet('security', rulesDir);
  const bug = loadBundledRuleSet('bug', rulesDir);
  return new CapabilityRegistry()
    .register(new SecurityCapability(security, logger))
    .register(new BugCapability(bug, logger))
    .register(new FixVerificationCapability([security, bug], logger));
}
