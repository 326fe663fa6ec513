/**
 * @fileoverview Composition Root: DI container wiring for the orchestrator.
 *
 * Creates a {@link ServiceContainer} with all production services
 * registered. This is the single place where concrete classes meet their
 * interfaces.
 *
 * ## Dependency Graph
 *
 * ```
 * IConfigProvider    ──→ JsonConfigProvider     (singleton)
 *   └─ used by: Settings, Logger
 *
 * Settings           ──→ loadSettings(IConfigProvider) (singleton)
 *   └─ used by: ReviewService
 *
 * Logger             ──→ Logger.initialize(IConfigProvider) (singleton)
 *   └─ used by: all components via Logger.for()
 *
 * CapabilityRegistry ──→ createDefaultRegistry(rulesDir) (singleton)
 * RetrySupervisor    ──→ RetrySupervisor        (singleton)
 * ReviewService      ──→ ReviewService          (singleton, uses all of the above)
 * ```
 *
 * @module composition
 */

import { createDefaultRegistry } from './capabilities/registry';
import { DEFAULT_RULES_DIR } from './capabilities/rules';
import { JsonConfigProvider } from './core/configProvider';
import { ServiceContainer } from './core/container';
import { Logger } from './core/logger';
import { loadSettings } from './core/settings';
import * as Tokens from './core/tokens';
import type { IConfigProvider } from './interfaces/IConfigProvider';
import { RetrySupervisor } from './retry/supervisor';
import { ReviewService } from './review/reviewService';

export interface CompositionOptions {
  /** Use this provider instead of the JSON file + environment provider. */
  configProvider?: IConfigProvider;
  /** JSON config file for the default provider. */
  configFile?: string;
  /** Environment for the default provider; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Directory of the bundled rule files. */
  rulesDir?: string;
}

/**
 * Create and wire the production DI container.
 *
 * Nothing is constructed until first resolved, so configuration errors
 * surface from `resolve` (as {@link ConfigValidationError} or
 * {@link ConfigFileError}).
 */
export function createContainer(options: CompositionOptions = {}): ServiceContainer {
  const container = new ServiceContainer();

  // ─── Configuration ───────────────────────────────────────────────────
  const { configProvider } = options;
  if (configProvider) {
    container.registerInstance(Tokens.IConfigProvider, configProvider);
  } else {
    container.registerSingleton(
      Tokens.IConfigProvider,
      () => new JsonConfigProvider({ filePath: options.configFile, env: options.env }),
    );
  }

  container.registerSingleton(Tokens.Settings, (c) => loadSettings(c.resolve(Tokens.IConfigProvider)));

  // ─── Logging ─────────────────────────────────────────────────────────
  // Process-wide: every Logger.for() picks up the configured level
  container.registerSingleton(Tokens.Logger, (c) => Logger.initialize(c.resolve(Tokens.IConfigProvider)));

  // ─── Orchestration ───────────────────────────────────────────────────
  container.registerSingleton(Tokens.CapabilityRegistry, () =>
    createDefaultRegistry(options.rulesDir ?? DEFAULT_RULES_DIR),
  );

  container.registerSingleton(Tokens.RetrySupervisor, () => new RetrySupervisor());

  container.registerSingleton(Tokens.ReviewService, (c) => {
    c.resolve(Tokens.Logger);
    return new ReviewService({
      registry: c.resolve(Tokens.CapabilityRegistry),
      supervisor: c.resolve(Tokens.RetrySupervisor),
      settings: c.resolve(Tokens.Settings),
    });
  });

  return container;
}
