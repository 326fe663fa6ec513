/**
 * @fileoverview Interface for configuration access.
 *
 * Every component reads its settings through this abstraction so the same
 * code runs from the CLI (JSON file + environment) and from tests (plain
 * in-memory objects).
 *
 * @module interfaces/IConfigProvider
 */

/**
 * Read access to layered configuration.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly config: IConfigProvider) {}
 *
 *   getTimeout(): number {
 *     return this.config.getConfig('execution', 'capabilityTimeoutMs', 120_000);
 *   }
 * }
 * ```
 */
export interface IConfigProvider {
  /**
   * Get a configuration value with a fallback default.
   *
   * @param section - Configuration section (e.g. `retry`, `eventBus`)
   * @param key - Configuration key within the section
   * @param defaultValue - Value returned when the key is not set
   */
  getConfig<T>(section: string, key: string, defaultValue: T): T;
}
