/**
 * @fileoverview Configuration providers for running outside an editor host.
 *
 * - {@link ObjectConfigProvider}: reads from a plain nested object
 *   (`{ retry: { maxAttempts: 3 } }`), used by tests and embedders.
 * - {@link JsonConfigProvider}: loads such an object from a JSON file and
 *   layers environment overrides on top.
 *
 * Environment overrides use `REVIEW_ORCHESTRATOR_<SECTION>_<KEY>` with
 * camelCase converted to SCREAMING_SNAKE_CASE, e.g.
 * `REVIEW_ORCHESTRATOR_RETRY_MAX_ATTEMPTS=5`. The raw string is coerced to
 * the type of the default value passed to `getConfig`.
 *
 * @module core/configProvider
 */

import * as fs from 'fs';
import type { IConfigProvider } from '../interfaces/IConfigProvider';

/** Prefix for environment overrides. */
export const ENV_PREFIX = 'REVIEW_ORCHESTRATOR';

/** Default config file name looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = 'review-orchestrator.config.json';

export type ConfigRecord = Record<string, unknown>;

/**
 * Thrown when a config file exists but cannot be read or parsed.
 */
export class ConfigFileError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'ConfigFileError';
  }
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when `value` has the same runtime shape as `sample`
 * (array vs. object vs. primitive type).
 */
function matchesSample<T>(value: unknown, sample: T): value is T {
  if (Array.isArray(sample)) return Array.isArray(value);
  if (isRecord(sample)) return isRecord(value);
  return typeof value === typeof sample;
}

/**
 * Convert `maxAttempts` to `MAX_ATTEMPTS`.
 */
export function toEnvSegment(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .toUpperCase();
}

/**
 * Build the environment variable name for a section/key pair.
 */
export function envVarName(section: string, key: string): string {
  return `${ENV_PREFIX}_${toEnvSegment(section)}_${toEnvSegment(key)}`;
}

/**
 * Coerce a raw environment string to the type of `sample`.
 * Returns undefined when the string cannot represent that type.
 */
export function coerceEnvValue<T>(raw: string, sample: T): T | undefined {
  let parsed: unknown;
  if (typeof sample === 'number') {
    const n = Number(raw);
    parsed = raw.trim() === '' || Number.isNaN(n) ? undefined : n;
  } else if (typeof sample === 'boolean') {
    const lowered = raw.trim().toLowerCase();
    parsed = lowered === 'true' || lowered === '1' ? true : lowered === 'false' || lowered === '0' ? false : undefined;
  } else if (typeof sample === 'string') {
    parsed = raw;
  } else if (Array.isArray(sample)) {
    parsed = raw.trim().startsWith('[')
      ? safeJsonParse(raw)
      : raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
  } else {
    parsed = safeJsonParse(raw);
  }
  return matchesSample(parsed, sample) ? parsed : undefined;
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Configuration backed by a nested plain object.
 */
export class ObjectConfigProvider implements IConfigProvider {
  constructor(private readonly values: ConfigRecord = {}) {}

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const sectionValue = this.values[section];
    if (!isRecord(sectionValue)) {
      return defaultValue;
    }
    const value = sectionValue[key];
    return value !== undefined && matchesSample(value, defaultValue) ? value : defaultValue;
  }
}

/**
 * Options for {@link JsonConfigProvider}.
 */
export interface JsonConfigProviderOptions {
  /** Path of the JSON file. A missing file is not an error. */
  filePath?: string;
  /** Environment to read overrides from (defaults to `process.env`). */
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration from an optional JSON file plus environment overrides.
 * Environment values win over the file; the file wins over defaults.
 */
export class JsonConfigProvider implements IConfigProvider {
  private readonly file: ObjectConfigProvider;
  private readonly env: NodeJS.ProcessEnv;
  readonly filePath: string | undefined;

  constructor(options: JsonConfigProviderOptions = {}) {
    this.filePath = options.filePath;
    this.env = options.env ?? process.env;
    this.file = new ObjectConfigProvider(options.filePath ? readConfigFile(options.filePath) : {});
  }

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const fromFile = this.file.getConfig(section, key, defaultValue);
    const raw = this.env[envVarName(section, key)];
    if (raw === undefined) {
      return fromFile;
    }
    return coerceEnvValue(raw, defaultValue) ?? fromFile;
  }
}

/**
 * Read a JSON config file. A missing file yields an empty object; an
 * unreadable or malformed one throws {@link ConfigFileError}.
 */
export function readConfigFile(filePath: string): ConfigRecord {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw new ConfigFileError(`Cannot read config file: ${String(err)}`, filePath);
  }

  const parsed = safeJsonParse(raw);
  if (!isRecord(parsed)) {
    throw new ConfigFileError('Config file must contain a JSON object', filePath);
  }
  return parsed;
}
