/**
 * @fileoverview Core module exports.
 *
 * Logging, configuration, settings, validation and the DI container.
 *
 * @module core
 */

export { Logger, ComponentLogger } from './logger';
export type { LogComponent, LogLevel } from './logger';
export {
  ConfigFileError,
  DEFAULT_CONFIG_FILE,
  ENV_PREFIX,
  JsonConfigProvider,
  ObjectConfigProvider,
  coerceEnvValue,
  envVarName,
  readConfigFile,
  toEnvSegment,
} from './configProvider';
export type { ConfigRecord, JsonConfigProviderOptions } from './configProvider';
export {
  ConfigValidationError,
  DEFAULT_SETTINGS,
  loadSettings,
  retryPolicyFor,
  timeoutFor,
} from './settings';
export type {
  ConsolidationSettings,
  EventBusSettings,
  ExecutionSettings,
  InputSettings,
  LoggingSettings,
  OrchestratorSettings,
  RetryPolicySettings,
  RetrySettings,
  ServiceSettings,
} from './settings';
export { compileSchema, formatErrors, validateWith } from './validation';
export type { SchemaCheck } from './validation';
export { ServiceContainer, createToken } from './container';
export type { ServiceFactory, ServiceToken } from './container';
export * as Tokens from './tokens';
