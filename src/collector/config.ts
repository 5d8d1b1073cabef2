/**
 * Event Log Digest - Collector Configuration
 *
 * Configuration for one collection run. Values come from CLI flags
 * (overrides), then environment variables, then defaults.
 */

import * as os from 'os';
import * as path from 'path';

import type { LogSource } from '../types/eventRecord';
import { ConfigError } from '../utils/errors';
import { isLogLevel, type LogLevel, type LoggerLike } from '../utils/logger';
import { CollectorConfigSchema } from '../utils/validation';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export interface CollectorConfig {
  /** Size of the collection window in hours (EVENTLOG_HOURS_BACK) */
  hoursBack: number;

  /** Maximum records kept per log source (EVENTLOG_MAX_EVENTS) */
  maxRecords: number;

  /** Where the JSON document is written (EVENTLOG_OUTPUT) */
  outputPath: string;

  /** Query the System log (EVENTLOG_INCLUDE_SYSTEM) */
  includeSystem: boolean;

  /** Query the Application log (EVENTLOG_INCLUDE_APPLICATION) */
  includeApplication: boolean;

  /** Query the Security log; needs elevation (EVENTLOG_INCLUDE_SECURITY) */
  includeSecurity: boolean;

  /** Write aggregated groups instead of every record (EVENTLOG_AGGREGATE) */
  aggregate: boolean;

  /** Distinct sample messages kept per group (EVENTLOG_SAMPLE_CAP) */
  sampleCap: number;

  /** Budget for each source query (EVENTLOG_SOURCE_TIMEOUT) */
  sourceTimeoutMs: number;

  /** Minimum log level (LOG_LEVEL) */
  logLevel: LogLevel;
}

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

/**
 * Default output location: per-user application data on Windows, the home
 * directory elsewhere.
 */
export function defaultOutputPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.LOCALAPPDATA || os.homedir();
  return path.join(base, 'EventlogDigest', 'logs', 'eventlog.json');
}

export const DEFAULT_COLLECTOR_CONFIG: Omit<CollectorConfig, 'outputPath'> = {
  hoursBack: 48,
  maxRecords: 500,
  includeSystem: true,
  includeApplication: true,
  includeSecurity: true,
  aggregate: false,
  sampleCap: 3,
  sourceTimeoutMs: 120000,   // 2 minutes per log
  logLevel: 'info',
};

// =============================================================================
// ENVIRONMENT VARIABLE PARSING
// =============================================================================

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;

  /** Receives a message for every environment value that was ignored */
  onWarning?: (message: string) => void;
}

/**
 * Parse an integer environment variable with fallback.
 */
function parseIntEnv(
  env: NodeJS.ProcessEnv,
  key: string,
  defaultValue: number,
  onWarning: (message: string) => void
): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    onWarning(`Invalid integer value for ${key}: ${value}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse a boolean environment variable with fallback.
 */
function parseBoolEnv(
  env: NodeJS.ProcessEnv,
  key: string,
  defaultValue: boolean,
  onWarning: (message: string) => void
): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const lower = value.trim().toLowerCase();
  if (lower === 'true' || lower === '1') {
    return true;
  }
  if (lower === 'false' || lower === '0') {
    return false;
  }
  onWarning(`Invalid boolean value for ${key}: ${value}, using default: ${defaultValue}`);
  return defaultValue;
}

function parseLogLevelEnv(
  env: NodeJS.ProcessEnv,
  defaultValue: LogLevel,
  onWarning: (message: string) => void
): LogLevel {
  const value = env.LOG_LEVEL;
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const lower = value.toLowerCase();
  if (isLogLevel(lower)) {
    return lower;
  }
  onWarning(`Invalid LOG_LEVEL: ${value}, using default: ${defaultValue}`);
  return defaultValue;
}

// =============================================================================
// CONFIGURATION LOADER
// =============================================================================

/**
 * Load collector configuration from environment variables.
 * Falls back to defaults for any missing values.
 */
export function loadCollectorConfig(
  overrides?: Partial<CollectorConfig>,
  options: LoadConfigOptions = {}
): CollectorConfig {
  const env = options.env ?? process.env;
  const onWarning = options.onWarning ?? (() => undefined);
  const defaults = DEFAULT_COLLECTOR_CONFIG;

  const config: CollectorConfig = {
    hoursBack: parseIntEnv(env, 'EVENTLOG_HOURS_BACK', defaults.hoursBack, onWarning),
    maxRecords: parseIntEnv(env, 'EVENTLOG_MAX_EVENTS', defaults.maxRecords, onWarning),
    outputPath: env.EVENTLOG_OUTPUT || defaultOutputPath(env),
    includeSystem: parseBoolEnv(env, 'EVENTLOG_INCLUDE_SYSTEM', defaults.includeSystem, onWarning),
    includeApplication: parseBoolEnv(env, 'EVENTLOG_INCLUDE_APPLICATION', defaults.includeApplication, onWarning),
    includeSecurity: parseBoolEnv(env, 'EVENTLOG_INCLUDE_SECURITY', defaults.includeSecurity, onWarning),
    aggregate: parseBoolEnv(env, 'EVENTLOG_AGGREGATE', defaults.aggregate, onWarning),
    sampleCap: parseIntEnv(env, 'EVENTLOG_SAMPLE_CAP', defaults.sampleCap, onWarning),
    sourceTimeoutMs: parseIntEnv(env, 'EVENTLOG_SOURCE_TIMEOUT', defaults.sourceTimeoutMs, onWarning),
    logLevel: parseLogLevelEnv(env, defaults.logLevel, onWarning),
  };

  // Apply any overrides
  if (overrides) {
    Object.assign(config, overrides);
  }

  return config;
}

// =============================================================================
// CONFIGURATION VALIDATION
// =============================================================================

/**
 * Validation result interface.
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validate collector configuration.
 */
export function validateCollectorConfig(config: CollectorConfig): ValidationResult {
  const warnings: string[] = [];
  const parsed = CollectorConfigSchema.safeParse(config);
  const errors = parsed.success ? [] : parsed.error.issues.map((issue) => issue.message);

  if (config.hoursBack > 720) {
    warnings.push('Window longer than 30 days may take a long time to query');
  }
  if (config.maxRecords > 5000) {
    warnings.push('More than 5000 records per log may not fit a language model context');
  }
  if (config.sourceTimeoutMs < 5000) {
    warnings.push('Source timeout under 5 seconds may cut off slow log queries');
  }
  if (config.includeSecurity) {
    warnings.push('Security log needs an elevated prompt; it is skipped otherwise');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate and log warnings, or throw ConfigError.
 */
export function assertValidConfig(config: CollectorConfig, logger: LoggerLike): void {
  const result = validateCollectorConfig(config);
  for (const warning of result.warnings) {
    logger.debug(warning);
  }
  if (!result.valid) {
    throw new ConfigError(result.errors);
  }
}

/**
 * Log sources enabled by the configuration, in canonical order.
 */
export function enabledSources(config: CollectorConfig): LogSource[] {
  const sources: LogSource[] = [];
  if (config.includeSystem) sources.push('System');
  if (config.includeApplication) sources.push('Application');
  if (config.includeSecurity) sources.push('Security');
  return sources;
}

// =============================================================================
// CONFIGURATION LOGGING
// =============================================================================

/**
 * Get a version of config for logging.
 */
export function getLoggableConfig(config: CollectorConfig): Record<string, unknown> {
  return {
    hoursBack: config.hoursBack,
    maxRecords: config.maxRecords,
    outputPath: config.outputPath,
    sources: enabledSources(config),
    aggregate: config.aggregate,
    sampleCap: config.sampleCap,
    sourceTimeoutMs: config.sourceTimeoutMs,
    logLevel: config.logLevel,
  };
}
