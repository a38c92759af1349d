/**
 * @pointpack/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { ENV_PREFIX, ErrorCode, LogLevels, ValidationError } from '@pointpack/core';
import type {
  CodecConfig,
  DeepPartial,
  EnvConfigOptions,
  LogFormat,
  LogLevel,
  ObservabilityConfig,
  ValidationConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

/**
 * Deep freeze a config so no section can be mutated.
 */
function freezeConfig(config: CodecConfig): CodecConfig {
  Object.freeze(config.validation);
  Object.freeze(config.observability);
  return Object.freeze(config);
}

function mergeValidation(
  target: DeepPartial<ValidationConfig> | undefined,
  source: DeepPartial<ValidationConfig> | undefined
): DeepPartial<ValidationConfig> {
  return {
    ...target,
    ...(source?.allowOverlappingMasks !== undefined && { allowOverlappingMasks: source.allowOverlappingMasks }),
    ...(source?.allowNarrowSubFieldTypes !== undefined && { allowNarrowSubFieldTypes: source.allowNarrowSubFieldTypes }),
  };
}

function mergeObservability(
  target: DeepPartial<ObservabilityConfig> | undefined,
  source: DeepPartial<ObservabilityConfig> | undefined
): DeepPartial<ObservabilityConfig> {
  return {
    ...target,
    ...(source?.logLevel !== undefined && { logLevel: source.logLevel }),
    ...(source?.logFormat !== undefined && { logFormat: source.logFormat }),
  };
}

/**
 * Create a complete CodecConfig with optional overrides.
 *
 * Undefined override values leave the base value in place.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen CodecConfig with all values filled in
 *
 * @example
 * ```typescript
 * const strict = createConfig();
 *
 * const lenient = createConfig({
 *   validation: { allowOverlappingMasks: true },
 * });
 *
 * const quiet = createConfig({ observability: { logLevel: 'warn' } }, lenient);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<CodecConfig>,
  base: CodecConfig = DEFAULT_CONFIG
): CodecConfig {
  const validation = mergeValidation(undefined, overrides?.validation);
  const observability = mergeObservability(undefined, overrides?.observability);

  return freezeConfig({
    validation: {
      allowOverlappingMasks: validation.allowOverlappingMasks ?? base.validation.allowOverlappingMasks,
      allowNarrowSubFieldTypes: validation.allowNarrowSubFieldTypes ?? base.validation.allowNarrowSubFieldTypes,
    },
    observability: {
      logLevel: observability.logLevel ?? base.observability.logLevel,
      logFormat: observability.logFormat ?? base.observability.logFormat,
    },
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { observability: { logLevel: 'debug' } },
 *   { observability: { logFormat: 'pretty' } },
 * );
 * // merged.observability => { logLevel: 'debug', logFormat: 'pretty' }
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<CodecConfig> | null | undefined>
): DeepPartial<CodecConfig> {
  let result: DeepPartial<CodecConfig> = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }
    result = {
      ...result,
      ...(config.validation && { validation: mergeValidation(result.validation, config.validation) }),
      ...(config.observability && {
        observability: mergeObservability(result.observability, config.observability),
      }),
    };
  }

  return result;
}

/**
 * Parse a boolean environment value. 'true' (any case) and '1' are true.
 */
function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): { key: string; value: string | undefined } {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return { key, value: env[key] };
}

function invalidEnvValue(key: string, value: string, allowed: readonly string[]): ValidationError {
  return new ValidationError(
    `Invalid value "${value}" for ${key}`,
    ErrorCode.VALIDATION_ERROR,
    { key, value, allowed: [...allowed] },
    `Use one of: ${allowed.join(', ')}`
  );
}

function parseLogLevel(key: string, value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!LogLevels.isLogLevel(value)) {
    throw invalidEnvValue(key, value, ['debug', 'info', 'warn', 'error']);
  }
  return value;
}

function parseLogFormat(key: string, value: string | undefined): LogFormat | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isLogFormat(value)) {
    throw invalidEnvValue(key, value, LOG_FORMATS);
  }
  return value;
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: POINTPACK_<SECTION>_<FIELD>
 * - POINTPACK_VALIDATION_ALLOW_OVERLAPPING_MASKS=true
 * - POINTPACK_VALIDATION_ALLOW_NARROW_SUB_FIELD_TYPES=1
 * - POINTPACK_OBSERVABILITY_LOG_LEVEL=warn
 * - POINTPACK_OBSERVABILITY_LOG_FORMAT=pretty
 *
 * @throws ValidationError for a log level or format that is not recognised
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'LIDAR', env: { LIDAR_OBSERVABILITY_LOG_LEVEL: 'debug' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): CodecConfig {
  const prefix = options.prefix ?? ENV_PREFIX;
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});

  const overrides: DeepPartial<CodecConfig> = {};

  // Validation configuration
  const allowOverlappingMasks = parseBoolean(
    getEnvVar(env, prefix, 'VALIDATION', 'ALLOW', 'OVERLAPPING', 'MASKS').value
  );
  const allowNarrowSubFieldTypes = parseBoolean(
    getEnvVar(env, prefix, 'VALIDATION', 'ALLOW', 'NARROW', 'SUB', 'FIELD', 'TYPES').value
  );

  if (allowOverlappingMasks !== undefined || allowNarrowSubFieldTypes !== undefined) {
    overrides.validation = {
      ...(allowOverlappingMasks !== undefined && { allowOverlappingMasks }),
      ...(allowNarrowSubFieldTypes !== undefined && { allowNarrowSubFieldTypes }),
    };
  }

  // Observability configuration
  const level = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL');
  const format = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT');
  const logLevel = parseLogLevel(level.key, level.value);
  const logFormat = parseLogFormat(format.key, format.value);

  if (logLevel !== undefined || logFormat !== undefined) {
    overrides.observability = {
      ...(logLevel !== undefined && { logLevel }),
      ...(logFormat !== undefined && { logFormat }),
    };
  }

  return createConfig(overrides);
}
