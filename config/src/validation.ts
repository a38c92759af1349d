/**
 * @pointpack/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 *
 * @packageDocumentation
 */

import { LogLevels } from '@pointpack/core';
import type {
  CodecConfig,
  ConfigValidationError,
  ConfigValidationResult,
  ConfigValidationWarning,
} from './types.js';

/**
 * Validate a complete CodecConfig.
 *
 * Configs built with createConfig are well-typed, but values can still
 * arrive from plain JavaScript or parsed files.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   logger.error('Invalid codec config', undefined, { errors: result.errors.map(e => e.message) });
 * }
 * ```
 */
export function validateConfig(config: CodecConfig): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateValidationConfig(config.validation, errors, warnings);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate point-format validation settings.
 */
function validateValidationConfig(
  validation: CodecConfig['validation'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  for (const key of ['allowOverlappingMasks', 'allowNarrowSubFieldTypes'] as const) {
    if (typeof validation[key] !== 'boolean') {
      errors.push({
        path: `validation.${key}`,
        message: 'Must be a boolean',
        value: validation[key],
      });
    }
  }

  if (validation.allowOverlappingMasks === true) {
    warnings.push({
      path: 'validation.allowOverlappingMasks',
      message: 'Overlapping masks let later sub-fields overwrite bits of earlier ones on repack',
      value: true,
      recommendation: 'Fix the point-format definition so sub-field masks are disjoint',
    });
  }

  if (validation.allowNarrowSubFieldTypes === true) {
    warnings.push({
      path: 'validation.allowNarrowSubFieldTypes',
      message: 'Narrow sub-field types truncate unpacked values',
      value: true,
      recommendation: 'Declare sub-field types wide enough for their mask',
    });
  }
}

/**
 * Validate observability configuration.
 */
function validateObservabilityConfig(
  observability: CodecConfig['observability'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  const validLogLevels = ['debug', 'info', 'warn', 'error'];
  if (!LogLevels.isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: `Log level must be one of: ${validLogLevels.join(', ')}`,
      value: observability.logLevel,
    });
  }

  const validLogFormats: readonly string[] = ['json', 'pretty'];
  if (!validLogFormats.includes(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: observability.logFormat,
    });
  }

  if (observability.logLevel === 'debug') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Debug logging writes one entry per batch and may be noisy',
      value: observability.logLevel,
      recommendation: 'Use "info" or higher log level in production',
    });
  }
}
