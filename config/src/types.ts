/**
 * @pointpack/config - Configuration Types
 *
 * Naming conventions:
 * - allow*: opt-in relaxations of point-format validation
 * - log*: logger settings
 *
 * @packageDocumentation
 */

import type { LogFormat, LogLevel } from '@pointpack/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Sections
// =============================================================================

/**
 * Point-format validation settings, passed to compilePointFormat.
 */
export interface ValidationConfig {
  /**
   * Accept sub-fields whose masks share bits within one composed field.
   * The sub-field declared last wins the shared bits on repack.
   * @default false
   */
  allowOverlappingMasks: boolean;

  /**
   * Accept sub-field types too narrow for their mask's maximum value.
   * Unpacking then truncates silently.
   * @default false
   */
  allowNarrowSubFieldTypes: boolean;
}

export type { LogFormat, LogLevel };

/**
 * Logging settings.
 */
export interface ObservabilityConfig {
  /** @default 'info' */
  logLevel: LogLevel;

  /** @default 'json' */
  logFormat: LogFormat;
}

/**
 * Complete codec configuration.
 */
export interface CodecConfig {
  validation: ValidationConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'observability.logLevel') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ConfigValidationWarning {
  /** Path to the field with potential issue */
  path: string;

  /** Human-readable warning message */
  message: string;

  /** The concerning value */
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'POINTPACK') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
