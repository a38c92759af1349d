/**
 * @pointpack/config - Configuration for the pointpack codec
 *
 * Key Features:
 * - Deep partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with clear error messages
 * - createCodecContext() to hand a config to @pointpack/core
 *
 * @example
 * ```typescript
 * import { createCodecContext, getConfigFromEnv } from '@pointpack/config';
 * import { loadDefaultCatalog } from '@pointpack/core';
 *
 * const { logger, pointFormatOptions } = createCodecContext(getConfigFromEnv());
 * const catalog = loadDefaultCatalog({ ...pointFormatOptions, logger });
 * ```
 *
 * @packageDocumentation
 * @module @pointpack/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  // Utility types
  DeepPartial,

  // Sections
  ValidationConfig,
  LogFormat,
  LogLevel,
  ObservabilityConfig,

  // Main config
  CodecConfig,

  // Validation types
  ConfigValidationError,
  ConfigValidationWarning,
  ConfigValidationResult,

  // Environment types
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG } from './defaults.js';

// =============================================================================
// Config Functions
// =============================================================================

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig } from './validation.js';

// =============================================================================
// Codec Context
// =============================================================================

export { createCodecContext, type CodecContext, type CodecContextOptions } from './context.js';
