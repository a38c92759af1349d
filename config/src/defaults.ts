/**
 * @pointpack/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { CodecConfig } from './types.js';

/**
 * Default validation configuration: every layout check enabled.
 */
const DEFAULT_VALIDATION_CONFIG = Object.freeze({
  allowOverlappingMasks: false,
  allowNarrowSubFieldTypes: false,
});

/**
 * Default observability configuration.
 */
const DEFAULT_OBSERVABILITY_CONFIG = Object.freeze({
  logLevel: 'info' as const,
  logFormat: 'json' as const,
});

/**
 * Default codec configuration. Frozen, like every config createConfig returns.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@pointpack/config';
 *
 * DEFAULT_CONFIG.validation.allowOverlappingMasks; // false
 *
 * const config = createConfig({
 *   observability: { logFormat: 'pretty' },
 * });
 * ```
 */
export const DEFAULT_CONFIG: CodecConfig = Object.freeze({
  validation: DEFAULT_VALIDATION_CONFIG,
  observability: DEFAULT_OBSERVABILITY_CONFIG,
});
