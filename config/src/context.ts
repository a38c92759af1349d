/**
 * @pointpack/config - Codec Context
 *
 * Turns a CodecConfig into the objects @pointpack/core functions take:
 * a Logger and PointFormatOptions.
 *
 * @packageDocumentation
 */

import {
  ErrorCode,
  ValidationError,
  createConsoleLogger,
  type Logger,
  type PointFormatOptions,
} from '@pointpack/core';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './validation.js';
import type { CodecConfig } from './types.js';

export interface CodecContext {
  readonly config: CodecConfig;
  readonly logger: Logger;
  readonly pointFormatOptions: PointFormatOptions;
}

export interface CodecContextOptions {
  /** Use this logger instead of a console logger built from the config */
  logger?: Logger;
}

/**
 * Validate `config` and build the logger and point-format options it describes.
 * Validation warnings are logged at warn level.
 *
 * @throws ValidationError if the config has errors
 *
 * @example
 * ```typescript
 * const { logger, pointFormatOptions } = createCodecContext(getConfigFromEnv());
 * const catalog = loadDefaultCatalog({ ...pointFormatOptions, logger });
 * const expanded = unpackSubFields(batch, catalog.get(6), { logger });
 * ```
 */
export function createCodecContext(
  config: CodecConfig = DEFAULT_CONFIG,
  options: CodecContextOptions = {}
): CodecContext {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new ValidationError(
      `Invalid codec configuration: ${result.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`,
      ErrorCode.VALIDATION_ERROR,
      { errors: result.errors.map(e => ({ path: e.path, message: e.message })) },
      result.errors[0]?.suggestion
    );
  }

  const logger = options.logger ?? createConsoleLogger({
    format: config.observability.logFormat,
    minLevel: config.observability.logLevel,
  });

  for (const warning of result.warnings) {
    logger.warn(warning.message, {
      operation: 'configure',
      path: warning.path,
      ...(warning.recommendation !== undefined && { recommendation: warning.recommendation }),
    });
  }

  return Object.freeze({
    config,
    logger,
    pointFormatOptions: Object.freeze({
      allowOverlappingMasks: config.validation.allowOverlappingMasks,
      allowNarrowSubFieldTypes: config.validation.allowNarrowSubFieldTypes,
    }),
  });
}
