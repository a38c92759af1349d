/**
 * Point-format catalog.
 *
 * Definitions are loaded from JSON once, compiled, and then only read. The
 * bundled catalog (formats/point-formats.json) describes LAS point formats
 * 0 to 10.
 */

import { readFileSync } from 'node:fs';
import { ErrorCode, UnknownPointFormatError, ValidationError } from './errors.js';
import type { Logger } from './logging.js';
import { compilePointFormat, type PointFormat, type PointFormatOptions } from './point-format.js';
import { parseJSON, PointFormatCatalogSchema } from './validation.js';

export const DEFAULT_CATALOG_URL = new URL('../formats/point-formats.json', import.meta.url);

export interface CatalogOptions extends PointFormatOptions {
  logger?: Logger;
}

export class PointFormatCatalog {
  private readonly formats: ReadonlyMap<number, PointFormat>;

  constructor(formats: Iterable<PointFormat>) {
    const byId = new Map<number, PointFormat>();
    for (const format of formats) {
      if (byId.has(format.id)) {
        throw new ValidationError(
          `Point format ${format.id} is registered twice`,
          ErrorCode.DUPLICATE_POINT_FORMAT,
          { pointFormat: format.id }
        );
      }
      byId.set(format.id, format);
    }
    this.formats = byId;
  }

  has(id: number): boolean {
    return this.formats.has(id);
  }

  /**
   * @throws UnknownPointFormatError if `id` is not registered
   */
  get(id: number): PointFormat {
    const format = this.formats.get(id);
    if (format === undefined) {
      throw new UnknownPointFormatError(id, this.ids());
    }
    return format;
  }

  /** Registered ids in ascending order */
  ids(): number[] {
    return [...this.formats.keys()].sort((a, b) => a - b);
  }
}

/**
 * Parse, validate and compile a catalog document.
 *
 * @throws JSONParseError / JSONValidationError for malformed documents
 * @throws ValidationError / InvalidMaskError for invalid bit layouts
 */
export function loadPointFormatCatalog(json: string, options: CatalogOptions = {}): PointFormatCatalog {
  const document = parseJSON(json, PointFormatCatalogSchema);
  const { logger, ...formatOptions } = options;

  const catalog = new PointFormatCatalog(
    document.formats.map(definition => compilePointFormat(definition, formatOptions))
  );

  logger?.debug('Loaded point-format catalog', {
    operation: 'load-catalog',
    pointFormats: catalog.ids(),
  });

  return catalog;
}

/**
 * Load the bundled LAS catalog.
 *
 * @example
 * ```typescript
 * const catalog = loadDefaultCatalog();
 * const format = catalog.get(6);
 * format.subFieldNames('classification_flags');
 * // ['synthetic', 'key_point', 'withheld', 'overlap', 'scanner_channel', ...]
 * ```
 */
export function loadDefaultCatalog(options: CatalogOptions = {}): PointFormatCatalog {
  return loadPointFormatCatalog(readFileSync(DEFAULT_CATALOG_URL, 'utf8'), options);
}
