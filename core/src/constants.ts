// Shared constants

import type { PackableType } from './types.js';

/** Expanded element type of a sub-field that does not declare one */
export const DEFAULT_SUB_FIELD_TYPE: PackableType = 'u8';

/** Catalog file layout version understood by loadPointFormatCatalog */
export const CATALOG_VERSION = 1;

/** Prefix of environment variables read by @pointpack/config */
export const ENV_PREFIX = 'POINTPACK';
