// @pointpack/core
// Bit-field codec for composed fields of columnar point records

// =============================================================================
// Core Types
// =============================================================================

export {
  ELEMENT_TYPES,
  ELEMENT_TYPE_NAMES,
  PACKABLE_TYPE_NAMES,
  allocateColumn,
  copyColumnBytes,
  elementTypeOf,
  isComposedFieldDefinition,
  isPackableColumn,
  isPackableType,
  type ColumnArray,
  type ColumnArrayMap,
  type ComposedFieldDefinition,
  type ElementType,
  type ElementTypeInfo,
  type FieldDefinition,
  type FieldSpec,
  type PackableColumn,
  type PackableType,
  type PlainFieldDefinition,
  type PointFormatDefinition,
  type Schema,
  type SubFieldDefinition,
} from './types.js';

export { CATALOG_VERSION, DEFAULT_SUB_FIELD_TYPE, ENV_PREFIX } from './constants.js';

// =============================================================================
// Mask Primitives
// =============================================================================

export {
  MAX_MASK,
  assertValidMask,
  leastSignificantBit,
  maskBitWidth,
  maskFitsType,
  maxValueForMask,
  resolveMask,
  type MaskLayout,
} from './bits.js';

export { assertValuesFitMask, pack, packInPlace, unpack, type MaskInput } from './packing.js';

// =============================================================================
// Record Batches and Point Formats
// =============================================================================

export { RecordBatch } from './record-batch.js';

export {
  PointFormat,
  compilePointFormat,
  type ComposedFieldPlan,
  type FieldPlan,
  type PlainFieldPlan,
  type PointFormatOptions,
  type ResolvedSubField,
} from './point-format.js';

export {
  assertBatchMatchesSchema,
  repackSubFields,
  unpackSubFields,
  type SubFieldCodecOptions,
} from './sub-fields.js';

export {
  DEFAULT_CATALOG_URL,
  PointFormatCatalog,
  loadDefaultCatalog,
  loadPointFormatCatalog,
  type CatalogOptions,
} from './catalog.js';

// =============================================================================
// Validation
// =============================================================================

export {
  ComposedFieldDefinitionSchema,
  ElementTypeSchema,
  JSONParseError,
  JSONValidationError,
  MaskSchema,
  PackableTypeSchema,
  PlainFieldDefinitionSchema,
  PointFormatCatalogSchema,
  PointFormatDefinitionSchema,
  SubFieldDefinitionSchema,
  parseJSON,
  validate,
  type PointFormatCatalogDocument,
  type ZodErrorLike,
  type ZodSchemaLike,
} from './validation.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  InvalidMaskError,
  PointPackError,
  RangeViolationError,
  SchemaMismatchError,
  UnknownPointFormatError,
  ValidationError,
  isErrorCode,
  type RangeViolationContext,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogContextValue,
  withContext,
  type ConsoleLoggerConfig,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type LogFormat,
  type LogLevel,
  type Logger,
  type LoggerConfig,
  type TestLogger,
} from './logging.js';
