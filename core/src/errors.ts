/**
 * Typed exception classes for pointpack
 *
 * Error hierarchy:
 * - PointPackError: Base error class for all pointpack errors
 *   - InvalidMaskError: A mask with no defined bit position, or one that does
 *     not fit the container it addresses
 *   - RangeViolationError: Sub-field values that do not fit their mask
 *   - SchemaMismatchError: A record batch that does not carry the columns a
 *     point format expects
 *   - ValidationError: Point-format definition and JSON validation failures
 *     - UnknownPointFormatError: Catalog lookup for an id that is not registered
 *
 * All of these are data-integrity errors. They are never retried: the caller
 * must treat the current record batch as failed and must not persist any
 * partially written or clamped data.
 *
 * @example
 * ```typescript
 * import { repackSubFields, RangeViolationError, ErrorCode } from '@pointpack/core';
 *
 * try {
 *   const physical = repackSubFields(expanded, format);
 * } catch (error) {
 *   if (error instanceof RangeViolationError) {
 *     logger.error(`Cannot write batch: ${error.message}`, error, {
 *       composedField: error.composedField ?? null,
 *       maxAllowed: error.maxAllowed,
 *     });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',

  // Codec errors
  INVALID_MASK = 'INVALID_MASK',
  RANGE_VIOLATION = 'RANGE_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  TYPE_MISMATCH = 'TYPE_MISMATCH',

  // Point-format definition errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  OVERLAPPING_MASKS = 'OVERLAPPING_MASKS',
  NARROW_SUB_FIELD_TYPE = 'NARROW_SUB_FIELD_TYPE',
  UNSUPPORTED_CONTAINER_TYPE = 'UNSUPPORTED_CONTAINER_TYPE',
  DUPLICATE_FIELD = 'DUPLICATE_FIELD',
  UNKNOWN_POINT_FORMAT = 'UNKNOWN_POINT_FORMAT',
  DUPLICATE_POINT_FORMAT = 'DUPLICATE_POINT_FORMAT',

  // JSON errors
  JSON_PARSE_ERROR = 'JSON_PARSE_ERROR',
  SCHEMA_VALIDATION_ERROR = 'SCHEMA_VALIDATION_ERROR',
}

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all pointpack errors
 *
 * Carries a `code` for programmatic handling, optional structured `details`
 * and an optional `suggestion` for resolving the problem.
 */
export class PointPackError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (field, mask, offending value, etc.)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'PointPackError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, PointPackError);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Mask Errors
// =============================================================================

/**
 * Error thrown when a mask cannot address a sub-field
 *
 * Examples:
 * - A zero mask (no lowest set bit, so no shift)
 * - A negative, fractional or wider-than-32-bit mask
 * - A mask with bits outside the container element width
 *
 * @example
 * ```typescript
 * throw InvalidMaskError.zero();
 * throw InvalidMaskError.exceedsContainer(0x1ff, 'u8');
 * ```
 */
export class InvalidMaskError extends PointPackError {
  /** The rejected mask */
  public readonly mask: number;

  constructor(
    message: string,
    mask: number,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, ErrorCode.INVALID_MASK, { mask, ...details }, suggestion);
    this.name = 'InvalidMaskError';
    this.mask = mask;
    captureStackTrace(this, InvalidMaskError);
  }

  static zero(): InvalidMaskError {
    return new InvalidMaskError(
      'Mask is zero: a zero mask has no bit position',
      0,
      undefined,
      'Check the point-format definition that produced this mask'
    );
  }

  static notAnInteger(mask: number): InvalidMaskError {
    return new InvalidMaskError(
      `Mask ${mask} is not an unsigned 32-bit integer`,
      mask,
      { maxMask: 0xffffffff }
    );
  }

  static exceedsContainer(mask: number, containerType: string): InvalidMaskError {
    return new InvalidMaskError(
      `Mask 0x${mask.toString(16)} has bits outside the ${containerType} container`,
      mask,
      { containerType },
      `Use a container type wide enough for mask 0x${mask.toString(16)}`
    );
  }
}

// =============================================================================
// Range Errors
// =============================================================================

/**
 * Context attached to a range violation raised while repacking a record batch.
 */
export interface RangeViolationContext {
  /** Sub-field whose values did not fit */
  subField?: string;
  /** Composed field the sub-field is packed into */
  composedField?: string;
}

/**
 * Error thrown when sub-field values do not fit in their mask
 *
 * `offendingValue` is the value that failed the check (the column maximum, or
 * its minimum when negative values are present) and `maxAllowed` is the
 * largest value the mask can represent.
 *
 * @example
 * ```typescript
 * // Packing 16 into a 4-bit mask
 * throw new RangeViolationError(16, 15);
 * ```
 */
export class RangeViolationError extends PointPackError {
  public readonly offendingValue: number;
  public readonly maxAllowed: number;
  public readonly subField?: string;
  public readonly composedField?: string;

  constructor(
    offendingValue: number,
    maxAllowed: number,
    context: RangeViolationContext = {},
    options?: ErrorOptions
  ) {
    super(
      formatRangeMessage(offendingValue, maxAllowed, context),
      ErrorCode.RANGE_VIOLATION,
      {
        offendingValue,
        maxAllowed,
        ...(context.subField !== undefined && { subField: context.subField }),
        ...(context.composedField !== undefined && { composedField: context.composedField }),
      },
      `Values must be between 0 and ${maxAllowed}`,
      options
    );
    this.name = 'RangeViolationError';
    this.offendingValue = offendingValue;
    this.maxAllowed = maxAllowed;
    this.subField = context.subField;
    this.composedField = context.composedField;
    captureStackTrace(this, RangeViolationError);
  }

  /**
   * Re-raise a violation with the sub-field and composed-field identity added.
   * The offending value and allowed maximum are kept; the original error
   * becomes the cause.
   */
  static withContext(error: RangeViolationError, context: RangeViolationContext): RangeViolationError {
    return new RangeViolationError(
      error.offendingValue,
      error.maxAllowed,
      { ...context },
      { cause: error }
    );
  }
}

function formatRangeMessage(
  offendingValue: number,
  maxAllowed: number,
  context: RangeViolationContext
): string {
  const base = offendingValue < 0
    ? `value (${offendingValue}) is negative (allowed: 0..${maxAllowed})`
    : `value (${offendingValue}) is greater than allowed (max: ${maxAllowed})`;
  if (context.subField !== undefined && context.composedField !== undefined) {
    return `Error repacking ${context.subField} into ${context.composedField}: ${base}`;
  }
  return base;
}

// =============================================================================
// Schema Errors
// =============================================================================

/**
 * Error thrown when a record batch does not match the schema a point format expects
 *
 * @example
 * ```typescript
 * throw SchemaMismatchError.missingField('bit_fields', 'physical');
 * throw SchemaMismatchError.typeMismatch('intensity', 'u16', 'u8');
 * ```
 */
export class SchemaMismatchError extends PointPackError {
  /** Field the mismatch was detected on */
  public readonly field: string;

  constructor(
    message: string,
    field: string,
    details?: Record<string, unknown>,
    suggestion?: string,
    code: string = ErrorCode.SCHEMA_MISMATCH
  ) {
    super(message, code, { field, ...details }, suggestion);
    this.name = 'SchemaMismatchError';
    this.field = field;
    captureStackTrace(this, SchemaMismatchError);
  }

  static missingField(field: string, schema: string): SchemaMismatchError {
    return new SchemaMismatchError(
      `Field "${field}" expected by the ${schema} schema is absent from the record batch`,
      field,
      { schema, expected: 'present', actual: 'absent' },
      `Provide a "${field}" column or use the point format the batch was read with`
    );
  }

  static unexpectedField(field: string, schema: string): SchemaMismatchError {
    return new SchemaMismatchError(
      `Field "${field}" is not part of the ${schema} schema`,
      field,
      { schema, expected: 'absent', actual: 'present' }
    );
  }

  static typeMismatch(field: string, expected: string, actual: string): SchemaMismatchError {
    return new SchemaMismatchError(
      `Field "${field}" has element type ${actual}, expected ${expected}`,
      field,
      { expected, actual },
      undefined,
      ErrorCode.TYPE_MISMATCH
    );
  }

  static lengthMismatch(field: string, expected: number, actual: number): SchemaMismatchError {
    return new SchemaMismatchError(
      `Field "${field}" has ${actual} elements, expected ${expected}`,
      field,
      { expected, actual },
      undefined,
      ErrorCode.LENGTH_MISMATCH
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when a point-format definition or configuration is invalid
 *
 * @example
 * ```typescript
 * throw ValidationError.overlappingMasks('bit_fields', 'a', 'b', 0x0c);
 * ```
 */
export class ValidationError extends PointPackError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  static overlappingMasks(
    composedField: string,
    first: string,
    second: string,
    overlap: number
  ): ValidationError {
    return new ValidationError(
      `Sub-fields "${first}" and "${second}" of "${composedField}" share bits 0x${overlap.toString(16)}`,
      ErrorCode.OVERLAPPING_MASKS,
      { composedField, subFields: [first, second], overlap },
      'Sub-field masks within one composed field must be disjoint'
    );
  }

  static narrowSubFieldType(subField: string, type: string, maxValue: number): ValidationError {
    return new ValidationError(
      `Sub-field "${subField}" of type ${type} cannot hold its mask's maximum ${maxValue}`,
      ErrorCode.NARROW_SUB_FIELD_TYPE,
      { subField, type, maxValue },
      `Declare "${subField}" with a wider type`
    );
  }

  static unsupportedContainerType(field: string, type: string): ValidationError {
    return new ValidationError(
      `Field "${field}" uses ${type}, which cannot hold packed sub-fields`,
      ErrorCode.UNSUPPORTED_CONTAINER_TYPE,
      { field, type },
      'Use u8, i8, u16, i16, u32 or i32'
    );
  }

  static duplicateField(field: string, pointFormat: number): ValidationError {
    return new ValidationError(
      `Field "${field}" is declared more than once in point format ${pointFormat}`,
      ErrorCode.DUPLICATE_FIELD,
      { field, pointFormat }
    );
  }
}

/**
 * Error thrown when a point format id is not registered in a catalog
 */
export class UnknownPointFormatError extends ValidationError {
  public readonly pointFormat: number;

  constructor(pointFormat: number, available: readonly number[]) {
    super(
      `Point format ${pointFormat} is not registered`,
      ErrorCode.UNKNOWN_POINT_FORMAT,
      { pointFormat, available: [...available] },
      `Available point formats: ${available.join(', ')}`
    );
    this.name = 'UnknownPointFormatError';
    this.pointFormat = pointFormat;
    captureStackTrace(this, UnknownPointFormatError);
  }
}
