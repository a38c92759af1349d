/**
 * Type-safe parsing of point-format definitions.
 *
 * Definitions arrive as JSON (the bundled catalog or a caller's own file).
 * The zod schemas below check their shape and turn mask literals into
 * numbers; compilePointFormat then checks the bit layout itself.
 *
 * Masks may be written as JSON numbers or as "0x.." / "0b.." strings:
 *
 * ```json
 * { "name": "bit_fields", "type": "u8", "subFields": [
 *   { "name": "return_number", "mask": "0x07" },
 *   { "name": "number_of_returns", "mask": "0b00111000" }
 * ] }
 * ```
 */

import { z } from 'zod';
import { MAX_MASK } from './bits.js';
import { CATALOG_VERSION } from './constants.js';
import { ValidationError, ErrorCode } from './errors.js';
import { captureStackTrace } from './stack-trace.js';
import { ELEMENT_TYPE_NAMES, PACKABLE_TYPE_NAMES } from './types.js';

// =============================================================================
// Schemas
// =============================================================================

export const ElementTypeSchema = z.enum(ELEMENT_TYPE_NAMES);

export const PackableTypeSchema = z.enum(PACKABLE_TYPE_NAMES);

/**
 * Sub-field mask: a positive integer up to 0xffffffff, given as a number or
 * a hex/binary literal string.
 */
export const MaskSchema = z
  .union([
    z.number(),
    z.string().regex(/^0x[0-9a-f]+$/i, 'Expected a hex literal such as "0x0F"')
      .transform(literal => Number.parseInt(literal.slice(2), 16)),
    z.string().regex(/^0b[01]+$/, 'Expected a binary literal such as "0b00001111"')
      .transform(literal => Number.parseInt(literal.slice(2), 2)),
  ])
  .pipe(z.number().int().positive().max(MAX_MASK));

const FieldNameSchema = z.string().min(1);

export const SubFieldDefinitionSchema = z.object({
  name: FieldNameSchema,
  mask: MaskSchema,
  type: PackableTypeSchema.optional(),
});

export const ComposedFieldDefinitionSchema = z.object({
  name: FieldNameSchema,
  type: ElementTypeSchema,
  subFields: z.array(SubFieldDefinitionSchema).min(1),
});

export const PlainFieldDefinitionSchema = z.object({
  name: FieldNameSchema,
  type: ElementTypeSchema,
}).strict();

export const PointFormatDefinitionSchema = z.object({
  id: z.number().int().nonnegative(),
  fields: z.array(z.union([ComposedFieldDefinitionSchema, PlainFieldDefinitionSchema])).min(1),
});

export const PointFormatCatalogSchema = z.object({
  version: z.literal(CATALOG_VERSION),
  formats: z.array(PointFormatDefinitionSchema),
});

export type PointFormatCatalogDocument = z.infer<typeof PointFormatCatalogSchema>;

// =============================================================================
// Zod-compatible Parsing
// =============================================================================

/**
 * ZodError-like shape used in JSONValidationError
 */
export interface ZodErrorLike {
  issues: Array<{
    code: string;
    path: (string | number)[];
    message: string;
  }>;
  message: string;
}

/**
 * Any schema with zod's safeParse contract
 */
export interface ZodSchemaLike<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: ZodErrorLike };
}

/**
 * Error thrown when a JSON document cannot be parsed.
 */
export class JSONParseError extends ValidationError {
  constructor(message: string, cause?: unknown) {
    super(
      message,
      ErrorCode.JSON_PARSE_ERROR,
      { cause: cause instanceof Error ? cause.message : String(cause) },
      'Ensure the JSON string is valid.'
    );
    this.name = 'JSONParseError';
    this.cause = cause;
    captureStackTrace(this, JSONParseError);
  }
}

/**
 * Error thrown when parsed JSON does not match its schema.
 */
export class JSONValidationError extends ValidationError {
  public readonly zodError: ZodErrorLike;

  constructor(message: string, zodError: ZodErrorLike) {
    super(
      message,
      ErrorCode.SCHEMA_VALIDATION_ERROR,
      { issues: zodError.issues.map(i => ({ path: i.path, message: i.message })) },
      'Ensure the JSON data matches the expected schema.'
    );
    this.name = 'JSONValidationError';
    this.zodError = zodError;
    captureStackTrace(this, JSONValidationError);
  }
}

function describeIssues(error: ZodErrorLike): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

/**
 * Validate an already-parsed value against a schema.
 *
 * @throws JSONValidationError if validation fails
 */
export function validate<T>(value: unknown, schema: ZodSchemaLike<T>): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new JSONValidationError(`Validation failed: ${describeIssues(result.error)}`, result.error);
  }

  return result.data;
}

/**
 * Parse a JSON string and validate it against a schema.
 *
 * @throws JSONParseError if the string is not valid JSON
 * @throws JSONValidationError if the parsed value does not match the schema
 *
 * @example
 * ```typescript
 * const definition = parseJSON(json, PointFormatDefinitionSchema);
 * ```
 */
export function parseJSON<T>(json: string, schema: ZodSchemaLike<T>): T {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch (cause) {
    throw new JSONParseError(
      `Failed to parse JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
  }

  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new JSONValidationError(`JSON validation failed: ${describeIssues(result.error)}`, result.error);
  }

  return result.data;
}
