/**
 * Columnar record batch: N records, one typed array per named field.
 *
 * A batch is the unit the codec transforms. Its schema is fixed at
 * construction; columns are mutable typed arrays owned by the batch.
 */

import { SchemaMismatchError, ValidationError, ErrorCode } from './errors.js';
import {
  allocateColumn,
  elementTypeOf,
  type ColumnArray,
  type FieldSpec,
  type Schema,
} from './types.js';

export class RecordBatch {
  /** Number of records */
  readonly length: number;
  readonly schema: Schema;
  private readonly columns: ReadonlyMap<string, ColumnArray>;

  private constructor(schema: Schema, columns: ReadonlyMap<string, ColumnArray>, length: number) {
    this.schema = Object.freeze(schema.map(field => Object.freeze({ ...field })));
    this.columns = columns;
    this.length = length;
  }

  /**
   * Create a zero-filled batch of `length` records.
   */
  static allocate(schema: Schema, length: number): RecordBatch {
    if (!Number.isInteger(length) || length < 0) {
      throw new ValidationError(
        `Invalid record count: ${length}`,
        ErrorCode.VALIDATION_ERROR,
        { length }
      );
    }
    assertUniqueNames(schema);

    const columns = new Map<string, ColumnArray>();
    for (const field of schema) {
      columns.set(field.name, allocateColumn(field.type, length));
    }
    return new RecordBatch(schema, columns, length);
  }

  /**
   * Wrap existing columns (not copied). Every schema field needs a column of
   * the declared element type; all columns must have the same length and no
   * column may be left out of the schema.
   *
   * @example
   * ```typescript
   * const batch = RecordBatch.fromColumns(
   *   [{ name: 'intensity', type: 'u16' }, { name: 'bit_fields', type: 'u8' }],
   *   { intensity: Uint16Array.of(10, 20), bit_fields: Uint8Array.of(0x11, 0x12) }
   * );
   * ```
   */
  static fromColumns(schema: Schema, columns: Readonly<Record<string, ColumnArray>>): RecordBatch {
    assertUniqueNames(schema);

    const known = new Set(schema.map(field => field.name));
    for (const name of Object.keys(columns)) {
      if (!known.has(name)) {
        throw SchemaMismatchError.unexpectedField(name, 'record batch');
      }
    }

    let length: number | undefined;
    const map = new Map<string, ColumnArray>();
    for (const field of schema) {
      const column = columns[field.name];
      if (column === undefined) {
        throw SchemaMismatchError.missingField(field.name, 'record batch');
      }
      const actual = elementTypeOf(column);
      if (actual !== field.type) {
        throw SchemaMismatchError.typeMismatch(field.name, field.type, actual);
      }
      if (length === undefined) {
        length = column.length;
      } else if (column.length !== length) {
        throw SchemaMismatchError.lengthMismatch(field.name, length, column.length);
      }
      map.set(field.name, column);
    }

    return new RecordBatch(schema, map, length ?? 0);
  }

  fieldNames(): string[] {
    return this.schema.map(field => field.name);
  }

  field(name: string): FieldSpec | undefined {
    return this.schema.find(field => field.name === name);
  }

  hasColumn(name: string): boolean {
    return this.columns.has(name);
  }

  column(name: string): ColumnArray | undefined {
    return this.columns.get(name);
  }

  /**
   * Column lookup that throws SchemaMismatchError when the field is absent.
   */
  requireColumn(name: string): ColumnArray {
    const column = this.columns.get(name);
    if (column === undefined) {
      throw SchemaMismatchError.missingField(name, 'record batch');
    }
    return column;
  }

  /**
   * Gather the records at `indices` (in that order) into a new batch.
   */
  select(indices: readonly number[]): RecordBatch {
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= this.length) {
        throw new ValidationError(
          `Record index ${index} is out of range for a batch of ${this.length} records`,
          ErrorCode.VALIDATION_ERROR,
          { index, length: this.length }
        );
      }
    }

    const out = RecordBatch.allocate(this.schema, indices.length);
    for (const field of this.schema) {
      const source = this.requireColumn(field.name);
      const target = out.requireColumn(field.name);
      const width = source.BYTES_PER_ELEMENT;
      const from = new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
      const to = new Uint8Array(target.buffer, target.byteOffset, target.byteLength);
      indices.forEach((index, i) => {
        to.set(from.subarray(index * width, (index + 1) * width), i * width);
      });
    }
    return out;
  }
}

function assertUniqueNames(schema: Schema): void {
  const seen = new Set<string>();
  for (const field of schema) {
    if (seen.has(field.name)) {
      throw new ValidationError(
        `Field "${field.name}" appears more than once in the schema`,
        ErrorCode.DUPLICATE_FIELD,
        { field: field.name }
      );
    }
    seen.add(field.name);
  }
}
