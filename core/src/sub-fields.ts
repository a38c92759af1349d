/**
 * Record-level unpack/repack of composed fields.
 *
 * unpackSubFields turns a physical batch (as stored on disk) into an expanded
 * batch with one column per sub-field; repackSubFields reverses it. Plain
 * fields are copied byte for byte in both directions. Record count and order
 * never change.
 */

import { RangeViolationError, SchemaMismatchError } from './errors.js';
import type { Logger } from './logging.js';
import { packInPlace, unpack } from './packing.js';
import type { PointFormat } from './point-format.js';
import { RecordBatch } from './record-batch.js';
import {
  allocateColumn,
  copyColumnBytes,
  elementTypeOf,
  isPackableColumn,
  type ColumnArray,
  type PackableColumn,
  type Schema,
} from './types.js';

export interface SubFieldCodecOptions {
  logger?: Logger;
}

/**
 * Check that `batch` carries exactly the fields of `schema`, with matching
 * element types.
 */
export function assertBatchMatchesSchema(batch: RecordBatch, schema: Schema, label: string): void {
  for (const field of schema) {
    const column = batch.column(field.name);
    if (column === undefined) {
      throw SchemaMismatchError.missingField(field.name, label);
    }
    const actual = elementTypeOf(column);
    if (actual !== field.type) {
      throw SchemaMismatchError.typeMismatch(field.name, field.type, actual);
    }
  }
  if (batch.schema.length !== schema.length) {
    const expected = new Set(schema.map(field => field.name));
    const extra = batch.fieldNames().find(name => !expected.has(name));
    if (extra !== undefined) {
      throw SchemaMismatchError.unexpectedField(extra, label);
    }
  }
}

function packableColumn(batch: RecordBatch, name: string): PackableColumn {
  const column = batch.requireColumn(name);
  if (!isPackableColumn(column)) {
    throw SchemaMismatchError.typeMismatch(name, 'packable integer', elementTypeOf(column));
  }
  return column;
}

/**
 * Expand every composed field of a physical batch into its sub-field columns.
 *
 * @throws SchemaMismatchError if the batch does not match the format's physical schema
 *
 * @example
 * ```typescript
 * const format = catalog.get(6);
 * const expanded = unpackSubFields(physical, format);
 * expanded.requireColumn('return_number'); // Uint8Array
 * ```
 */
export function unpackSubFields(
  batch: RecordBatch,
  format: PointFormat,
  options: SubFieldCodecOptions = {}
): RecordBatch {
  assertBatchMatchesSchema(batch, format.physicalSchema, 'physical');

  const columns: Record<string, ColumnArray> = {};
  for (const field of format.plan) {
    if (field.kind === 'plain') {
      const target = allocateColumn(field.type, batch.length);
      copyColumnBytes(batch.requireColumn(field.name), target);
      columns[field.name] = target;
      continue;
    }

    const container = packableColumn(batch, field.name);
    for (const sub of field.subFields) {
      columns[sub.name] = unpack(container, sub, sub.type);
    }
  }

  options.logger?.debug('Unpacked sub-fields', {
    operation: 'unpack',
    pointFormat: format.id,
    rowsProcessed: batch.length,
    composedFields: format.composedFields.map(field => field.name),
  });

  return RecordBatch.fromColumns(format.expandedSchema, columns);
}

/**
 * Collapse the sub-field columns of an expanded batch back into their
 * composed fields.
 *
 * Sub-fields are packed in declared order. A value that does not fit its
 * mask aborts the whole call with a RangeViolationError naming the sub-field
 * and composed field; no partially packed batch is returned.
 *
 * @throws SchemaMismatchError if the batch does not match the format's expanded schema
 * @throws RangeViolationError if a sub-field value exceeds its mask
 */
export function repackSubFields(
  batch: RecordBatch,
  format: PointFormat,
  options: SubFieldCodecOptions = {}
): RecordBatch {
  assertBatchMatchesSchema(batch, format.expandedSchema, 'expanded');

  const out = RecordBatch.allocate(format.physicalSchema, batch.length);
  for (const field of format.plan) {
    if (field.kind === 'plain') {
      copyColumnBytes(batch.requireColumn(field.name), out.requireColumn(field.name));
      continue;
    }

    const container = packableColumn(out, field.name);
    for (const sub of field.subFields) {
      try {
        packInPlace(container, packableColumn(batch, sub.name), sub);
      } catch (error) {
        if (!(error instanceof RangeViolationError)) {
          throw error;
        }
        const wrapped = RangeViolationError.withContext(error, {
          subField: sub.name,
          composedField: field.name,
        });
        options.logger?.error('Sub-field repack failed', wrapped, {
          operation: 'repack',
          pointFormat: format.id,
          field: field.name,
          subField: sub.name,
          errorCode: wrapped.code,
        });
        throw wrapped;
      }
    }
  }

  options.logger?.debug('Repacked sub-fields', {
    operation: 'repack',
    pointFormat: format.id,
    rowsProcessed: batch.length,
    composedFields: format.composedFields.map(field => field.name),
  });

  return out;
}
