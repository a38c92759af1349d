/**
 * Shared fixtures for codec tests: a small LAS-like point format and a
 * three-record physical batch with known bit patterns.
 */

import { compilePointFormat, type PointFormat } from '../point-format.js';
import { RecordBatch } from '../record-batch.js';
import type { ColumnArray, PointFormatDefinition } from '../types.js';

export const SAMPLE_DEFINITION: PointFormatDefinition = {
  id: 100,
  fields: [
    { name: 'intensity', type: 'u16' },
    {
      name: 'bit_fields',
      type: 'u8',
      subFields: [
        { name: 'return_number', mask: 0b00000111 },
        { name: 'number_of_returns', mask: 0b00111000 },
        { name: 'scan_direction_flag', mask: 0b01000000 },
        { name: 'edge_of_flight_line', mask: 0b10000000 },
      ],
    },
    { name: 'gps_time', type: 'f64' },
  ],
};

export function sampleFormat(): PointFormat {
  return compilePointFormat(SAMPLE_DEFINITION);
}

/**
 * bit_fields:
 * - 0x8A: edge 1, scan 0, number_of_returns 1, return_number 2
 * - 0x59: edge 0, scan 1, number_of_returns 3, return_number 1
 * - 0xFF: every sub-field at its maximum
 */
export function samplePhysicalBatch(): RecordBatch {
  return RecordBatch.fromColumns(sampleFormat().physicalSchema, {
    intensity: Uint16Array.of(100, 200, 300),
    bit_fields: Uint8Array.of(0x8a, 0x59, 0xff),
    gps_time: Float64Array.of(1.25, Number.NaN, -0),
  });
}

/** Expanded form of samplePhysicalBatch; `overrides` replaces whole columns */
export function sampleExpandedBatch(overrides: Readonly<Record<string, ColumnArray>> = {}): RecordBatch {
  return RecordBatch.fromColumns(sampleFormat().expandedSchema, {
    intensity: Uint16Array.of(100, 200, 300),
    return_number: Uint8Array.of(2, 1, 7),
    number_of_returns: Uint8Array.of(1, 3, 7),
    scan_direction_flag: Uint8Array.of(0, 1, 1),
    edge_of_flight_line: Uint8Array.of(1, 0, 1),
    gps_time: Float64Array.of(1.25, Number.NaN, -0),
    ...overrides,
  });
}

/** Raw bytes of a column, for bit-exact comparisons */
export function bytesOf(column: ColumnArray | undefined): Uint8Array {
  if (column === undefined) {
    throw new Error('column is missing');
  }
  return new Uint8Array(column.buffer.slice(column.byteOffset, column.byteOffset + column.byteLength));
}
