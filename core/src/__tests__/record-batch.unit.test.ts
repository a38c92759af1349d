import { describe, it, expect } from 'vitest';
import { RecordBatch } from '../record-batch.js';
import { ErrorCode, SchemaMismatchError, ValidationError } from '../errors.js';
import type { Schema } from '../types.js';

const SCHEMA: Schema = [
  { name: 'intensity', type: 'u16' },
  { name: 'gps_time', type: 'f64' },
];

describe('RecordBatch.allocate', () => {
  it('creates zero-filled columns of the declared types', () => {
    const batch = RecordBatch.allocate(SCHEMA, 4);

    expect(batch.length).toBe(4);
    expect(batch.fieldNames()).toEqual(['intensity', 'gps_time']);
    expect(batch.requireColumn('intensity')).toEqual(new Uint16Array(4));
    expect(batch.requireColumn('gps_time')).toEqual(new Float64Array(4));
  });

  it('supports empty batches', () => {
    const batch = RecordBatch.allocate(SCHEMA, 0);
    expect(batch.length).toBe(0);
    expect(batch.requireColumn('intensity')).toHaveLength(0);
  });

  it('rejects negative or fractional record counts', () => {
    expect(() => RecordBatch.allocate(SCHEMA, -1)).toThrow(ValidationError);
    expect(() => RecordBatch.allocate(SCHEMA, 1.5)).toThrow(ValidationError);
  });

  it('rejects duplicate field names', () => {
    try {
      RecordBatch.allocate([...SCHEMA, { name: 'intensity', type: 'u8' }], 1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ErrorCode.DUPLICATE_FIELD);
      }
    }
  });

  it('freezes its schema', () => {
    const batch = RecordBatch.allocate(SCHEMA, 1);
    expect(Object.isFrozen(batch.schema)).toBe(true);
  });
});

describe('RecordBatch.fromColumns', () => {
  it('wraps the given columns without copying', () => {
    const intensity = Uint16Array.of(1, 2);
    const batch = RecordBatch.fromColumns(SCHEMA, { intensity, gps_time: Float64Array.of(0.5, 1.5) });

    expect(batch.length).toBe(2);
    expect(batch.column('intensity')).toBe(intensity);
  });

  it('rejects a missing column', () => {
    expect(() => RecordBatch.fromColumns(SCHEMA, { intensity: Uint16Array.of(1) }))
      .toThrow(SchemaMismatchError);
  });

  it('rejects a column of the wrong element type', () => {
    try {
      RecordBatch.fromColumns(SCHEMA, { intensity: Uint8Array.of(1), gps_time: Float64Array.of(1) });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaMismatchError);
      if (error instanceof SchemaMismatchError) {
        expect(error.code).toBe(ErrorCode.TYPE_MISMATCH);
        expect(error.field).toBe('intensity');
        expect(error.details).toEqual({ field: 'intensity', expected: 'u16', actual: 'u8' });
      }
    }
  });

  it('rejects columns of different lengths', () => {
    try {
      RecordBatch.fromColumns(SCHEMA, { intensity: Uint16Array.of(1, 2), gps_time: Float64Array.of(1) });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaMismatchError);
      if (error instanceof SchemaMismatchError) {
        expect(error.code).toBe(ErrorCode.LENGTH_MISMATCH);
        expect(error.field).toBe('gps_time');
      }
    }
  });

  it('rejects columns that are not in the schema', () => {
    expect(() => RecordBatch.fromColumns(SCHEMA, {
      intensity: Uint16Array.of(1),
      gps_time: Float64Array.of(1),
      user_data: Uint8Array.of(1),
    })).toThrow(SchemaMismatchError);
  });
});

describe('RecordBatch lookups', () => {
  const batch = RecordBatch.allocate(SCHEMA, 2);

  it('reports whether a column exists', () => {
    expect(batch.hasColumn('intensity')).toBe(true);
    expect(batch.hasColumn('nir')).toBe(false);
    expect(batch.column('nir')).toBeUndefined();
    expect(batch.field('gps_time')).toEqual({ name: 'gps_time', type: 'f64' });
  });

  it('throws SchemaMismatchError from requireColumn for absent fields', () => {
    try {
      batch.requireColumn('nir');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaMismatchError);
      if (error instanceof SchemaMismatchError) {
        expect(error.code).toBe(ErrorCode.SCHEMA_MISMATCH);
        expect(error.field).toBe('nir');
      }
    }
  });
});

describe('RecordBatch.select', () => {
  it('gathers records in the given order', () => {
    const batch = RecordBatch.fromColumns(SCHEMA, {
      intensity: Uint16Array.of(10, 20, 30),
      gps_time: Float64Array.of(1.5, 2.5, 3.5),
    });

    const picked = batch.select([2, 0, 2]);

    expect(picked.length).toBe(3);
    expect(picked.requireColumn('intensity')).toEqual(Uint16Array.of(30, 10, 30));
    expect(picked.requireColumn('gps_time')).toEqual(Float64Array.of(3.5, 1.5, 3.5));
  });

  it('rejects out-of-range indices', () => {
    const batch = RecordBatch.allocate(SCHEMA, 2);
    expect(() => batch.select([0, 2])).toThrow(ValidationError);
  });
});
