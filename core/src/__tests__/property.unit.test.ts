/**
 * Property-based tests with fast-check
 *
 * 1. Mask round trips: unpack/pack in both directions (contiguous masks)
 * 2. Copy and in-place packing agree
 * 3. Disjoint sub-fields can be packed in any order
 * 4. Record-level unpack/repack round trips in both directions, bit for bit
 * 5. Records are transformed independently of each other, in both directions
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { leastSignificantBit } from '../bits.js';
import { pack, packInPlace, unpack } from '../packing.js';
import { loadDefaultCatalog } from '../catalog.js';
import type { PointFormat, ResolvedSubField } from '../point-format.js';
import { RecordBatch } from '../record-batch.js';
import { repackSubFields, unpackSubFields } from '../sub-fields.js';
import { ELEMENT_TYPES, allocateColumn, type ColumnArray, type FieldSpec } from '../types.js';
import { bytesOf } from './fixtures.js';

/** Contiguous u8 masks: `width` set bits starting at bit `shift` */
const maskArb = fc
  .tuple(fc.integer({ min: 0, max: 7 }), fc.integer({ min: 1, max: 8 }))
  .filter(([shift, width]) => shift + width <= 8)
  .map(([shift, width]) => ((1 << width) - 1) << shift);

/** A u8 mask, a container column and values that fit the mask, all of one length */
const packCaseArb = maskArb.chain(mask =>
  fc.integer({ min: 0, max: 32 }).chain(length =>
    fc.record({
      mask: fc.constant(mask),
      dest: fc.uint8Array({ minLength: length, maxLength: length }),
      values: fc.array(fc.integer({ min: 0, max: mask >>> leastSignificantBit(mask) }), {
        minLength: length,
        maxLength: length,
      }).map(values => Uint8Array.from(values)),
    })
  )
);

function recordWidth(format: PointFormat): number {
  return format.physicalSchema.reduce((sum, field) => sum + ELEMENT_TYPES[field.type].byteWidth, 0);
}

/** Physical batch whose columns are filled from `bytes`, column after column */
function physicalBatchFromBytes(format: PointFormat, length: number, bytes: Uint8Array): RecordBatch {
  const columns: Record<string, ColumnArray> = {};
  let offset = 0;
  for (const field of format.physicalSchema) {
    const column = allocateColumn(field.type, length);
    const view = new Uint8Array(column.buffer, column.byteOffset, column.byteLength);
    view.set(bytes.subarray(offset, offset + column.byteLength));
    offset += column.byteLength;
    columns[field.name] = column;
  }
  return RecordBatch.fromColumns(format.physicalSchema, columns);
}

/** Random column for one expanded field: in-range values for sub-fields, raw bytes otherwise */
function expandedColumnArb(
  field: FieldSpec,
  subField: ResolvedSubField | undefined,
  length: number
): fc.Arbitrary<ColumnArray> {
  if (subField !== undefined) {
    return fc.array(fc.integer({ min: 0, max: subField.maxValue }), { minLength: length, maxLength: length })
      .map(values => {
        const column = allocateColumn(subField.type, length);
        column.set(values);
        return column;
      });
  }
  const byteLength = length * ELEMENT_TYPES[field.type].byteWidth;
  return fc.uint8Array({ minLength: byteLength, maxLength: byteLength }).map(bytes => {
    const column = allocateColumn(field.type, length);
    new Uint8Array(column.buffer, column.byteOffset, column.byteLength).set(bytes);
    return column;
  });
}

describe('Property: Mask Round-Trip', () => {
  it('unpacked values always fit in their mask', () => {
    fc.assert(
      fc.property(packCaseArb, ({ mask, dest }) => {
        const max = mask >>> leastSignificantBit(mask);
        return unpack(dest, mask).every(value => value <= max);
      })
    );
  });

  it('packing unpacked values returns the container unchanged', () => {
    fc.assert(
      fc.property(packCaseArb, ({ mask, dest }) => {
        expect(pack(dest, unpack(dest, mask), mask)).toEqual(dest);
      })
    );
  });

  it('unpacking packed values returns the values', () => {
    fc.assert(
      fc.property(packCaseArb, ({ mask, dest, values }) => {
        expect(unpack(pack(dest, values, mask), mask)).toEqual(values);
      })
    );
  });

  it('packing leaves bits outside the mask untouched', () => {
    fc.assert(
      fc.property(packCaseArb, ({ mask, dest, values }) => {
        const packed = pack(dest, values, mask);
        packed.forEach((byte, i) => {
          expect(byte & ~mask & 0xff).toBe((dest[i] ?? 0) & ~mask & 0xff);
        });
      })
    );
  });
});

describe('Property: Copy and In-Place Packing', () => {
  it('produce identical containers', () => {
    fc.assert(
      fc.property(packCaseArb, ({ mask, dest, values }) => {
        const copied = pack(dest, values, mask);
        const inPlace = dest.slice();
        packInPlace(inPlace, values, mask);
        expect(inPlace).toEqual(copied);
      })
    );
  });
});

describe('Property: Disjoint Sub-Field Order', () => {
  const disjointArb = fc.integer({ min: 1, max: 0xfe }).chain(first =>
    fc.record({
      first: fc.constant(first),
      second: fc.integer({ min: 1, max: 0xff })
        .map(bits => bits & ~first & 0xff)
        .filter(second => second !== 0),
      seed: fc.uint8Array({ minLength: 1, maxLength: 16 }),
    })
  );

  it('packing order does not matter', () => {
    fc.assert(
      fc.property(disjointArb, ({ first, second, seed }) => {
        const firstValues = unpack(seed.map(byte => byte ^ 0x5a), first);
        const secondValues = unpack(seed, second);

        const forward = new Uint8Array(seed.length);
        packInPlace(forward, firstValues, first);
        packInPlace(forward, secondValues, second);

        const backward = new Uint8Array(seed.length);
        packInPlace(backward, secondValues, second);
        packInPlace(backward, firstValues, first);

        expect(backward).toEqual(forward);
      })
    );
  });
});

describe('Property: LAS Record Round-Trip', () => {
  const catalog = loadDefaultCatalog();

  const batchArb = fc.constantFrom(...catalog.ids()).chain(id => {
    const format = catalog.get(id);
    return fc.integer({ min: 0, max: 8 }).chain(length =>
      fc.uint8Array({ minLength: length * recordWidth(format), maxLength: length * recordWidth(format) })
        .map(bytes => ({ format, batch: physicalBatchFromBytes(format, length, bytes) }))
    );
  });

  it('repack(unpack(batch)) is bit-identical to batch', () => {
    fc.assert(
      fc.property(batchArb, ({ format, batch }) => {
        const restored = repackSubFields(unpackSubFields(batch, format), format);
        for (const name of batch.fieldNames()) {
          expect(bytesOf(restored.column(name))).toEqual(bytesOf(batch.column(name)));
        }
      })
    );
  });

  const expandedArb = fc.constantFrom(...catalog.ids()).chain(id => {
    const format = catalog.get(id);
    const subFields = new Map(
      format.composedFields
        .flatMap(field => field.subFields)
        .map((sub): [string, ResolvedSubField] => [sub.name, sub])
    );
    return fc.integer({ min: 0, max: 8 }).chain(length =>
      fc.tuple(...format.expandedSchema.map(field => expandedColumnArb(field, subFields.get(field.name), length)))
        .map(columns => {
          const record: Record<string, ColumnArray> = {};
          format.expandedSchema.forEach((field, i) => {
            const column = columns[i];
            if (column !== undefined) record[field.name] = column;
          });
          return { format, batch: RecordBatch.fromColumns(format.expandedSchema, record) };
        })
    );
  });

  const withIndices = <T extends { batch: RecordBatch }>(arb: fc.Arbitrary<T>) =>
    arb
      .filter(({ batch }) => batch.length > 0)
      .chain(value =>
        fc.record({
          value: fc.constant(value),
          indices: fc.array(fc.integer({ min: 0, max: value.batch.length - 1 }), { minLength: 1, maxLength: 8 }),
        })
      );

  it('unpack(repack(batch)) is bit-identical to an in-range expanded batch', () => {
    fc.assert(
      fc.property(expandedArb, ({ format, batch }) => {
        const restored = unpackSubFields(repackSubFields(batch, format), format);
        for (const name of batch.fieldNames()) {
          expect(bytesOf(restored.column(name))).toEqual(bytesOf(batch.column(name)));
        }
      })
    );
  });

  it('unpacks each record independently of the rest of the batch', () => {
    fc.assert(
      fc.property(withIndices(batchArb), ({ value: { format, batch }, indices }) => {
        const whole = unpackSubFields(batch, format).select(indices);
        const subset = unpackSubFields(batch.select(indices), format);
        for (const name of whole.fieldNames()) {
          expect(bytesOf(subset.column(name))).toEqual(bytesOf(whole.column(name)));
        }
      })
    );
  });

  it('repacks each record independently of the rest of the batch', () => {
    fc.assert(
      fc.property(withIndices(expandedArb), ({ value: { format, batch }, indices }) => {
        const whole = repackSubFields(batch, format).select(indices);
        const subset = repackSubFields(batch.select(indices), format);
        for (const name of whole.fieldNames()) {
          expect(bytesOf(subset.column(name))).toEqual(bytesOf(whole.column(name)));
        }
      })
    );
  });
});
