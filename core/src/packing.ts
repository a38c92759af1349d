/**
 * Mask-driven pack/unpack of sub-fields over whole columns.
 *
 * A composed field is a container column whose bits are shared by several
 * sub-fields. `unpack` extracts one sub-field into its own column; `pack` and
 * `packInPlace` write one back. Every function here works on entire columns
 * in a single pass and never allocates per record.
 *
 * Masks are unsigned 32-bit integers, so containers are integer columns of
 * at most 32 bits (see PackableType).
 */

import { InvalidMaskError, RangeViolationError, SchemaMismatchError } from './errors.js';
import { maskFitsType, resolveMask, type MaskLayout } from './bits.js';
import {
  allocateColumn,
  elementTypeOf,
  type ColumnArrayMap,
  type PackableColumn,
  type PackableType,
} from './types.js';

/** A raw mask, or one already resolved by point-format compilation */
export type MaskInput = number | MaskLayout;

function layoutOf(mask: MaskInput): MaskLayout {
  return typeof mask === 'number' ? resolveMask(mask) : mask;
}

function assertMaskFitsColumn(column: PackableColumn, mask: number): void {
  const type = elementTypeOf(column);
  if (!maskFitsType(mask, type)) {
    throw InvalidMaskError.exceedsContainer(mask, type);
  }
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Extract the sub-field selected by `mask` from every element of `source`.
 *
 * `result[i] = (source[i] & mask) >>> shift`, stored as `targetType`
 * (default u8). A target type too narrow for the mask's range wraps silently;
 * point-format compilation rejects such sub-field declarations up front.
 * `mask` may also be a resolved MaskLayout, whose shift is used as is.
 *
 * @example
 * ```typescript
 * unpack(Uint8Array.of(0b10110101), 0b11110000); // Uint8Array [11]
 * ```
 */
export function unpack(source: PackableColumn, mask: MaskInput): Uint8Array;
export function unpack<K extends PackableType>(
  source: PackableColumn,
  mask: MaskInput,
  targetType: K
): ColumnArrayMap[K];
export function unpack(
  source: PackableColumn,
  mask: MaskInput,
  targetType: PackableType = 'u8'
): PackableColumn {
  const layout = layoutOf(mask);
  assertMaskFitsColumn(source, layout.mask);

  const result = allocateColumn(targetType, source.length);
  for (let i = 0; i < source.length; i++) {
    result[i] = (source[i] & layout.mask) >>> layout.shift;
  }
  return result;
}

// =============================================================================
// Injection
// =============================================================================

/**
 * Check that every value fits the sub-field selected by `mask`.
 *
 * One min/max reduction over the whole column; throws RangeViolationError
 * carrying the offending extreme and the mask's maximum.
 *
 * The maximum is `mask >>> shift`. For a mask with gaps (e.g. 0b1001) that
 * admits values whose bits fall into the gap; packing drops those bits.
 */
export function assertValuesFitMask(values: PackableColumn, mask: MaskInput): void {
  const maxAllowed = layoutOf(mask).maxValue;

  let min = 0;
  let max = 0;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v > max) max = v;
    else if (v < min) min = v;
  }

  if (max > maxAllowed) {
    throw new RangeViolationError(max, maxAllowed);
  }
  if (min < 0) {
    throw new RangeViolationError(min, maxAllowed);
  }
}

function validatePack(dest: PackableColumn, values: PackableColumn, mask: MaskInput): MaskLayout {
  const layout = layoutOf(mask);
  assertMaskFitsColumn(dest, layout.mask);
  if (values.length !== dest.length) {
    throw SchemaMismatchError.lengthMismatch('values', dest.length, values.length);
  }
  assertValuesFitMask(values, layout);
  return layout;
}

function writeMasked(dest: PackableColumn, values: PackableColumn, { mask, shift }: MaskLayout): void {
  const keep = ~mask;
  for (let i = 0; i < dest.length; i++) {
    dest[i] = (dest[i] & keep) | ((values[i] << shift) & mask);
  }
}

/**
 * Pack `values` into the bits of `dest` selected by `mask`, returning a new
 * column of the same element type. `dest` is left untouched.
 *
 * @throws RangeViolationError if a value is negative or exceeds `mask >>> shift`
 * @throws InvalidMaskError if the mask is zero or does not fit `dest`
 * @throws SchemaMismatchError if the columns differ in length
 */
export function pack(dest: PackableColumn, values: PackableColumn, mask: MaskInput): PackableColumn {
  const layout = validatePack(dest, values, mask);
  const result = dest.slice();
  writeMasked(result, values, layout);
  return result;
}

/**
 * Pack `values` into the bits of `dest` selected by `mask`, in place.
 *
 * Validation completes before the first write, so on failure `dest` is
 * bit-identical to its state before the call. Bits outside `mask` are never
 * touched, which lets disjoint sub-fields be layered into one container in
 * any order.
 */
export function packInPlace(dest: PackableColumn, values: PackableColumn, mask: MaskInput): void {
  const layout = validatePack(dest, values, mask);
  writeMasked(dest, values, layout);
}
