// Mask arithmetic shared by the extractor, the injector and format compilation

import { InvalidMaskError } from './errors.js';
import { ELEMENT_TYPES, type ElementType } from './types.js';

/** Largest mask a sub-field may use */
export const MAX_MASK = 0xffffffff;

/**
 * Throw InvalidMaskError unless `mask` is a nonzero unsigned 32-bit integer.
 */
export function assertValidMask(mask: number): void {
  if (mask === 0) {
    throw InvalidMaskError.zero();
  }
  if (!Number.isInteger(mask) || mask < 0 || mask > MAX_MASK) {
    throw InvalidMaskError.notAnInteger(mask);
  }
}

/**
 * Index of the lowest set bit of `mask`, i.e. the shift that aligns the
 * sub-field it selects to bit 0.
 *
 * @example
 * ```typescript
 * leastSignificantBit(0b00001111); // 0
 * leastSignificantBit(0b11110000); // 4
 * ```
 */
export function leastSignificantBit(mask: number): number {
  assertValidMask(mask);
  const lowest = (mask & -mask) >>> 0;
  return 31 - Math.clz32(lowest);
}

/**
 * Largest value the sub-field selected by `mask` can hold (`mask >>> shift`).
 */
export function maxValueForMask(mask: number): number {
  return mask >>> leastSignificantBit(mask);
}

/** A mask with its shift and maximum value worked out */
export interface MaskLayout {
  readonly mask: number;
  readonly shift: number;
  readonly maxValue: number;
}

/**
 * Resolve `mask` into its layout. Point-format compilation does this once per
 * sub-field so the pack/unpack loops reuse the result.
 *
 * @example
 * ```typescript
 * resolveMask(0b00111000); // { mask: 56, shift: 3, maxValue: 7 }
 * ```
 */
export function resolveMask(mask: number): MaskLayout {
  return { mask, shift: leastSignificantBit(mask), maxValue: maxValueForMask(mask) };
}

/**
 * Number of bits spanned by `mask`, from its lowest to its highest set bit.
 */
export function maskBitWidth(mask: number): number {
  const shift = leastSignificantBit(mask);
  return 32 - Math.clz32(mask >>> shift);
}

/**
 * True when every bit of `mask` lies inside an element of `type`.
 */
export function maskFitsType(mask: number, type: ElementType): boolean {
  const bits = ELEMENT_TYPES[type].byteWidth * 8;
  if (bits >= 32) {
    return mask <= MAX_MASK;
  }
  return mask < 2 ** bits;
}
