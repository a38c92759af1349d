// Element types, columns and point-format definitions

// =============================================================================
// Element Types
// =============================================================================

/**
 * Typed array backing each element type. Values are stored in host byte order.
 */
export interface ColumnArrayMap {
  u8: Uint8Array;
  i8: Int8Array;
  u16: Uint16Array;
  i16: Int16Array;
  u32: Uint32Array;
  i32: Int32Array;
  u64: BigUint64Array;
  i64: BigInt64Array;
  f32: Float32Array;
  f64: Float64Array;
}

/** Element type of a record-batch column */
export type ElementType = keyof ColumnArrayMap;

/**
 * Integer types that can hold packed sub-fields.
 * 64-bit integers are excluded: masks are unsigned 32-bit values.
 */
export type PackableType = 'u8' | 'i8' | 'u16' | 'i16' | 'u32' | 'i32';

/** Any column */
export type ColumnArray = ColumnArrayMap[ElementType];

/** A column whose elements can be packed into or unpacked from */
export type PackableColumn = ColumnArrayMap[PackableType];

export interface ElementTypeInfo {
  /** Size of one element in bytes */
  byteWidth: number;
  signed: boolean;
  /** Smallest representable value (integer types) */
  min: number;
  /** Largest representable value (integer types) */
  max: number;
  packable: boolean;
}

export const ELEMENT_TYPES: Readonly<Record<ElementType, ElementTypeInfo>> = {
  u8: { byteWidth: 1, signed: false, min: 0, max: 0xff, packable: true },
  i8: { byteWidth: 1, signed: true, min: -0x80, max: 0x7f, packable: true },
  u16: { byteWidth: 2, signed: false, min: 0, max: 0xffff, packable: true },
  i16: { byteWidth: 2, signed: true, min: -0x8000, max: 0x7fff, packable: true },
  u32: { byteWidth: 4, signed: false, min: 0, max: 0xffffffff, packable: true },
  i32: { byteWidth: 4, signed: true, min: -0x80000000, max: 0x7fffffff, packable: true },
  u64: { byteWidth: 8, signed: false, min: 0, max: Number.MAX_SAFE_INTEGER, packable: false },
  i64: { byteWidth: 8, signed: true, min: Number.MIN_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER, packable: false },
  f32: { byteWidth: 4, signed: true, min: -Infinity, max: Infinity, packable: false },
  f64: { byteWidth: 8, signed: true, min: -Infinity, max: Infinity, packable: false },
};

/** Element type names, in the order definitions and error messages list them */
export const ELEMENT_TYPE_NAMES = [
  'u8', 'i8', 'u16', 'i16', 'u32', 'i32', 'u64', 'i64', 'f32', 'f64',
] as const satisfies readonly ElementType[];

export const PACKABLE_TYPE_NAMES = ['u8', 'i8', 'u16', 'i16', 'u32', 'i32'] as const satisfies readonly PackableType[];

const COLUMN_CONSTRUCTORS: { [K in ElementType]: new (length: number) => ColumnArrayMap[K] } = {
  u8: Uint8Array,
  i8: Int8Array,
  u16: Uint16Array,
  i16: Int16Array,
  u32: Uint32Array,
  i32: Int32Array,
  u64: BigUint64Array,
  i64: BigInt64Array,
  f32: Float32Array,
  f64: Float64Array,
};

export function isPackableType(type: ElementType): type is PackableType {
  return ELEMENT_TYPES[type].packable;
}

/**
 * Allocate a zero-filled column of `length` elements.
 */
export function allocateColumn<K extends ElementType>(type: K, length: number): ColumnArrayMap[K] {
  const Ctor = COLUMN_CONSTRUCTORS[type];
  return new Ctor(length);
}

/**
 * Element type of an existing column.
 */
export function elementTypeOf(column: ColumnArray): ElementType {
  if (column instanceof Uint8Array) return 'u8';
  if (column instanceof Int8Array) return 'i8';
  if (column instanceof Uint16Array) return 'u16';
  if (column instanceof Int16Array) return 'i16';
  if (column instanceof Uint32Array) return 'u32';
  if (column instanceof Int32Array) return 'i32';
  if (column instanceof BigUint64Array) return 'u64';
  if (column instanceof BigInt64Array) return 'i64';
  if (column instanceof Float32Array) return 'f32';
  return 'f64';
}

/**
 * Narrow a column to one that can take part in packing.
 */
export function isPackableColumn(column: ColumnArray): column is PackableColumn {
  return isPackableType(elementTypeOf(column));
}

/**
 * Copy `source` into `target` byte for byte. Both must have the same element
 * type and length; callers check this beforehand.
 */
export function copyColumnBytes(source: ColumnArray, target: ColumnArray): void {
  const from = new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
  const to = new Uint8Array(target.buffer, target.byteOffset, target.byteLength);
  to.set(from);
}

// =============================================================================
// Schema
// =============================================================================

/** One named column of a record batch schema */
export interface FieldSpec {
  readonly name: string;
  readonly type: ElementType;
}

/** Ordered list of fields; the order is the record layout order */
export type Schema = readonly FieldSpec[];

// =============================================================================
// Point-Format Definitions
// =============================================================================

/**
 * A sub-field packed into a composed field.
 * `type` is the element type of the expanded column (default: u8).
 */
export interface SubFieldDefinition {
  name: string;
  mask: number;
  type?: PackableType;
}

/** A plain field, copied verbatim between the physical and expanded schemas */
export interface PlainFieldDefinition {
  name: string;
  type: ElementType;
}

/** A container field whose bits are shared by its sub-fields */
export interface ComposedFieldDefinition {
  name: string;
  type: ElementType;
  subFields: SubFieldDefinition[];
}

export type FieldDefinition = PlainFieldDefinition | ComposedFieldDefinition;

/**
 * Static description of one record layout version, in physical field order.
 */
export interface PointFormatDefinition {
  id: number;
  fields: FieldDefinition[];
}

export function isComposedFieldDefinition(field: FieldDefinition): field is ComposedFieldDefinition {
  return 'subFields' in field;
}
