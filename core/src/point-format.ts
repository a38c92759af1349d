/**
 * Point-format compilation.
 *
 * A PointFormatDefinition names fields and masks. Compiling it resolves
 * everything the codec needs per field once (shift, maximum value, element
 * types, expanded column order) so the unpack/repack loops walk a fixed plan
 * instead of looking masks up by name.
 *
 * Compilation also enforces the layout invariants of a composed field:
 * - the container is an integer type of at most 32 bits
 * - every mask is nonzero and lies inside the container
 * - sub-field masks are pairwise disjoint (unless allowOverlappingMasks)
 * - each sub-field's expanded type can hold its mask's maximum
 *   (unless allowNarrowSubFieldTypes)
 */

import { InvalidMaskError, ValidationError, ErrorCode } from './errors.js';
import { assertValidMask, maskFitsType, resolveMask, type MaskLayout } from './bits.js';
import { DEFAULT_SUB_FIELD_TYPE } from './constants.js';
import {
  ELEMENT_TYPES,
  isComposedFieldDefinition,
  isPackableType,
  type ComposedFieldDefinition,
  type ElementType,
  type FieldSpec,
  type PackableType,
  type PointFormatDefinition,
  type Schema,
} from './types.js';

export interface PointFormatOptions {
  /**
   * Accept sub-fields whose masks share bits. Repacking then lets the
   * sub-field declared last win the shared bits. Default: false.
   */
  allowOverlappingMasks?: boolean;
  /**
   * Accept sub-field types too narrow for their mask's maximum. Unpacking
   * then truncates those values. Default: false.
   */
  allowNarrowSubFieldTypes?: boolean;
}

/** A sub-field with its mask arithmetic resolved */
export interface ResolvedSubField extends MaskLayout {
  readonly name: string;
  /** Element type of the expanded column */
  readonly type: PackableType;
}

export interface PlainFieldPlan {
  readonly kind: 'plain';
  readonly name: string;
  readonly type: ElementType;
}

export interface ComposedFieldPlan {
  readonly kind: 'composed';
  readonly name: string;
  readonly type: PackableType;
  /** Sub-fields in declared order; repacking follows this order */
  readonly subFields: readonly ResolvedSubField[];
}

export type FieldPlan = PlainFieldPlan | ComposedFieldPlan;

/**
 * Compiled, immutable point format.
 */
export class PointFormat {
  readonly id: number;
  /** On-disk layout: composed fields present */
  readonly physicalSchema: Schema;
  /** In-memory layout: each composed field replaced by its sub-fields */
  readonly expandedSchema: Schema;
  /** One entry per physical field, in physical order */
  readonly plan: readonly FieldPlan[];
  readonly composedFields: readonly ComposedFieldPlan[];

  private readonly composedByName: ReadonlyMap<string, ComposedFieldPlan>;

  constructor(id: number, plan: readonly FieldPlan[]) {
    this.id = id;
    this.plan = Object.freeze([...plan]);
    this.composedFields = Object.freeze(
      plan.filter((field): field is ComposedFieldPlan => field.kind === 'composed')
    );
    this.composedByName = new Map(
      this.composedFields.map((field): [string, ComposedFieldPlan] => [field.name, field])
    );
    this.physicalSchema = Object.freeze(
      plan.map((field): FieldSpec => Object.freeze({ name: field.name, type: field.type }))
    );
    this.expandedSchema = Object.freeze(
      plan.flatMap((field): FieldSpec[] =>
        field.kind === 'composed'
          ? field.subFields.map(sub => Object.freeze({ name: sub.name, type: sub.type }))
          : [Object.freeze({ name: field.name, type: field.type })]
      )
    );
    Object.freeze(this);
  }

  isComposed(name: string): boolean {
    return this.composedByName.has(name);
  }

  composedField(name: string): ComposedFieldPlan | undefined {
    return this.composedByName.get(name);
  }

  /**
   * Names of the sub-fields packed into `name`, in declared order
   * (empty for plain or unknown fields).
   */
  subFieldNames(name: string): string[] {
    return this.composedByName.get(name)?.subFields.map(sub => sub.name) ?? [];
  }
}

/**
 * Validate a definition and resolve it into a PointFormat.
 *
 * @throws ValidationError for duplicate names, unsupported container types,
 *   overlapping masks or narrow sub-field types
 * @throws InvalidMaskError for zero masks or masks wider than their container
 *
 * @example
 * ```typescript
 * const format = compilePointFormat({
 *   id: 0,
 *   fields: [
 *     { name: 'intensity', type: 'u16' },
 *     {
 *       name: 'bit_fields',
 *       type: 'u8',
 *       subFields: [
 *         { name: 'return_number', mask: 0b00000111 },
 *         { name: 'number_of_returns', mask: 0b00111000 },
 *       ],
 *     },
 *   ],
 * });
 * format.expandedSchema.map(f => f.name); // ['intensity', 'return_number', 'number_of_returns']
 * ```
 */
export function compilePointFormat(
  definition: PointFormatDefinition,
  options: PointFormatOptions = {}
): PointFormat {
  const physicalNames = new Set<string>();
  const expandedNames = new Set<string>();
  const claim = (names: Set<string>, name: string): void => {
    if (names.has(name)) {
      throw ValidationError.duplicateField(name, definition.id);
    }
    names.add(name);
  };

  const plan: FieldPlan[] = [];
  for (const field of definition.fields) {
    claim(physicalNames, field.name);

    if (!isComposedFieldDefinition(field)) {
      claim(expandedNames, field.name);
      plan.push(Object.freeze<PlainFieldPlan>({ kind: 'plain', name: field.name, type: field.type }));
      continue;
    }

    const composed = compileComposedField(field, options);
    for (const sub of composed.subFields) {
      claim(expandedNames, sub.name);
    }
    plan.push(composed);
  }

  return new PointFormat(definition.id, plan);
}

function compileComposedField(
  field: ComposedFieldDefinition,
  options: PointFormatOptions
): ComposedFieldPlan {
  const containerType = field.type;
  if (!isPackableType(containerType)) {
    throw ValidationError.unsupportedContainerType(field.name, containerType);
  }
  if (field.subFields.length === 0) {
    throw new ValidationError(
      `Composed field "${field.name}" declares no sub-fields`,
      ErrorCode.VALIDATION_ERROR,
      { field: field.name },
      'Declare it as a plain field instead'
    );
  }

  const subFields: ResolvedSubField[] = [];
  for (const sub of field.subFields) {
    assertValidMask(sub.mask);
    if (!maskFitsType(sub.mask, containerType)) {
      throw InvalidMaskError.exceedsContainer(sub.mask, containerType);
    }

    const { shift, maxValue } = resolveMask(sub.mask);
    const type = sub.type ?? DEFAULT_SUB_FIELD_TYPE;
    if (!options.allowNarrowSubFieldTypes && maxValue > ELEMENT_TYPES[type].max) {
      throw ValidationError.narrowSubFieldType(sub.name, type, maxValue);
    }

    if (!options.allowOverlappingMasks) {
      for (const earlier of subFields) {
        const overlap = (earlier.mask & sub.mask) >>> 0;
        if (overlap !== 0) {
          throw ValidationError.overlappingMasks(field.name, earlier.name, sub.name, overlap);
        }
      }
    }

    subFields.push(Object.freeze({ name: sub.name, mask: sub.mask, shift, maxValue, type }));
  }

  return Object.freeze<ComposedFieldPlan>({
    kind: 'composed',
    name: field.name,
    type: containerType,
    subFields: Object.freeze(subFields),
  });
}
