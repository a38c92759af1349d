import { describe, it, expect } from 'vitest';
import {
  ElementTypeSchema,
  JSONParseError,
  JSONValidationError,
  MaskSchema,
  PackableTypeSchema,
  PointFormatDefinitionSchema,
  parseJSON,
  validate,
} from '../validation.js';
import { ErrorCode } from '../errors.js';
import { ELEMENT_TYPES, ELEMENT_TYPE_NAMES, PACKABLE_TYPE_NAMES } from '../types.js';

describe('element type schemas', () => {
  it('list every element type and every packable type', () => {
    expect(ElementTypeSchema.options).toEqual([...ELEMENT_TYPE_NAMES]);
    expect([...ELEMENT_TYPE_NAMES].sort()).toEqual(Object.keys(ELEMENT_TYPES).sort());
    expect(PackableTypeSchema.options).toEqual([...PACKABLE_TYPE_NAMES]);
    expect(PACKABLE_TYPE_NAMES.every(type => ELEMENT_TYPES[type].packable)).toBe(true);
  });

  it('reject unknown and non-packable names', () => {
    expect(ElementTypeSchema.safeParse('u128').success).toBe(false);
    expect(PackableTypeSchema.safeParse('u64').success).toBe(false);
    expect(PackableTypeSchema.parse('i16')).toBe('i16');
  });
});

describe('MaskSchema', () => {
  it('accepts numbers and hex or binary literals', () => {
    expect(MaskSchema.parse(7)).toBe(7);
    expect(MaskSchema.parse('0x0F')).toBe(15);
    expect(MaskSchema.parse('0b101000')).toBe(40);
    expect(MaskSchema.parse('0xffffffff')).toBe(0xffffffff);
  });

  it('rejects zero, fractions and masks beyond 32 bits', () => {
    expect(MaskSchema.safeParse(0).success).toBe(false);
    expect(MaskSchema.safeParse(1.5).success).toBe(false);
    expect(MaskSchema.safeParse('0x100000000').success).toBe(false);
  });

  it('rejects decimal strings', () => {
    expect(MaskSchema.safeParse('12').success).toBe(false);
  });
});

describe('parseJSON', () => {
  it('returns the validated definition', () => {
    const definition = parseJSON(
      '{"id": 3, "fields": [{"name": "flags", "type": "u8", "subFields": [{"name": "a", "mask": "0x03"}]}]}',
      PointFormatDefinitionSchema
    );

    expect(definition).toEqual({
      id: 3,
      fields: [{ name: 'flags', type: 'u8', subFields: [{ name: 'a', mask: 3 }] }],
    });
  });

  it('throws JSONParseError for invalid JSON', () => {
    try {
      parseJSON('{', PointFormatDefinitionSchema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JSONParseError);
      if (error instanceof JSONParseError) {
        expect(error.code).toBe(ErrorCode.JSON_PARSE_ERROR);
        expect(error.message.startsWith('Failed to parse JSON: ')).toBe(true);
        expect(error.cause).toBeInstanceOf(SyntaxError);
      }
    }
  });

  it('throws JSONValidationError listing every issue path', () => {
    try {
      parseJSON('{"id": -1, "fields": []}', PointFormatDefinitionSchema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JSONValidationError);
      if (error instanceof JSONValidationError) {
        expect(error.code).toBe(ErrorCode.SCHEMA_VALIDATION_ERROR);
        expect(error.message.startsWith('JSON validation failed: id: ')).toBe(true);
        expect(error.zodError.issues.map(issue => issue.path)).toEqual([['id'], ['fields']]);
      }
    }
  });

  it('rejects unknown element types', () => {
    expect(() => parseJSON('{"id": 1, "fields": [{"name": "x", "type": "u128"}]}', PointFormatDefinitionSchema))
      .toThrow(JSONValidationError);
  });
});

describe('validate', () => {
  it('validates already-parsed values', () => {
    expect(validate({ id: 0, fields: [{ name: 'x', type: 'f32' }] }, PointFormatDefinitionSchema)).toEqual({
      id: 0,
      fields: [{ name: 'x', type: 'f32' }],
    });
  });

  it('throws JSONValidationError with a Validation failed message', () => {
    expect(() => validate({ id: 'zero', fields: [] }, PointFormatDefinitionSchema)).toThrow(/^Validation failed: id: /);
  });
});
