import { describe, it, expect } from 'vitest';
import { CoercerRegistry, coerce, createCoercerRegistry, customTypesOf, types } from '../coerce.js';
import { CoercionError } from '../errors.js';

class Color {
  constructor(readonly hex: string) {
    if (!/^#[0-9a-f]{6}$/i.test(hex)) {
      throw new Error('expected #rrggbb');
    }
  }
}

describe('coerce', () => {
  describe('boolean', () => {
    it('accepts true and false in any case', () => {
      expect(coerce('true', types.boolean.descriptor)).toBe(true);
      expect(coerce('FALSE', types.boolean.descriptor)).toBe(false);
      expect(coerce('True', types.boolean.descriptor)).toBe(true);
    });

    it('rejects other words', () => {
      expect(() => coerce('yes', types.boolean.descriptor)).toThrow(
        '"yes" is not a valid boolean; expected true or false',
      );
    });
  });

  describe('integer', () => {
    it('parses signed decimal integers', () => {
      expect(coerce('42', types.integer.descriptor)).toBe(42);
      expect(coerce('-7', types.integer.descriptor)).toBe(-7);
      expect(coerce('+3', types.integer.descriptor)).toBe(3);
    });

    it('rejects malformed text', () => {
      expect(() => coerce('4.5', types.integer.descriptor)).toThrow('"4.5" is not a valid integer');
      expect(() => coerce('', types.integer.descriptor)).toThrow('"" is not a valid integer');
      expect(() => coerce('0x10', types.integer.descriptor)).toThrow('"0x10" is not a valid integer');
    });

    it('rejects values beyond the safe integer range', () => {
      try {
        coerce('9007199254740993', types.integer.descriptor);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CoercionError);
        expect((error as CoercionError).code).toBe('OUT_OF_RANGE');
        expect((error as CoercionError).message).toBe('"9007199254740993" is out of range for integer');
      }
    });
  });

  describe('floating', () => {
    it('parses decimal and exponent notation', () => {
      expect(coerce('2.5', types.floating.descriptor)).toBe(2.5);
      expect(coerce('-.5', types.floating.descriptor)).toBe(-0.5);
      expect(coerce('1e3', types.floating.descriptor)).toBe(1000);
    });

    it('accepts the special values', () => {
      expect(coerce('Infinity', types.floating.descriptor)).toBe(Infinity);
      expect(coerce('-Infinity', types.floating.descriptor)).toBe(-Infinity);
      expect(coerce('NaN', types.floating.descriptor)).toBeNaN();
    });

    it('rejects malformed and overflowing text', () => {
      expect(() => coerce('abc', types.floating.descriptor)).toThrow('"abc" is not a valid number');
      expect(() => coerce('1e400', types.floating.descriptor)).toThrow('"1e400" is out of range for number');
    });
  });

  it('returns strings unchanged', () => {
    expect(coerce(' spaced ', types.string.descriptor)).toBe(' spaced ');
  });

  describe('enumeration', () => {
    const mode = types.enumeration('Mode', ['fast', 'safe'] as const);

    it('matches constant names exactly', () => {
      expect(coerce('safe', mode.descriptor)).toBe('safe');
    });

    it('is case-sensitive and lists legal values', () => {
      expect(() => coerce('Fast', mode.descriptor)).toThrow('"Fast" is not a valid Mode; expected one of: fast, safe');
    });
  });

  describe('list', () => {
    it('splits and coerces every element', () => {
      expect(coerce('3,4,5', types.list(types.integer).descriptor)).toEqual([3, 4, 5]);
    });

    it('yields an empty list for empty text', () => {
      expect(coerce('', types.list(types.integer).descriptor)).toEqual([]);
    });

    it('honours a custom separator', () => {
      expect(coerce('a:b', types.list(types.string, ':').descriptor)).toEqual(['a', 'b']);
    });

    it('reports the failing element', () => {
      expect(() => coerce('1,x', types.list(types.integer).descriptor)).toThrow('"x" is not a valid integer');
    });
  });

  describe('custom', () => {
    it('uses the default coercers for URL and RegExp', () => {
      const url = coerce('https://example.com/a', types.custom(URL).descriptor);
      expect(url).toBeInstanceOf(URL);
      expect(String(url)).toBe('https://example.com/a');

      const pattern = coerce('^a+$', types.custom(RegExp).descriptor);
      expect(pattern).toBeInstanceOf(RegExp);
      expect((pattern as RegExp).test('aaa')).toBe(true);
    });

    it('uses a registered string constructor', () => {
      const registry = createCoercerRegistry().registerConstructor(Color);
      const value = coerce('#00ff00', types.custom(Color).descriptor, registry);
      expect(value).toBeInstanceOf(Color);
      expect((value as Color).hex).toBe('#00ff00');
    });

    it('wraps a failing constructor', () => {
      const registry = new CoercerRegistry().registerConstructor(Color);
      expect(() => coerce('green', types.custom(Color).descriptor, registry)).toThrow(
        '"green" is not a valid Color: expected #rrggbb',
      );
    });

    it('fails without a registered coercer', () => {
      expect(() => coerce('#000000', types.custom(Color).descriptor, new CoercerRegistry())).toThrow(
        'No coercer registered for type Color',
      );
    });
  });
});

describe('types', () => {
  it('guards values by type', () => {
    expect(types.integer.is(3)).toBe(true);
    expect(types.integer.is(3.5)).toBe(false);
    expect(types.list(types.string).is(['a', 'b'])).toBe(true);
    expect(types.list(types.string).is(['a', 1])).toBe(false);
    expect(types.enumeration('Mode', ['fast']).is('slow')).toBe(false);
    expect(types.custom(URL).is(new URL('https://example.com'))).toBe(true);
  });

  it('names types for documentation', () => {
    expect(types.floating.name).toBe('number');
    expect(types.list(types.integer).name).toBe('integer[]');
    expect(types.custom(Color).name).toBe('Color');
  });

  it('finds custom types inside lists', () => {
    const found = customTypesOf(types.list(types.custom(Color)).descriptor);
    expect(found.map((type) => type.name)).toEqual(['Color']);
    expect(customTypesOf(types.string.descriptor)).toEqual([]);
  });
});
