import { describe, it, expect } from 'vitest';
import { LanguagesErrorCode } from '../src/errors.js';
import { Value } from '../src/value.js';
import { expectErr, expectOk } from './helpers/fixtures.js';

function number(raw: number): Value {
  return expectOk(Value.from(raw));
}

describe('Value', () => {
  describe('constructors and predicates', () => {
    it('should report the variant of each constructor', () => {
      expect(Value.string('hi').kind).toBe('string');
      expect(number(3).kind).toBe('integer');
      expect(number(0.5).kind).toBe('float');
      expect(Value.boolean(false).kind).toBe('boolean');
      expect(Value.sequence([]).kind).toBe('sequence');
      expect(Value.mapping(new Map()).kind).toBe('mapping');
    });

    it('should answer exactly one predicate per variant', () => {
      const value = Value.string('hi');
      expect(value.isString()).toBe(true);
      expect(value.isInteger()).toBe(false);
      expect(value.isFloat()).toBe(false);
      expect(value.isNumber()).toBe(false);
      expect(value.isBoolean()).toBe(false);
      expect(value.isMapping()).toBe(false);
      expect(value.isSequence()).toBe(false);
    });

    it('should treat integers and floats as numbers', () => {
      expect(number(1).isNumber()).toBe(true);
      expect(number(1.5).isNumber()).toBe(true);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(Value.string('hi'))).toBe(true);
      expect(Object.isFrozen(expectOk(Value.sequence([number(1)]).getSequence()))).toBe(true);
    });
  });

  describe('accessors', () => {
    it('should return the stored string', () => {
      expect(expectOk(Value.string('Hello world!').getString())).toBe('Hello world!');
    });

    it('should fail with TYPE_MISMATCH when reading a boolean as a string', () => {
      const error = expectErr(Value.boolean(true).getString());

      expect(error.code).toBe(LanguagesErrorCode.TYPE_MISMATCH);
      expect(error.details).toEqual({ expected: 'string', actual: 'boolean' });
      expect(error.message).toBe('Expected a string value but found a boolean.');
    });

    it('should widen integers in getFloat but not floats in getInteger', () => {
      expect(expectOk(number(4).getFloat())).toBe(4);
      expect(expectErr(number(4.5).getInteger()).code).toBe(LanguagesErrorCode.TYPE_MISMATCH);
    });

    it('should not coerce strings to numbers', () => {
      expect(expectErr(Value.string('4').getFloat()).details).toEqual({ expected: 'float', actual: 'string' });
    });

    it('should expose nested mappings and sequences', () => {
      const value = expectOk(Value.from({ home: { title: 'Home' }, list: ['a', 'b'] }));
      const mapping = expectOk(value.getMapping());

      const home = mapping.get('home');
      expect(home).toBeDefined();
      expect(home && expectOk(home.getMapping()).get('title')?.toString()).toBe('Home');

      const list = mapping.get('list');
      expect(list && expectOk(list.getSequence()).map((item) => item.toString())).toEqual(['a', 'b']);
    });

    it('should read booleans', () => {
      expect(expectOk(Value.boolean(false).getBoolean())).toBe(false);
      expect(expectErr(number(0).getBoolean()).code).toBe(LanguagesErrorCode.TYPE_MISMATCH);
    });
  });

  describe('from', () => {
    it('should split numbers into integers and floats', () => {
      expect(expectOk(Value.from(20)).kind).toBe('integer');
      expect(expectOk(Value.from(0.75)).kind).toBe('float');
    });

    it('should accept bigints in the safe integer range', () => {
      const value = expectOk(Value.from(BigInt(42)));
      expect(value.kind).toBe('integer');
      expect(expectOk(value.getInteger())).toBe(42);
    });

    it('should reject bigints outside the safe integer range', () => {
      const error = expectErr(Value.from(BigInt(Number.MAX_SAFE_INTEGER) + BigInt(1)));
      expect(error.code).toBe(LanguagesErrorCode.PARSE_ERROR);
    });

    it('should reject null with the path of the offending value', () => {
      const error = expectErr(Value.from({ pages: { home: { title: null } } }));

      expect(error.code).toBe(LanguagesErrorCode.PARSE_ERROR);
      expect(error.details).toEqual({ path: 'pages.home.title' });
      expect(error.message).toBe('Cannot use a null value at `pages.home.title` as a language text value.');
    });

    it('should report sequence indexes in the path', () => {
      const error = expectErr(Value.from({ list: ['a', undefined] }));
      expect(error.details).toEqual({ path: 'list[1]' });
    });

    it('should reject dates and non-finite numbers', () => {
      expect(expectErr(Value.from(new Date(0))).message).toBe('Cannot use a date value as a language text value.');
      expect(expectErr(Value.from(Number.NaN)).code).toBe(LanguagesErrorCode.PARSE_ERROR);
      expect(expectErr(Value.from(Infinity)).code).toBe(LanguagesErrorCode.PARSE_ERROR);
    });

    it('should keep keys named like Object.prototype members', () => {
      const raw: unknown = JSON.parse('{"__proto__": "Draft", "constructor": "Builder", "prototype": "Model"}');
      const mapping = expectOk(expectOk(Value.from(raw)).getMapping());

      expect(Array.from(mapping.keys())).toEqual(['__proto__', 'constructor', 'prototype']);
      expect(mapping.get('constructor')?.toString()).toBe('Builder');
    });

    it('should reject integers outside the safe range instead of rounding them', () => {
      const error = expectErr(Value.from({ id: 9007199254740992 }));

      expect(error.code).toBe(LanguagesErrorCode.PARSE_ERROR);
      expect(error.details).toEqual({ path: 'id' });
      expect(expectOk(Value.from(Number.MAX_SAFE_INTEGER)).kind).toBe('integer');
    });

    it('should keep large values with a fractional part as floats', () => {
      expect(number(123456789.5).kind).toBe('float');
    });
  });

  describe('equals', () => {
    it('should compare primitives by variant and content', () => {
      expect(Value.string('a').equals(Value.string('a'))).toBe(true);
      expect(Value.string('a').equals(Value.string('b'))).toBe(false);
      expect(number(1).equals(Value.string('1'))).toBe(false);
      expect(number(1).equals(number(1.5))).toBe(false);
    });

    it('should ignore mapping key order', () => {
      const a = expectOk(Value.from({ x: 1, y: ['a', { z: true }] }));
      const b = expectOk(Value.from({ y: ['a', { z: true }], x: 1 }));
      expect(a.equals(b)).toBe(true);
    });

    it('should respect sequence order and length', () => {
      const a = expectOk(Value.from(['a', 'b']));
      expect(a.equals(expectOk(Value.from(['b', 'a'])))).toBe(false);
      expect(a.equals(expectOk(Value.from(['a'])))).toBe(false);
    });

    it('should detect differing mapping keys', () => {
      const a = expectOk(Value.from({ x: 1 }));
      expect(a.equals(expectOk(Value.from({ y: 1 })))).toBe(false);
      expect(a.equals(expectOk(Value.from({ x: 1, y: 1 })))).toBe(false);
    });
  });

  describe('toPlain and toString', () => {
    it('should keep `__proto__` as an own key in plain data', () => {
      const raw: unknown = JSON.parse('{"__proto__": {"polluted": "yes"}, "title": "Home"}');
      const plain = expectOk(Value.from(raw)).toPlain();

      expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
      expect(Object.keys(plain)).toEqual(['__proto__', 'title']);
      expect(Object.getOwnPropertyDescriptor(plain, '__proto__')?.value).toEqual({ polluted: 'yes' });
      expect('polluted' in {}).toBe(false);
    });

    it('should convert back to plain data', () => {
      const raw = { title: 'Home', count: 2, ratio: 0.5, on: true, items: ['a', { b: 'c' }] };
      expect(expectOk(Value.from(raw)).toPlain()).toEqual(raw);
    });

    it('should render strings raw and structures with brackets', () => {
      expect(Value.string('Hello').toString()).toBe('Hello');
      expect(expectOk(Value.from(['Message 1', 'Message 2'])).toString()).toBe('[Message 1, Message 2]');
      expect(expectOk(Value.from({ title: 'Home', count: 2 })).toString()).toBe('{title: Home, count: 2}');
    });
  });
});
