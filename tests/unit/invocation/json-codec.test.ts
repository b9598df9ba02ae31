import { describe, it, expect } from 'vitest';
import { LosslessNumber } from 'lossless-json';
import { parseJson, stringifyJson } from '../../../src/domain/invocation/json-codec.js';
import { isJsonValue } from '../../../src/domain/invocation/json-types.js';

describe('parseJson', () => {
  it('reads numbers a double holds exactly as plain numbers', () => {
    expect(parseJson('{"count":42,"ratio":1.5,"items":[1,2]}')).toEqual({ count: 42, ratio: 1.5, items: [1, 2] });
  });

  it('keeps the digits of integers beyond double precision', () => {
    const value = parseJson('{"id":12345678901234567890}');

    expect(value).toEqual({ id: new LosslessNumber('12345678901234567890') });
    expect(stringifyJson(value)).toBe('{"id":12345678901234567890}');
  });

  it('keeps numbers that overflow a double', () => {
    expect(stringifyJson(parseJson('[1e400]'))).toBe('[1e400]');
  });

  it('keeps a "__proto__" member as data', () => {
    const value = parseJson('{"__proto__":{"x":1},"y":2}');

    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    expect(stringifyJson(value)).toBe('{"__proto__":{"x":1},"y":2}');
  });

  it('lets the last duplicate member win', () => {
    expect(parseJson('{"a":1,"a":2}')).toEqual({ a: 2 });
  });

  it('throws on text that is not JSON', () => {
    expect(() => parseJson('{"a":')).toThrow(SyntaxError);
  });

  it('produces values that pass the JSON value check', () => {
    expect(isJsonValue(parseJson('{"id":12345678901234567890,"tags":[null,true,"x"]}'))).toBe(true);
  });
});

describe('stringifyJson', () => {
  it('writes compact JSON by default', () => {
    expect(stringifyJson({ a: [1, 'two', null], b: { c: true } })).toBe('{"a":[1,"two",null],"b":{"c":true}}');
  });

  it('indents when asked', () => {
    expect(stringifyJson({ name: 'x' }, 2)).toBe('{\n  "name": "x"\n}');
  });
});
