import { describe, it, expect } from 'vitest';
import { ShapeMismatchError } from '../src/errors.js';
import {
  type JSONValue, childPath, describeJson, isJSONObject, jsonEntries, jsonGet, readJson, writeJson,
} from '../src/json-value.js';

describe('childPath', () => {
  it('uses dots for identifiers and brackets otherwise', () => {
    expect(childPath('$', 'blocks')).toBe('$.blocks');
    expect(childPath('$.blocks', 0)).toBe('$.blocks[0]');
    expect(childPath('$', 'pandoc-api-version')).toBe('$["pandoc-api-version"]');
  });
});

describe('object access', () => {
  it('reads plain objects and maps alike', () => {
    const plain: JSONValue = JSON.parse('{"__proto__":1,"t":"Str"}');
    const map = new Map<string, JSONValue>([['t', 'Str']]);
    expect(isJSONObject(plain) && jsonEntries(plain)).toEqual([['__proto__', 1], ['t', 'Str']]);
    expect(jsonGet(map, 't')).toBe('Str');
    expect(jsonGet({ t: 'Str' }, 'toString')).toBeUndefined();
  });

  it('describes values', () => {
    expect(describeJson(undefined)).toBe('nothing');
    expect(describeJson(new Map())).toBe('object');
    expect(describeJson({})).toBe('object');
    expect(describeJson([1])).toBe('array of length 1');
    expect(describeJson(true)).toBe('boolean');
  });
});

describe('readJson', () => {
  it('reads objects as maps in text order', () => {
    const value = readJson('{"b": 1, "1": 2, "__proto__": 3}');
    expect(value instanceof Map && [...value]).toEqual([['b', 1], ['1', 2], ['__proto__', 3]]);
  });

  it('reads scalars and arrays', () => {
    expect(readJson(' [1, -2.5e3, true, false, null, "a\\"b"] ')).toEqual([1, -2500, true, false, null, 'a"b']);
  });

  it('reports syntax errors with the JSON path', () => {
    expect(() => readJson('{"a":1,}')).toThrow(ShapeMismatchError);
    expect(() => readJson('{"a":1,}')).toThrow('Expected a string key at $, got "}" at offset 7');
    expect(() => readJson('[1 2]')).toThrow(`Expected ',' or ']' at $, got "2" at offset 3`);
    expect(() => readJson('{"a":[1,')).toThrow('Expected a JSON value at $.a[1], got end of input');
    expect(() => readJson('1 2')).toThrow('Expected end of input at $, got "2" at offset 2');
    expect(() => readJson('"abc')).toThrow('Expected a closing quote at $, got end of input');
  });
});

describe('writeJson', () => {
  it('writes map entries in order', () => {
    expect(writeJson(new Map<string, JSONValue>([['1', 'x'], ['a', []]]))).toBe('{"1":"x","a":[]}');
  });

  it('indents like JSON.stringify', () => {
    const value: JSONValue = { a: [1, {}], b: new Map<string, JSONValue>() };
    expect(writeJson(value, 2)).toBe('{\n  "a": [\n    1,\n    {}\n  ],\n  "b": {}\n}');
  });

  it('reads back what it writes', () => {
    const text = '{"z":[{"1":null}],"a":"\\u00e9"}';
    expect(writeJson(readJson(text))).toBe('{"z":[{"1":null}],"a":"é"}');
  });
});
