/**
 * Plain JSON values and JSON-path helpers used in codec error reports.
 *
 * A JSON object is either a plain object or, where key order must
 * survive (integer-like keys, `__proto__`), a `Map`. `readJson` and
 * `writeJson` keep the order of both forms; `JSON.parse` and
 * `JSON.stringify` do not.
 */

import { ShapeMismatchError } from './errors.js';

export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | JSONObject
  | JSONMap;

export type JSONObject = { [key: string]: JSONValue };

export type JSONMap = Map<string, JSONValue>;

export function isJSONObject(value: JSONValue | undefined): value is JSONObject | JSONMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJSONScalar(value: JSONValue): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function jsonEntries(object: JSONObject | JSONMap): [string, JSONValue][] {
  return object instanceof Map ? [...object] : Object.entries(object);
}

/** Own entry `key` of a JSON object; undefined when absent. */
export function jsonGet(object: JSONObject | JSONMap, key: string): JSONValue | undefined {
  if (object instanceof Map) return object.get(key);
  return Object.hasOwn(object, key) ? object[key] : undefined;
}

/** Short description of a JSON value for error messages. */
export function describeJson(value: JSONValue | undefined): string {
  if (value === undefined) return 'nothing';
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array of length ${value.length}`;
  if (isJSONObject(value)) return 'object';
  return typeof value;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** `$.blocks` + 0 → `$.blocks[0]`; `$` + "pandoc-api-version" → `$["pandoc-api-version"]` */
export function childPath(path: string, key: string | number): string {
  if (typeof key === 'number') return `${path}[${key}]`;
  return IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

// --- Reading ---

const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const LITERALS: ReadonlyArray<readonly [string, JSONValue]> = [['true', true], ['false', false], ['null', null]];

class JsonReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  document(): JSONValue {
    const value = this.value('$');
    this.skipSpace();
    if (this.pos < this.text.length) this.fail('$', 'end of input');
    return value;
  }

  private value(path: string): JSONValue {
    this.skipSpace();
    const ch = this.text[this.pos];
    if (ch === '{') return this.object(path);
    if (ch === '[') return this.array(path);
    if (ch === '"') return this.string(path);
    for (const [word, literal] of LITERALS) {
      if (this.text.startsWith(word, this.pos)) {
        this.pos += word.length;
        return literal;
      }
    }
    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.text);
    if (!match) return this.fail(path, 'a JSON value');
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private object(path: string): JSONMap {
    const out: JSONMap = new Map();
    this.pos++;
    this.skipSpace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return out;
    }
    for (;;) {
      this.skipSpace();
      if (this.text[this.pos] !== '"') return this.fail(path, 'a string key');
      const key = this.string(path);
      this.skipSpace();
      if (this.text[this.pos] !== ':') return this.fail(childPath(path, key), "':'");
      this.pos++;
      out.set(key, this.value(childPath(path, key)));
      this.skipSpace();
      const next = this.text[this.pos];
      this.pos++;
      if (next === '}') return out;
      if (next !== ',') {
        this.pos--;
        return this.fail(path, "',' or '}'");
      }
    }
  }

  private array(path: string): JSONValue[] {
    const out: JSONValue[] = [];
    this.pos++;
    this.skipSpace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return out;
    }
    for (;;) {
      out.push(this.value(childPath(path, out.length)));
      this.skipSpace();
      const next = this.text[this.pos];
      this.pos++;
      if (next === ']') return out;
      if (next !== ',') {
        this.pos--;
        return this.fail(path, "',' or ']'");
      }
    }
  }

  private string(path: string): string {
    const start = this.pos;
    let end = start + 1;
    while (end < this.text.length && this.text[end] !== '"') {
      end += this.text[end] === '\\' ? 2 : 1;
    }
    if (end >= this.text.length) {
      this.pos = this.text.length;
      return this.fail(path, 'a closing quote');
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.text.slice(start, end + 1));
    } catch (err) {
      throw new ShapeMismatchError(path, 'a valid string literal', `offset ${start}`, undefined, err);
    }
    if (typeof parsed !== 'string') return this.fail(path, 'a valid string literal');
    this.pos = end + 1;
    return parsed;
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && ' \t\n\r'.includes(this.text[this.pos])) this.pos++;
  }

  private fail(path: string, expected: string): never {
    const actual = this.pos < this.text.length
      ? `${JSON.stringify(this.text[this.pos])} at offset ${this.pos}`
      : 'end of input';
    throw new ShapeMismatchError(path, expected, actual);
  }
}

/**
 * Parse JSON text, keeping object key order: every object comes back as
 * a `Map`. Syntax errors are `ShapeMismatchError`s naming the JSON path.
 */
export function readJson(text: string): JSONValue {
  return new JsonReader(text).document();
}

// --- Writing ---

function writeValue(value: JSONValue, indent: string, current: string): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value);

  const inner = current + indent;
  const open = indent ? `\n${inner}` : '';
  const close = indent ? `\n${current}` : '';
  const separator = indent ? `,\n${inner}` : ',';

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    return `[${open}${value.map(item => writeValue(item, indent, inner)).join(separator)}${close}]`;
  }
  const entries = jsonEntries(value);
  if (entries.length === 0) return '{}';
  const colon = indent ? ': ' : ':';
  const parts = entries.map(([k, v]) => `${JSON.stringify(k)}${colon}${writeValue(v, indent, inner)}`);
  return `{${open}${parts.join(separator)}${close}}`;
}

/** Serialize like `JSON.stringify(value, null, indent)`, writing keys in entry order. */
export function writeJson(value: JSONValue, indent = 0): string {
  return writeValue(value, ' '.repeat(Math.min(10, Math.max(0, indent))), '');
}
