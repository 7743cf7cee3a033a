/**
 * JsonCodec — descriptor-driven decode and value-driven encode shared by
 * both wire-format generations.
 *
 * Subclasses decide the points where the generations differ: tag
 * erasure, optional values, the "c" payload of nullary constructors and
 * per-constructor exceptions.
 */

import type { CodecGeneration } from './schema-version.js';
import type { SchemaContext } from './context.js';
import { type Constructor, type SumType, type TypeDescriptor, formatType } from './descriptors.js';
import { ShapeMismatchError, describeValue } from './errors.js';
import {
  type JSONMap, type JSONValue, childPath, describeJson, isJSONObject, isJSONScalar, jsonEntries, jsonGet,
} from './json-value.js';
import { Node, Tuple, type Mapping, type Value } from './tree.js';
import { type TypeRegistry, matchesPrimitive } from './type-registry.js';

export abstract class JsonCodec {
  abstract readonly generation: CodecGeneration;
  protected readonly registry: TypeRegistry;

  constructor(readonly context: SchemaContext) {
    this.registry = context.registry;
  }

  // --- Generation hooks ---

  /** Is the "t" tag left out for values of `type`? */
  protected abstract erasesTag(type: SumType): boolean;

  /** May a tagged value of `ctor` come without "c"? */
  protected abstract payloadOptional(ctor: Constructor): boolean;

  /** Does a tagged nullary value carry `"c": []`? */
  protected abstract writesEmptyPayload(): boolean;

  protected abstract decodeOption(json: JSONValue, item: TypeDescriptor, path: string): Value;

  protected abstract encodeEmpty(path: string): JSONValue;

  /** A constructor with its own wire shape, decoded outside the generic rule. */
  protected decodeSpecial(_ctor: Constructor, _json: JSONValue, _path: string): Node | undefined {
    return undefined;
  }

  protected encodeSpecial(_node: Node, _ctor: Constructor, _path: string): JSONValue | undefined {
    return undefined;
  }

  // --- Decode ---

  decode(json: JSONValue, type: TypeDescriptor, path = '$'): Value {
    const target = this.registry.unalias(type);
    const fail = (): never => {
      throw new ShapeMismatchError(path, formatType(type), describeJson(json));
    };

    if (target.kind === 'sum') return this.decodeSum(json, target, path);

    switch (target.kind) {
      case 'primitive':
        if (!isJSONScalar(json) || !matchesPrimitive(json, target.name)) return fail();
        return json;
      case 'list':
        if (!Array.isArray(json)) return fail();
        return json.map((item, i) => this.decode(item, target.item, childPath(path, i)));
      case 'tuple':
        if (!Array.isArray(json) || json.length !== target.items.length) return fail();
        return new Tuple(json.map((item, i) => this.decode(item, target.items[i], childPath(path, i))));
      case 'map': {
        if (!isJSONObject(json)) return fail();
        const result: Mapping = new Map();
        for (const [k, v] of jsonEntries(json)) {
          const key = this.decode(k, target.key, childPath(path, k));
          if (typeof key !== 'string') {
            throw new ShapeMismatchError(childPath(path, k), 'a text key', describeValue(key));
          }
          result.set(key, this.decode(v, target.value, childPath(path, k)));
        }
        return result;
      }
      case 'option':
        return this.decodeOption(json, target.item, path);
    }
  }

  private decodeSum(json: JSONValue, type: SumType, path: string): Node {
    if (this.erasesTag(type)) {
      const ctor = type.constructors[0];
      return this.decodeSpecial(ctor, json, path) ?? this.decodeConstructor(ctor, json, false, path);
    }

    if (!isJSONObject(json)) {
      throw new ShapeMismatchError(path, `a tagged ${type.name}`, describeJson(json), type.name);
    }
    const tagPath = childPath(path, 't');
    const tag = jsonGet(json, 't');
    if (typeof tag !== 'string') {
      throw new ShapeMismatchError(tagPath, 'a constructor name', describeJson(tag), type.name);
    }
    const ctor = this.registry.resolveConstructor(tag, tagPath);
    if (ctor.parent !== type) {
      throw new ShapeMismatchError(tagPath, `a constructor of ${type.name}`, `'${tag}' of ${ctor.parent.name}`, tag);
    }
    return this.decodeSpecial(ctor, json, path) ?? this.decodeConstructor(ctor, json, true, path);
  }

  private decodeConstructor(ctor: Constructor, json: JSONValue, tagged: boolean, path: string): Node {
    if (ctor.shape === 'record') return this.decodeRecord(ctor, json, path);

    let payload: JSONValue | undefined = json;
    let payloadPath = path;
    if (tagged && isJSONObject(json)) {
      payloadPath = childPath(path, 'c');
      payload = jsonGet(json, 'c');
      if (payload === undefined) {
        if (!this.payloadOptional(ctor)) {
          throw new ShapeMismatchError(payloadPath, 'a "c" payload', 'nothing', ctor.name);
        }
        return new Node(ctor.name, []);
      }
    }

    if (ctor.listArg) {
      const field = ctor.fields[0];
      if (!Array.isArray(payload)) {
        throw new ShapeMismatchError(payloadPath, formatType(field.type), describeJson(payload), ctor.name);
      }
      return new Node(ctor.name, [this.decode(payload, field.type, payloadPath)]);
    }
    if (ctor.fields.length === 1) {
      return new Node(ctor.name, [this.decode(payload, ctor.fields[0].type, payloadPath)]);
    }
    if (!Array.isArray(payload) || payload.length !== ctor.fields.length) {
      throw new ShapeMismatchError(
        payloadPath, `${ctor.fields.length} argument(s) of ${ctor.name}`, describeJson(payload), ctor.name,
      );
    }
    const args = payload;
    return new Node(ctor.name, ctor.fields.map((f, i) => this.decode(args[i], f.type, childPath(payloadPath, i))));
  }

  private decodeRecord(ctor: Constructor, json: JSONValue, path: string): Node {
    if (!isJSONObject(json)) {
      throw new ShapeMismatchError(path, `a ${ctor.name} record`, describeJson(json), ctor.name);
    }
    const args = ctor.fields.map(field => {
      const key = field.name ?? '';
      const fieldPath = childPath(path, key);
      const entry = jsonGet(json, key);
      if (entry === undefined) {
        throw new ShapeMismatchError(fieldPath, formatType(field.type), 'nothing', ctor.name);
      }
      return this.decode(entry, field.type, fieldPath);
    });
    return new Node(ctor.name, args);
  }

  // --- Encode ---

  encode(value: Value, path = '$'): JSONValue {
    if (value === null) return this.encodeEmpty(path);
    if (value instanceof Node) return this.encodeNode(value, path);
    if (value instanceof Tuple) return value.items.map((item, i) => this.encode(item, childPath(path, i)));
    // Mappings stay Maps: any key, in insertion order.
    if (value instanceof Map) {
      const out: JSONMap = new Map();
      for (const [k, v] of value) out.set(k, this.encode(v, childPath(path, k)));
      return out;
    }
    if (Array.isArray(value)) return value.map((item, i) => this.encode(item, childPath(path, i)));
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new ShapeMismatchError(path, 'a finite number', String(value));
    }
    return value;
  }

  private encodeNode(node: Node, path: string): JSONValue {
    const ctor = this.registry.resolveConstructor(node.tag, path);
    if (node.arity !== ctor.fields.length) {
      throw new ShapeMismatchError(path, `${ctor.fields.length} argument(s) of ${ctor.name}`, `${node.arity}`, ctor.name);
    }
    const special = this.encodeSpecial(node, ctor, path);
    if (special !== undefined) return special;

    const erased = this.erasesTag(ctor.parent);
    if (ctor.shape === 'record') {
      const entries: [string, JSONValue][] = erased ? [] : [['t', ctor.name]];
      ctor.fields.forEach((field, i) => {
        const key = field.name ?? '';
        entries.push([key, this.encode(node.children[i], childPath(path, key))]);
      });
      return Object.fromEntries(entries);
    }

    const payloadPath = erased ? path : childPath(path, 'c');
    const single = ctor.fields.length === 1;
    const args = node.children.map((child, i) => this.encode(child, single ? payloadPath : childPath(payloadPath, i)));
    const payload: JSONValue = single ? args[0] : args;
    if (erased) return payload;

    return ctor.fields.length > 0 || this.writesEmptyPayload() ? { t: ctor.name, c: payload } : { t: ctor.name };
  }
}
