/**
 * Wire format v2 (pandoc-types 1.17 and later).
 *
 *   {"pandoc-api-version": [1, 22], "meta": {}, "blocks": [{"t": "Para", "c": [...]}]}
 *
 * Nullary constructors are `{"t": Name}`, `null` is the empty optional
 * value, and single-constructor types drop their tag unless declared
 * `tagged`. `Pandoc` and `Meta` have shapes of their own, listed in
 * SPECIAL_CASES.
 */

import { type Constructor, type SumType, type TypeDescriptor, isSingleConstructor } from './descriptors.js';
import { ShapeMismatchError } from './errors.js';
import { JsonCodec } from './json-codec.js';
import {
  type JSONMap, type JSONObject, type JSONValue, childPath, describeJson, isJSONObject, jsonGet,
} from './json-value.js';
import { createLogger } from './logger.js';
import { formatVersion } from './schema-version.js';
import { Node, type Value } from './tree.js';

const logger = createLogger('codec');

export const API_VERSION_KEY = 'pandoc-api-version';

interface SpecialCase {
  decode(codec: V2Codec, ctor: Constructor, json: JSONValue, path: string): Node;
  encode(codec: V2Codec, node: Node, path: string): JSONValue;
}

// ---- Exception table ----

const SPECIAL_CASES: ReadonlyMap<string, SpecialCase> = new Map<string, SpecialCase>([
  ['Pandoc', {
    decode(codec, ctor, json, path) {
      if (!isJSONObject(json)) {
        throw new ShapeMismatchError(path, 'a Pandoc document object', describeJson(json), 'Pandoc');
      }
      codec.checkApiVersion(jsonGet(json, API_VERSION_KEY), childPath(path, API_VERSION_KEY));
      const [metaField, blocksField] = ctor.fields;
      const meta = codec.decode(requireKey(json, 'meta', path), metaField.type, childPath(path, 'meta'));
      const blocks = codec.decode(requireKey(json, 'blocks', path), blocksField.type, childPath(path, 'blocks'));
      return new Node('Pandoc', [meta, blocks]);
    },
    encode(codec, node, path) {
      const [meta, blocks] = node.children;
      return {
        [API_VERSION_KEY]: [...codec.context.version],
        meta: codec.encode(meta, childPath(path, 'meta')),
        blocks: codec.encode(blocks, childPath(path, 'blocks')),
      };
    },
  }],
  ['Meta', {
    decode(codec, ctor, json, path) {
      return new Node('Meta', [codec.decode(json, ctor.fields[0].type, path)]);
    },
    encode(codec, node, path) {
      return codec.encode(node.children[0], path);
    },
  }],
]);

function requireKey(json: JSONObject | JSONMap, key: string, path: string): JSONValue {
  const value = jsonGet(json, key);
  if (value === undefined) {
    throw new ShapeMismatchError(childPath(path, key), `a "${key}" entry`, 'nothing', 'Pandoc');
  }
  return value;
}

// ---- Codec ----

export class V2Codec extends JsonCodec {
  readonly generation = 'v2';

  protected erasesTag(type: SumType): boolean {
    return isSingleConstructor(type) && !type.tagged;
  }

  protected payloadOptional(ctor: Constructor): boolean {
    return ctor.fields.length === 0;
  }

  protected writesEmptyPayload(): boolean {
    return false;
  }

  protected decodeOption(json: JSONValue, item: TypeDescriptor, path: string): Value {
    return json === null ? null : this.decode(json, item, path);
  }

  protected encodeEmpty(_path: string): JSONValue {
    return null;
  }

  protected decodeSpecial(ctor: Constructor, json: JSONValue, path: string): Node | undefined {
    return SPECIAL_CASES.get(ctor.name)?.decode(this, ctor, json, path);
  }

  protected encodeSpecial(node: Node, ctor: Constructor, path: string): JSONValue | undefined {
    return SPECIAL_CASES.get(ctor.name)?.encode(this, node, path);
  }

  /**
   * The document's API version must be a list of integers. A major.minor
   * different from the context's is reported, not rejected.
   */
  checkApiVersion(json: JSONValue | undefined, path: string): void {
    if (!Array.isArray(json) || json.length === 0) {
      throw new ShapeMismatchError(path, 'a list of integers', describeJson(json), 'Pandoc');
    }
    const version: number[] = [];
    json.forEach((part, i) => {
      if (typeof part !== 'number' || !Number.isInteger(part)) {
        throw new ShapeMismatchError(childPath(path, i), 'Int', describeJson(part), 'Pandoc');
      }
      version.push(part);
    });
    const ours = this.context.version;
    if (version[0] !== ours[0] || version[1] !== ours[1]) {
      logger.warn(
        `Document API version ${formatVersion(version)} differs from pandoc-types ${this.context.typesVersion}`,
      );
    }
  }
}
