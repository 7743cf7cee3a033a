/**
 * Wire format v1 (pandoc-types 1.12 up to 1.17).
 *
 *   [{"unMeta": {...}}, [{"t": "Para", "c": [{"t": "Str", "c": "hi"}]}]]
 *
 * Single-constructor types are always their bare payload and every
 * tagged value carries "c", even when empty. The document needs no
 * special case: `Pandoc Meta [Block]` is a two-field erased constructor.
 */

import { type Constructor, type SumType, type TypeDescriptor, isSingleConstructor } from './descriptors.js';
import { UnsupportedVersionError } from './errors.js';
import { JsonCodec } from './json-codec.js';
import type { JSONValue } from './json-value.js';
import type { Value } from './tree.js';

export class V1Codec extends JsonCodec {
  readonly generation = 'v1';

  protected erasesTag(type: SumType): boolean {
    return isSingleConstructor(type);
  }

  protected payloadOptional(_ctor: Constructor): boolean {
    return false;
  }

  protected writesEmptyPayload(): boolean {
    return true;
  }

  protected decodeOption(_json: JSONValue, _item: TypeDescriptor, path: string): Value {
    throw new UnsupportedVersionError(this.context.typesVersion, `optional values (at ${path}) need 1.17 or newer`);
  }

  protected encodeEmpty(path: string): JSONValue {
    throw new UnsupportedVersionError(this.context.typesVersion, `empty optional values (at ${path}) need 1.17 or newer`);
  }
}
