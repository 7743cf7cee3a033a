/**
 * JSON codec entry points. The wire-format generation is picked once per
 * call from the context's schema version.
 */

import { V1Codec } from './codec-v1.js';
import { V2Codec } from './codec-v2.js';
import type { SchemaContext } from './context.js';
import { type TypeDescriptor, ref } from './descriptors.js';
import type { JsonCodec } from './json-codec.js';
import type { JSONValue } from './json-value.js';
import type { Value } from './tree.js';

export function codecFor(context: SchemaContext): JsonCodec {
  return context.generation === 'v1' ? new V1Codec(context) : new V2Codec(context);
}

/** Decode a parsed JSON value as `type` (a whole document by default). */
export function decode(json: JSONValue, context: SchemaContext, type: TypeDescriptor = ref('Pandoc')): Value {
  return codecFor(context).decode(json, type);
}

export function encode(value: Value, context: SchemaContext): JSONValue {
  return codecFor(context).encode(value);
}
