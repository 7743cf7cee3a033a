/**
 * Document helpers — whole-document construction and JSON text in/out.
 */

import { decode, encode } from './codec.js';
import type { SchemaContext } from './context.js';
import { type TypeDescriptor, ref } from './descriptors.js';
import { ShapeMismatchError, describeValue } from './errors.js';
import { readJson, writeJson } from './json-value.js';
import { Node, type Value } from './tree.js';

/**
 * Wrap content into a `Pandoc` node with empty metadata. Accepts a
 * document, a block, a list of blocks, an inline or a list of inlines
 * (wrapped in a single `Plain`). An empty list is a document without
 * blocks.
 */
export function makeDocument(content: Value, context: SchemaContext): Node {
  const { registry } = context;
  if (content instanceof Node && registry.isA(content, 'Pandoc')) return content;

  let blocks: Value[] | undefined;
  if (registry.isA(content, 'Block')) {
    blocks = [content];
  } else if (registry.isA(content, 'Inline')) {
    blocks = [registry.construct('Plain', [[content]])];
  } else if (Array.isArray(content)) {
    if (content.every(item => registry.isA(item, 'Block'))) {
      blocks = content;
    } else if (content.every(item => registry.isA(item, 'Inline'))) {
      blocks = [registry.construct('Plain', [content])];
    }
  }

  if (blocks === undefined) {
    throw new ShapeMismatchError('$', 'a Pandoc document, block(s) or inline(s)', describeValue(content));
  }
  return registry.construct('Pandoc', [registry.construct('Meta', [new Map()]), blocks]);
}

/**
 * Decode JSON text; a whole document unless `type` says otherwise.
 * Metadata keeps the key order of the text.
 */
export function parseJson(text: string, context: SchemaContext, type: TypeDescriptor = ref('Pandoc')): Value {
  return decode(readJson(text), context, type);
}

export function stringifyJson(value: Value, context: SchemaContext, indent?: number): string {
  return writeJson(encode(value, context), indent);
}
