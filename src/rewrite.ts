/**
 * Bottom-up tree rewriting.
 *
 * Every value is rebuilt from its rewritten children, then handed to the
 * transform. A transform returning undefined keeps the rebuilt value;
 * anything else replaces it. Input trees are never modified.
 *
 *   const strongly = rewriter(v => v instanceof Node && v.tag === 'Emph' ? new Node('Strong', v.children) : undefined);
 */

import { ShapeMismatchError, describeValue } from './errors.js';
import { type Mapping, Node, Tuple, type Value } from './tree.js';

export type Transform = (value: Value) => Value | undefined;

export function rewrite(transform: Transform, root: Value): Value {
  const rebuilt = rebuild(transform, root);
  const replaced = transform(rebuilt);
  return replaced === undefined ? rebuilt : replaced;
}

/** Curried form: `rewriter(f)(root)`. */
export function rewriter(transform: Transform): (root: Value) => Value {
  return root => rewrite(transform, root);
}

function rebuild(transform: Transform, value: Value): Value {
  if (value instanceof Node) return value.withChildren(value.children.map(c => rewrite(transform, c)));
  if (value instanceof Tuple) return new Tuple(value.items.map(c => rewrite(transform, c)));
  if (value instanceof Map) return rebuildMapping(transform, value);
  if (Array.isArray(value)) return value.map(c => rewrite(transform, c));
  return value;
}

// Entries go through the transform as (key, value) tuples and must come back as such.
function rebuildMapping(transform: Transform, value: Mapping): Mapping {
  const result: Mapping = new Map();
  for (const [k, v] of value) {
    const entry = rewrite(transform, new Tuple([k, v]));
    const path = `mapping[${JSON.stringify(k)}]`;
    if (!(entry instanceof Tuple) || entry.length !== 2) {
      throw new ShapeMismatchError(path, 'a (key, value) pair', describeValue(entry));
    }
    const [key, item] = entry.items;
    if (typeof key !== 'string') {
      throw new ShapeMismatchError(path, 'a text key', describeValue(key));
    }
    result.set(key, item);
  }
  return result;
}
