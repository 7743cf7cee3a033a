/**
 * Tree values — the runtime form of a decoded document.
 *
 * A value is one of a closed set of kinds: scalars (text, numbers,
 * booleans), the empty optional value (null), sequences (arrays),
 * tuples, string-keyed mappings that keep insertion order, and tagged
 * nodes. A node is a constructor tag plus a fixed-arity list of
 * children; it refers to its constructor by name only.
 */

export type Scalar = string | number | boolean;

export type Value = Scalar | null | Node | Tuple | Value[] | Mapping;

export type Mapping = Map<string, Value>;

export type ValueKind = 'scalar' | 'empty' | 'sequence' | 'tuple' | 'mapping' | 'node';

export class Node {
  constructor(
    readonly tag: string,
    readonly children: readonly Value[],
  ) {}

  get arity(): number {
    return this.children.length;
  }

  /** A node with the same tag and new children. */
  withChildren(children: readonly Value[]): Node {
    return new Node(this.tag, children);
  }

  toString(): string {
    return repr(this);
  }
}

export class Tuple {
  constructor(readonly items: readonly Value[]) {}

  get length(): number {
    return this.items.length;
  }

  toString(): string {
    return repr(this);
  }
}

// --- Creation ---

export function tuple(...items: Value[]): Tuple {
  return new Tuple(items);
}

/** Build a mapping from [key, value] entries, keeping their order. */
export function mapping(entries: Iterable<readonly [string, Value]> = []): Mapping {
  const m: Mapping = new Map();
  for (const [k, v] of entries) m.set(k, v);
  return m;
}

// --- Kinds ---

export function kindOf(value: Value): ValueKind {
  if (value === null) return 'empty';
  if (value instanceof Node) return 'node';
  if (value instanceof Tuple) return 'tuple';
  if (value instanceof Map) return 'mapping';
  if (Array.isArray(value)) return 'sequence';
  return 'scalar';
}

// --- Navigation ---

/**
 * Direct children of a value. Mapping entries come back as
 * (key, value) tuples, built fresh on every call.
 */
export function childrenOf(value: Value): readonly Value[] {
  if (value instanceof Node) return value.children;
  if (value instanceof Tuple) return value.items;
  if (value instanceof Map) return Array.from(value, ([k, v]) => new Tuple([k, v]));
  if (Array.isArray(value)) return value;
  return [];
}

/** The constructor arguments of a node, in declaration order. */
export function children(node: Node): readonly Value[] {
  return node.children;
}

/**
 * Pre-order iteration of a subtree: the value itself, then the subtree
 * of each child. Text is a leaf.
 */
export function* treeIter(value: Value): Generator<Value> {
  yield value;
  for (const child of childrenOf(value)) {
    yield* treeIter(child);
  }
}

// --- Comparison ---

/** Structural equality. */
export function valueEquals(a: Value, b: Value): boolean {
  if (a instanceof Node) {
    return b instanceof Node && a.tag === b.tag && sequenceEquals(a.children, b.children);
  }
  if (a instanceof Tuple) return b instanceof Tuple && sequenceEquals(a.items, b.items);
  if (a instanceof Map) return b instanceof Map && sequenceEquals(childrenOf(a), childrenOf(b));
  if (Array.isArray(a)) return Array.isArray(b) && sequenceEquals(a, b);
  return Object.is(a, b);
}

function sequenceEquals(a: readonly Value[], b: readonly Value[]): boolean {
  return a.length === b.length && a.every((v, i) => valueEquals(v, b[i]));
}

// --- Serialization ---

/** Constructor-call rendering: `Para([Str("hi")])`. */
export function repr(value: Value): string {
  if (value === null) return 'null';
  if (value instanceof Node) return `${value.tag}(${value.children.map(repr).join(', ')})`;
  if (value instanceof Tuple) return `(${value.items.map(repr).join(', ')})`;
  if (value instanceof Map) {
    const parts = Array.from(value, ([k, v]) => `${JSON.stringify(k)}: ${repr(v)}`);
    return `{${parts.join(', ')}}`;
  }
  if (Array.isArray(value)) return `[${value.map(repr).join(', ')}]`;
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}
