/**
 * Tree walks — pre-order iteration with enter/exit hooks, paths from the
 * root, and parent lookup.
 *
 * A path is the list of [parent, childIndex] steps leading from the root
 * to a value; the root's path is empty. Mapping entries are visited as
 * (key, value) tuples, so a path through a mapping names the entry's
 * position, not its key.
 */

import { childrenOf, type Value } from './tree.js';

export type PathStep = readonly [parent: Value, index: number];
export type Path = readonly PathStep[];

export interface WalkHooks {
  /** Called before `value` is yielded. */
  enter?: (value: Value, path: Path) => void;
  /** Called once the subtree of `value` has been iterated. */
  exit?: (value: Value, path: Path) => void;
}

function* walk(value: Value, path: Path, hooks: WalkHooks): Generator<[Value, Path]> {
  hooks.enter?.(value, path);
  yield [value, path];
  const kids = childrenOf(value);
  for (let i = 0; i < kids.length; i++) {
    yield* walk(kids[i], [...path, [value, i]], hooks);
  }
  hooks.exit?.(value, path);
}

/**
 * Pre-order iteration yielding each value with its path. `exit` only
 * runs for subtrees the caller iterates to the end.
 */
export function iterateWithPath(root: Value, hooks: WalkHooks = {}): Generator<[Value, Path]> {
  return walk(root, [], hooks);
}

export function* iterate(root: Value, hooks: WalkHooks = {}): Generator<Value> {
  for (const [value] of walk(root, [], hooks)) yield value;
}

export function pathIndices(path: Path): number[] {
  return path.map(([, index]) => index);
}

/** Follow child indices from `root`; undefined when a step falls outside the tree. */
export function getByPath(root: Value, indices: readonly number[]): Value | undefined {
  let current: Value = root;
  for (const index of indices) {
    const kids = childrenOf(current);
    if (index < 0 || index >= kids.length) return undefined;
    current = kids[index];
  }
  return current;
}

/**
 * Parent of the first value in pre-order that is `target` (by
 * Object.is). Undefined for the root itself or when `target` is absent.
 */
export function ancestorOf(root: Value, target: Value): Value | undefined {
  const stack: Value[] = [];
  const hooks: WalkHooks = {
    enter: value => { stack.push(value); },
    exit: () => { stack.pop(); },
  };
  for (const value of iterate(root, hooks)) {
    if (Object.is(value, target)) return stack.length > 1 ? stack[stack.length - 2] : undefined;
  }
  return undefined;
}
