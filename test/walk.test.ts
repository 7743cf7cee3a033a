import { describe, it, expect } from 'vitest';
import { Node, mapping, repr, type Value } from '../src/tree.js';
import { ancestorOf, getByPath, iterate, iterateWithPath, pathIndices, type Path } from '../src/walk.js';

const Str = (text: string) => new Node('Str', [text]);

describe('walk', () => {
  const a = Str('a');
  const b = Str('b');
  const para = new Node('Para', [[a, b]]);
  const doc = new Node('Pandoc', [new Node('Meta', [mapping()]), [para]]);

  describe('iterateWithPath', () => {
    it('yields each value with the child indices leading to it', () => {
      const seen = [...iterateWithPath(para)].map(([value, path]) => [repr(value), pathIndices(path)]);
      expect(seen).toEqual([
        ['Para([Str("a"), Str("b")])', []],
        ['[Str("a"), Str("b")]', [0]],
        ['Str("a")', [0, 0]],
        ['"a"', [0, 0, 0]],
        ['Str("b")', [0, 1]],
        ['"b"', [0, 1, 0]],
      ]);
    });

    it('records the parent of every step', () => {
      const entry = [...iterateWithPath(para)].find(([value]) => value === b);
      const path: Path = entry ? entry[1] : [];
      expect(path.map(([parent]) => parent)).toEqual([para, para.children[0]]);
    });
  });

  describe('iterate', () => {
    it('runs enter and exit hooks around each subtree', () => {
      const events: string[] = [];
      const label = (v: Value) => (v instanceof Node ? v.tag : repr(v));
      const values = [...iterate(new Node('Emph', [[a]]), {
        enter: v => { events.push(`enter ${label(v)}`); },
        exit: v => { events.push(`exit ${label(v)}`); },
      })];
      expect(values).toHaveLength(4);
      expect(events).toEqual([
        'enter Emph', 'enter [Str("a")]', 'enter Str', 'enter "a"',
        'exit "a"', 'exit Str', 'exit [Str("a")]', 'exit Emph',
      ]);
    });

    it('passes the path to hooks', () => {
      const depths: number[] = [];
      for (const value of iterate(para, { enter: (_v: Value, path: Path) => { depths.push(path.length); } })) {
        expect(value).toBeDefined();
      }
      expect(depths).toEqual([0, 1, 2, 3, 2, 3]);
    });
  });

  describe('getByPath', () => {
    it('follows child indices', () => {
      expect(getByPath(doc, [1, 0, 0, 1])).toBe(b);
      expect(getByPath(doc, [])).toBe(doc);
    });

    it('returns undefined outside the tree', () => {
      expect(getByPath(doc, [2])).toBeUndefined();
      expect(getByPath(doc, [1, 0, 0, 1, 0, 0])).toBeUndefined();
    });
  });

  describe('ancestorOf', () => {
    it('finds the direct parent', () => {
      expect(ancestorOf(doc, b)).toBe(para.children[0]);
      expect(ancestorOf(doc, para.children[0])).toBe(para);
    });

    it('tells equal siblings apart', () => {
      const first = Str('a');
      const second = Str('a');
      const twins = new Node('Para', [[first, second]]);
      expect(ancestorOf(twins, second)).toBe(twins.children[0]);
    });

    it('tells equal values under different parents apart', () => {
      const inner = Str('x');
      const strong = new Node('Strong', [[inner]]);
      const root = new Node('Para', [[new Node('Emph', [[Str('x')]]), strong]]);
      expect(ancestorOf(root, inner)).toBe(strong.children[0]);
    });

    it('has no parent for the root or a value outside the tree', () => {
      expect(ancestorOf(doc, doc)).toBeUndefined();
      expect(ancestorOf(doc, Str('a'))).toBeUndefined();
    });
  });
});
