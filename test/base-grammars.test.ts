import { describe, it, expect } from 'vitest';
import { BUILTIN_GRAMMAR_VERSIONS, createRegistry, grammarVersionFor } from '../src/base-grammars.js';
import { UnsupportedVersionError } from '../src/errors.js';
import { formatConstructor } from '../src/descriptors.js';

describe('grammarVersionFor', () => {
  it('picks the newest built-in grammar not newer than the version', () => {
    expect(grammarVersionFor([1, 12, 4])).toBe('1.12');
    expect(grammarVersionFor([1, 16])).toBe('1.16');
    expect(grammarVersionFor([1, 17, 5])).toBe('1.17');
    expect(grammarVersionFor([1, 20])).toBe('1.17');
    expect(grammarVersionFor([1, 22, 2, 1])).toBe('1.21');
    expect(grammarVersionFor([1, 23, 1])).toBe('1.23');
  });

  it('rejects unsupported versions', () => {
    expect(() => grammarVersionFor([1, 11])).toThrow(UnsupportedVersionError);
    expect(() => grammarVersionFor([2, 0])).toThrow(UnsupportedVersionError);
  });
});

describe('createRegistry', () => {
  it('loads every built-in grammar', () => {
    for (const version of BUILTIN_GRAMMAR_VERSIONS) {
      const registry = createRegistry(version.split('.').map(Number));
      expect(registry.hasConstructor('Pandoc')).toBe(true);
      expect(registry.hasType('MetaValue')).toBe(true);
    }
  });

  it('tracks the constructors each release adds and removes', () => {
    const v112 = createRegistry([1, 12]);
    const v116 = createRegistry([1, 16]);
    const v117 = createRegistry([1, 17]);
    const v121 = createRegistry([1, 21]);
    const v123 = createRegistry([1, 23]);

    expect(v112.hasConstructor('SoftBreak')).toBe(false);
    expect(v116.hasConstructor('SoftBreak')).toBe(true);
    expect(v116.hasConstructor('LineBlock')).toBe(false);
    expect(v117.hasConstructor('LineBlock')).toBe(true);
    expect(v117.hasConstructor('Underline')).toBe(false);
    expect(v121.hasConstructor('Underline')).toBe(true);
    expect(v121.hasConstructor('Figure')).toBe(false);
    expect(v123.hasConstructor('Figure')).toBe(true);
    expect(v121.hasConstructor('Null')).toBe(true);
    expect(v123.hasConstructor('Null')).toBe(false);
  });

  it('gives Link an Attr from 1.16 on', () => {
    expect(formatConstructor(createRegistry([1, 12]).resolveConstructor('Link'))).toBe('Link [Inline] Target');
    expect(formatConstructor(createRegistry([1, 16]).resolveConstructor('Link'))).toBe('Link Attr [Inline] Target');
  });

  it('switches to the new table model in 1.21', () => {
    expect(formatConstructor(createRegistry([1, 17]).resolveConstructor('Table')))
      .toBe('Table [Inline] [Alignment] [Double] [TableCell] [[TableCell]]');
    const v121 = createRegistry([1, 21]);
    expect(formatConstructor(v121.resolveConstructor('Table')))
      .toBe('Table Attr Caption [ColSpec] TableHead [TableBody] TableFoot');
    expect(formatConstructor(v121.resolveConstructor('Caption'))).toBe('Caption (Maybe ShortCaption) [Block]');
    expect(v121.resolveSum('ColWidth').constructors.map(c => c.name)).toEqual(['ColWidth', 'ColWidthDefault']);
  });

  it('declares Meta as a record newtype', () => {
    const meta = createRegistry([1, 22]).resolveConstructor('Meta');
    expect(formatConstructor(meta)).toBe('Meta { unMeta :: Map Text MetaValue }');
    expect(meta.parent.newtype).toBe(true);
  });
});
