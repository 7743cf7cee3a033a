import { describe, it, expect, vi, afterEach } from 'vitest';
import { createContext } from '../src/context.js';
import { decode, encode } from '../src/codec.js';
import { ref } from '../src/descriptors.js';
import { parseJson, stringifyJson } from '../src/document.js';
import { ShapeMismatchError, UnknownConstructorError } from '../src/errors.js';
import { type JSONValue, writeJson } from '../src/json-value.js';
import { Node, repr, tuple, valueEquals } from '../src/tree.js';
import { TypeRegistry } from '../src/type-registry.js';

const ctx = createContext('1.22');

function parse(text: string): JSONValue {
  return JSON.parse(text);
}

/** decode then encode, compared as compact JSON text (key order included) */
function roundTrip(text: string, type = ref('Pandoc')): string {
  return writeJson(encode(decode(parse(text), ctx, type), ctx));
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe('v2 codec', () => {
  const HELLO = '{"pandoc-api-version":[1,22],"meta":{},"blocks":[{"t":"Para","c":[{"t":"Str","c":"hi"}]}]}';

  it('decodes the document envelope', () => {
    const doc = decode(parse(HELLO), ctx);
    expect(repr(doc)).toBe('Pandoc(Meta({}), [Para([Str("hi")])])');
  });

  it('encodes the document envelope with the context API version', () => {
    const doc = decode(parse(HELLO), ctx);
    expect(writeJson(encode(doc, ctx))).toBe(HELLO);
    expect(encode(doc, createContext('1.22.2.1'))).toMatchObject({ 'pandoc-api-version': [1, 22, 2, 1] });
  });

  it('round-trips a document with every kind of value', () => {
    const text = JSON.stringify({
      'pandoc-api-version': [1, 22],
      meta: { title: { t: 'MetaInlines', c: [{ t: 'Str', c: 'T' }] }, draft: { t: 'MetaBool', c: true } },
      blocks: [
        { t: 'Header', c: [1, ['sec', ['a'], [['k', 'v']]], [{ t: 'Str', c: 'Title' }]] },
        { t: 'Para', c: [{ t: 'Emph', c: [{ t: 'Str', c: 'x' }] }, { t: 'Space' }, { t: 'SoftBreak' }] },
        { t: 'RawBlock', c: ['html', '<hr>'] },
        { t: 'HorizontalRule' },
        { t: 'BulletList', c: [[{ t: 'Plain', c: [{ t: 'Str', c: 'item' }] }], []] },
        { t: 'OrderedList', c: [[1, { t: 'Decimal' }, { t: 'Period' }], [[{ t: 'Plain', c: [] }]]] },
        { t: 'LineBlock', c: [[{ t: 'Str', c: 'line' }], []] },
        { t: 'Para', c: [{ t: 'Link', c: [['', [], []], [{ t: 'Str', c: 'here' }], ['https://example.com', '']] }] },
        {
          t: 'Para',
          c: [{
            t: 'Cite',
            c: [[{
              citationId: 'item1',
              citationPrefix: [],
              citationSuffix: [],
              citationMode: { t: 'NormalCitation' },
              citationNoteNum: 1,
              citationHash: 0,
            }], [{ t: 'Str', c: '[@item1]' }]],
          }],
        },
        { t: 'Null' },
      ],
    });
    expect(roundTrip(text)).toBe(text);
  });

  it('round-trips the table model', () => {
    const attr = ['', [], []];
    const cell = [attr, { t: 'AlignDefault' }, 1, 1, [{ t: 'Plain', c: [{ t: 'Str', c: 'h' }] }]];
    const table = {
      t: 'Table',
      c: [
        attr,
        [null, []],
        [[{ t: 'AlignLeft' }, { t: 'ColWidth', c: 0.5 }], [{ t: 'AlignDefault' }, { t: 'ColWidthDefault' }]],
        [attr, [[attr, [cell]]]],
        [[attr, 0, [], [[attr, [cell]]]]],
        [attr, []],
      ],
    };
    const text = JSON.stringify(table);
    expect(roundTrip(text, ref('Block'))).toBe(text);

    const decoded = decode(parse(text), ctx, ref('Block'));
    expect(decoded instanceof Node && repr(decoded.children[1])).toBe('Caption(null, [])');
  });

  it('decodes short captions', () => {
    const caption = decode(parse('[[{"t":"Str","c":"s"}],[]]'), ctx, ref('Caption'));
    expect(repr(caption)).toBe('Caption([Str("s")], [])');
  });

  it('erases the tag of single-constructor types', () => {
    const raw = decode(parse('{"t":"RawInline","c":["tex","\\\\x"]}'), ctx, ref('Inline'));
    expect(repr(raw)).toBe('RawInline(Format("tex"), "\\\\x")');
    expect(encode(new Node('Format', ['html']), ctx)).toBe('html');
  });

  it('omits "c" for nullary constructors', () => {
    expect(encode(new Node('Space', []), ctx)).toEqual({ t: 'Space' });
    expect(repr(decode(parse('{"t":"Space"}'), ctx, ref('Inline')))).toBe('Space()');
  });

  it('requires "c" for constructors with fields', () => {
    expect(() => decode(parse('{"t":"Str"}'), ctx, ref('Inline')))
      .toThrow('Expected a "c" payload at $.c, got nothing');
  });

  it('keeps the tag of types declared tagged', () => {
    const registry = new TypeRegistry().loadGrammar('tagged data Wrap\n  Wrap Int');
    const tagged = createContext('1.22', { registry });
    expect(encode(new Node('Wrap', [3]), tagged)).toEqual({ t: 'Wrap', c: 3 });
    expect(repr(decode({ t: 'Wrap', c: 3 }, tagged, ref('Wrap')))).toBe('Wrap(3)');
  });

  it('maps null to the empty optional value', () => {
    const registry = new TypeRegistry().loadGrammar('data Cap\n  Cap (Maybe Text)');
    const local = createContext('1.22', { registry });
    expect(decode(null, local, ref('Cap'))).toEqual(new Node('Cap', [null]));
    expect(encode(new Node('Cap', [null]), local)).toBeNull();
    expect(encode(new Node('Cap', ['x']), local)).toBe('x');
  });

  it('keeps metadata key order', () => {
    const text = '{"pandoc-api-version":[1,22],"meta":{"zeta":{"t":"MetaBool","c":true},"alpha":{"t":"MetaString","c":"x"},"mid":{"t":"MetaMap","c":{"b":{"t":"MetaList","c":[]},"a":{"t":"MetaBool","c":false}}}},"blocks":[]}';
    const doc = decode(parse(text), ctx);
    const meta = doc instanceof Node ? doc.children[0] : null;
    const entries = meta instanceof Node ? meta.children[0] : null;
    expect(entries instanceof Map && [...entries.keys()]).toEqual(['zeta', 'alpha', 'mid']);
    expect(writeJson(encode(doc, ctx))).toBe(text);
  });

  it('decode(encode(v)) gives back an equal tree', () => {
    const Str = (s: string) => new Node('Str', [s]);
    const doc = new Node('Pandoc', [
      new Node('Meta', [new Map([['author', new Node('MetaString', ['me'])]])]),
      [
        new Node('Header', [2, tuple('', ['x'], []), [Str('H')]]),
        new Node('CodeBlock', [tuple('', [], [tuple('k', 'v')]), 'code']),
        new Node('Para', [[new Node('Quoted', [new Node('DoubleQuote', []), [Str('q')]])]]),
      ],
    ]);
    expect(valueEquals(decode(encode(doc, ctx), ctx), doc)).toBe(true);
  });

  it('keeps integer-like metadata keys in insertion order', () => {
    const doc = new Node('Pandoc', [
      new Node('Meta', [new Map([['b', new Node('MetaBool', [true])], ['1', new Node('MetaBool', [false])]])]),
      [],
    ]);
    const text = stringifyJson(doc, ctx);
    expect(text).toBe(
      '{"pandoc-api-version":[1,22],"meta":{"b":{"t":"MetaBool","c":true},"1":{"t":"MetaBool","c":false}},"blocks":[]}',
    );
    expect(valueEquals(decode(encode(doc, ctx), ctx), doc)).toBe(true);
    expect(valueEquals(parseJson(text, ctx), doc)).toBe(true);
  });

  it('keeps a "__proto__" metadata key', () => {
    const text = '{"pandoc-api-version":[1,22],"meta":{"__proto__":{"t":"MetaString","c":"x"}},"blocks":[]}';
    expect(writeJson(encode(decode(parse(text), ctx), ctx))).toBe(text);
    expect(stringifyJson(parseJson(text, ctx), ctx)).toBe(text);
  });

  describe('errors', () => {
    it('reports the JSON path of a list payload of the wrong shape', () => {
      const text = '{"pandoc-api-version":[1,22],"meta":{},"blocks":[{"t":"Para","c":{"t":"Str","c":"x"}}]}';
      expect(() => decode(parse(text), ctx)).toThrow('Expected [Inline] at $.blocks[0].c, got object');
    });

    it('reports unknown constructors with their path', () => {
      const text = '{"pandoc-api-version":[1,22],"meta":{},"blocks":[{"t":"Para","c":[{"t":"Bogus"}]}]}';
      expect(() => decode(parse(text), ctx)).toThrow(UnknownConstructorError);
      expect(() => decode(parse(text), ctx)).toThrow("Unknown constructor 'Bogus' at $.blocks[0].c[0].t");
    });

    it('rejects a constructor of another type', () => {
      expect(() => decode(parse('{"t":"Para","c":[]}'), ctx, ref('Inline')))
        .toThrow("Expected a constructor of Inline at $.t, got 'Para' of Block");
    });

    it('checks Int fields', () => {
      expect(() => decode(parse('{"t":"Header","c":[1.5,["",[],[]],[]]}'), ctx, ref('Block')))
        .toThrow('Expected Int at $.c[0], got number');
    });

    it('checks tuple arity', () => {
      expect(() => decode(parse('{"t":"Code","c":[["",[]],"x"]}'), ctx, ref('Inline')))
        .toThrow('Expected Attr at $.c[0], got array of length 2');
    });

    it('reports missing record fields', () => {
      const text = '{"citationId":"a","citationPrefix":[],"citationSuffix":[],"citationMode":{"t":"AuthorInText"},"citationNoteNum":0}';
      expect(() => decode(parse(text), ctx, ref('Citation'))).toThrow('Expected Int at $.citationHash, got nothing');
    });

    it('rejects a v1 document', () => {
      const text = '[{"unMeta":{}},[{"t":"Para","c":[{"t":"Str","c":"hi"}]}]]';
      expect(() => decode(parse(text), ctx)).toThrow('Expected a Pandoc document object at $, got array of length 2');
    });

    it('requires every envelope entry', () => {
      expect(() => decode(parse('{"pandoc-api-version":[1,22],"meta":{}}'), ctx))
        .toThrow('Expected a "blocks" entry at $.blocks, got nothing');
      expect(() => decode(parse('{"pandoc-api-version":"1.22","meta":{},"blocks":[]}'), ctx))
        .toThrow('Expected a list of integers at $["pandoc-api-version"], got string');
    });

    it('rejects nodes it cannot encode', () => {
      expect(() => encode(new Node('Bogus', []), ctx)).toThrow("Unknown constructor 'Bogus' at $");
      expect(() => encode(new Node('Str', []), ctx)).toThrow('Expected 1 argument(s) of Str at $, got 0');
      expect(() => encode(Number.NaN, ctx)).toThrow(ShapeMismatchError);
    });
  });

  describe('API version', () => {
    it('warns when the document major.minor differs', () => {
      vi.stubEnv('LOG_LEVEL', 'WARNING');
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      decode(parse('{"pandoc-api-version":[1,21,1],"meta":{},"blocks":[]}'), ctx);
      expect(warn).toHaveBeenCalledWith('[codec]', 'Document API version 1.21.1 differs from pandoc-types 1.22');
    });

    it('accepts a different patch level silently', () => {
      vi.stubEnv('LOG_LEVEL', 'WARNING');
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      decode(parse('{"pandoc-api-version":[1,22,2,1],"meta":{},"blocks":[]}'), ctx);
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
