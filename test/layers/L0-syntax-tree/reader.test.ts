import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { LineIndex, parse, render } from '../../../src/layers/L0-syntax-tree';
import { ERROR_CODES } from '../../../src/shared/types';

const atom = fc.constantFrom('a', 'foo?', '+', '<=', '1', '-42', ':k', '"s"', '"a\\"b"', 'nil', '\\c', '#"x+"');
const sep = fc.constantFrom(' ', '\n', ', ', ' ;; note\n', '  ', ' #_ignored ', ' ^:meta ');
const tail = fc.constantFrom('', ' ', '\n');
const delimiters = fc.constantFrom(['(', ')'], ['[', ']'], ['{', '}'], ['#{', '}'], ['#(', ')']);

const { form } = fc.letrec<{ form: string; coll: string; quoted: string }>((tie) => ({
  form: fc.oneof({ depthSize: 'small' }, atom, tie('coll'), tie('quoted')),
  coll: fc
    .tuple(delimiters, fc.array(fc.tuple(sep, tie('form')), { maxLength: 4 }), tail)
    .map(([[open, close], items, trailing]) =>
      open + items.map(([s, f], i) => (i === 0 ? '' : s) + f).join('') + trailing + close,
    ),
  quoted: fc.tuple(fc.constantFrom("'", '`', '~', '@', "#'"), tie('form')).map(([prefix, f]) => prefix + f),
}));

const documentText = fc
  .tuple(fc.array(fc.tuple(sep, form), { maxLength: 5 }), tail)
  .map(([items, trailing]) => items.map(([s, f]) => s + f).join('') + trailing);

describe('parse / render', () => {
  it('reproduces any source byte for byte', () => {
    fc.assert(
      fc.property(documentText, (text) => {
        expect(render(parse(text))).toBe(text);
      }),
      { numRuns: 300 },
    );
  });

  it('keeps comments and commas as leading trivia of the next child', () => {
    const doc = parse('(a, ;; why\n b)');
    const list = doc.items[0].node;
    if (list.kind !== 'ordered') throw new Error('expected a list');
    expect(list.items.map((item) => item.before)).toEqual(['', ', ;; why\n ']);
  });

  it('treats metadata and discarded forms as trivia', () => {
    const doc = parse('(defn ^:private f [x] #_(debug x) x)');
    const list = doc.items[0].node;
    if (list.kind !== 'ordered') throw new Error('expected a list');
    expect(list.items.map((item) => item.node.kind === 'token' ? item.node.text : item.node.kind)).toEqual([
      'defn',
      'f',
      'ordered',
      'x',
    ]);
    expect(list.items[1].before).toBe(' ^:private ');
    expect(list.items[3].before).toBe(' #_(debug x) ');
  });

  it('classifies tokens', () => {
    const doc = parse('sym :kw 12 "str" \\a #"re"');
    expect(doc.items.map((item) => (item.node.kind === 'token' ? item.node.token : item.node.kind))).toEqual([
      'symbol',
      'keyword',
      'number',
      'string',
      'char',
      'regex',
    ]);
  });

  it('reads every quote prefix as a quoted node', () => {
    const doc = parse("'a `b ~c ~@d @e #'f");
    expect(doc.items.map((item) => (item.node.kind === 'quoted' ? item.node.prefix : null))).toEqual([
      "'",
      '`',
      '~',
      '~@',
      '@',
      "#'",
    ]);
  });
});

describe('parse errors', () => {
  it('reports an unterminated list at the line it opened', () => {
    expect(() => parse('\n(defn f [x]\n  (+ x 1)')).toThrow('Unterminated "(" opened here (line 2)');
  });

  it('reports a mismatched delimiter at its own line', () => {
    expect(() => parse('(a\n b]')).toThrow('Mismatched delimiter "]", expected ")" (line 2)');
  });

  it('reports a stray closing delimiter', () => {
    expect(() => parse('(a) )')).toThrow('Unexpected closing delimiter ")" (line 1)');
  });

  it('reports an unterminated string', () => {
    expect(() => parse('(str "abc)')).toThrow('Unterminated string (line 1)');
  });

  it('uses the parse error code', () => {
    expect(() => parse('(')).toThrow(expect.objectContaining({ code: ERROR_CODES.PARSE_ERROR }));
  });
});

describe('LineIndex', () => {
  it('maps offsets to 1-based lines', () => {
    const lines = new LineIndex('ab\ncd\n\nef');
    expect(lines.lineAt(0)).toBe(1);
    expect(lines.lineAt(2)).toBe(1);
    expect(lines.lineAt(3)).toBe(2);
    expect(lines.lineAt(6)).toBe(3);
    expect(lines.lineAt(7)).toBe(4);
  });
});
