import { describe, it, expect } from 'vitest';
import { callHead, parseSource } from '../../../src/layers/L0-syntax-tree';
import {
  ARITHMETIC_OPERATORS,
  CONDITIONAL_OPERATORS,
  RELATIONAL_OPERATORS,
  defineOperator,
} from '../../../src/layers/L1-operator-catalog';
import { scanForms, scanSource, siteId } from '../../../src/layers/L3-site-scanner';
import { ERROR_CODES } from '../../../src/shared/types';

const TEXT = `(ns calc)

(defn clamp [x lo]
  (if (< x lo)
    lo
    (+ x 1)))
`;

const F = 'src/calc.clj::defn clamp';
const OPERATORS = [
  ...ARITHMETIC_OPERATORS,
  ...RELATIONAL_OPERATORS.filter((op) => op.family === 'relational:lt'),
  ...CONDITIONAL_OPERATORS,
];

describe('scanSource', () => {
  const source = parseSource('src/calc.clj', TEXT);

  it('emits sites in tree order, then operator order', () => {
    const { sites } = scanSource(source, OPERATORS);
    expect(sites.map((s) => s.id)).toEqual([
      `${F}@3:conditional/if-to-if-not`,
      `${F}@3:conditional/swap-branches`,
      `${F}@3/1:relational/lt-to-le`,
      `${F}@3/1:relational/lt-to-gt`,
      `${F}@3/1:relational/lt-to-ge`,
      `${F}@3/1:relational/lt-to-eq`,
      `${F}@3/1:relational/lt-to-ne`,
      `${F}@3/1:relational/lt-to-true`,
      `${F}@3/1:relational/lt-to-false`,
      `${F}@3/3:arithmetic/plus-to-minus`,
    ]);
    expect(sites.map((s) => s.scan_order)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('records lines, texts and the source snapshot', () => {
    const { sites } = scanSource(source, OPERATORS);
    const swap = sites[1];
    expect(swap).toMatchObject({
      file: 'src/calc.clj',
      form_id: F,
      form_line: 3,
      line: 4,
      coordinate: [3],
      category: 'conditional',
      original: '(if (< x lo)\n    lo\n    (+ x 1))',
      replacement: '(if (< x lo)\n    (+ x 1)\n    lo)',
      snapshot: source.snapshot,
    });
    expect(sites[9]).toMatchObject({ line: 6, original: '(+ x 1)', replacement: '(- x 1)', hardness: 5 });
  });

  it('numbers sites from the given start', () => {
    const { sites } = scanSource(source, ARITHMETIC_OPERATORS, 5);
    expect(sites.map((s) => s.scan_order)).toEqual([5]);
  });

  it('is deterministic', () => {
    expect(scanSource(source, OPERATORS)).toEqual(scanSource(source, OPERATORS));
  });

  it('ignores quoted data', () => {
    const quoted = parseSource('src/t.clj', "(def table '(+ 1 2))\n");
    expect(scanSource(quoted, ARITHMETIC_OPERATORS).sites).toEqual([]);
  });

  it('scans only the requested forms', () => {
    const ns = source.forms.filter((f) => f.id === 'src/calc.clj::ns calc');
    expect(scanForms(source, ns, OPERATORS).sites).toEqual([]);
  });

  it('records a failing generator without dropping the other sites', () => {
    const boom = defineOperator({
      id: 'test/boom',
      category: 'arithmetic',
      family: 'test:boom',
      description: 'always fails',
      hardness: 1,
      match: (ctx) => (ctx.node.kind === 'ordered' && callHead(ctx.node) === 'if' ? ctx.node : undefined),
      generate: () => {
        throw new Error('generator exploded');
      },
    });
    const { sites, failures } = scanSource(source, [boom, ...ARITHMETIC_OPERATORS]);
    const id = siteId(F, '3', 'test/boom');
    expect(failures).toHaveLength(1);
    expect(failures[0].site.id).toBe(id);
    expect(failures[0].error.code).toBe(ERROR_CODES.MUTATION_APPLY_FAILURE);
    expect(failures[0].error.message).toBe(`Replacement generator for test/boom failed at ${id}`);
    expect(sites.map((s) => [s.id, s.scan_order])).toEqual([[`${F}@3/3:arithmetic/plus-to-minus`, 1]]);
  });
});
