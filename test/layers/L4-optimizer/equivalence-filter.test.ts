import { describe, it, expect } from 'vitest';
import { parseSource, type Form } from '../../../src/layers/L0-syntax-tree';
import {
  ARITHMETIC_OPERATORS,
  CONDITIONAL_OPERATORS,
  RELATIONAL_OPERATORS,
  getOperator,
} from '../../../src/layers/L1-operator-catalog';
import { scanSource } from '../../../src/layers/L3-site-scanner';
import { buildDominanceGraph, contextAt, filterEquivalent, reduceSites } from '../../../src/layers/L4-optimizer';

const TEXT = '(defn f [x]\n  (+ (* x 1) (- x 0) (< x x)))\n';
const OPERATORS = [...ARITHMETIC_OPERATORS, ...RELATIONAL_OPERATORS.filter((op) => op.family === 'relational:lt')];

function prepare(text: string, operators = OPERATORS) {
  const source = parseSource('src/f.clj', text);
  const forms = new Map<string, Form>(source.forms.map((form) => [form.id, form]));
  return { sites: scanSource(source, operators).sites, forms };
}

describe('filterEquivalent', () => {
  it('excludes sites whose equivalence rule holds in context', () => {
    const { sites, forms } = prepare(TEXT);
    const { kept, equivalent } = filterEquivalent(sites, forms, getOperator);

    expect(equivalent.map((e) => [e.site.operator_id, e.reason])).toEqual([
      ['arithmetic/mul-to-div', 'multiplying or dividing by one'],
      ['arithmetic/minus-to-plus', 'adding or subtracting zero'],
      ['relational/lt-to-gt', 'operands are identical'],
      ['relational/lt-to-ne', 'operands are identical'],
      ['relational/lt-to-false', 'operands are identical'],
    ]);
    expect(equivalent.every((e) => e.tag === 'provably-equivalent')).toBe(true);
    expect(kept.map((s) => s.operator_id)).toEqual([
      'arithmetic/plus-to-minus',
      'relational/lt-to-le',
      'relational/lt-to-ge',
      'relational/lt-to-eq',
      'relational/lt-to-true',
    ]);
  });

  it('feeds only non-equivalent sites to the dominance reduction', () => {
    const { sites, forms } = prepare(TEXT);
    const { kept } = filterEquivalent(sites, forms, getOperator);
    const reduced = reduceSites(kept, buildDominanceGraph(OPERATORS));
    expect(reduced.map((s) => s.operator_id)).toEqual(['arithmetic/plus-to-minus', 'relational/lt-to-le']);
  });

  it('keeps sites without a rule or without their form', () => {
    const { sites, forms } = prepare('(defn g [ok]\n  (if ok 1 2))\n', CONDITIONAL_OPERATORS);
    expect(filterEquivalent(sites, forms, getOperator).kept).toHaveLength(sites.length);
    expect(filterEquivalent(sites, new Map(), getOperator).kept).toHaveLength(sites.length);
  });

  it('rebuilds the matcher context of a site', () => {
    const { sites, forms } = prepare(TEXT);
    const site = sites[0];
    const form = forms.get(site.form_id);
    if (!form) throw new Error('form missing');
    const ctx = contextAt(form, site);
    expect(ctx.index).toBe(3);
    expect(ctx.parent).toBe(form.node);
  });
});
