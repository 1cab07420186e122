import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { makeToken, parseSource } from '../../../src/layers/L0-syntax-tree';
import { RELATIONAL_OPERATORS, defineOperator } from '../../../src/layers/L1-operator-catalog';
import { scanSource } from '../../../src/layers/L3-site-scanner';
import {
  buildDominanceGraph,
  dominatedClosure,
  reduceOperators,
  reduceSites,
} from '../../../src/layers/L4-optimizer';
import { ERROR_CODES } from '../../../src/shared/types';

function stub(id: string, family: string, dominates: string[]) {
  return defineOperator({
    id,
    category: 'arithmetic',
    family,
    description: id,
    hardness: 1,
    dominates,
    match: () => undefined,
    generate: () => makeToken('x'),
  });
}

const graph = buildDominanceGraph(RELATIONAL_OPERATORS);
const LT_IDS = RELATIONAL_OPERATORS.filter((op) => op.family === 'relational:lt').map((op) => op.id);

describe('buildDominanceGraph', () => {
  it('computes transitive closures within a family', () => {
    expect([...dominatedClosure(graph, 'relational/lt-to-le')].sort()).toEqual([
      'relational/lt-to-eq',
      'relational/lt-to-ge',
      'relational/lt-to-true',
    ]);
    expect(dominatedClosure(graph, 'relational/lt-to-ge').size).toBe(0);
  });

  it('rejects a dominance cycle', () => {
    expect(() => buildDominanceGraph([stub('test/a', 'test', ['test/b']), stub('test/b', 'test', ['test/a'])])).toThrow(
      expect.objectContaining({
        code: ERROR_CODES.SUBSUMPTION_CYCLE,
        message: 'Subsumption cycle: test/a → test/b → test/a',
      }),
    );
  });

  it('ignores edges that cross families', () => {
    const crossed = buildDominanceGraph([stub('test/a', 'one', ['test/b']), stub('test/b', 'two', ['test/a'])]);
    expect(crossed.edges.get('test/a')?.size).toBe(0);
    expect(crossed.edges.get('test/b')?.size).toBe(0);
  });
});

describe('reduceOperators', () => {
  it('keeps the undominated members of the < family', () => {
    expect(reduceOperators(LT_IDS, graph)).toEqual([
      'relational/lt-to-le',
      'relational/lt-to-ne',
      'relational/lt-to-false',
    ]);
  });

  it('keeps a dominated operator when its dominator is absent', () => {
    expect(reduceOperators(['relational/lt-to-eq', 'relational/lt-to-ge'], graph)).toEqual(['relational/lt-to-eq']);
  });

  it('is idempotent and never grows the set', () => {
    fc.assert(
      fc.property(fc.subarray(LT_IDS), (ids) => {
        const once = reduceOperators(ids, graph);
        expect(once.every((id) => ids.includes(id))).toBe(true);
        expect(reduceOperators(once, graph)).toEqual(once);
        if (ids.length > 0) expect(once.length).toBeGreaterThan(0);
      }),
    );
  });
});

describe('reduceSites', () => {
  it('reduces each location independently', () => {
    const source = parseSource('src/r.clj', '(defn r [a b]\n  (and (< a 0) (< b 0)))\n');
    const sites = scanSource(source, RELATIONAL_OPERATORS).sites;
    const reduced = reduceSites(sites, graph);
    expect(reduced.map((s) => `${s.coordinate.join('/')}:${s.operator_id}`)).toEqual([
      '3/1:relational/lt-to-le',
      '3/1:relational/lt-to-ne',
      '3/1:relational/lt-to-false',
      '3/2:relational/lt-to-le',
      '3/2:relational/lt-to-ne',
      '3/2:relational/lt-to-false',
    ]);
  });
});
