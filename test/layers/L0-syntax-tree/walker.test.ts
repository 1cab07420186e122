import { describe, it, expect } from 'vitest';
import { callHead, parse, renderNode, walkScannable } from '../../../src/layers/L0-syntax-tree';

describe('walkScannable', () => {
  const form = parse("(do (quote (+ 1 2)) '(+ 3 4) `(+ 5 ~(+ 6 7)) (comment (+ 8 9)) (+ 10 11))").items[0].node;

  it('skips quoted regions but re-enters unquoted ones', () => {
    const calls = [...walkScannable(form)].filter((v) => callHead(v.node) === '+').map((v) => renderNode(v.node));
    expect(calls).toEqual(['(+ 6 7)', '(+ 10 11)']);
  });

  it('reports coordinate, path and parent of each visit', () => {
    const visit = [...walkScannable(form)].find((v) => renderNode(v.node) === '(+ 6 7)');
    expect(visit?.coordinate).toEqual([3, 0, 2, 0]);
    expect(visit?.path).toEqual([3, 0, 2, 0]);
    expect(visit?.index).toBe(0);
    expect(visit?.parent && renderNode(visit.parent)).toBe('~(+ 6 7)');
  });

  it('visits the root first with index -1', () => {
    const [first] = walkScannable(form);
    expect(first.node).toBe(form);
    expect(first.index).toBe(-1);
    expect(first.coordinate).toEqual([]);
  });
});
