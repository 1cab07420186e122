/**
 * Relational operator replacement.
 *
 * Every comparator and boolean constant is described by its truth value on
 * the three ordering partitions (lt, eq, gt). A replacement is killed by a
 * test exercising any partition where it disagrees with the original, so
 * replacement A dominates replacement B when A's kill partitions are a
 * strict subset of B's. Strict subsets cannot form cycles.
 */

import { callArgs, canonicalText, makeToken, withChild, type OrderedNode } from '../L0-syntax-tree';
import { defineOperator, type MutationOperator } from './define';

type TruthVector = readonly [lt: boolean, eq: boolean, gt: boolean];

interface Replacement {
  text: string;
  slug: string;
  truth: TruthVector;
}

export const COMPARATORS: readonly Replacement[] = [
  { text: '<', slug: 'lt', truth: [true, false, false] },
  { text: '<=', slug: 'le', truth: [true, true, false] },
  { text: '>', slug: 'gt', truth: [false, false, true] },
  { text: '>=', slug: 'ge', truth: [false, true, true] },
  { text: '=', slug: 'eq', truth: [false, true, false] },
  { text: 'not=', slug: 'ne', truth: [true, false, true] },
];

const CONSTANTS: readonly Replacement[] = [
  { text: 'true', slug: 'true', truth: [true, true, true] },
  { text: 'false', slug: 'false', truth: [false, false, false] },
];

const EQ_PARTITION = 1;

/** Partition indices where `replacement` disagrees with `original`. */
export function killPartitions(original: TruthVector, replacement: TruthVector): number[] {
  const partitions: number[] = [];
  for (let i = 0; i < 3; i++) {
    if (original[i] !== replacement[i]) partitions.push(i);
  }
  return partitions;
}

function isStrictSubset(a: number[], b: number[]): boolean {
  return a.length < b.length && a.every((p) => b.includes(p));
}

export function relationalOperatorId(from: string, to: string): string {
  return `relational/${from}-to-${to}`;
}

function buildFamily(source: Replacement): MutationOperator[] {
  const replacements = [...COMPARATORS, ...CONSTANTS].filter((r) => r.text !== source.text);
  const kills = new Map(replacements.map((r) => [r.slug, killPartitions(source.truth, r.truth)]));

  return replacements.map((target) => {
    const own = kills.get(target.slug) ?? [];
    const dominates = replacements
      .filter((other) => other !== target && isStrictSubset(own, kills.get(other.slug) ?? []))
      .map((other) => relationalOperatorId(source.slug, other.slug));
    const isConstant = CONSTANTS.includes(target);

    return defineOperator<OrderedNode>({
      id: relationalOperatorId(source.slug, target.slug),
      category: 'relational',
      family: `relational:${source.slug}`,
      description: `Replace \`${source.text}\` with \`${target.text}\``,
      hardness: 10 - 2 * own.length,
      dominates,
      match: (ctx) => {
        const { node } = ctx;
        if (node.kind !== 'ordered' || node.open !== '(') return undefined;
        const head = node.items[0]?.node;
        return head?.kind === 'token' && head.text === source.text ? node : undefined;
      },
      generate: (call) => (isConstant ? makeToken(target.text) : withChild(call, 0, makeToken(target.text))),
      equivalence: (call) => {
        const args = callArgs(call);
        // With identical operands only the eq partition is reachable.
        if (args.length === 2 && canonicalText(args[0]) === canonicalText(args[1]) && !own.includes(EQ_PARTITION)) {
          return 'operands are identical';
        }
        return undefined;
      },
    });
  });
}

export const RELATIONAL_OPERATORS: MutationOperator[] = COMPARATORS.flatMap(buildFamily);
