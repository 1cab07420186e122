import type { OperatorCategory } from '../../shared/types';
import type { SyntaxNode } from '../L0-syntax-tree';

/** Immediate syntactic context a matcher or equivalence rule may inspect. */
export interface MatchContext {
  node: SyntaxNode;
  parent: SyntaxNode | undefined;
  /** Physical index of `node` within `parent`; -1 at a form root */
  index: number;
}

/**
 * Declarative operator definition. `match` must be total and side-effect
 * free; its payload is handed to `generate` and `equivalence`.
 */
export interface OperatorDefinition<P> {
  id: string;
  category: OperatorCategory;
  /** Comparator family; subsumption edges only connect members of one family */
  family: string;
  description: string;
  /** Higher is harder to kill; used to pick cluster representatives */
  hardness: number;
  /** Operators in the same family whose kills this operator's kills imply */
  dominates?: readonly string[];
  match(ctx: MatchContext): P | undefined;
  generate(payload: P, ctx: MatchContext): SyntaxNode;
  /** Reason string when the mutation is provably equivalent here */
  equivalence?(payload: P, ctx: MatchContext): string | undefined;
}

export interface BoundMatch {
  generate(): SyntaxNode;
  equivalence(): string | undefined;
}

export interface MutationOperator {
  readonly id: string;
  readonly category: OperatorCategory;
  readonly family: string;
  readonly description: string;
  readonly hardness: number;
  readonly dominates: readonly string[];
  readonly hasEquivalenceRule: boolean;
  bind(ctx: MatchContext): BoundMatch | undefined;
}

/** Erase an operator's payload type so heterogeneous operators share one catalog. */
export function defineOperator<P>(definition: OperatorDefinition<P>): MutationOperator {
  return {
    id: definition.id,
    category: definition.category,
    family: definition.family,
    description: definition.description,
    hardness: definition.hardness,
    dominates: definition.dominates ?? [],
    hasEquivalenceRule: definition.equivalence !== undefined,
    bind(ctx) {
      const payload = definition.match(ctx);
      if (payload === undefined) return undefined;
      return {
        generate: () => definition.generate(payload, ctx),
        equivalence: () => definition.equivalence?.(payload, ctx),
      };
    },
  };
}
