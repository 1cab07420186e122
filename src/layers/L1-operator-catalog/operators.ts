import type { OperatorCategory } from '../../shared/types';
import {
  callArgs,
  callHead,
  canonicalText,
  isSymbol,
  makeToken,
  numericValue,
  withChild,
  type OrderedNode,
  type TokenNode,
} from '../L0-syntax-tree';
import { defineOperator, type MatchContext, type MutationOperator } from './define';

// === Matcher helpers ===

function callNamed(ctx: MatchContext, head: string): OrderedNode | undefined {
  const { node } = ctx;
  return node.kind === 'ordered' && callHead(node) === head ? node : undefined;
}

function tokenWhere(ctx: MatchContext, test: (token: TokenNode) => boolean): TokenNode | undefined {
  const { node } = ctx;
  if (node.kind !== 'token') return undefined;
  // Heads of call forms are handled by the call-level operators.
  if (ctx.index === 0 && ctx.parent?.kind === 'ordered' && ctx.parent.open === '(') return undefined;
  return test(node) ? node : undefined;
}

/** True when every argument after the first is the literal `value`. */
function trailingArgsAre(call: OrderedNode, value: number): boolean {
  const args = callArgs(call);
  return args.length >= 2 && args.slice(1).every((arg) => numericValue(arg) === value);
}

interface HeadSwap {
  id: string;
  category: OperatorCategory;
  family: string;
  from: string;
  to: string;
  hardness: number;
  equivalence?: (call: OrderedNode) => string | undefined;
}

function headSwap(def: HeadSwap): MutationOperator {
  return defineOperator<OrderedNode>({
    id: def.id,
    category: def.category,
    family: def.family,
    description: `Replace \`${def.from}\` with \`${def.to}\``,
    hardness: def.hardness,
    match: (ctx) => callNamed(ctx, def.from),
    generate: (call) => withChild(call, 0, makeToken(def.to)),
    equivalence: def.equivalence,
  });
}

// === Arithmetic ===

const addsZero = (call: OrderedNode): string | undefined =>
  trailingArgsAre(call, 0) ? 'adding or subtracting zero' : undefined;

const multipliesByOne = (call: OrderedNode): string | undefined =>
  trailingArgsAre(call, 1) ? 'multiplying or dividing by one' : undefined;

export const ARITHMETIC_OPERATORS: MutationOperator[] = [
  headSwap({ id: 'arithmetic/plus-to-minus', category: 'arithmetic', family: 'arithmetic:+', from: '+', to: '-', hardness: 5, equivalence: addsZero }),
  headSwap({ id: 'arithmetic/minus-to-plus', category: 'arithmetic', family: 'arithmetic:-', from: '-', to: '+', hardness: 5, equivalence: addsZero }),
  headSwap({ id: 'arithmetic/mul-to-div', category: 'arithmetic', family: 'arithmetic:*', from: '*', to: '/', hardness: 5, equivalence: multipliesByOne }),
  headSwap({ id: 'arithmetic/div-to-mul', category: 'arithmetic', family: 'arithmetic:/', from: '/', to: '*', hardness: 5, equivalence: multipliesByOne }),
  headSwap({ id: 'arithmetic/inc-to-dec', category: 'arithmetic', family: 'arithmetic:inc', from: 'inc', to: 'dec', hardness: 4 }),
  headSwap({ id: 'arithmetic/dec-to-inc', category: 'arithmetic', family: 'arithmetic:dec', from: 'dec', to: 'inc', hardness: 4 }),
];

// === Logical ===

function sameOperands(call: OrderedNode): string | undefined {
  const args = callArgs(call);
  if (args.length === 1) return 'single operand';
  if (args.length > 1 && args.every((arg) => canonicalText(arg) === canonicalText(args[0]))) {
    return 'identical operands';
  }
  return undefined;
}

export const LOGICAL_OPERATORS: MutationOperator[] = [
  headSwap({ id: 'logical/and-to-or', category: 'logical', family: 'logical:and', from: 'and', to: 'or', hardness: 5, equivalence: sameOperands }),
  headSwap({ id: 'logical/or-to-and', category: 'logical', family: 'logical:or', from: 'or', to: 'and', hardness: 5, equivalence: sameOperands }),
  defineOperator<OrderedNode>({
    id: 'logical/remove-not',
    category: 'logical',
    family: 'logical:not',
    description: 'Replace `(not x)` with `x`',
    hardness: 3,
    match: (ctx) => {
      const call = callNamed(ctx, 'not');
      return call && callArgs(call).length === 1 ? call : undefined;
    },
    generate: (call) => callArgs(call)[0],
  }),
];

// === Conditional ===

export const CONDITIONAL_OPERATORS: MutationOperator[] = [
  headSwap({ id: 'conditional/if-to-if-not', category: 'conditional', family: 'conditional:if', from: 'if', to: 'if-not', hardness: 4 }),
  headSwap({ id: 'conditional/if-not-to-if', category: 'conditional', family: 'conditional:if-not', from: 'if-not', to: 'if', hardness: 4 }),
  headSwap({ id: 'conditional/when-to-when-not', category: 'conditional', family: 'conditional:when', from: 'when', to: 'when-not', hardness: 4 }),
  headSwap({ id: 'conditional/when-not-to-when', category: 'conditional', family: 'conditional:when-not', from: 'when-not', to: 'when', hardness: 4 }),
  defineOperator<OrderedNode>({
    id: 'conditional/swap-branches',
    category: 'conditional',
    family: 'conditional:if',
    description: 'Swap the then and else branches of `if`',
    hardness: 6,
    match: (ctx) => {
      const call = callNamed(ctx, 'if');
      return call && call.items.length === 4 ? call : undefined;
    },
    generate: (call) => withChild(withChild(call, 2, call.items[3].node), 3, call.items[2].node),
    equivalence: (call) =>
      canonicalText(call.items[2].node) === canonicalText(call.items[3].node) ? 'identical branches' : undefined,
  }),
];

// === Constants ===

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?\d+(?:\.\d+)?$/;

function isDocstring(ctx: MatchContext): boolean {
  const { parent } = ctx;
  if (!parent || parent.kind !== 'ordered') return false;
  const head = callHead(parent);
  return head !== undefined && head.startsWith('def') && ctx.index === 2 && parent.items.length > 3;
}

export const CONSTANT_OPERATORS: MutationOperator[] = [
  defineOperator<TokenNode>({
    id: 'constant/true-to-false',
    category: 'constant',
    family: 'constant:boolean',
    description: 'Replace `true` with `false`',
    hardness: 3,
    match: (ctx) => tokenWhere(ctx, (t) => isSymbol(t, 'true')),
    generate: () => makeToken('false'),
  }),
  defineOperator<TokenNode>({
    id: 'constant/false-to-true',
    category: 'constant',
    family: 'constant:boolean',
    description: 'Replace `false` with `true`',
    hardness: 3,
    match: (ctx) => tokenWhere(ctx, (t) => isSymbol(t, 'false')),
    generate: () => makeToken('true'),
  }),
  defineOperator<TokenNode>({
    id: 'constant/increment-number',
    category: 'constant',
    family: 'constant:number',
    description: 'Replace an integer literal `n` with `n+1`',
    hardness: 3,
    match: (ctx) => tokenWhere(ctx, (t) => t.token === 'number' && INTEGER_RE.test(t.text)),
    generate: (token) => makeToken((BigInt(token.text.replace(/^\+/, '')) + 1n).toString()),
  }),
  defineOperator<TokenNode>({
    id: 'constant/negate-number',
    category: 'constant',
    family: 'constant:number',
    description: 'Negate a numeric literal',
    hardness: 2,
    match: (ctx) => tokenWhere(ctx, (t) => t.token === 'number' && DECIMAL_RE.test(t.text)),
    generate: (token) =>
      makeToken(token.text.startsWith('-') ? token.text.slice(1) : `-${token.text.replace(/^\+/, '')}`),
    equivalence: (token) => (Number(token.text) === 0 ? 'negating zero' : undefined),
  }),
  defineOperator<TokenNode>({
    id: 'constant/empty-string',
    category: 'constant',
    family: 'constant:string',
    description: 'Replace a non-empty string literal with ""',
    hardness: 2,
    match: (ctx) => tokenWhere(ctx, (t) => t.token === 'string' && t.text !== '""'),
    generate: () => makeToken('""'),
    equivalence: (_token, ctx) => (isDocstring(ctx) ? 'docstring' : undefined),
  }),
];

// === Collections ===

export const COLLECTION_OPERATORS: MutationOperator[] = [
  headSwap({ id: 'collection/first-to-last', category: 'collection', family: 'collection:first', from: 'first', to: 'last', hardness: 4 }),
  headSwap({ id: 'collection/last-to-first', category: 'collection', family: 'collection:last', from: 'last', to: 'first', hardness: 4 }),
  headSwap({ id: 'collection/empty-to-seq', category: 'collection', family: 'collection:empty?', from: 'empty?', to: 'seq', hardness: 4 }),
  headSwap({ id: 'collection/seq-to-empty', category: 'collection', family: 'collection:seq', from: 'seq', to: 'empty?', hardness: 4 }),
];
