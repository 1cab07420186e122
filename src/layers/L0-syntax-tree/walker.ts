import type { CoordinateSegment } from '../../shared/types';
import { segmentFor } from './coordinates';
import { callHead, childNodes, type SyntaxNode } from './nodes';

/**
 * Quoting state while descending a form.
 * `literal` is set by `'`, `#'`, `(quote …)` and `(comment …)` and is never
 * cleared below that point; `syntaxDepth` counts open syntax-quotes that an
 * unquote (`~`, `~@`) can step back out of.
 */
export interface QuoteState {
  literal: boolean;
  syntaxDepth: number;
}

export const UNQUOTED: QuoteState = { literal: false, syntaxDepth: 0 };

const LITERAL_HEADS = new Set(['quote', 'comment']);

/** State that applies to the children of `node`, given the state at `node`. */
export function enterNode(node: SyntaxNode, state: QuoteState): QuoteState {
  if (state.literal) return state;
  if (node.kind === 'quoted') {
    switch (node.prefix) {
      case "'":
      case "#'":
        return { literal: true, syntaxDepth: state.syntaxDepth };
      case '`':
        return { literal: false, syntaxDepth: state.syntaxDepth + 1 };
      case '~':
      case '~@':
        return { literal: false, syntaxDepth: Math.max(0, state.syntaxDepth - 1) };
      case '@':
        return state;
    }
  }
  const head = callHead(node);
  if (head !== undefined && LITERAL_HEADS.has(head)) {
    return { literal: true, syntaxDepth: state.syntaxDepth };
  }
  return state;
}

export function isScannable(state: QuoteState): boolean {
  return !state.literal && state.syntaxDepth === 0;
}

export interface Visit {
  node: SyntaxNode;
  coordinate: readonly CoordinateSegment[];
  /** Physical child ordinals from the root */
  path: readonly number[];
  parent: SyntaxNode | undefined;
  /** Physical index within `parent`; -1 for the root */
  index: number;
}

/**
 * Depth-first pre-order traversal that yields only nodes outside quoted
 * regions. Syntax-quoted regions are still descended so that unquoted
 * sub-forms are found.
 */
export function* walkScannable(root: SyntaxNode): Generator<Visit> {
  yield* visit(root, [], [], undefined, -1, UNQUOTED);
}

function* visit(
  node: SyntaxNode,
  coordinate: CoordinateSegment[],
  path: number[],
  parent: SyntaxNode | undefined,
  index: number,
  state: QuoteState,
): Generator<Visit> {
  if (isScannable(state)) {
    yield { node, coordinate, path, parent, index };
  }
  const inner = enterNode(node, state);
  if (inner.literal) return;
  const children = childNodes(node);
  for (let i = 0; i < children.length; i++) {
    yield* visit(children[i], [...coordinate, segmentFor(node, i)], [...path, i], node, i, inner);
  }
}
