/**
 * Closed node variant for the coordinate-addressed syntax tree.
 *
 * Every byte of the source is owned by exactly one place in the tree:
 * token text, collection delimiters, a child's leading trivia (`before`),
 * a collection's `trailing` trivia, or a quote prefix and its `gap`.
 */

export interface Span {
  /** Offset of the first character */
  start: number;
  /** Offset one past the last character */
  end: number;
}

export type TokenKind = 'symbol' | 'keyword' | 'number' | 'string' | 'char' | 'regex';

export interface TokenNode {
  kind: 'token';
  token: TokenKind;
  text: string;
  span?: Span;
}

export type OrderedOpen = '(' | '[' | '#(';

export interface OrderedNode {
  kind: 'ordered';
  open: OrderedOpen;
  items: readonly Child[];
  trailing: string;
  span?: Span;
}

export type AssociativeOpen = '{' | '#{';

export interface AssociativeNode {
  kind: 'associative';
  open: AssociativeOpen;
  items: readonly Child[];
  trailing: string;
  span?: Span;
}

export type QuotePrefix = "'" | '`' | '~' | '~@' | '@' | "#'";

export interface QuotedNode {
  kind: 'quoted';
  prefix: QuotePrefix;
  /** Trivia between the prefix and the quoted form */
  gap: string;
  child: SyntaxNode;
  span?: Span;
}

export type SyntaxNode = TokenNode | OrderedNode | AssociativeNode | QuotedNode;

export type CollectionNode = OrderedNode | AssociativeNode;

export interface Child {
  /** Whitespace, commas, comments, discards and metadata preceding the node */
  before: string;
  node: SyntaxNode;
}

export interface Document {
  items: readonly Child[];
  trailing: string;
}

export function closeDelimiter(open: OrderedOpen | AssociativeOpen): string {
  switch (open) {
    case '(':
    case '#(':
      return ')';
    case '[':
      return ']';
    case '{':
    case '#{':
      return '}';
  }
}

export function isCollection(node: SyntaxNode): node is CollectionNode {
  return node.kind === 'ordered' || node.kind === 'associative';
}

export function isMap(node: SyntaxNode): node is AssociativeNode & { open: '{' } {
  return node.kind === 'associative' && node.open === '{';
}

/** Direct children in physical order. */
export function childNodes(node: SyntaxNode): SyntaxNode[] {
  switch (node.kind) {
    case 'token':
      return [];
    case 'quoted':
      return [node.child];
    case 'ordered':
    case 'associative':
      return node.items.map((item) => item.node);
  }
}

// === Rendering ===

export function renderNode(node: SyntaxNode): string {
  switch (node.kind) {
    case 'token':
      return node.text;
    case 'quoted':
      return node.prefix + node.gap + renderNode(node.child);
    case 'ordered':
    case 'associative':
      return node.open + renderChildren(node.items) + node.trailing + closeDelimiter(node.open);
  }
}

function renderChildren(items: readonly Child[]): string {
  let out = '';
  for (const item of items) {
    out += item.before + renderNode(item.node);
  }
  return out;
}

export function renderDocument(doc: Document): string {
  return renderChildren(doc.items) + doc.trailing;
}

/**
 * Canonical text: tokens joined by single spaces, all trivia dropped.
 * Two nodes that differ only in formatting share a canonical text.
 */
export function canonicalText(node: SyntaxNode): string {
  switch (node.kind) {
    case 'token':
      return node.text;
    case 'quoted':
      return node.prefix + canonicalText(node.child);
    case 'ordered':
    case 'associative':
      return node.open + node.items.map((item) => canonicalText(item.node)).join(' ') + closeDelimiter(node.open);
  }
}

// === Construction helpers (used by replacement generators) ===

const NUMBER_RE = /^[+-]?\d/;

export function classifyToken(text: string): TokenKind {
  if (text.startsWith('"')) return 'string';
  if (text.startsWith('#"')) return 'regex';
  if (text.startsWith('\\')) return 'char';
  if (text.startsWith(':')) return 'keyword';
  if (NUMBER_RE.test(text)) return 'number';
  return 'symbol';
}

export function makeToken(text: string): TokenNode {
  return { kind: 'token', token: classifyToken(text), text };
}

export function makeList(nodes: SyntaxNode[]): OrderedNode {
  return {
    kind: 'ordered',
    open: '(',
    items: nodes.map((node, i) => ({ before: i === 0 ? '' : ' ', node })),
    trailing: '',
  };
}

/** Copy of a collection with one child's node swapped; trivia is kept in place. */
export function withChild<T extends CollectionNode>(node: T, index: number, replacement: SyntaxNode): T {
  const items = node.items.map((item, i) => (i === index ? { before: item.before, node: replacement } : item));
  return { ...node, items, span: undefined };
}

export function withQuotedChild(node: QuotedNode, replacement: SyntaxNode): QuotedNode {
  return { ...node, child: replacement, span: undefined };
}

// === Inspection helpers (used by matchers) ===

export function isSymbol(node: SyntaxNode | undefined, name?: string): node is TokenNode {
  return node !== undefined && node.kind === 'token' && node.token === 'symbol' && (name === undefined || node.text === name);
}

/** Head symbol of a `( … )` call form, if any. */
export function callHead(node: SyntaxNode): string | undefined {
  if (node.kind !== 'ordered' || node.open !== '(') return undefined;
  const head = node.items[0]?.node;
  return isSymbol(head) ? head.text : undefined;
}

/** Arguments of a call form (children after the head). */
export function callArgs(node: OrderedNode): SyntaxNode[] {
  return node.items.slice(1).map((item) => item.node);
}

export function numericValue(node: SyntaxNode | undefined): number | undefined {
  if (!node || node.kind !== 'token' || node.token !== 'number') return undefined;
  const value = Number(node.text);
  return Number.isFinite(value) ? value : undefined;
}
