import { hashContent } from '../../shared/hash';
import { LineIndex, parse } from './reader';
import { canonicalText, childNodes, isSymbol, renderNode, type Document, type SyntaxNode } from './nodes';

export interface Form {
  /** Stable identity: `<file>::<head> <name>`, `#n` appended for repeats */
  id: string;
  file: string;
  /** Position among the file's top-level forms */
  index: number;
  startLine: number;
  endLine: number;
  node: SyntaxNode;
  text: string;
  /** Digest of the form's exact text */
  digest: string;
}

export interface ParsedSource {
  file: string;
  text: string;
  document: Document;
  forms: Form[];
  /** Digest of the whole file text */
  snapshot: string;
  lines: LineIndex;
}

function formLabel(node: SyntaxNode): string {
  if (node.kind === 'ordered' && node.open === '(') {
    const [head, name] = childNodes(node);
    if (isSymbol(head)) {
      return isSymbol(name) ? `${head.text} ${name.text}` : head.text;
    }
    return head ? `(${canonicalText(head)})` : '()';
  }
  if (node.kind === 'token') return node.text;
  return node.kind;
}

/**
 * Split a document into its top-level forms. Offsets come from the parsed
 * spans, so the document must be straight from `parse`.
 */
export function extractForms(file: string, doc: Document, lines: LineIndex): Form[] {
  const seen = new Map<string, number>();
  return doc.items.map((item, index) => {
    const label = formLabel(item.node);
    const count = (seen.get(label) ?? 0) + 1;
    seen.set(label, count);
    const span = item.node.span;
    const text = renderNode(item.node);
    return {
      id: count === 1 ? `${file}::${label}` : `${file}::${label}#${count}`,
      file,
      index,
      startLine: span ? lines.lineAt(span.start) : 1,
      endLine: span ? lines.lineAt(Math.max(span.start, span.end - 1)) : 1,
      node: item.node,
      text,
      digest: hashContent(text),
    };
  });
}

export function parseSource(file: string, text: string): ParsedSource {
  const document = parse(text);
  const lines = new LineIndex(text);
  return {
    file,
    text,
    document,
    forms: extractForms(file, document, lines),
    snapshot: hashContent(text),
    lines,
  };
}
