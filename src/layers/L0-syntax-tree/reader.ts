import { ERROR_CODES, MutaformError } from '../../shared/types';
import {
  closeDelimiter,
  renderDocument,
  type AssociativeOpen,
  type Child,
  type Document,
  type OrderedOpen,
  type QuotePrefix,
  type SyntaxNode,
  type TokenKind,
} from './nodes';

// Characters that end a symbol, keyword or number.
const DELIMITER_RE = /[\s,()[\]{}";`~^\\]/;

function isWhitespace(ch: string): boolean {
  return ch === ',' || /\s/.test(ch);
}

/** Maps offsets to 1-based line numbers via binary search over line starts. */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.starts.push(i + 1);
    }
  }

  lineAt(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }
}

class Reader {
  private pos = 0;
  private readonly lines: LineIndex;

  constructor(private readonly text: string) {
    this.lines = new LineIndex(text);
  }

  readDocument(): Document {
    const items: Child[] = [];
    for (;;) {
      const before = this.readTrivia();
      if (this.atEnd()) return { items, trailing: before };
      const ch = this.peek();
      if (ch === ')' || ch === ']' || ch === '}') {
        this.fail(`Unexpected closing delimiter "${ch}"`);
      }
      items.push({ before, node: this.readForm() });
    }
  }

  /** Whitespace, commas, line comments, `#_` discards, `^` metadata, `#!` lines. */
  private readTrivia(): string {
    const start = this.pos;
    while (!this.atEnd()) {
      const ch = this.peek();
      if (isWhitespace(ch)) {
        this.pos++;
      } else if (ch === ';' || (ch === '#' && this.peek(1) === '!')) {
        while (!this.atEnd() && this.peek() !== '\n') this.pos++;
      } else if (ch === '#' && this.peek(1) === '_') {
        this.pos += 2;
        this.readTrivia();
        this.expectForm('#_ discard');
        this.readForm();
      } else if (ch === '^') {
        this.pos++;
        this.readTrivia();
        this.expectForm('metadata');
        this.readForm();
      } else {
        break;
      }
    }
    return this.text.slice(start, this.pos);
  }

  private readForm(): SyntaxNode {
    const start = this.pos;
    const ch = this.peek();
    const next = this.peek(1);

    switch (ch) {
      case '(':
        return this.readOrdered('(', start);
      case '[':
        return this.readOrdered('[', start);
      case '{':
        return this.readAssociative('{', start);
      case ')':
      case ']':
      case '}':
        return this.fail(`Unexpected closing delimiter "${ch}"`);
      case '"':
        return this.readString('string', start);
      case "'":
        return this.readQuoted("'", start);
      case '`':
        return this.readQuoted('`', start);
      case '~':
        return this.readQuoted(next === '@' ? '~@' : '~', start);
      case '@':
        return this.readQuoted('@', start);
      case '\\':
        return this.readChar(start);
      case '#':
        if (next === '(') return this.readOrdered('#(', start);
        if (next === '{') return this.readAssociative('#{', start);
        if (next === '"') {
          this.pos++;
          return this.readString('regex', start);
        }
        if (next === "'") return this.readQuoted("#'", start);
        break;
    }

    // Symbols, keywords, numbers and dispatch tags such as #inst or ##Inf
    while (!this.atEnd() && (this.pos === start || !DELIMITER_RE.test(this.peek()))) {
      this.pos++;
    }
    const text = this.text.slice(start, this.pos);
    if (DELIMITER_RE.test(text)) {
      this.fail(`Unexpected character "${text}"`, start);
    }
    return {
      kind: 'token',
      token: classifyAtom(text),
      text,
      span: { start, end: this.pos },
    };
  }

  private readOrdered(open: OrderedOpen, start: number): SyntaxNode {
    this.pos += open.length;
    const { items, trailing } = this.readItems(open, start);
    return { kind: 'ordered', open, items, trailing, span: { start, end: this.pos } };
  }

  private readAssociative(open: AssociativeOpen, start: number): SyntaxNode {
    this.pos += open.length;
    const { items, trailing } = this.readItems(open, start);
    return { kind: 'associative', open, items, trailing, span: { start, end: this.pos } };
  }

  private readItems(open: OrderedOpen | AssociativeOpen, start: number): { items: Child[]; trailing: string } {
    const close = closeDelimiter(open);
    const items: Child[] = [];
    for (;;) {
      const before = this.readTrivia();
      if (this.atEnd()) {
        this.fail(`Unterminated "${open}" opened here`, start);
      }
      const ch = this.peek();
      if (ch === close) {
        this.pos++;
        return { items, trailing: before };
      }
      if (ch === ')' || ch === ']' || ch === '}') {
        this.fail(`Mismatched delimiter "${ch}", expected "${close}"`);
      }
      items.push({ before, node: this.readForm() });
    }
  }

  private readQuoted(prefix: QuotePrefix, start: number): SyntaxNode {
    this.pos += prefix.length;
    const gap = this.readTrivia();
    this.expectForm(`"${prefix}"`);
    const child = this.readForm();
    return { kind: 'quoted', prefix, gap, child, span: { start, end: this.pos } };
  }

  private readString(token: TokenKind, start: number): SyntaxNode {
    this.pos++; // opening quote
    while (!this.atEnd() && this.peek() !== '"') {
      this.pos += this.peek() === '\\' ? 2 : 1;
    }
    if (this.atEnd()) {
      this.fail('Unterminated string', start);
    }
    this.pos++; // closing quote
    return { kind: 'token', token, text: this.text.slice(start, this.pos), span: { start, end: this.pos } };
  }

  private readChar(start: number): SyntaxNode {
    this.pos++;
    if (this.atEnd()) this.fail('Unterminated character literal', start);
    this.pos++;
    while (!this.atEnd() && /[A-Za-z0-9]/.test(this.peek())) this.pos++;
    return { kind: 'token', token: 'char', text: this.text.slice(start, this.pos), span: { start, end: this.pos } };
  }

  private expectForm(what: string): void {
    if (this.atEnd()) this.fail(`Expected a form after ${what}`);
    const ch = this.peek();
    if (ch === ')' || ch === ']' || ch === '}') this.fail(`Expected a form after ${what}, found "${ch}"`);
  }

  private peek(ahead = 0): string {
    return this.text.charAt(this.pos + ahead);
  }

  private atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  private fail(message: string, offset = this.pos): never {
    const line = this.lines.lineAt(offset);
    throw new MutaformError({
      code: ERROR_CODES.PARSE_ERROR,
      severity: 'medium',
      message: `${message} (line ${line})`,
      context: { line, offset },
    });
  }
}

function classifyAtom(text: string): TokenKind {
  if (text.startsWith(':')) return 'keyword';
  if (/^[+-]?\d/.test(text)) return 'number';
  return 'symbol';
}

/** Parse source text into a formatting-preserving document. */
export function parse(text: string): Document {
  return new Reader(text).readDocument();
}

/** Inverse of `parse`: `render(parse(text)) === text`. */
export function render(doc: Document): string {
  return renderDocument(doc);
}
