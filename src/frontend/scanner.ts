import { internalError } from '../diagnostics/internal.js';
import { isBreak, isByteOrderMark, isSeparator } from './chars.js';
import type { Span } from './syntax.js';

/**
 * Peeks allowed without consuming anything before the scanner assumes the parser is stuck.
 *
 * Well above what the deepest permitted nesting needs to unwind at end of input.
 */
export const PEEK_LIMIT = 100_000;

export type CharPredicate = (ch: string) => boolean;

/**
 * Forward-only cursor over decoded text, one code point at a time.
 */
export class Scanner {
  private offset = 0;
  private peeks = 0;

  constructor(readonly text: string) {}

  pos(): number {
    return this.offset;
  }

  /**
   * Code point starting at `index`, or `undefined` past the end. Does not count as a peek.
   */
  charAt(index: number): string | undefined {
    const c = this.text.codePointAt(index);
    return c === undefined ? undefined : String.fromCodePoint(c);
  }

  peek(): string | undefined {
    this.countPeek();
    return this.charAt(this.offset);
  }

  peekNext(): string | undefined {
    this.countPeek();
    const first = this.charAt(this.offset);
    return first === undefined ? undefined : this.charAt(this.offset + first.length);
  }

  /**
   * Index of the first code point at or after the cursor that `skip` rejects (or the end of the
   * text).
   */
  indexPast(skip: CharPredicate): number {
    this.countPeek();
    let i = this.offset;
    for (let ch = this.charAt(i); ch !== undefined && skip(ch); ch = this.charAt(i)) {
      i += ch.length;
    }
    return i;
  }

  /**
   * Like {@link indexPast} over whitespace and line breaks, also skipping comments that a separator
   * introduces.
   */
  indexPastSeparators(): number {
    this.countPeek();
    let i = this.offset;
    for (let ch = this.charAt(i); ch !== undefined; ch = this.charAt(i)) {
      if (ch === '#' && this.isSeparatedAt(i)) {
        while (ch !== undefined && !isBreak(ch)) {
          i += ch.length;
          ch = this.charAt(i);
        }
        continue;
      }
      if (!isSeparator(ch)) return i;
      i += ch.length;
    }
    return i;
  }

  /**
   * Whether the code point at `index` starts the text or follows whitespace, a line break or a byte
   * order mark.
   */
  isSeparatedAt(index: number): boolean {
    const prev = this.text[index - 1];
    return prev === undefined || isSeparator(prev) || isByteOrderMark(prev);
  }

  bump(): string {
    const ch = this.charAt(this.offset);
    if (ch === undefined) internalError(`bump called at end of input (offset ${this.offset})`);
    this.offset += ch.length;
    this.peeks = 0;
    return ch;
  }

  isEndOfInput(): boolean {
    return this.peek() === undefined;
  }

  /**
   * True at the start of input and right after a consumed line break, looking through byte order
   * marks.
   */
  isStartOfLine(): boolean {
    let i = this.offset - 1;
    while (this.text[i] === '\uFEFF') i--;
    const prev = this.text[i];
    return prev === undefined || isBreak(prev);
  }

  is(pred: CharPredicate): boolean {
    const ch = this.peek();
    return ch !== undefined && pred(ch);
  }

  isChar(expected: string): boolean {
    return this.peek() === expected;
  }

  eat(pred: CharPredicate): boolean {
    if (!this.is(pred)) return false;
    this.bump();
    return true;
  }

  eatChar(expected: string): boolean {
    if (!this.isChar(expected)) return false;
    this.bump();
    return true;
  }

  eatWhile(pred: CharPredicate): Span {
    const start = this.offset;
    while (this.is(pred)) this.bump();
    return { start, end: this.offset };
  }

  startsWith(literal: string): boolean {
    this.countPeek();
    return this.text.startsWith(literal, this.offset);
  }

  slice(span: Span): string {
    return this.text.slice(span.start, span.end);
  }

  private countPeek(): void {
    this.peeks++;
    if (this.peeks > PEEK_LIMIT) {
      internalError(`parser made no progress at offset ${this.offset}`);
    }
  }
}
