import { DiagnosticIds } from '../diagnostics/types.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DEFAULT_MAX_NESTING_DEPTH } from '../pipeline.js';
import type { ParseResult } from '../pipeline.js';
import {
  ESCAPE_HEX_DIGITS,
  SIMPLE_ESCAPES,
  isAnchorChar,
  isBreak,
  isByteOrderMark,
  isDecDigit,
  isFlowIndicator,
  isFlowIndicatorOrSeparator,
  isHexDigit,
  isIndicator,
  isJson,
  isNonBreak,
  isNonWhitespace,
  isSeparator,
  isTagChar,
  isUriChar,
  isWhitespace,
  isWordChar,
} from './chars.js';
import {
  allowsMultiLine,
  inFlow,
  isPlainSafe,
  recoveryPredicate,
  separatesAcrossLines,
} from './context.js';
import type { Context } from './context.js';
import { Scanner } from './scanner.js';
import type { CharPredicate } from './scanner.js';
import { SyntaxKind } from './syntax.js';
import type { Span } from './syntax.js';
import { TreeBuilder } from './tree.js';
import type { Checkpoint } from './tree.js';

interface Marker {
  readonly pos: number;
  readonly checkpoint: Checkpoint;
}

interface CollectionShape {
  open: '[' | '{';
  close: ']' | '}';
  startKind: SyntaxKind;
  endKind: SyntaxKind;
  nodeKind: SyntaxKind;
  entry: string;
}

const SEQUENCE: CollectionShape = {
  open: '[',
  close: ']',
  startKind: SyntaxKind.SequenceStart,
  endKind: SyntaxKind.SequenceEnd,
  nodeKind: SyntaxKind.FlowSequence,
  entry: 'flow sequence entry',
};

const MAPPING: CollectionShape = {
  open: '{',
  close: '}',
  startKind: SyntaxKind.MappingStart,
  endKind: SyntaxKind.MappingEnd,
  nodeKind: SyntaxKind.FlowMapping,
  entry: 'flow mapping entry',
};

/** Recovery that skips nothing: the `Error` token covers only what was already consumed. */
const stopHere: CharPredicate = () => true;

/**
 * Recursive-descent parser over YAML 1.2 productions (comments name the production each method
 * implements).
 *
 * Every production either parses its construct or records one diagnostic and leaves an `Error`
 * token in the tree, so the finished tree always covers every character consumed. Nothing here
 * throws for bad input; a thrown error means the parser itself is broken.
 */
export class Parser {
  private readonly scanner: Scanner;
  private readonly builder = new TreeBuilder();
  private readonly diagnostics: Diagnostic[] = [];
  private depth = 0;

  private readonly documentBoundary: CharPredicate = () => this.atDocumentBoundary();

  constructor(
    text: string,
    private readonly maxNestingDepth: number = DEFAULT_MAX_NESTING_DEPTH,
  ) {
    this.scanner = new Scanner(text);
    this.builder.startNode(SyntaxKind.Root);
  }

  /**
   * Close the root node and hand over the tree. The parser must not be used afterwards.
   */
  finish(): ParseResult {
    this.builder.finishNode();
    // Recovery can report a construct after problems found inside it; the sort is stable.
    const diagnostics = [...this.diagnostics].sort((a, b) => a.span.start - b.span.start);
    return { tree: this.builder.finish(), diagnostics };
  }

  // l-yaml-stream
  stream(): void {
    this.documentPrefix();
    while (!this.scanner.isEndOfInput()) {
      this.document();
      this.documentPrefix();
    }
  }

  // l-document-prefix
  private documentPrefix(): void {
    const start = this.pos();
    if (this.scanner.eat(isByteOrderMark)) this.token(SyntaxKind.ByteOrderMark, start);
    this.lineComments();
  }

  // l-any-document, then an optional l-document-suffix
  document(): void {
    const start = this.marker();
    let directives = false;
    while (this.scanner.isChar('%')) {
      this.directive();
      this.lineComments();
      directives = true;
    }
    if (this.atMarker('---')) {
      this.markerToken(SyntaxKind.DirectivesEnd);
      this.documentContent(true);
    } else {
      if (directives && !this.scanner.isEndOfInput()) {
        this.error(this.pos(), "expected '---' after directives", stopHere);
      }
      this.documentContent(false);
    }
    if (this.atMarker('...')) {
      this.markerToken(SyntaxKind.DocumentEnd);
      this.separatedLineComments();
    }
    this.nodeAt(start, SyntaxKind.Document);
  }

  private documentContent(explicit: boolean): void {
    if (explicit) this.tryLineSeparator(0);
    else this.tryInlineSeparator();
    if (this.scanner.isEndOfInput() || this.atDocumentBoundary()) return;
    if (this.startsBlockStructure()) return this.blockUnsupported();
    if (!this.startsFlowNodeAt(this.pos(), 'FlowOut')) {
      return this.error(this.pos(), 'expected a flow node', this.documentBoundary);
    }
    this.flowNode(0, 'FlowOut');
    if (this.scanner.charAt(this.scanner.indexPast(isWhitespace)) === ':') {
      this.tryInlineSeparator();
      return this.blockUnsupported();
    }
    this.separatedLineComments();
    if (!this.scanner.isEndOfInput() && !this.atDocumentBoundary()) {
      this.error(this.pos(), 'expected end of document', this.documentBoundary);
    }
  }

  private blockUnsupported(): void {
    this.error(this.pos(), 'block-style content is not supported', this.documentBoundary);
  }

  private startsBlockStructure(): boolean {
    const ch = this.scanner.peek();
    if (ch === '|' || ch === '>') return true;
    if (ch !== '-' && ch !== '?' && ch !== ':') return false;
    const next = this.scanner.peekNext();
    return next === undefined || isSeparator(next);
  }

  private atMarker(marker: '---' | '...'): boolean {
    return (
      this.scanner.isStartOfLine() &&
      this.scanner.startsWith(marker) &&
      this.endsMarkerAt(this.pos() + 3)
    );
  }

  private atDocumentBoundary(): boolean {
    return this.atMarker('---') || this.atMarker('...');
  }

  // c-forbidden, for a line known to start at `index`
  private isDocumentMarkerAt(index: number): boolean {
    const text = this.scanner.text;
    const marker = text.startsWith('---', index) || text.startsWith('...', index);
    return marker && this.endsMarkerAt(index + 3);
  }

  private endsMarkerAt(index: number): boolean {
    const after = this.scanner.charAt(index);
    return after === undefined || isSeparator(after);
  }

  private markerToken(kind: SyntaxKind): void {
    const start = this.pos();
    for (let i = 0; i < 3; i++) this.scanner.bump();
    this.token(kind, start);
  }

  // l-directive
  directive(): void {
    const start = this.marker();
    if (!this.scanner.eatChar('%')) return this.error(start.pos, "expected '%'", isBreak);
    this.token(SyntaxKind.DirectiveToken, start.pos);
    this.directiveBody();
    this.separatedLineComments();
    this.nodeAt(start, SyntaxKind.Directive);
  }

  private directiveBody(): void {
    const start = this.marker();
    const name = this.scanner.eatWhile(isNonWhitespace);
    if (name.end === name.start) return this.error(start.pos, 'expected directive name', isBreak);
    this.tokenAt(SyntaxKind.DirectiveName, name);
    switch (this.scanner.slice(name)) {
      case 'YAML':
        if (this.tryInlineSeparator()) this.yamlVersion();
        else this.error(this.pos(), 'expected YAML version', isBreak);
        return this.nodeAt(start, SyntaxKind.YamlDirective);
      case 'TAG':
        if (!this.tryInlineSeparator()) {
          this.error(this.pos(), 'expected tag handle', isBreak);
        } else {
          this.tagHandle();
          if (this.tryInlineSeparator()) this.tagPrefix();
          else this.error(this.pos(), 'expected tag prefix', isBreak);
        }
        return this.nodeAt(start, SyntaxKind.TagDirective);
      default:
        while (this.atDirectiveParameter()) {
          this.inlineSeparator();
          this.tokenAt(SyntaxKind.DirectiveParameter, this.scanner.eatWhile(isNonWhitespace));
        }
        return this.nodeAt(start, SyntaxKind.ReservedDirective);
    }
  }

  private atDirectiveParameter(): boolean {
    if (!this.scanner.is(isWhitespace)) return false;
    const next = this.scanner.charAt(this.scanner.indexPast(isWhitespace));
    return next !== undefined && next !== '#' && isNonWhitespace(next);
  }

  // ns-yaml-version
  yamlVersion(): void {
    const start = this.pos();
    if (!this.eatDigits() || !this.scanner.eatChar('.') || !this.eatDigits()) {
      const message = 'invalid YAML version: expected digits separated by a dot';
      return this.error(start, message, isSeparator);
    }
    this.token(SyntaxKind.YamlVersion, start);
  }

  private eatDigits(): boolean {
    const digits = this.scanner.eatWhile(isDecDigit);
    return digits.end > digits.start;
  }

  // c-tag-handle
  tagHandle(): void {
    const start = this.pos();
    if (!this.scanner.eatChar('!')) {
      return this.error(start, "invalid tag handle: expected '!'", isFlowIndicatorOrSeparator);
    }
    if (this.scanner.is(isWordChar)) {
      this.scanner.eatWhile(isWordChar);
      if (!this.scanner.eatChar('!')) {
        const message = "invalid tag handle: expected '!' after the handle name";
        return this.error(start, message, isFlowIndicatorOrSeparator);
      }
      this.token(SyntaxKind.NamedTagHandle, start);
    } else if (this.scanner.eatChar('!')) {
      this.token(SyntaxKind.SecondaryTagHandle, start);
    } else {
      this.token(SyntaxKind.PrimaryTagHandle, start);
    }
  }

  // ns-tag-prefix
  tagPrefix(): void {
    const start = this.pos();
    if (!this.scanner.eatChar('!') && !this.scanner.is(isTagChar)) {
      return this.error(start, 'invalid tag prefix', isSeparator);
    }
    this.scanner.eatWhile(isUriChar);
    this.token(SyntaxKind.TagPrefix, start);
  }

  // c-ns-tag-property
  tagProperty(): void {
    const start = this.marker();
    if (!this.scanner.eatChar('!')) {
      return this.error(start.pos, "expected '!'", isFlowIndicatorOrSeparator);
    }
    if (this.scanner.eatChar('<')) {
      this.verbatimTag(start.pos);
    } else if (this.scanner.is(isTagChar)) {
      this.shorthandTag(start.pos);
    } else if (this.scanner.eatChar('!')) {
      this.token(SyntaxKind.SecondaryTagHandle, start.pos);
      this.tagSuffix();
    } else {
      this.token(SyntaxKind.NonSpecificTag, start.pos);
    }
    this.nodeAt(start, SyntaxKind.TagProperty);
  }

  // c-verbatim-tag
  private verbatimTag(start: number): void {
    this.token(SyntaxKind.VerbatimTagStart, start);
    const uri = this.scanner.eatWhile(isUriChar);
    if (uri.end === uri.start) {
      return this.error(uri.start, 'expected verbatim tag', isFlowIndicatorOrSeparator);
    }
    this.tokenAt(SyntaxKind.VerbatimTag, uri);
    const end = this.pos();
    if (!this.scanner.eatChar('>')) {
      return this.error(end, "expected '>'", isFlowIndicatorOrSeparator);
    }
    this.token(SyntaxKind.VerbatimTagEnd, end);
  }

  // c-ns-shorthand-tag
  private shorthandTag(start: number): void {
    const name = this.scanner.eatWhile(isTagChar);
    if (!this.scanner.eatChar('!')) {
      this.tokenAt(SyntaxKind.PrimaryTagHandle, { start, end: name.start });
      this.tokenAt(SyntaxKind.TagSuffix, name);
      return;
    }
    const handle: Span = { start, end: this.pos() };
    if ([...this.scanner.slice(name)].every(isWordChar)) {
      this.tokenAt(SyntaxKind.NamedTagHandle, handle);
    } else {
      this.errorToken(handle, 'invalid character in tag handle');
    }
    this.tagSuffix();
  }

  private tagSuffix(): void {
    const suffix = this.scanner.eatWhile(isTagChar);
    if (suffix.end === suffix.start) {
      return this.error(suffix.start, 'expected tag suffix', isFlowIndicatorOrSeparator);
    }
    this.tokenAt(SyntaxKind.TagSuffix, suffix);
  }

  // c-ns-anchor-property
  anchorProperty(): void {
    this.anchored('&', SyntaxKind.AnchorToken, SyntaxKind.AnchorProperty);
  }

  // c-ns-alias-node
  aliasNode(): void {
    this.anchored('*', SyntaxKind.AliasToken, SyntaxKind.AliasNode);
  }

  private anchored(indicator: '&' | '*', tokenKind: SyntaxKind, nodeKind: SyntaxKind): void {
    const start = this.marker();
    if (!this.scanner.eatChar(indicator)) {
      return this.error(start.pos, `expected '${indicator}'`, isFlowIndicatorOrSeparator);
    }
    this.token(tokenKind, start.pos);
    const name = this.scanner.eatWhile(isAnchorChar);
    if (name.end === name.start) {
      this.error(name.start, 'expected anchor name', isFlowIndicatorOrSeparator);
    } else {
      this.tokenAt(SyntaxKind.AnchorName, name);
    }
    this.nodeAt(start, nodeKind);
  }

  // c-ns-properties(n,c)
  properties(indent: number, context: Context): void {
    const start = this.marker();
    if (this.scanner.isChar('!')) {
      this.tagProperty();
      if (this.followedBy('&', context) && this.trySeparator(indent, context)) {
        this.anchorProperty();
      }
    } else if (this.scanner.isChar('&')) {
      this.anchorProperty();
      if (this.followedBy('!', context) && this.trySeparator(indent, context)) {
        this.tagProperty();
      }
    } else {
      return this.error(start.pos, "expected '!' or '&'", recoveryPredicate(context));
    }
    this.nodeAt(start, SyntaxKind.Properties);
  }

  /**
   * ns-flow-node(n,c). Returns whether the content is JSON-like (a flow collection or a quoted
   * scalar), which lets a `:` value indicator follow it without a separator.
   */
  flowNode(indent: number, context: Context): boolean {
    const start = this.marker();
    let json = false;
    if (this.scanner.isChar('*')) {
      this.aliasNode();
    } else if (this.scanner.isChar('!') || this.scanner.isChar('&')) {
      this.properties(indent, context);
      const next = this.indexPastSeparator(context);
      if (this.startsFlowContentAt(next, context) && this.trySeparator(indent, context)) {
        json = this.flowContent(indent, context);
      }
    } else {
      json = this.flowContent(indent, context);
    }
    this.nodeAt(start, SyntaxKind.FlowNode);
    return json;
  }

  // ns-flow-content(n,c)
  flowContent(indent: number, context: Context): boolean {
    const ch = this.scanner.peek();
    if (ch === '[' || ch === '{' || ch === "'" || ch === '"') {
      this.flowJsonContent(indent, context);
      return true;
    }
    if (this.isPlainFirstAt(this.pos(), context)) {
      this.plainScalar(indent, context);
    } else {
      this.error(this.pos(), 'invalid flow content', recoveryPredicate(context));
    }
    return false;
  }

  // c-flow-json-content(n,c)
  flowJsonContent(indent: number, context: Context): void {
    switch (this.scanner.peek()) {
      case '[':
        return this.flowSequence(indent, context);
      case '{':
        return this.flowMapping(indent, context);
      case "'":
        return this.singleQuoted(indent, context);
      case '"':
        return this.doubleQuoted(indent, context);
      default:
        return this.error(
          this.pos(),
          'expected a flow collection or a quoted scalar',
          recoveryPredicate(context),
        );
    }
  }

  private startsFlowNodeAt(index: number, context: Context): boolean {
    const ch = this.scanner.charAt(index);
    return ch === '*' || ch === '!' || ch === '&' || this.startsFlowContentAt(index, context);
  }

  private startsFlowContentAt(index: number, context: Context): boolean {
    const ch = this.scanner.charAt(index);
    if (ch === '[' || ch === '{' || ch === "'" || ch === '"') return true;
    return this.isPlainFirstAt(index, context);
  }

  // ns-plain(n,c)
  plainScalar(indent: number, context: Context): void {
    const start = this.marker();
    if (!this.isPlainFirstAt(start.pos, context)) {
      return this.error(start.pos, 'expected plain scalar', recoveryPredicate(context));
    }
    this.scanner.bump();
    this.plainInLine(context);
    this.token(SyntaxKind.PlainText, start.pos);
    let more = allowsMultiLine(context);
    while (more) more = this.plainNextLine(indent, context);
    this.nodeAt(start, SyntaxKind.PlainScalar);
  }

  // ns-plain-first(c)
  private isPlainFirstAt(index: number, context: Context): boolean {
    const ch = this.scanner.charAt(index);
    if (ch === undefined || !isNonWhitespace(ch)) return false;
    if (!isIndicator(ch)) return true;
    if (ch !== '?' && ch !== ':' && ch !== '-') return false;
    const next = this.scanner.charAt(index + 1);
    return next !== undefined && isPlainSafe(next, context);
  }

  // ns-plain-char(c)
  private isPlainCharAt(index: number, context: Context): boolean {
    const ch = this.scanner.charAt(index);
    if (ch === undefined) return false;
    if (ch === ':') {
      const next = this.scanner.charAt(index + 1);
      return next !== undefined && isPlainSafe(next, context);
    }
    if (ch === '#') return !this.scanner.isSeparatedAt(index);
    return isPlainSafe(ch, context);
  }

  // nb-ns-plain-in-line(c)
  private plainInLine(context: Context): void {
    for (;;) {
      const next = this.scanner.indexPast(isWhitespace);
      if (!this.isPlainCharAt(next, context)) return;
      while (this.pos() <= next) this.scanner.bump();
    }
  }

  // s-ns-plain-next-line(n,c); consumes nothing unless a continuation line follows
  private plainNextLine(indent: number, context: Context): boolean {
    let i = this.scanner.indexPast(isWhitespace);
    if (!this.isBreakAt(i)) return false;
    let lineStart: number;
    do {
      lineStart = this.breakEndAt(i);
      i = this.whitespaceEndAt(lineStart);
    } while (this.isBreakAt(i));
    if (this.isDocumentMarkerAt(lineStart)) return false;
    if (this.spacesAt(lineStart) < indent) return false;
    if (!this.isPlainCharAt(i, context)) return false;

    this.inlineSeparator();
    while (this.scanner.is(isBreak)) {
      this.lineBreak();
      this.inlineSeparator();
    }
    const start = this.pos();
    this.scanner.bump();
    this.plainInLine(context);
    this.token(SyntaxKind.PlainText, start);
    return true;
  }

  private isBreakAt(index: number): boolean {
    const ch = this.scanner.text[index];
    return ch !== undefined && isBreak(ch);
  }

  private breakEndAt(index: number): number {
    const text = this.scanner.text;
    return text[index] === '\r' && text[index + 1] === '\n' ? index + 2 : index + 1;
  }

  private whitespaceEndAt(index: number): number {
    const text = this.scanner.text;
    let i = index;
    while (text[i] === ' ' || text[i] === '\t') i++;
    return i;
  }

  private spacesAt(index: number): number {
    let i = index;
    while (this.scanner.text[i] === ' ') i++;
    return i - index;
  }

  // c-flow-sequence(n,c)
  flowSequence(indent: number, context: Context): void {
    this.flowCollection(indent, context, SEQUENCE);
  }

  // c-flow-mapping(n,c)
  flowMapping(indent: number, context: Context): void {
    this.flowCollection(indent, context, MAPPING);
  }

  private flowCollection(indent: number, context: Context, shape: CollectionShape): void {
    const start = this.marker();
    if (!this.scanner.eatChar(shape.open)) {
      return this.error(start.pos, `expected '${shape.open}'`, recoveryPredicate(context));
    }
    if (this.depth >= this.maxNestingDepth) return this.skipNested(start.pos);
    this.depth++;
    this.token(shape.startKind, start.pos);
    const inner = inFlow(context);
    this.trySeparator(indent, context);

    let stray = false;
    while (!this.atCollectionEnd(shape)) {
      if (this.startsFlowEntry(inner)) {
        if (shape === SEQUENCE) this.flowSequenceEntry(indent, inner);
        else this.flowMapEntry(indent, inner);
        this.trySeparator(indent, inner);
        if (this.eatComma()) {
          this.trySeparator(indent, inner);
          continue;
        }
        if (this.atCollectionEnd(shape)) break;
        this.error(this.pos(), `expected ',' or '${shape.close}'`, isFlowIndicator);
      } else {
        this.error(this.pos(), `expected ${shape.entry}`, isFlowIndicator);
      }
      if (this.eatComma()) {
        this.trySeparator(indent, inner);
        continue;
      }
      // A closer of the other kind belongs to an enclosing collection.
      // '[' and '{' start the next entry.
      if (this.scanner.isChar(shape === SEQUENCE ? '}' : ']')) {
        stray = true;
        break;
      }
    }

    const end = this.pos();
    if (this.scanner.eatChar(shape.close)) this.token(shape.endKind, end);
    else if (!stray) this.error(end, `expected '${shape.close}'`, stopHere);
    this.depth--;
    this.nodeAt(start, shape.nodeKind);
  }

  private atCollectionEnd(shape: CollectionShape): boolean {
    return (
      this.scanner.isEndOfInput() || this.scanner.isChar(shape.close) || this.atDocumentBoundary()
    );
  }

  /**
   * Consume the rest of a collection opened too deep, up to its matching closer. Brackets inside
   * quoted scalars and comments do not count, and a document marker ends the skip.
   */
  private skipNested(start: number): void {
    let open = 1;
    while (open > 0 && !this.scanner.isEndOfInput() && !this.atDocumentBoundary()) {
      const separated = this.scanner.isSeparatedAt(this.pos());
      const ch = this.scanner.bump();
      if (ch === '[' || ch === '{') open++;
      else if (ch === ']' || ch === '}') open--;
      else if (ch === '"' || ch === "'") this.skipQuoted(ch);
      else if (ch === '#' && separated) this.scanner.eatWhile((c) => !isBreak(c));
    }
    this.errorToken(
      { start, end: this.pos() },
      `flow collections nested deeper than ${this.maxNestingDepth} levels`,
      DiagnosticIds.NestingTooDeep,
    );
  }

  private skipQuoted(quote: '"' | "'"): void {
    while (!this.scanner.isEndOfInput() && !this.atDocumentBoundary()) {
      const ch = this.scanner.bump();
      if (quote === '"' && ch === '\\') {
        if (!this.scanner.isEndOfInput()) this.scanner.bump();
      } else if (ch === quote) {
        if (quote === '"' || !this.scanner.eatChar("'")) return;
      }
    }
  }

  private eatComma(): boolean {
    const start = this.pos();
    if (!this.scanner.eatChar(',')) return false;
    this.token(SyntaxKind.Comma, start);
    return true;
  }

  private startsFlowEntry(context: Context): boolean {
    const ch = this.scanner.peek();
    return ch === '?' || ch === ':' || this.startsFlowNodeAt(this.pos(), context);
  }

  // ns-flow-seq-entry(n,c)
  private flowSequenceEntry(indent: number, context: Context): void {
    const start = this.marker();
    if (this.atExplicitKey(context)) {
      this.explicitEntry(indent, context);
      return this.nodeAt(start, SyntaxKind.FlowPair);
    }
    if (this.implicitEntry(indent, context, true)) this.nodeAt(start, SyntaxKind.FlowPair);
  }

  // ns-flow-map-entry(n,c)
  private flowMapEntry(indent: number, context: Context): void {
    const start = this.marker();
    if (this.atExplicitKey(context)) this.explicitEntry(indent, context);
    else this.implicitEntry(indent, context, false);
    this.nodeAt(start, SyntaxKind.FlowMapEntry);
  }

  private atExplicitKey(context: Context): boolean {
    return this.scanner.isChar('?') && !this.isPlainFirstAt(this.pos(), context);
  }

  private isEmptyKeyAt(index: number, context: Context): boolean {
    return this.scanner.charAt(index) === ':' && !this.isPlainFirstAt(index, context);
  }

  // ns-flow-map-explicit-entry(n,c)
  private explicitEntry(indent: number, context: Context): void {
    const start = this.pos();
    this.scanner.bump();
    this.token(SyntaxKind.QuestionMark, start);
    const next = this.indexPastSeparator(context);
    if (!this.startsFlowNodeAt(next, context) && !this.isEmptyKeyAt(next, context)) return;
    this.trySeparator(indent, context);
    this.implicitEntry(indent, context, false);
  }

  /**
   * ns-flow-map-implicit-entry(n,c), or ns-flow-pair-entry(n,c) when `singleLineKey` is set.
   * Returns whether a value indicator followed the key.
   */
  private implicitEntry(indent: number, context: Context, singleLineKey: boolean): boolean {
    if (this.isEmptyKeyAt(this.pos(), context)) {
      this.flowMapValue(indent, context, false);
      return true;
    }
    const key = this.marker();
    const json = this.flowNode(indent, context);
    const keyEnd = this.pos();
    const next = singleLineKey
      ? this.scanner.indexPast(isWhitespace)
      : this.indexPastSeparator(context);
    if (!this.isValueIndicatorAt(next, context, json)) return false;

    if (singleLineKey && /[\r\n]/.test(this.scanner.text.slice(key.pos, keyEnd))) {
      this.nodeAt(key, SyntaxKind.Error);
      this.report({ start: key.pos, end: keyEnd }, 'implicit key must be on a single line');
    }
    if (singleLineKey) this.tryInlineSeparator();
    else this.trySeparator(indent, context);
    this.flowMapValue(indent, context, json);
    return true;
  }

  private isValueIndicatorAt(index: number, context: Context, adjacent: boolean): boolean {
    if (this.scanner.charAt(index) !== ':') return false;
    if (adjacent) return true;
    const after = this.scanner.charAt(index + 1);
    return after === undefined || !isPlainSafe(after, context);
  }

  // c-ns-flow-map-separate-value(n,c), or c-ns-flow-map-adjacent-value(n,c) after a JSON-like key
  private flowMapValue(indent: number, context: Context, adjacent: boolean): void {
    const start = this.pos();
    this.scanner.bump();
    this.token(SyntaxKind.Colon, start);
    if (!this.startsFlowNodeAt(this.indexPastSeparator(context), context)) return;
    if (this.trySeparator(indent, context) || adjacent) this.flowNode(indent, context);
  }

  // c-single-quoted(n,c)
  singleQuoted(indent: number, context: Context): void {
    this.quoted(indent, context, "'");
  }

  // c-double-quoted(n,c)
  doubleQuoted(indent: number, context: Context): void {
    this.quoted(indent, context, '"');
  }

  private quoted(indent: number, context: Context, quote: "'" | '"'): void {
    const single = quote === "'";
    const quoteKind = single ? SyntaxKind.SingleQuote : SyntaxKind.DoubleQuote;
    const style = single ? 'single-quoted' : 'double-quoted';
    const start = this.marker();
    if (!this.scanner.eatChar(quote)) {
      return this.error(start.pos, `expected ${quote}`, recoveryPredicate(context));
    }
    this.token(quoteKind, start.pos);

    let text = this.pos();
    for (;;) {
      const ch = this.scanner.peek();
      if (ch === undefined) {
        this.token(SyntaxKind.QuotedText, text);
        this.error(this.pos(), `unterminated ${style} scalar`, stopHere);
        break;
      }
      if (single && ch === "'" && this.scanner.peekNext() === "'") {
        this.token(SyntaxKind.QuotedText, text);
        const escape = this.pos();
        this.scanner.bump();
        this.scanner.bump();
        this.token(SyntaxKind.EscapeSequence, escape);
        text = this.pos();
        continue;
      }
      if (ch === quote) {
        this.token(SyntaxKind.QuotedText, text);
        const end = this.pos();
        this.scanner.bump();
        this.token(quoteKind, end);
        break;
      }
      if (!single && ch === '\\') {
        this.token(SyntaxKind.QuotedText, text);
        this.escapeSequence();
        text = this.pos();
        continue;
      }
      if (isSeparator(ch) && this.isBreakAt(this.scanner.indexPast(isWhitespace))) {
        this.token(SyntaxKind.QuotedText, text);
        if (!this.quotedLineBreak(indent, context, style)) break;
        text = this.pos();
        continue;
      }
      if (!isJson(ch)) {
        this.token(SyntaxKind.QuotedText, text);
        const bad = this.pos();
        this.scanner.bump();
        this.errorToken({ start: bad, end: this.pos() }, `invalid character in ${style} scalar`);
        text = this.pos();
        continue;
      }
      this.scanner.bump();
    }
    this.nodeAt(start, single ? SyntaxKind.SingleQuoted : SyntaxKind.DoubleQuoted);
  }

  // s-flow-folded(n) inside a quoted scalar; returns false when the scalar cannot continue
  private quotedLineBreak(indent: number, context: Context, style: string): boolean {
    this.inlineSeparator();
    if (!allowsMultiLine(context)) {
      this.error(this.pos(), `${style} scalar in a key must be on a single line`, stopHere);
      return false;
    }
    this.lineBreak();
    while (this.isBreakAt(this.scanner.indexPast(isWhitespace))) {
      this.inlineSeparator();
      this.lineBreak();
    }
    if (this.atDocumentBoundary()) {
      this.error(this.pos(), `unterminated ${style} scalar`, stopHere);
      return false;
    }
    this.flowLinePrefix(indent);
    return true;
  }

  // c-ns-esc-char, or the `\` of an escaped line break
  private escapeSequence(): void {
    const start = this.pos();
    this.scanner.bump();
    const ch = this.scanner.peek();
    if (ch !== undefined && isBreak(ch)) return this.token(SyntaxKind.EscapeSequence, start);
    if (ch !== undefined && SIMPLE_ESCAPES.has(ch)) {
      this.scanner.bump();
      return this.token(SyntaxKind.EscapeSequence, start);
    }
    const digits = ch === undefined ? undefined : ESCAPE_HEX_DIGITS[ch];
    if (digits === undefined) {
      if (ch !== undefined) this.scanner.bump();
      return this.errorToken({ start, end: this.pos() }, 'invalid escape sequence');
    }
    this.scanner.bump();
    for (let i = 0; i < digits; i++) {
      if (!this.scanner.eat(isHexDigit)) {
        const message = `invalid escape sequence: expected ${digits} hex digits`;
        return this.errorToken({ start, end: this.pos() }, message);
      }
    }
    this.token(SyntaxKind.EscapeSequence, start);
  }

  // s-separate(n,c)
  trySeparator(indent: number, context: Context): boolean {
    return separatesAcrossLines(context)
      ? this.tryLineSeparator(indent)
      : this.tryInlineSeparator();
  }

  // s-separate-lines(n)
  tryLineSeparator(indent: number): boolean {
    const next = this.scanner.charAt(this.scanner.indexPast(isWhitespace));
    if (next === undefined || (next !== '#' && !isBreak(next))) return this.tryInlineSeparator();
    this.separatedLineComments();
    if (!this.scanner.isEndOfInput()) this.flowLinePrefix(indent);
    return true;
  }

  // s-separate-in-line; true at the start of a line without consuming anything
  tryInlineSeparator(): boolean {
    if (!this.scanner.isStartOfLine() && !this.scanner.is(isWhitespace)) return false;
    this.inlineSeparator();
    return true;
  }

  private inlineSeparator(): void {
    this.tokenAt(SyntaxKind.InlineSeparator, this.scanner.eatWhile(isWhitespace));
  }

  private lineBreak(): void {
    const start = this.pos();
    if (this.scanner.bump() === '\r') this.scanner.eatChar('\n');
    this.token(SyntaxKind.LineBreak, start);
  }

  // s-flow-line-prefix(n)
  flowLinePrefix(indent: number): void {
    const start = this.pos();
    const indentEnd = this.scanner.indexPast((ch) => ch === ' ');
    if (indentEnd - start < indent && this.scanner.charAt(indentEnd) !== undefined) {
      this.errorToken({ start, end: start }, `expected line to be indented ${indent} spaces`);
    }
    this.inlineSeparator();
  }

  // s-l-comments
  separatedLineComments(): void {
    if (this.scanner.isChar('#') && !this.scanner.isSeparatedAt(this.pos())) {
      this.error(this.pos(), 'comments must be separated from values', isBreak);
    } else {
      if (this.tryInlineSeparator() && this.scanner.isChar('#')) this.comment();
      const atLineEnd =
        this.scanner.isEndOfInput() || this.scanner.is(isBreak) || this.scanner.isStartOfLine();
      if (!atLineEnd) {
        this.error(this.pos(), 'expected end of line', isBreak);
      }
    }
    if (this.scanner.is(isBreak)) this.lineBreak();
    else if (!this.scanner.isStartOfLine()) return;
    this.lineComments();
  }

  // l-comment*
  lineComments(): void {
    while (this.scanner.isStartOfLine() || this.scanner.is(isWhitespace)) {
      const next = this.scanner.charAt(this.scanner.indexPast(isWhitespace));
      if (next !== undefined && next !== '#' && !isBreak(next)) return;
      this.inlineSeparator();
      if (this.scanner.isChar('#')) this.comment();
      if (!this.scanner.is(isBreak)) return;
      this.lineBreak();
    }
  }

  // c-nb-comment-text
  comment(): void {
    const start = this.marker();
    if (!this.scanner.eatChar('#')) return this.error(start.pos, "expected '#'", isBreak);
    this.token(SyntaxKind.CommentToken, start.pos);
    this.tokenAt(SyntaxKind.CommentText, this.scanner.eatWhile(isNonBreak));
    this.nodeAt(start, SyntaxKind.Comment);
  }

  private indexPastSeparator(context: Context): number {
    return separatesAcrossLines(context)
      ? this.scanner.indexPastSeparators()
      : this.scanner.indexPast(isWhitespace);
  }

  private followedBy(ch: string, context: Context): boolean {
    return this.scanner.charAt(this.indexPastSeparator(context)) === ch;
  }

  private pos(): number {
    return this.scanner.pos();
  }

  private marker(): Marker {
    return { pos: this.pos(), checkpoint: this.builder.checkpoint() };
  }

  private nodeAt(marker: Marker, kind: SyntaxKind): void {
    this.builder.startNodeAt(marker.checkpoint, kind);
    this.builder.finishNode();
  }

  private token(kind: SyntaxKind, start: number): void {
    this.tokenAt(kind, { start, end: this.pos() });
  }

  // Empty tokens are dropped, except `Error` tokens which mark where a construct was expected.
  private tokenAt(kind: SyntaxKind, span: Span): void {
    if (span.end === span.start && kind !== SyntaxKind.Error) return;
    this.builder.token(kind, this.scanner.slice(span));
  }

  /**
   * Skip input until `recover` accepts the next character (or input ends), then cover everything
   * from `start` with one `Error` token and record the diagnostic.
   */
  private error(
    start: number,
    message: string,
    recover: CharPredicate,
    id: DiagnosticId = DiagnosticIds.ParseError,
  ): void {
    while (!this.scanner.isEndOfInput() && !this.scanner.is(recover)) this.scanner.bump();
    this.errorToken({ start, end: this.pos() }, message, id);
  }

  private errorToken(
    span: Span,
    message: string,
    id: DiagnosticId = DiagnosticIds.ParseError,
  ): void {
    this.tokenAt(SyntaxKind.Error, span);
    this.report(span, message, id);
  }

  private report(span: Span, message: string, id: DiagnosticId = DiagnosticIds.ParseError): void {
    this.diagnostics.push({ id, severity: 'error', message, span });
  }
}
