/**
 * Syntax tree contracts for the pipeline YAML front end.
 *
 * This module defines kinds and tree shapes only (no parsing). The tree is lossless: concatenating
 * the text of every token in document order reproduces the decoded input exactly.
 */

/**
 * Half-open `[start, end)` range of offsets into the decoded text.
 *
 * Offsets are UTF-16 code unit indexes of the decoded string.
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Closed set of token and node kinds.
 *
 * Comments name the YAML 1.2 production each kind corresponds to, where there is one.
 */
export const SyntaxKind = {
  /** Reserved for malformed input, both as a token and as a node. */
  Error: 'Error',
  Root: 'Root',

  // Tokens.
  /** c-byte-order-mark */
  ByteOrderMark: 'ByteOrderMark',
  /** Whitespace run (s-separate-in-line, s-indent). */
  InlineSeparator: 'InlineSeparator',
  /** b-break, with `\r\n` as a single token. */
  LineBreak: 'LineBreak',
  /** `#` of c-comment */
  CommentToken: 'CommentToken',
  /** c-nb-comment-text, without the `#` */
  CommentText: 'CommentText',
  /** `%` of c-directive */
  DirectiveToken: 'DirectiveToken',
  /** ns-directive-name */
  DirectiveName: 'DirectiveName',
  /** ns-directive-parameter */
  DirectiveParameter: 'DirectiveParameter',
  /** ns-yaml-version */
  YamlVersion: 'YamlVersion',
  /** c-primary-tag-handle `!` */
  PrimaryTagHandle: 'PrimaryTagHandle',
  /** c-secondary-tag-handle `!!` */
  SecondaryTagHandle: 'SecondaryTagHandle',
  /** c-named-tag-handle `!name!` */
  NamedTagHandle: 'NamedTagHandle',
  /** ns-tag-prefix */
  TagPrefix: 'TagPrefix',
  /** ns-tag-char+ following a shorthand tag handle */
  TagSuffix: 'TagSuffix',
  /** c-non-specific-tag `!` */
  NonSpecificTag: 'NonSpecificTag',
  /** `!<` */
  VerbatimTagStart: 'VerbatimTagStart',
  /** ns-uri-char+ inside a verbatim tag */
  VerbatimTag: 'VerbatimTag',
  /** `>` */
  VerbatimTagEnd: 'VerbatimTagEnd',
  /** `&` */
  AnchorToken: 'AnchorToken',
  /** `*` */
  AliasToken: 'AliasToken',
  /** ns-anchor-name */
  AnchorName: 'AnchorName',
  /** c-directives-end `---` */
  DirectivesEnd: 'DirectivesEnd',
  /** c-document-end `...` */
  DocumentEnd: 'DocumentEnd',
  SequenceStart: 'SequenceStart',
  SequenceEnd: 'SequenceEnd',
  MappingStart: 'MappingStart',
  MappingEnd: 'MappingEnd',
  /** c-collect-entry `,` */
  Comma: 'Comma',
  /** c-mapping-key `?` */
  QuestionMark: 'QuestionMark',
  /** c-mapping-value `:` */
  Colon: 'Colon',
  SingleQuote: 'SingleQuote',
  DoubleQuote: 'DoubleQuote',
  /** Literal run of quoted scalar content on one line. */
  QuotedText: 'QuotedText',
  /** c-quoted-quote `''`, c-ns-esc-char, or an escaped line break. */
  EscapeSequence: 'EscapeSequence',
  /** Run of plain scalar content on one line. */
  PlainText: 'PlainText',

  // Nodes.
  Document: 'Document',
  /** l-directive */
  Directive: 'Directive',
  /** ns-yaml-directive */
  YamlDirective: 'YamlDirective',
  /** ns-tag-directive */
  TagDirective: 'TagDirective',
  /** ns-reserved-directive */
  ReservedDirective: 'ReservedDirective',
  /** c-nb-comment-text including `#` */
  Comment: 'Comment',
  /** c-ns-properties */
  Properties: 'Properties',
  /** c-ns-tag-property */
  TagProperty: 'TagProperty',
  /** c-ns-anchor-property */
  AnchorProperty: 'AnchorProperty',
  /** c-ns-alias-node */
  AliasNode: 'AliasNode',
  /** ns-flow-node */
  FlowNode: 'FlowNode',
  /** c-flow-sequence */
  FlowSequence: 'FlowSequence',
  /** c-flow-mapping */
  FlowMapping: 'FlowMapping',
  /** ns-flow-map-entry */
  FlowMapEntry: 'FlowMapEntry',
  /** ns-flow-pair, a single-pair mapping inside a flow sequence */
  FlowPair: 'FlowPair',
  /** ns-plain */
  PlainScalar: 'PlainScalar',
  /** c-single-quoted */
  SingleQuoted: 'SingleQuoted',
  /** c-double-quoted */
  DoubleQuoted: 'DoubleQuoted',
} as const;

/**
 * Union type of all syntax kinds.
 */
export type SyntaxKind = (typeof SyntaxKind)[keyof typeof SyntaxKind];

/**
 * Leaf of the tree: a kind plus the exact source text it covers.
 */
export interface SyntaxToken {
  readonly type: 'token';
  readonly kind: SyntaxKind;
  readonly span: Span;
  readonly text: string;
}

/**
 * Interior node of the tree. Its span is the union of its children's spans.
 */
export interface SyntaxNode {
  readonly type: 'node';
  readonly kind: SyntaxKind;
  readonly span: Span;
  readonly children: readonly SyntaxElement[];
}

export type SyntaxElement = SyntaxNode | SyntaxToken;
