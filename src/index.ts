export { parse, parseFile } from './parse.js';
export { DEFAULT_MAX_NESTING_DEPTH } from './pipeline.js';
export type { ParseFn, ParseOptions, ParseResult } from './pipeline.js';

export { DiagnosticIds } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { isInternalParserError } from './diagnostics/internal.js';

export { SyntaxKind } from './frontend/syntax.js';
export type { Span, SyntaxElement, SyntaxNode, SyntaxToken } from './frontend/syntax.js';
export { childrenOfKind, descendants, findAll, textOf, tokensOf } from './frontend/tree.js';
export { decode, detectEncoding } from './frontend/encoding.js';
export type { DecodeResult, Encoding } from './frontend/encoding.js';
