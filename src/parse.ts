import { readFile } from 'node:fs/promises';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { decode } from './frontend/encoding.js';
import { Parser } from './frontend/parser.js';
import { SyntaxKind } from './frontend/syntax.js';
import { emptyNode } from './frontend/tree.js';
import { DEFAULT_MAX_NESTING_DEPTH } from './pipeline.js';
import type { ParseFn, ParseOptions, ParseResult } from './pipeline.js';

function resolveMaxNestingDepth(options: ParseOptions): number {
  const depth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  if (!Number.isInteger(depth) || depth < 1) {
    throw new RangeError(`maxNestingDepth must be a positive integer, got ${depth}`);
  }
  return depth;
}

/**
 * Parse a YAML stream into a lossless syntax tree.
 *
 * Never throws for malformed input: encoding and grammar problems are reported as diagnostics.
 * Throws a `RangeError` for invalid options, and an `InternalParserError` if the parser itself
 * misbehaves.
 */
export const parse: ParseFn = (bytes: Uint8Array, options: ParseOptions = {}): ParseResult => {
  const maxNestingDepth = resolveMaxNestingDepth(options);
  const decoded = decode(bytes);
  if (decoded.kind === 'error') {
    const diagnostic: Diagnostic = {
      id: DiagnosticIds.InvalidEncoding,
      severity: 'error',
      message: decoded.message,
      span: { start: 0, end: 0 },
    };
    return { tree: emptyNode(SyntaxKind.Error), diagnostics: [diagnostic] };
  }

  const parser = new Parser(decoded.text, maxNestingDepth);
  parser.stream();
  return parser.finish();
};

/**
 * Read `path` and {@link parse} its contents. File system errors propagate unchanged.
 */
export async function parseFile(path: string, options: ParseOptions = {}): Promise<ParseResult> {
  const bytes = await readFile(path);
  return parse(bytes, options);
}
