import type { Diagnostic } from './diagnostics/types.js';
import type { SyntaxNode } from './frontend/syntax.js';

/** Nesting depth allowed when {@link ParseOptions.maxNestingDepth} is not given. */
export const DEFAULT_MAX_NESTING_DEPTH = 256;

/**
 * Options that influence parsing.
 */
export interface ParseOptions {
  /**
   * Deepest flow collection nesting that is parsed normally.
   *
   * A collection nested deeper is skipped as a single `Error` token with one `YML101` diagnostic.
   * Must be a positive integer.
   */
  maxNestingDepth?: number;
}

/**
 * Result of a parse: the lossless tree plus diagnostics ordered by where they start.
 *
 * The tree's text always equals the decoded input, whatever the diagnostics say.
 */
export interface ParseResult {
  tree: SyntaxNode;
  diagnostics: Diagnostic[];
}

/**
 * Top-level parse function signature.
 */
export type ParseFn = (bytes: Uint8Array, options?: ParseOptions) => ParseResult;
