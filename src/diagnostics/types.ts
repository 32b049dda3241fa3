import type { Span } from '../frontend/syntax.js';

/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info' | 'hint';

/**
 * A parser diagnostic (error/warning/info/hint) anchored to a span of the decoded text.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them. Line/column mapping is
 * left to the consumer; spans are offsets only.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `YML100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  span: Span;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Input bytes could not be decoded with the detected encoding. */
  InvalidEncoding: 'YML001',

  /** Generic parse error (expected construct absent or malformed). */
  ParseError: 'YML100',

  /** Flow collections nested deeper than the configured limit. */
  NestingTooDeep: 'YML101',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
