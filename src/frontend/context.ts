import { isBreak, isFlowIndicator, isNonWhitespace } from './chars.js';
import type { CharPredicate } from './scanner.js';

/**
 * Grammar context (YAML's `c` parameter): where a node sits, which decides separator, recovery and
 * plain scalar rules.
 */
export type Context = 'BlockIn' | 'BlockOut' | 'BlockKey' | 'FlowIn' | 'FlowOut' | 'FlowKey';

/**
 * Whether a separator may cross line boundaries (s-separate-lines) or must stay on one line.
 */
export function separatesAcrossLines(context: Context): boolean {
  return context !== 'BlockKey' && context !== 'FlowKey';
}

/**
 * Where error recovery stops skipping input. End of input always stops it too.
 */
export function recoveryPredicate(context: Context): CharPredicate {
  switch (context) {
    case 'BlockIn':
    case 'BlockOut':
    case 'BlockKey':
      return isBreak;
    case 'FlowIn':
    case 'FlowOut':
    case 'FlowKey':
      return isFlowIndicator;
  }
}

/**
 * ns-plain-safe(c): characters that may continue a plain scalar.
 *
 * Block contexts never hold a plain scalar directly; they use the permissive flow-out rule.
 */
export function isPlainSafe(ch: string, context: Context): boolean {
  switch (context) {
    case 'FlowIn':
    case 'FlowKey':
      return isNonWhitespace(ch) && !isFlowIndicator(ch);
    case 'FlowOut':
    case 'BlockKey':
    case 'BlockIn':
    case 'BlockOut':
      return isNonWhitespace(ch);
  }
}

/**
 * Plain scalars span lines except in key contexts.
 */
export function allowsMultiLine(context: Context): boolean {
  return separatesAcrossLines(context);
}

/**
 * in-flow(c): the context for entries of a flow collection found in `context`.
 */
export function inFlow(context: Context): Context {
  switch (context) {
    case 'FlowOut':
    case 'FlowIn':
    case 'BlockIn':
    case 'BlockOut':
      return 'FlowIn';
    case 'BlockKey':
    case 'FlowKey':
      return 'FlowKey';
  }
}
