/**
 * YAML 1.2 character classes. Every predicate takes a single code point as a string.
 */

const FLOW_INDICATORS = ',[]{}';
const INDICATORS = "-?:#&*!|>'\"%@`" + FLOW_INDICATORS;
const URI_PUNCTUATION = "%#;/?:@&=+$,_.!~*'()[]";

/** Escapes that take hex digits after the `\`, mapped to how many. */
export const ESCAPE_HEX_DIGITS: Readonly<Record<string, number>> = { x: 2, u: 4, U: 8 };

/** Single-character escapes of ns-esc-* (excluding line breaks and hex escapes). */
export const SIMPLE_ESCAPES: ReadonlySet<string> = new Set([
  '0', 'a', 'b', 't', '\t', 'n', 'v', 'f', 'r', 'e', ' ', '"', '/', '\\', 'N', '_', 'L', 'P',
]);

function code(ch: string): number {
  return ch.codePointAt(0) ?? -1;
}

// c-printable
export function isPrintable(ch: string): boolean {
  const c = code(ch);
  return (
    c === 0x09 ||
    c === 0x0a ||
    c === 0x0d ||
    (c >= 0x20 && c <= 0x7e) ||
    c === 0x85 ||
    (c >= 0xa0 && c <= 0xd7ff) ||
    (c >= 0xe000 && c <= 0xfffd) ||
    (c >= 0x10000 && c <= 0x10ffff)
  );
}

// b-char
export function isBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

// c-byte-order-mark
export function isByteOrderMark(ch: string): boolean {
  return ch === '\uFEFF';
}

// s-white
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

// nb-char
export function isNonBreak(ch: string): boolean {
  return isPrintable(ch) && !isBreak(ch) && !isByteOrderMark(ch);
}

// ns-char
export function isNonWhitespace(ch: string): boolean {
  return isNonBreak(ch) && !isWhitespace(ch);
}

// nb-json
export function isJson(ch: string): boolean {
  const c = code(ch);
  return c === 0x09 || (c >= 0x20 && c <= 0x10ffff);
}

// ns-dec-digit
export function isDecDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

// ns-hex-digit
export function isHexDigit(ch: string): boolean {
  return ch.length === 1 && /[0-9A-Fa-f]/.test(ch);
}

// ns-word-char
export function isWordChar(ch: string): boolean {
  return ch.length === 1 && /[0-9A-Za-z-]/.test(ch);
}

// c-indicator
export function isIndicator(ch: string): boolean {
  return ch.length === 1 && INDICATORS.includes(ch);
}

// c-flow-indicator
export function isFlowIndicator(ch: string): boolean {
  return ch.length === 1 && FLOW_INDICATORS.includes(ch);
}

// ns-anchor-char
export function isAnchorChar(ch: string): boolean {
  return isNonWhitespace(ch) && !isFlowIndicator(ch);
}

// ns-uri-char
export function isUriChar(ch: string): boolean {
  return isWordChar(ch) || (ch.length === 1 && URI_PUNCTUATION.includes(ch));
}

// ns-tag-char
export function isTagChar(ch: string): boolean {
  return isUriChar(ch) && !isFlowIndicator(ch) && ch !== '!';
}

export function isSeparator(ch: string): boolean {
  return isBreak(ch) || isWhitespace(ch);
}

export function isFlowIndicatorOrSeparator(ch: string): boolean {
  return isSeparator(ch) || isFlowIndicator(ch);
}
