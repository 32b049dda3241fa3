import { describe, expect, it } from 'vitest';

import { SyntaxKind } from '../src/frontend/syntax.js';
import { findAll, textOf } from '../src/frontend/tree.js';
import { dump, messages, parseWith } from './helpers/tree.js';
import type { Context } from '../src/frontend/context.js';

const plain = (text: string, context: Context) => parseWith(text, (p) => p.plainScalar(0, context));
const plainTexts = (text: string, context: Context) =>
  findAll(plain(text, context).tree, SyntaxKind.PlainText).map(textOf);

describe('plain scalars', () => {
  it('stops at a flow indicator inside a flow collection', () => {
    const res = plain('a,b', 'FlowIn');
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual(['Root', '  PlainScalar', '    PlainText "a"']);
  });

  it('keeps flow indicators in a block key', () => {
    expect(plainTexts('a,b', 'BlockKey')).toEqual(['a,b']);
    expect(plainTexts('a,b', 'FlowOut')).toEqual(['a,b']);
  });

  it('keeps inner whitespace and stops before a comment or a value indicator', () => {
    expect(plainTexts('a b  c', 'FlowIn')).toEqual(['a b  c']);
    expect(plainTexts('a # c', 'FlowOut')).toEqual(['a']);
    expect(plainTexts('a#b', 'FlowOut')).toEqual(['a#b']);
    expect(plainTexts('a: b', 'FlowOut')).toEqual(['a']);
    expect(plainTexts('a:b', 'FlowIn')).toEqual(['a:b']);
    expect(plainTexts('-a', 'FlowIn')).toEqual(['-a']);
  });

  it('folds continuation lines', () => {
    const res = plain('a\n  b\n\n c', 'FlowOut');
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  PlainScalar',
      '    PlainText "a"',
      '    LineBreak "\\n"',
      '    InlineSeparator "  "',
      '    PlainText "b"',
      '    LineBreak "\\n"',
      '    LineBreak "\\n"',
      '    InlineSeparator " "',
      '    PlainText "c"',
    ]);
  });

  it('does not continue past a document marker, a comment line or in a key', () => {
    expect(plainTexts('a\n---', 'FlowOut')).toEqual(['a']);
    expect(plainTexts('a\n# c', 'FlowOut')).toEqual(['a']);
    expect(plainTexts('a\nb', 'FlowKey')).toEqual(['a']);
  });

  it('reports a character that cannot start a plain scalar', () => {
    const res = plain('- a', 'FlowIn');
    expect(messages(res)).toEqual(['expected plain scalar']);
  });
});

describe('single-quoted scalars', () => {
  it("unescapes nothing but marks '' as an escape", () => {
    const res = parseWith("'it''s'", (p) => p.singleQuoted(0, 'FlowOut'));
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  SingleQuoted',
      '    SingleQuote "\'"',
      '    QuotedText "it"',
      '    EscapeSequence "\'\'"',
      '    QuotedText "s"',
      '    SingleQuote "\'"',
    ]);
  });

  it('separates line folding from the text', () => {
    const res = parseWith("'a  \n\n  b'", (p) => p.singleQuoted(0, 'FlowOut'));
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  SingleQuoted',
      '    SingleQuote "\'"',
      '    QuotedText "a"',
      '    InlineSeparator "  "',
      '    LineBreak "\\n"',
      '    LineBreak "\\n"',
      '    InlineSeparator "  "',
      '    QuotedText "b"',
      '    SingleQuote "\'"',
    ]);
  });

  it('reports a missing closing quote', () => {
    const res = parseWith("'abc", (p) => p.singleQuoted(0, 'FlowIn'));
    expect(res.diagnostics).toEqual([
      {
        id: 'YML100',
        severity: 'error',
        message: 'unterminated single-quoted scalar',
        span: { start: 4, end: 4 },
      },
    ]);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  SingleQuoted',
      '    SingleQuote "\'"',
      '    QuotedText "abc"',
      '    Error ""',
    ]);
  });

  it('must stay on one line in a key', () => {
    const res = parseWith("'a\nb'", (p) => p.singleQuoted(0, 'FlowKey'));
    expect(messages(res)).toEqual(['single-quoted scalar in a key must be on a single line']);
    expect(res.diagnostics[0]?.span).toEqual({ start: 2, end: 2 });
    expect(textOf(res.tree)).toBe("'a");
  });

  it('ends at a document marker', () => {
    const res = parseWith("'a\n--- b'", (p) => p.singleQuoted(0, 'FlowOut'));
    expect(messages(res)).toEqual(['unterminated single-quoted scalar']);
    expect(textOf(res.tree)).toBe("'a\n");
  });
});

describe('double-quoted scalars', () => {
  it('tokenizes escape sequences', () => {
    const res = parseWith('"a\\tb\\x41\\u00e9"', (p) => p.doubleQuoted(0, 'FlowOut'));
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  DoubleQuoted',
      '    DoubleQuote "\\""',
      '    QuotedText "a"',
      '    EscapeSequence "\\\\t"',
      '    QuotedText "b"',
      '    EscapeSequence "\\\\x41"',
      '    EscapeSequence "\\\\u00e9"',
      '    DoubleQuote "\\""',
    ]);
  });

  it('recovers locally from an unknown escape', () => {
    const res = parseWith('"a\\qb"', (p) => p.doubleQuoted(0, 'FlowOut'));
    expect(res.diagnostics).toEqual([
      {
        id: 'YML100',
        severity: 'error',
        message: 'invalid escape sequence',
        span: { start: 2, end: 4 },
      },
    ]);
    expect(findAll(res.tree, SyntaxKind.QuotedText).map(textOf)).toEqual(['a', 'b']);
    expect(findAll(res.tree, SyntaxKind.DoubleQuote)).toHaveLength(2);
  });

  it('requires the full number of hex digits', () => {
    const res = parseWith('"\\x4"', (p) => p.doubleQuoted(0, 'FlowOut'));
    expect(messages(res)).toEqual(['invalid escape sequence: expected 2 hex digits']);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  DoubleQuoted',
      '    DoubleQuote "\\""',
      '    Error "\\\\x4"',
      '    DoubleQuote "\\""',
    ]);
  });

  it('keeps an escaped line break apart from the folding around it', () => {
    const res = parseWith('"a\\\n  b"', (p) => p.doubleQuoted(0, 'FlowOut'));
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  DoubleQuoted',
      '    DoubleQuote "\\""',
      '    QuotedText "a"',
      '    EscapeSequence "\\\\"',
      '    LineBreak "\\n"',
      '    InlineSeparator "  "',
      '    QuotedText "b"',
      '    DoubleQuote "\\""',
    ]);
  });

  it('accepts single quotes as text', () => {
    const res = parseWith('"it\'s"', (p) => p.doubleQuoted(0, 'FlowIn'));
    expect(res.diagnostics).toEqual([]);
    expect(findAll(res.tree, SyntaxKind.QuotedText).map(textOf)).toEqual(["it's"]);
  });
});
