import { describe, expect, it } from 'vitest';

import { SyntaxKind } from '../src/frontend/syntax.js';
import { childrenOfKind, findAll, textOf } from '../src/frontend/tree.js';
import { dump, messages, parseText } from './helpers/tree.js';

describe('stream and documents', () => {
  it('parses nothing from empty input', () => {
    const res = parseText('');
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual(['Root']);
  });

  it('splits a stream into explicit documents', () => {
    const res = parseText('--- [a]\n...\n--- b\n');
    expect(res.diagnostics).toEqual([]);
    const documents = childrenOfKind(res.tree, SyntaxKind.Document);
    expect(documents.map(textOf)).toEqual(['--- [a]\n...\n', '--- b\n']);
    expect(findAll(res.tree, SyntaxKind.DirectivesEnd)).toHaveLength(2);
    expect(findAll(res.tree, SyntaxKind.DocumentEnd)).toHaveLength(1);
  });

  it('parses an explicit empty document', () => {
    const res = parseText('---\n...\n');
    expect(res.diagnostics).toEqual([]);
    expect(dump(res.tree)).toEqual([
      'Root',
      '  Document',
      '    DirectivesEnd "---"',
      '    LineBreak "\\n"',
      '    DocumentEnd "..."',
      '    LineBreak "\\n"',
    ]);
  });

  it('keeps a leading byte order mark and comments outside the document', () => {
    const res = parseText('\uFEFF# head\n[a] # tail\n');
    expect(res.diagnostics).toEqual([]);
    expect(res.tree.children.map((c) => c.kind)).toEqual([
      'ByteOrderMark',
      'Comment',
      'LineBreak',
      'Document',
    ]);
    expect(findAll(res.tree, SyntaxKind.Comment).map(textOf)).toEqual(['# head', '# tail']);
  });

  it('requires a directives end marker after directives', () => {
    const res = parseText('%YAML 1.2\n[a]');
    expect(res.diagnostics).toEqual([
      {
        id: 'YML100',
        severity: 'error',
        message: "expected '---' after directives",
        span: { start: 10, end: 10 },
      },
    ]);
    const [document] = childrenOfKind(res.tree, SyntaxKind.Document);
    expect(document?.type === 'node' ? document.children.map((c) => c.kind) : []).toEqual([
      'Directive',
      'Error',
      'FlowNode',
    ]);
  });

  it('accepts a directive document with a tagged root node', () => {
    const res = parseText('%TAG !e! tag:example.com,2000:\n--- !e!root [x]\n');
    expect(res.diagnostics).toEqual([]);
    expect(findAll(res.tree, SyntaxKind.TagDirective)).toHaveLength(1);
    expect(findAll(res.tree, SyntaxKind.TagSuffix).map(textOf)).toEqual(['root']);
    expect(findAll(res.tree, SyntaxKind.FlowSequence).map(textOf)).toEqual(['[x]']);
  });

  it('reports block content once and resumes at the next document', () => {
    const res = parseText('- a\n- b\n---\n[c]\n');
    expect(res.diagnostics).toEqual([
      {
        id: 'YML100',
        severity: 'error',
        message: 'block-style content is not supported',
        span: { start: 0, end: 8 },
      },
    ]);
    expect(childrenOfKind(res.tree, SyntaxKind.Document).map(textOf)).toEqual([
      '- a\n- b\n',
      '---\n[c]\n',
    ]);
  });

  it('reports a block mapping after its first key', () => {
    const res = parseText('key: value\n');
    expect(messages(res)).toEqual(['block-style content is not supported']);
    expect(res.diagnostics[0]?.span).toEqual({ start: 3, end: 11 });
    expect(findAll(res.tree, SyntaxKind.PlainText).map(textOf)).toEqual(['key']);
  });

  it('reports text after the root node', () => {
    const sameLine = parseText('[a] b');
    expect(messages(sameLine)).toEqual(['expected end of line']);
    expect(sameLine.diagnostics[0]?.span).toEqual({ start: 4, end: 5 });

    const nextLine = parseText('[a]\n[b]\n');
    expect(messages(nextLine)).toEqual(['expected end of document']);
    expect(nextLine.diagnostics[0]?.span).toEqual({ start: 4, end: 8 });
  });

  it('parses a multi-line plain scalar as the root node', () => {
    const res = parseText('hello\n  world # done\n');
    expect(res.diagnostics).toEqual([]);
    expect(findAll(res.tree, SyntaxKind.PlainScalar).map(textOf)).toEqual(['hello\n  world']);
    expect(findAll(res.tree, SyntaxKind.Comment).map(textOf)).toEqual(['# done']);
  });

  it('accepts CRLF line breaks', () => {
    const res = parseText('--- [a,\r\n b]\r\n');
    expect(res.diagnostics).toEqual([]);
    expect(findAll(res.tree, SyntaxKind.LineBreak).map(textOf)).toEqual(['\r\n', '\r\n']);
  });
});
