import { internalError } from '../diagnostics/internal.js';
import type { Span, SyntaxElement, SyntaxKind, SyntaxNode, SyntaxToken } from './syntax.js';

type GreenToken = { kind: SyntaxKind; text: string };
type GreenNode = { kind: SyntaxKind; children: GreenElement[] };
type GreenElement = GreenToken | GreenNode;

/**
 * Position in a tree under construction, see {@link TreeBuilder.startNodeAt}.
 */
export interface Checkpoint {
  readonly index: number;
}

/**
 * Incremental builder for a lossless syntax tree.
 *
 * Completed siblings live on one flat stack; each open node remembers where its first child sits on
 * that stack. Finishing a node splices its children off the stack and pushes the node in their
 * place, so a node can be opened after some of its children were already emitted
 * ({@link startNodeAt}) without moving anything.
 */
export class TreeBuilder {
  private readonly parents: Array<{ kind: SyntaxKind; first: number }> = [];
  private readonly children: GreenElement[] = [];

  startNode(kind: SyntaxKind): void {
    this.parents.push({ kind, first: this.children.length });
  }

  finishNode(): void {
    const parent = this.parents.pop();
    if (!parent) internalError('finishNode called with no open node');
    const children = this.children.splice(parent.first);
    this.children.push({ kind: parent.kind, children });
  }

  token(kind: SyntaxKind, text: string): void {
    this.children.push({ kind, text });
  }

  checkpoint(): Checkpoint {
    return { index: this.children.length };
  }

  /**
   * Open a node whose children are every sibling emitted since `checkpoint`.
   *
   * The checkpoint must have been taken inside the node that is currently open.
   */
  startNodeAt(checkpoint: Checkpoint, kind: SyntaxKind): void {
    const open = this.parents[this.parents.length - 1];
    if (checkpoint.index > this.children.length || (open && checkpoint.index < open.first)) {
      internalError(`checkpoint ${checkpoint.index} is outside the open node`);
    }
    this.parents.push({ kind, first: checkpoint.index });
  }

  finish(): SyntaxNode {
    const root = this.children[0];
    if (this.parents.length > 0 || this.children.length !== 1 || !root || !('children' in root)) {
      internalError('finish called before the tree was closed into a single root node');
    }
    return toRed(root, 0);
  }
}

function toRed(green: GreenNode, offset: number): SyntaxNode {
  const children: SyntaxElement[] = [];
  let end = offset;
  for (const child of green.children) {
    if ('text' in child) {
      const token: SyntaxToken = {
        type: 'token',
        kind: child.kind,
        span: { start: end, end: end + child.text.length },
        text: child.text,
      };
      children.push(token);
      end = token.span.end;
    } else {
      const node = toRed(child, end);
      children.push(node);
      end = node.span.end;
    }
  }
  return { type: 'node', kind: green.kind, span: { start: offset, end }, children };
}

/**
 * An empty root of the given kind, used when there is no text to build a tree from.
 */
export function emptyNode(kind: SyntaxKind, at = 0): SyntaxNode {
  const span: Span = { start: at, end: at };
  return { type: 'node', kind, span, children: [] };
}

/**
 * Depth-first pre-order walk, starting with `element` itself.
 */
export function* descendants(element: SyntaxElement): Generator<SyntaxElement> {
  yield element;
  if (element.type === 'node') {
    for (const child of element.children) yield* descendants(child);
  }
}

/**
 * All tokens under `element`, in document order.
 */
export function tokensOf(element: SyntaxElement): SyntaxToken[] {
  const out: SyntaxToken[] = [];
  for (const e of descendants(element)) {
    if (e.type === 'token') out.push(e);
  }
  return out;
}

/**
 * Exact source text covered by `element`.
 */
export function textOf(element: SyntaxElement): string {
  if (element.type === 'token') return element.text;
  return tokensOf(element)
    .map((t) => t.text)
    .join('');
}

/**
 * Every node or token of `kind` under `element` (inclusive), in pre-order.
 */
export function findAll(element: SyntaxElement, kind: SyntaxKind): SyntaxElement[] {
  const out: SyntaxElement[] = [];
  for (const e of descendants(element)) {
    if (e.kind === kind) out.push(e);
  }
  return out;
}

/**
 * Direct children of `node` with the given kind.
 */
export function childrenOfKind(node: SyntaxNode, kind: SyntaxKind): SyntaxElement[] {
  return node.children.filter((c) => c.kind === kind);
}
