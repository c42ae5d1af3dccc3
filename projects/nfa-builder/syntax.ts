import { formatRange } from '../alphabet/ranges.js';
import { codePoints } from '../utils/iter.js';

export enum NodeKind {
  EMPTY = 'EMPTY',
  SYMBOL = 'SYMBOL',
  CLASS = 'CLASS',
  CONCAT = 'CONCAT',
  ALT = 'ALT',
  REPEAT = 'REPEAT',
  GROUP = 'GROUP',
}

/**
 * A range as written by the parser. Unlike a SymbolRange it has not been
 * validated yet; the builder rejects `low > high`.
 */
export type RawRange = { readonly low: number; readonly high: number };

export type EmptyNode = { readonly kind: NodeKind.EMPTY };
export type SymbolNode = { readonly kind: NodeKind.SYMBOL; readonly symbol: number };
export type ClassNode = {
  readonly kind: NodeKind.CLASS;
  readonly ranges: readonly RawRange[];
  /**
   * Match every symbol of the alphabet domain except those in `ranges`
   */
  readonly negate: boolean;
};
export type ConcatNode = {
  readonly kind: NodeKind.CONCAT;
  readonly left: SyntaxNode;
  readonly right: SyntaxNode;
};
export type AltNode = {
  readonly kind: NodeKind.ALT;
  readonly left: SyntaxNode;
  readonly right: SyntaxNode;
};
export type RepeatNode = {
  readonly kind: NodeKind.REPEAT;
  readonly child: SyntaxNode;
  readonly min: number;
  /**
   * Inclusive upper bound, or null for no upper bound
   */
  readonly max: number | null;
};
export type GroupNode = {
  readonly kind: NodeKind.GROUP;
  readonly child: SyntaxNode;
};

export type SyntaxNode =
  | EmptyNode
  | SymbolNode
  | ClassNode
  | ConcatNode
  | AltNode
  | RepeatNode
  | GroupNode;

/**
 * Convert a one-character string to its code point, unless it is
 * already a number.
 */
export function toSymbol(s: number | string): number {
  if (typeof s == 'string') {
    const points = [...codePoints(s)];
    if (points.length != 1) {
      throw new Error(
        'Can only convert strings of length 1 to a symbol. Given: ' + s
      );
    }
    return points[0];
  }
  return s;
}

export function emptyNode(): EmptyNode {
  return { kind: NodeKind.EMPTY };
}
export function symbolNode(symbol: number | string): SymbolNode {
  return { kind: NodeKind.SYMBOL, symbol: toSymbol(symbol) };
}
export function rangeNode(low: number | string, high: number | string): ClassNode {
  return classNode([{ low: toSymbol(low), high: toSymbol(high) }]);
}
export function classNode(ranges: readonly RawRange[], negate = false): ClassNode {
  return { kind: NodeKind.CLASS, ranges, negate };
}
export function anyNode(): ClassNode {
  return classNode([], true);
}
export function concatNode(left: SyntaxNode | null, right: SyntaxNode): SyntaxNode {
  if (left == null) {
    return right;
  }
  return { kind: NodeKind.CONCAT, left, right };
}
export function altNode(left: SyntaxNode, right: SyntaxNode): AltNode {
  return { kind: NodeKind.ALT, left, right };
}
export function repeatNode(
  child: SyntaxNode,
  min: number,
  max: number | null
): RepeatNode {
  return { kind: NodeKind.REPEAT, child, min, max };
}
export function starNode(child: SyntaxNode) {
  return repeatNode(child, 0, null);
}
export function plusNode(child: SyntaxNode) {
  return repeatNode(child, 1, null);
}
export function optionalNode(child: SyntaxNode) {
  return repeatNode(child, 0, 1);
}
export function groupNode(child: SyntaxNode): GroupNode {
  return { kind: NodeKind.GROUP, child };
}

/**
 * Concatenation of the code points of a string. The empty string gives
 * an empty node.
 */
export function literalNode(s: string): SyntaxNode {
  let node: SyntaxNode | null = null;
  for (const symbol of codePoints(s)) {
    node = concatNode(node, symbolNode(symbol));
  }
  return node ?? emptyNode();
}

/**
 * Render a tree in conventional regex notation, for logs and test names.
 */
export function toPattern(node: SyntaxNode): string {
  switch (node.kind) {
    case NodeKind.EMPTY:
      return '()';
    case NodeKind.SYMBOL:
      return formatRange({ low: node.symbol, high: node.symbol });
    case NodeKind.CLASS: {
      if (node.negate && node.ranges.length == 0) {
        return '.';
      }
      const inner = node.ranges.map(formatRange).join('');
      return `[${node.negate ? '^' : ''}${inner}]`;
    }
    case NodeKind.CONCAT:
      return toPattern(node.left) + toPattern(node.right);
    case NodeKind.ALT:
      return `${toPattern(node.left)}|${toPattern(node.right)}`;
    case NodeKind.REPEAT: {
      const child = toPattern(node.child);
      const operand = needsParens(node.child) ? `(?:${child})` : child;
      if (node.max == null) {
        if (node.min == 0) return operand + '*';
        if (node.min == 1) return operand + '+';
        return `${operand}{${node.min},}`;
      }
      if (node.min == 0 && node.max == 1) return operand + '?';
      if (node.min == node.max) return `${operand}{${node.min}}`;
      return `${operand}{${node.min},${node.max}}`;
    }
    case NodeKind.GROUP:
      return `(${toPattern(node.child)})`;
  }
}

function needsParens(node: SyntaxNode) {
  return (
    node.kind == NodeKind.CONCAT ||
    node.kind == NodeKind.ALT ||
    node.kind == NodeKind.REPEAT
  );
}
