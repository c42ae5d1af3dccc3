/**
 * This file implements the McNaughton-Yamada-Thompson algorithm for
 * converting regular expressions to NFAs. You can find a description in
 * Section 3.7.4 of the dragon book (p. 159): "Construction of an NFA from
 * a Regular Expression".
 */

import type { Result } from 'neverthrow';
import { coalesceRanges, complementRanges } from '../alphabet/partition.js';
import {
  isValidRange,
  UNICODE_SCALARS,
  type SymbolRange,
} from '../alphabet/ranges.js';
import { resolveOptions, type AutomataOptions } from '../config.js';
import {
  type AutomataError,
  InvalidRangeError,
  InvalidRepetitionBoundError,
  resultOf,
} from '../errors.js';
import { IRGraph, type StateId } from '../ir-graph/graph.js';
import { NodeKind, type ClassNode, type RepeatNode, type SyntaxNode } from './syntax.js';

export interface BuildOptions extends AutomataOptions {
  /**
   * Symbols a negated class is complemented against
   */
  domain?: readonly SymbolRange[];
}

/**
 * A partially built piece of the graph: one entry state and the states
 * that still need to be connected to whatever follows.
 */
type Fragment = { entry: StateId; exits: StateId[] };

class FragmentBuilder {
  constructor(
    private readonly graph: IRGraph,
    private readonly domain: readonly SymbolRange[]
  ) {}

  build(node: SyntaxNode): Fragment {
    switch (node.kind) {
      case NodeKind.EMPTY: {
        const state = this.graph.addState();
        return { entry: state, exits: [state] };
      }
      case NodeKind.SYMBOL:
        if (!isValidRange(node.symbol, node.symbol)) {
          throw new InvalidRangeError(node.symbol, node.symbol);
        }
        return this.ranges([{ low: node.symbol, high: node.symbol }]);
      case NodeKind.CLASS:
        return this.ranges(this.classRanges(node));
      case NodeKind.CONCAT:
        return this.concat(this.build(node.left), this.build(node.right));
      case NodeKind.ALT: {
        const entry = this.graph.addState();
        const left = this.build(node.left);
        const right = this.build(node.right);
        this.graph.addEpsilon(entry, left.entry);
        this.graph.addEpsilon(entry, right.entry);
        return { entry, exits: [...left.exits, ...right.exits] };
      }
      case NodeKind.REPEAT:
        return this.repeat(node);
      case NodeKind.GROUP:
        return this.build(node.child);
      default: {
        const unknown: never = node;
        throw new Error(`Unrecognized syntax node ${JSON.stringify(unknown)}`);
      }
    }
  }

  private classRanges(node: ClassNode): SymbolRange[] {
    for (const { low, high } of node.ranges) {
      if (!isValidRange(low, high)) {
        throw new InvalidRangeError(low, high);
      }
    }
    const ranges = coalesceRanges(node.ranges);
    return node.negate ? complementRanges(ranges, this.domain) : ranges;
  }

  private ranges(ranges: SymbolRange[]): Fragment {
    const entry = this.graph.addState();
    const exit = this.graph.addState();
    for (const range of ranges) {
      this.graph.addTransition(entry, range, exit);
    }
    return { entry, exits: [exit] };
  }

  private concat(left: Fragment, right: Fragment): Fragment {
    for (const exit of left.exits) {
      this.graph.addEpsilon(exit, right.entry);
    }
    return { entry: left.entry, exits: right.exits };
  }

  private repeat(node: RepeatNode): Fragment {
    const { child, min, max } = node;
    if (
      !Number.isInteger(min) ||
      min < 0 ||
      (max != null && (!Number.isInteger(max) || max < min))
    ) {
      throw new InvalidRepetitionBoundError(min, max);
    }

    const copies: Fragment[] = [];
    for (let i = 0; i < min; i++) {
      copies.push(this.build(child));
    }
    if (max == null) {
      copies.push(this.optional(child, true));
    } else {
      for (let i = min; i < max; i++) {
        copies.push(this.optional(child, false));
      }
    }
    if (copies.length == 0) {
      return this.build({ kind: NodeKind.EMPTY });
    }
    return copies.reduce((left, right) => this.concat(left, right));
  }

  /**
   * A copy of `child` behind an entry state that can skip it. When
   * `loop` is set, the copy's exits lead back to its own entry.
   */
  private optional(child: SyntaxNode, loop: boolean): Fragment {
    const entry = this.graph.addState();
    const copy = this.build(child);
    this.graph.addEpsilon(entry, copy.entry);
    if (loop) {
      for (const exit of copy.exits) {
        this.graph.addEpsilon(exit, copy.entry);
      }
    }
    return { entry, exits: [entry, ...copy.exits] };
  }
}

/**
 * Compile a syntax tree into an NFA whose start state is the tree's entry
 * and whose accepting states are the tree's exits.
 *
 * Repetition bounds are fully unrolled, so `a{1,1000}` costs a thousand
 * copies of `a`. Use `maxStates` to cap the growth.
 */
export function buildNFA(
  tree: SyntaxNode,
  options: BuildOptions = {}
): Result<IRGraph, AutomataError> {
  const { maxStates } = resolveOptions(options);
  return resultOf(() => {
    const graph = new IRGraph({ maxStates });
    const { entry, exits } = new FragmentBuilder(
      graph,
      options.domain ?? UNICODE_SCALARS
    ).build(tree);
    graph.setStartState(entry);
    for (const exit of exits) {
      graph.setAccepting(exit, true);
    }
    return graph;
  });
}

/**
 * Compile several trees into one NFA. The start state has an epsilon
 * transition into each tree, and every accepting state of tree `i` is
 * tagged with `i`.
 */
export function buildCombinedNFA(
  trees: readonly SyntaxNode[],
  options: BuildOptions = {}
): Result<IRGraph, AutomataError> {
  const { maxStates } = resolveOptions(options);
  return resultOf(() => {
    const graph = new IRGraph({ maxStates });
    const builder = new FragmentBuilder(graph, options.domain ?? UNICODE_SCALARS);
    const start = graph.addState();
    graph.setStartState(start);
    for (const [ti, tree] of trees.entries()) {
      const { entry, exits } = builder.build(tree);
      graph.addEpsilon(start, entry);
      for (const exit of exits) {
        graph.addAcceptTag(exit, ti);
      }
    }
    return graph;
  });
}
