import { ok, type Result } from 'neverthrow';
import { complementRanges, intersectRanges } from '../alphabet/partition.js';
import { UNICODE_SCALARS, type SymbolRange } from '../alphabet/ranges.js';
import { resolveOptions, type AutomataOptions } from '../config.js';
import { type AutomataError, resultOf } from '../errors.js';
import { type ConstGraph, IRGraph, type StateId } from '../ir-graph/graph.js';
import { isDeterministic } from '../ir-graph/traversal.js';
import { determinize } from '../nfa-to-dfa/determinize.js';

/**
 * Copy every state and transition of `source` into `dest`. When an
 * `alphabet` is given, range labels are clipped to it and transitions
 * left with no symbols are dropped.
 *
 * @returns an array mapping source state ids to their ids in `dest`
 */
function copyInto(
  source: ConstGraph,
  dest: IRGraph,
  alphabet?: readonly SymbolRange[]
): StateId[] {
  const stateMap: StateId[] = [];
  for (let si = 0; si < source.numStates; si++) {
    const state = dest.addState(source.isAcceptingState(si));
    for (const tag of source.getAcceptTags(si)) {
      dest.addAcceptTag(state, tag);
    }
    stateMap.push(state);
  }
  for (let si = 0; si < source.numStates; si++) {
    for (const { label, target } of source.getTransitions(si)) {
      if (label == null || alphabet === undefined) {
        dest.addTransition(stateMap[si], label, stateMap[target]);
        continue;
      }
      for (const range of intersectRanges([label], alphabet)) {
        dest.addTransition(stateMap[si], range, stateMap[target]);
      }
    }
  }
  return stateMap;
}

/**
 * The graph itself when it is already deterministic, otherwise its subset
 * construction.
 */
export function asDFA(
  graph: ConstGraph,
  options: AutomataOptions = {}
): Result<ConstGraph, AutomataError> {
  if (isDeterministic(graph)) {
    return ok(graph);
  }
  return determinize(graph, options);
}

/**
 * An NFA accepting every sequence either input accepts. A new start state
 * has epsilon transitions into copies of both.
 */
export function union(
  a: ConstGraph,
  b: ConstGraph,
  options: AutomataOptions = {}
): Result<IRGraph, AutomataError> {
  const { maxStates } = resolveOptions(options);
  return resultOf(() => {
    const graph = new IRGraph({ maxStates });
    const start = graph.addState();
    graph.setStartState(start);
    for (const source of [a, b]) {
      const stateMap = copyInto(source, graph);
      graph.addEpsilon(start, stateMap[source.getStartState()]);
    }
    return graph;
  });
}

function product(a: ConstGraph, b: ConstGraph, maxStates: number): IRGraph {
  const graph = new IRGraph({ maxStates });
  const pairs: [StateId, StateId][] = [];
  const ids: Map<string, StateId> = new Map();
  const stateFor = (x: StateId, y: StateId): StateId => {
    const key = `${x},${y}`;
    const existing = ids.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const state = graph.addState(
      a.isAcceptingState(x) && b.isAcceptingState(y)
    );
    ids.set(key, state);
    pairs.push([x, y]);
    return state;
  };

  graph.setStartState(stateFor(a.getStartState(), b.getStartState()));
  for (let si = 0; si < pairs.length; si++) {
    const [x, y] = pairs[si];
    for (const ta of a.getTransitions(x)) {
      for (const tb of b.getTransitions(y)) {
        if (ta.label == null || tb.label == null) {
          continue;
        }
        for (const range of intersectRanges([ta.label], [tb.label])) {
          graph.addTransition(si, range, stateFor(ta.target, tb.target));
        }
      }
    }
  }
  return graph;
}

/**
 * A DFA accepting the sequences both inputs accept, built as the product
 * of their DFAs over intersecting ranges.
 */
export function intersection(
  a: ConstGraph,
  b: ConstGraph,
  options: AutomataOptions = {}
): Result<IRGraph, AutomataError> {
  const { maxStates } = resolveOptions(options);
  return asDFA(a, options).andThen((left) =>
    asDFA(b, options).andThen((right) =>
      resultOf(() => product(left, right, maxStates))
    )
  );
}

export interface ComplementOptions extends AutomataOptions {
  /**
   * The symbols whose sequences the complement ranges over
   */
  domain?: readonly SymbolRange[];
}

/**
 * A DFA accepting exactly the sequences over `domain` that the input
 * rejects. The input's DFA is restricted to `domain`, completed with a
 * sink state and its acceptance flipped.
 */
export function complement(
  graph: ConstGraph,
  options: ComplementOptions = {}
): Result<IRGraph, AutomataError> {
  const { maxStates } = resolveOptions(options);
  const domain = options.domain ?? UNICODE_SCALARS;
  return asDFA(graph, options).andThen((dfa) =>
    resultOf(() => {
      const out = new IRGraph({ maxStates });
      const stateMap = copyInto(dfa, out, domain);
      out.setStartState(stateMap[dfa.getStartState()]);
      const sink = out.addState();
      for (let si = 0; si < out.numStates; si++) {
        const covered: SymbolRange[] = [];
        for (const { label } of out.getTransitions(si)) {
          if (label != null) {
            covered.push(label);
          }
        }
        for (const gap of complementRanges(covered, domain)) {
          out.addTransition(si, gap, sink);
        }
        out.setAccepting(si, !out.isAcceptingState(si));
      }
      return out;
    })
  );
}
