import { err, ok, Result } from 'neverthrow';
import {
  compareRanges,
  rangeContains,
  rangesOverlap,
  type SymbolRange,
} from '../alphabet/ranges.js';
import { NotDeterministicError } from '../errors.js';
import { NumberSet } from '../utils/sets.js';
import type { ConstGraph, StateId, Transition } from './graph.js';

/**
 * compute the epsilon closure of a set of states.
 *
 * @returns the set of states reachable from the given states by
 * following zero or more epsilon transitions
 */
export function epsilonClosure(
  graph: ConstGraph,
  states: Iterable<StateId>
): NumberSet {
  const visited: Set<StateId> = new Set();
  const stack = [...states];
  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    if (visited.has(current)) {
      continue;
    }
    visited.add(current);
    for (const { label, target } of graph.getTransitions(current)) {
      if (label == null && !visited.has(target)) {
        stack.push(target);
      }
    }
  }
  return new NumberSet(visited);
}

/**
 * move(T,a)
 *
 * Set of states to which there is a transition on input symbol a from
 * some state in T. Epsilon transitions are not followed.
 */
export function move(
  graph: ConstGraph,
  states: Iterable<StateId>,
  symbol: number
): NumberSet {
  const out: StateId[] = [];
  for (const state of states) {
    for (const { label, target } of graph.getTransitions(state)) {
      if (label != null && rangeContains(label, symbol)) {
        out.push(target);
      }
    }
  }
  return new NumberSet(out);
}

/**
 * Outgoing transitions of a state.
 */
export function outgoing(
  graph: ConstGraph,
  state: StateId
): readonly Transition[] {
  return graph.getTransitions(state);
}

/**
 * The state a deterministic graph moves to from `state` on `symbol`, or
 * null when no transition covers it.
 */
export function findTarget(
  graph: ConstGraph,
  state: StateId,
  symbol: number
): StateId | null {
  for (const { label, target } of graph.getTransitions(state)) {
    if (label != null && rangeContains(label, symbol)) {
      return target;
    }
  }
  return null;
}

/**
 * States reachable from the given states (the start state by default)
 * along any transition, in breadth-first order.
 */
export function reachableStates(
  graph: ConstGraph,
  from: Iterable<StateId> = [graph.getStartState()]
): StateId[] {
  const seen: Set<StateId> = new Set(from);
  const order = [...seen];
  for (let i = 0; i < order.length; i++) {
    for (const { target } of graph.getTransitions(order[i])) {
      if (!seen.has(target)) {
        seen.add(target);
        order.push(target);
      }
    }
  }
  return order;
}

/**
 * States from which some accepting state can be reached.
 */
export function productiveStates(graph: ConstGraph): Set<StateId> {
  const predecessors: StateId[][] = [];
  for (let si = 0; si < graph.numStates; si++) {
    predecessors.push([]);
  }
  for (let si = 0; si < graph.numStates; si++) {
    for (const { target } of graph.getTransitions(si)) {
      predecessors[target].push(si);
    }
  }
  const productive: Set<StateId> = new Set(graph.getAcceptingStates());
  const stack = [...productive];
  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    for (const pred of predecessors[current]) {
      if (!productive.has(pred)) {
        productive.add(pred);
        stack.push(pred);
      }
    }
  }
  return productive;
}

/**
 * Whether the automaton accepts the empty sequence.
 */
export function recognizesEmpty(graph: ConstGraph): boolean {
  for (const state of epsilonClosure(graph, [graph.getStartState()])) {
    if (graph.isAcceptingState(state)) {
      return true;
    }
  }
  return false;
}

/**
 * Check that no state has epsilon transitions or overlapping outgoing
 * ranges.
 */
export function checkDeterministic(
  graph: ConstGraph
): Result<void, NotDeterministicError> {
  for (let si = 0; si < graph.numStates; si++) {
    const ranges: SymbolRange[] = [];
    for (const { label } of graph.getTransitions(si)) {
      if (label == null) {
        return err(new NotDeterministicError(si, 'has an epsilon transition'));
      }
      ranges.push(label);
    }
    ranges.sort(compareRanges);
    for (let i = 1; i < ranges.length; i++) {
      if (rangesOverlap(ranges[i - 1], ranges[i])) {
        return err(
          new NotDeterministicError(si, 'has overlapping outgoing ranges')
        );
      }
    }
  }
  return ok(undefined);
}

export function isDeterministic(graph: ConstGraph): boolean {
  return checkDeterministic(graph).isOk();
}

/**
 * State-by-state equality: same start, same acceptance and tags, and the
 * same transitions in the same order.
 */
export function sameStructure(a: ConstGraph, b: ConstGraph): boolean {
  if (a.numStates != b.numStates || a.getStartState() != b.getStartState()) {
    return false;
  }
  for (let si = 0; si < a.numStates; si++) {
    if (a.isAcceptingState(si) != b.isAcceptingState(si)) {
      return false;
    }
    const aTags = a.getAcceptTags(si);
    const bTags = b.getAcceptTags(si);
    if (aTags.join(',') != bTags.join(',')) {
      return false;
    }
    const aTransitions = a.getTransitions(si);
    const bTransitions = b.getTransitions(si);
    if (aTransitions.length != bTransitions.length) {
      return false;
    }
    for (let ti = 0; ti < aTransitions.length; ti++) {
      const x = aTransitions[ti];
      const y = bTransitions[ti];
      if (x.target != y.target) {
        return false;
      }
      if (x.label == null || y.label == null) {
        if (x.label != y.label) {
          return false;
        }
      } else if (compareRanges(x.label, y.label) != 0) {
        return false;
      }
    }
  }
  return true;
}
