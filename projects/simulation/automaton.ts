import type { ConstGraph, StateId } from '../ir-graph/graph.js';
import { epsilonClosure, findTarget, move } from '../ir-graph/traversal.js';
import { codePoints } from '../utils/iter.js';
import { NumberSet } from '../utils/sets.js';

/**
 * Stepwise access to a deterministic or non-deterministic automaton.
 */
export interface Automaton<S> {
  /**
   * The state before any input is read, or null when nothing can match
   */
  initialState(): S | null;

  /**
   * The state after reading `symbol`, or null when the automaton is stuck
   */
  nextState(state: S, symbol: number): S | null;

  isFinalState(state: S): boolean;

  /**
   * Accept tags of the state, for multi-pattern automata
   */
  finalTags(state: S): number[];
}

/**
 * Runs an NFA directly by tracking the epsilon-closed set of states it
 * could be in.
 */
export class NFASimulator implements Automaton<NumberSet> {
  constructor(private readonly graph: ConstGraph) {}

  initialState(): NumberSet | null {
    const states = epsilonClosure(this.graph, [this.graph.getStartState()]);
    return states.size > 0 ? states : null;
  }

  nextState(state: NumberSet, symbol: number): NumberSet | null {
    const next = epsilonClosure(this.graph, move(this.graph, state, symbol));
    return next.size > 0 ? next : null;
  }

  isFinalState(state: NumberSet): boolean {
    for (const s of state) {
      if (this.graph.isAcceptingState(s)) {
        return true;
      }
    }
    return false;
  }

  finalTags(state: NumberSet): number[] {
    const tags: Set<number> = new Set();
    for (const s of state) {
      for (const tag of this.graph.getAcceptTags(s)) {
        tags.add(tag);
      }
    }
    return [...tags].sort((a, b) => a - b);
  }
}

export class DFASimulator implements Automaton<StateId> {
  constructor(private readonly graph: ConstGraph) {}

  initialState(): StateId {
    return this.graph.getStartState();
  }

  nextState(state: StateId, symbol: number): StateId | null {
    return findTarget(this.graph, state, symbol);
  }

  isFinalState(state: StateId): boolean {
    return this.graph.isAcceptingState(state);
  }

  finalTags(state: StateId): number[] {
    return [...this.graph.getAcceptTags(state)];
  }
}

/**
 * Run the automaton over the whole input.
 *
 * @returns the final state, or null if the automaton got stuck
 */
export function run<S>(
  automaton: Automaton<S>,
  symbols: Iterable<number>
): S | null {
  let state = automaton.initialState();
  for (const symbol of symbols) {
    if (state === null) {
      return null;
    }
    state = automaton.nextState(state, symbol);
  }
  return state;
}

export function accepts<S>(
  automaton: Automaton<S>,
  symbols: Iterable<number> | string
): boolean {
  const state = run(
    automaton,
    typeof symbols == 'string' ? codePoints(symbols) : symbols
  );
  return state !== null && automaton.isFinalState(state);
}

/**
 * Tags of the patterns that accept the whole input, or an empty array.
 */
export function acceptingTags<S>(
  automaton: Automaton<S>,
  symbols: Iterable<number> | string
): number[] {
  const state = run(
    automaton,
    typeof symbols == 'string' ? codePoints(symbols) : symbols
  );
  if (state === null || !automaton.isFinalState(state)) {
    return [];
  }
  return automaton.finalTags(state);
}
