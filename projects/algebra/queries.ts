import type { Result } from 'neverthrow';
import type { AutomataOptions } from '../config.js';
import type { AutomataError } from '../errors.js';
import type { ConstGraph, StateId } from '../ir-graph/graph.js';
import { productiveStates, sameStructure } from '../ir-graph/traversal.js';
import { minimize } from '../nfa-to-dfa/minimize.js';
import { asDFA } from './combine.js';

/**
 * The canonical minimal DFA of any graph.
 */
export function canonicalize(
  graph: ConstGraph,
  options: AutomataOptions = {}
): Result<ConstGraph, AutomataError> {
  return asDFA(graph, options).andThen((dfa) => minimize(dfa, options));
}

/**
 * Whether two automata accept the same language (and, for tagged
 * automata, tag it the same way).
 */
export function equivalent(
  a: ConstGraph,
  b: ConstGraph,
  options: AutomataOptions = {}
): Result<boolean, AutomataError> {
  return canonicalize(a, options).andThen((left) =>
    canonicalize(b, options).map((right) => sameStructure(left, right))
  );
}

export function isEmptyLanguage(graph: ConstGraph): boolean {
  return !productiveStates(graph).has(graph.getStartState());
}

/**
 * The only sequence the automaton accepts, or null when it accepts none
 * or more than one.
 */
export function toSingleton(
  graph: ConstGraph,
  options: AutomataOptions = {}
): Result<number[] | null, AutomataError> {
  return canonicalize(graph, options).map((minimal) => {
    // every state of a minimal DFA can reach an accepting state, so the
    // language is a singleton iff the graph is a single accepting chain
    const sequence: number[] = [];
    const visited: Set<StateId> = new Set();
    let state = minimal.getStartState();
    while (!visited.has(state)) {
      visited.add(state);
      const transitions = minimal.getTransitions(state);
      if (minimal.isAcceptingState(state)) {
        return transitions.length == 0 ? sequence : null;
      }
      if (transitions.length != 1) {
        return null;
      }
      const [{ label, target }] = transitions;
      if (label == null || label.low != label.high) {
        return null;
      }
      sequence.push(label.low);
      state = target;
    }
    return null;
  });
}

export function isSingleton(
  graph: ConstGraph,
  options: AutomataOptions = {}
): Result<boolean, AutomataError> {
  return toSingleton(graph, options).map((sequence) => sequence != null);
}
