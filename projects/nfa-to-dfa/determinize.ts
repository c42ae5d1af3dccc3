import type { Result } from 'neverthrow';
import { disjointRanges } from '../alphabet/partition.js';
import type { SymbolRange } from '../alphabet/ranges.js';
import { resolveOptions, type AutomataOptions } from '../config.js';
import { type AutomataError, resultOf } from '../errors.js';
import {
  type ConstGraph,
  IRGraph,
  type StateId,
} from '../ir-graph/graph.js';
import { epsilonClosure } from '../ir-graph/traversal.js';
import { HashMap, NumberSet } from '../utils/sets.js';

/**
 * A DFA that remembers which set of NFA states each of its states stands
 * for.
 */
export class DFAFromNFA extends IRGraph {
  readonly nfaStateMap: NumberSet[] = [];

  getStatesForSourceNFAState(sourceNFAState: StateId): StateId[] {
    const states: StateId[] = [];
    for (const [si, sourceNFAStates] of this.nfaStateMap.entries()) {
      if (sourceNFAStates.has(sourceNFAState)) {
        states.push(si);
      }
    }
    return states;
  }

  override toDebugStr() {
    let out = 'DFAFromNFA:\n' + super.toDebugStr();
    out += '\n';
    out += 'Mapping from DFA state to source NFA states:\n';
    for (const [si, nfaStates] of this.nfaStateMap.entries()) {
      out += `s${si}: ${nfaStates.hash()}\n`;
    }
    return out;
  }
}

type SubsetTransition = { range: SymbolRange; targets: NumberSet };

/**
 * For every disjoint range of the alphabet partition over the subset's
 * outgoing labels, the epsilon-closed set of states reached on it.
 */
function subsetTransitions(
  nfa: ConstGraph,
  subset: NumberSet
): SubsetTransition[] {
  const edges: { label: SymbolRange; target: StateId }[] = [];
  for (const state of subset) {
    for (const { label, target } of nfa.getTransitions(state)) {
      if (label != null) {
        edges.push({ label, target });
      }
    }
  }

  return disjointRanges(edges.map((edge) => edge.label)).map((range) => {
    const reached: StateId[] = [];
    for (const { label, target } of edges) {
      // partition ranges are either inside a label or disjoint from it
      if (label.low <= range.low && range.high <= label.high) {
        reached.push(target);
      }
    }
    return { range, targets: epsilonClosure(nfa, reached) };
  });
}

function subsetConstruction(nfa: ConstGraph, maxStates: number): DFAFromNFA {
  // See page 47 of Engineering a Compiler (Cooper & Torczon).
  const dfa = new DFAFromNFA({ maxStates });
  const subsetToState = new HashMap<NumberSet, StateId>((s) => s.hash());
  // states are created in worklist order, so worklist[i] is DFA state i
  const worklist: NumberSet[] = [];

  const stateFor = (subset: NumberSet): StateId => {
    const existing = subsetToState.get(subset);
    if (existing !== undefined) {
      return existing;
    }
    const state = dfa.addState();
    dfa.nfaStateMap.push(subset);
    for (const nfaState of subset) {
      if (nfa.isAcceptingState(nfaState)) {
        dfa.setAccepting(state, true);
        for (const tag of nfa.getAcceptTags(nfaState)) {
          dfa.addAcceptTag(state, tag);
        }
      }
    }
    subsetToState.set(subset, state);
    worklist.push(subset);
    return state;
  };

  dfa.setStartState(stateFor(epsilonClosure(nfa, [nfa.getStartState()])));
  for (let si = 0; si < worklist.length; si++) {
    for (const { range, targets } of subsetTransitions(nfa, worklist[si])) {
      dfa.addTransition(si, range, stateFor(targets));
    }
  }
  return dfa;
}

/**
 * Convert an NFA to a DFA by resolving ambiguity in the paths through the
 * NFA (subset construction). The input is left untouched.
 */
export function determinize(
  nfa: ConstGraph,
  options: AutomataOptions = {}
): Result<DFAFromNFA, AutomataError> {
  const { maxStates } = resolveOptions(options);
  return resultOf(() => subsetConstruction(nfa, maxStates));
}
