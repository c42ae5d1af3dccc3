import type { Result } from 'neverthrow';
import { disjointRanges } from '../alphabet/partition.js';
import { compareRanges, type SymbolRange } from '../alphabet/ranges.js';
import { resolveOptions, type AutomataOptions } from '../config.js';
import { type AutomataError, resultOf } from '../errors.js';
import {
  type ConstGraph,
  IRGraph,
  type StateId,
  type Transition,
} from '../ir-graph/graph.js';
import {
  checkDeterministic,
  productiveStates,
  reachableStates,
} from '../ir-graph/traversal.js';

const NO_TARGET = -1;

/**
 * Number the distinct keys in order of first appearance.
 */
function numberByFirstAppearance(keys: string[]): {
  blocks: number[];
  count: number;
} {
  const ids: Map<string, number> = new Map();
  const blocks = keys.map((key) => {
    let id = ids.get(key);
    if (id === undefined) {
      id = ids.size;
      ids.set(key, id);
    }
    return id;
  });
  return { blocks, count: ids.size };
}

function acceptSignature(dfa: ConstGraph, state: StateId): string {
  return dfa.isAcceptingState(state)
    ? `A{${dfa.getAcceptTags(state).join(',')}}`
    : 'N';
}

function emptyLanguage(maxStates: number): IRGraph {
  const graph = new IRGraph({ maxStates });
  graph.setStartState(graph.addState(false));
  return graph;
}

function minimizeDFA(dfa: ConstGraph, maxStates: number): IRGraph {
  // Step 1: keep only states that are reachable and can still accept.
  const productive = productiveStates(dfa);
  if (!productive.has(dfa.getStartState())) {
    return emptyLanguage(maxStates);
  }
  const states = reachableStates(dfa).filter((s) => productive.has(s));
  // index of each kept dfa state within `states`
  const position: Map<StateId, number> = new Map(
    states.map((s, i) => [s, i])
  );
  const kept: Transition[][] = states.map((s) =>
    dfa
      .getTransitions(s)
      .filter(({ target }) => position.has(target))
      .sort((a, b) => compareRanges(label(a), label(b)))
  );

  // Step 2: tabulate every state's successor on each range of the
  // alphabet partition, so states can be compared range by range.
  const alphabet = disjointRanges(kept.flat().map(label));
  const successors: number[][] = kept.map((transitions) => {
    const row: number[] = [];
    let j = 0;
    for (const range of alphabet) {
      while (j < transitions.length && label(transitions[j]).high < range.low) {
        j++;
      }
      const t = transitions[j];
      row.push(
        t && label(t).low <= range.low ? position.get(t.target) ?? NO_TARGET : NO_TARGET
      );
    }
    return row;
  });

  // Step 3: partition refinement, starting from accepting vs.
  // non-accepting (split further by accept tags).
  let { blocks, count } = numberByFirstAppearance(
    states.map((s) => acceptSignature(dfa, s))
  );
  while (true) {
    const current = blocks;
    const refined = numberByFirstAppearance(
      successors.map(
        (row, i) =>
          `${current[i]}:` +
          row.map((t) => (t == NO_TARGET ? NO_TARGET : current[t])).join(',')
      )
    );
    blocks = refined.blocks;
    if (refined.count == count) {
      break;
    }
    count = refined.count;
  }

  // Step 4: lift transitions from the first member of each block,
  // merging neighbouring ranges that lead to the same block.
  const representative: number[] = [];
  for (let i = states.length - 1; i >= 0; i--) {
    representative[blocks[i]] = i;
  }
  const blockTransitions = (block: number) => {
    const out: { range: { low: number; high: number }; target: number }[] = [];
    const row = successors[representative[block]];
    for (const [k, range] of alphabet.entries()) {
      if (row[k] == NO_TARGET) {
        continue;
      }
      const target = blocks[row[k]];
      const last = out[out.length - 1];
      if (last && last.target == target && last.range.high + 1 == range.low) {
        last.range.high = range.high;
      } else {
        out.push({ range: { low: range.low, high: range.high }, target });
      }
    }
    return out;
  };

  // Step 5: number the blocks breadth first from the start block so that
  // equivalent inputs produce identical graphs.
  const order = [blocks[0]];
  const newId: Map<number, StateId> = new Map([[blocks[0], 0]]);
  for (let i = 0; i < order.length; i++) {
    for (const { target } of blockTransitions(order[i])) {
      if (!newId.has(target)) {
        newId.set(target, order.length);
        order.push(target);
      }
    }
  }

  const minimal = new IRGraph({ maxStates });
  for (const block of order) {
    const state = minimal.addState();
    const source = states[representative[block]];
    if (dfa.isAcceptingState(source)) {
      minimal.setAccepting(state, true);
      for (const tag of dfa.getAcceptTags(source)) {
        minimal.addAcceptTag(state, tag);
      }
    }
  }
  minimal.setStartState(0);
  for (const [si, block] of order.entries()) {
    for (const { range, target } of blockTransitions(block)) {
      minimal.addTransition(si, range, newId.get(target) ?? NO_TARGET);
    }
  }
  return minimal;
}

function label(t: Transition): SymbolRange {
  if (t.label == null) {
    throw new Error('minimize: epsilon transition in a DFA');
  }
  return t.label;
}

/**
 * Produce the minimal DFA recognizing the same language as `dfa`, with
 * unreachable and dead states removed. State 0 is the start state and the
 * rest are numbered breadth first along ascending ranges, so two DFAs for
 * the same language minimize to the same graph.
 */
export function minimize(
  dfa: ConstGraph,
  options: AutomataOptions = {}
): Result<IRGraph, AutomataError> {
  const { maxStates } = resolveOptions(options);
  return checkDeterministic(dfa).andThen(() =>
    resultOf(() => minimizeDFA(dfa, maxStates))
  );
}
