import { NotDeterministicError } from '../errors.js';
import { IRGraph } from '../ir-graph/graph.js';
import { sameStructure } from '../ir-graph/traversal.js';
import { buildNFA } from '../nfa-builder/builder.js';
import {
  altNode,
  concatNode,
  literalNode,
  plusNode,
  starNode,
  symbolNode,
  type SyntaxNode,
} from '../nfa-builder/syntax.js';
import { determinize } from './determinize.js';
import { minimize } from './minimize.js';

const sym = (ch: string) => {
  const code = ch.charCodeAt(0);
  return { low: code, high: code };
};

function minimalOf(tree: SyntaxNode) {
  const nfa = buildNFA(tree)._unsafeUnwrap();
  return minimize(determinize(nfa)._unsafeUnwrap())._unsafeUnwrap();
}

test('fee|fie merges the two tails', () => {
  const dfa = new IRGraph();
  for (let i = 0; i < 6; i++) {
    dfa.addState();
  }
  dfa.setAccepting(3, true);
  dfa.setAccepting(5, true);
  dfa.setStartState(0);
  dfa.addTransition(0, sym('f'), 1);
  dfa.addTransition(1, sym('e'), 2);
  dfa.addTransition(1, sym('i'), 4);
  dfa.addTransition(2, sym('e'), 3);
  dfa.addTransition(4, sym('e'), 5);

  const minimal = minimize(dfa)._unsafeUnwrap();
  expect(minimal.numStates).toBe(4);
  expect(minimal.getStartState()).toBe(0);
  expect(minimal.getAcceptingStates()).toEqual([3]);
  expect(minimal.getTransitions(0)).toEqual([{ label: sym('f'), target: 1 }]);
  expect(minimal.getTransitions(1)).toEqual([
    { label: sym('e'), target: 2 },
    { label: sym('i'), target: 2 },
  ]);
  expect(minimal.getTransitions(2)).toEqual([{ label: sym('e'), target: 3 }]);
  expect(minimal.getTransitions(3)).toEqual([]);
});

test('adjacent ranges to the same block are coalesced', () => {
  const minimal = minimalOf(
    concatNode(symbolNode('a'), starNode(altNode(symbolNode('b'), symbolNode('c'))))
  );
  expect(minimal.numStates).toBe(2);
  expect(minimal.getTransitions(0)).toEqual([{ label: sym('a'), target: 1 }]);
  expect(minimal.getTransitions(1)).toEqual([
    { label: { low: 98, high: 99 }, target: 1 },
  ]);
  expect(minimal.getAcceptingStates()).toEqual([1]);
});

test('a* is a single accepting state with a self loop', () => {
  const minimal = minimalOf(starNode(symbolNode('a')));
  expect(minimal.numStates).toBe(1);
  expect(minimal.getAcceptingStates()).toEqual([0]);
  expect(minimal.getTransitions(0)).toEqual([{ label: sym('a'), target: 0 }]);
});

test('a|a minimizes to the same graph as a', () => {
  const a = symbolNode('a');
  const minimal = minimalOf(altNode(a, a));
  expect(sameStructure(minimal, minimalOf(a))).toBe(true);
  expect(minimal.numStates).toBe(2);
  expect(minimal.getTransitions(0)).toEqual([{ label: sym('a'), target: 1 }]);
});

test('equivalent trees give identical graphs', () => {
  const a = symbolNode('a');
  // aa* and a*a
  expect(
    sameStructure(
      minimalOf(concatNode(a, starNode(a))),
      minimalOf(concatNode(starNode(a), a))
    )
  ).toBe(true);
  expect(
    sameStructure(minimalOf(plusNode(a)), minimalOf(concatNode(a, starNode(a))))
  ).toBe(true);
});

test('minimizing a minimal DFA changes nothing', () => {
  const trees = [
    altNode(literalNode('fee'), literalNode('fie')),
    starNode(altNode(literalNode('ab'), symbolNode('c'))),
    plusNode(symbolNode('z')),
  ];
  for (const tree of trees) {
    const nfa = buildNFA(tree)._unsafeUnwrap();
    const dfa = determinize(nfa)._unsafeUnwrap();
    const once = minimize(dfa)._unsafeUnwrap();
    const twice = minimize(once)._unsafeUnwrap();
    expect(once.numStates).toBeLessThanOrEqual(dfa.numStates);
    expect(sameStructure(once, twice)).toBe(true);
  }
});

test('unreachable and dead states are dropped', () => {
  const dfa = new IRGraph();
  dfa.setStartState(dfa.addState());
  dfa.addState(true);
  dfa.addState(); // dead end
  dfa.addState(true); // unreachable
  dfa.addTransition(0, sym('a'), 1);
  dfa.addTransition(0, sym('b'), 2);
  dfa.addTransition(3, sym('a'), 0);

  const minimal = minimize(dfa)._unsafeUnwrap();
  expect(minimal.numStates).toBe(2);
  expect(minimal.getTransitions(0)).toEqual([{ label: sym('a'), target: 1 }]);
});

test('the empty language is a single rejecting state', () => {
  const dfa = new IRGraph();
  dfa.setStartState(dfa.addState());
  dfa.addState();
  dfa.addTransition(0, sym('a'), 1);

  const minimal = minimize(dfa)._unsafeUnwrap();
  expect(minimal.numStates).toBe(1);
  expect(minimal.getStartState()).toBe(0);
  expect(minimal.isAcceptingState(0)).toBe(false);
  expect(minimal.getTransitions(0)).toEqual([]);
});

test('accepting states with different tags stay apart', () => {
  const tagged = (second: number) => {
    const dfa = new IRGraph();
    dfa.setStartState(dfa.addState());
    dfa.addState();
    dfa.addState();
    dfa.addTransition(0, sym('a'), 1);
    dfa.addTransition(0, sym('b'), 2);
    dfa.addAcceptTag(1, 0);
    dfa.addAcceptTag(2, second);
    return minimize(dfa)._unsafeUnwrap();
  };

  const apart = tagged(1);
  expect(apart.numStates).toBe(3);
  expect(apart.getAcceptTags(1)).toEqual([0]);
  expect(apart.getAcceptTags(2)).toEqual([1]);

  const merged = tagged(0);
  expect(merged.numStates).toBe(2);
  expect(merged.getTransitions(0)).toEqual([
    { label: { low: 97, high: 98 }, target: 1 },
  ]);
  expect(merged.getAcceptTags(1)).toEqual([0]);
});

describe('rejects non-deterministic input', () => {
  test('epsilon transition', () => {
    const nfa = buildNFA(starNode(symbolNode('a')))._unsafeUnwrap();
    const error = minimize(nfa)._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(NotDeterministicError);
    expect(error.message).toBe(
      'NotDeterministic: state s0 has an epsilon transition'
    );
  });

  test('overlapping ranges', () => {
    const g = new IRGraph();
    g.setStartState(g.addState());
    g.addState(true);
    g.addTransition(0, { low: 97, high: 99 }, 1);
    g.addTransition(0, { low: 98, high: 100 }, 1);
    expect(minimize(g)._unsafeUnwrapErr().message).toBe(
      'NotDeterministic: state s0 has overlapping outgoing ranges'
    );
  });
});
