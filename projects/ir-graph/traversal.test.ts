import { IRGraph } from './graph.js';
import {
  checkDeterministic,
  epsilonClosure,
  findTarget,
  isDeterministic,
  move,
  outgoing,
  productiveStates,
  reachableStates,
  recognizesEmpty,
  sameStructure,
} from './traversal.js';

const sym = (c: string) => ({ low: c.charCodeAt(0), high: c.charCodeAt(0) });

describe('traversal functions', () => {
  let graph: IRGraph;
  const A = 97;
  const B = 98;
  const C = 99;

  beforeAll(() => {
    graph = new IRGraph();
    for (let i = 0; i < 5; i++) {
      graph.addState();
    }
    graph.setStartState(0);
    graph.setAccepting(4, true);
    const edges: [number, string | null, number][] = [
      [0, null, 1],
      [0, null, 2],
      [1, 'a', 4],
      [1, 'b', 3],
      [2, 'c', 4],
      [2, 'a', 4],
      [2, null, 3],
      [3, 'b', 4],
      [3, null, 2],
    ];
    for (const [from, label, to] of edges) {
      graph.addTransition(from, label == null ? null : sym(label), to);
    }
  });

  test('epsilonClosure()', () => {
    expect(epsilonClosure(graph, [1]).toArray()).toEqual([1]);
    expect(epsilonClosure(graph, [3]).toArray()).toEqual([2, 3]);
    expect(epsilonClosure(graph, [4]).toArray()).toEqual([4]);
    expect(epsilonClosure(graph, [0]).toArray()).toEqual([0, 1, 2, 3]);
    expect(epsilonClosure(graph, [1, 4]).toArray()).toEqual([1, 4]);
    expect(epsilonClosure(graph, [1, 3]).toArray()).toEqual([1, 2, 3]);
  });

  test('epsilonClosure() is idempotent', () => {
    for (let s = 0; s < graph.numStates; s++) {
      const once = epsilonClosure(graph, [s]);
      expect(epsilonClosure(graph, once).equals(once)).toBe(true);
    }
  });

  test('move()', () => {
    expect(move(graph, [1, 2], C).toArray()).toEqual([4]);
    expect(move(graph, [1, 3], B).toArray()).toEqual([3, 4]);
    expect(move(graph, [0], A).toArray()).toEqual([]);
  });

  test('reachableStates() is breadth first', () => {
    expect(reachableStates(graph)).toEqual([0, 1, 2, 4, 3]);
    expect(reachableStates(graph, [3])).toEqual([3, 4, 2]);
  });

  test('productiveStates()', () => {
    expect([...productiveStates(graph)].sort()).toEqual([0, 1, 2, 3, 4]);
  });

  test('recognizesEmpty()', () => {
    expect(recognizesEmpty(graph)).toBe(false);
  });

  test('outgoing()', () => {
    expect(outgoing(graph, 3)).toEqual([
      { label: sym('b'), target: 4 },
      { label: null, target: 2 },
    ]);
  });

  test('checkDeterministic() reports epsilon transitions', () => {
    expect(isDeterministic(graph)).toBe(false);
    expect(checkDeterministic(graph)._unsafeUnwrapErr().message).toBe(
      'NotDeterministic: state s0 has an epsilon transition'
    );
  });
});

describe('deterministic graphs', () => {
  function dfa() {
    const graph = new IRGraph();
    const s0 = graph.addState();
    const s1 = graph.addState(true);
    const dead = graph.addState();
    graph.setStartState(s0);
    graph.addTransition(s0, { low: 97, high: 99 }, s1);
    graph.addTransition(s0, { low: 100, high: 100 }, dead);
    graph.addTransition(s1, { low: 97, high: 97 }, s1);
    return graph;
  }

  test('findTarget()', () => {
    const graph = dfa();
    expect(findTarget(graph, 0, 98)).toBe(1);
    expect(findTarget(graph, 0, 100)).toBe(2);
    expect(findTarget(graph, 0, 101)).toBeNull();
    expect(findTarget(graph, 1, 97)).toBe(1);
  });

  test('productiveStates() leaves out dead states', () => {
    expect([...productiveStates(dfa())].sort()).toEqual([0, 1]);
  });

  test('checkDeterministic() accepts disjoint ranges', () => {
    expect(checkDeterministic(dfa()).isOk()).toBe(true);
  });

  test('checkDeterministic() reports overlapping ranges', () => {
    const graph = dfa();
    graph.addTransition(1, { low: 90, high: 97 }, 0);
    expect(checkDeterministic(graph)._unsafeUnwrapErr().message).toBe(
      'NotDeterministic: state s1 has overlapping outgoing ranges'
    );
  });

  test('sameStructure()', () => {
    expect(sameStructure(dfa(), dfa())).toBe(true);
    const changed = dfa();
    changed.setAccepting(2, true);
    expect(sameStructure(dfa(), changed)).toBe(false);
    const relabeled = dfa();
    relabeled.addTransition(2, null, 2);
    expect(sameStructure(dfa(), relabeled)).toBe(false);
  });
});
