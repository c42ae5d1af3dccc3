import { compileAll } from '../compile.js';
import { buildNFA } from '../nfa-builder/builder.js';
import {
  literalNode,
  rangeNode,
  starNode,
  symbolNode,
} from '../nfa-builder/syntax.js';
import {
  acceptingTags,
  accepts,
  DFASimulator,
  NFASimulator,
  run,
} from './automaton.js';

describe('NFASimulator', () => {
  const nfa = buildNFA(starNode(literalNode('ab')))._unsafeUnwrap();
  const sim = new NFASimulator(nfa);

  test('initial state is the closure of the start state', () => {
    expect(sim.initialState()?.toArray()).toEqual([0, 1]);
  });

  test.each([
    ['', true],
    ['ab', true],
    ['abab', true],
    ['a', false],
    ['aba', false],
    ['ba', false],
  ])('%p accepted: %p', (input, expected) => {
    expect(accepts(sim, input)).toBe(expected);
  });

  test('run returns null once stuck', () => {
    expect(run(sim, [98])).toBeNull();
  });
});

describe('DFASimulator', () => {
  const tagged = compileAll([
    symbolNode('a'),
    rangeNode('a', 'z'),
  ])._unsafeUnwrap();
  const sim = new DFASimulator(tagged.minimal);

  test('steps through the transitions', () => {
    expect(sim.initialState()).toBe(0);
    expect(run(sim, [97])).toBe(1);
    expect(run(sim, [97, 98])).toBeNull();
  });

  test('accepts symbol arrays and strings alike', () => {
    expect(accepts(sim, [98])).toBe(true);
    expect(accepts(sim, 'b')).toBe(true);
    expect(accepts(sim, '')).toBe(false);
  });

  test('acceptingTags lists every pattern that matches', () => {
    expect(acceptingTags(sim, 'a')).toEqual([0, 1]);
    expect(acceptingTags(sim, 'q')).toEqual([1]);
    expect(acceptingTags(sim, 'ab')).toEqual([]);
    expect(acceptingTags(sim, '')).toEqual([]);
  });

  test('NFA and DFA agree on tags', () => {
    const nfaSim = new NFASimulator(tagged.nfa);
    expect(acceptingTags(nfaSim, 'a')).toEqual([0, 1]);
    expect(acceptingTags(nfaSim, 'q')).toEqual([1]);
  });
});
