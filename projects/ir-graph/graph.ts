import { formatRange, type SymbolRange } from '../alphabet/ranges.js';
import { StateLimitExceededError } from '../errors.js';
import { Table } from '../utils/data-structures/table.js';
import type { IHaveDebugStr } from '../utils/debug.js';

export type StateId = number;

/**
 * A transition label: a symbol range, or `null` for an epsilon transition
 * that consumes no input.
 */
export type Label = SymbolRange | null;

export interface Transition {
  readonly label: Label;
  readonly target: StateId;
}

export interface ConstGraph extends IHaveDebugStr {
  /**
   * Get the number of states
   */
  readonly numStates: number;

  /**
   * Returns whether the given id names a state of this graph
   */
  hasState(state: StateId): boolean;

  /**
   * Get the start state of the graph
   */
  getStartState(): StateId;

  /**
   * Returns whether or not this state is accepting
   */
  isAcceptingState(state: StateId): boolean;

  /**
   * The sorted accept tags of a state. Multi-pattern automata tag each
   * accepting state with the index of the pattern(s) it accepts.
   */
  getAcceptTags(state: StateId): readonly number[];

  getAcceptingStates(): StateId[];

  /**
   * Outgoing transitions of a state, in the order they were added
   */
  getTransitions(state: StateId): readonly Transition[];
}

export interface MutGraph extends ConstGraph {
  /**
   * Adds a new state to the graph.
   *
   * @returns the index of the newly added state.
   */
  addState(accepting?: boolean): StateId;

  setAccepting(state: StateId, accepting: boolean): void;

  /**
   * Tag a state with an accept label. This also makes it accepting.
   */
  addAcceptTag(state: StateId, tag: number): void;

  setStartState(state: StateId): void;

  addTransition(fromState: StateId, label: Label, toState: StateId): void;
}

export interface GraphOptions {
  maxStates?: number;
}

/**
 * An automaton stored as an arena: states are indices into parallel
 * arrays, and transitions refer to their target by index. The same
 * structure holds both NFAs and DFAs.
 */
export class IRGraph implements MutGraph {
  static readonly NO_STATE = -1;

  readonly maxStates: number;

  private readonly accepting: boolean[] = [];
  private readonly tags: number[][] = [];
  private readonly transitions: Transition[][] = [];
  private startState: StateId = IRGraph.NO_STATE;

  constructor(options: GraphOptions = {}) {
    this.maxStates = options.maxStates ?? Infinity;
  }

  get numStates() {
    return this.transitions.length;
  }

  hasState(state: StateId): boolean {
    return Number.isInteger(state) && state >= 0 && state < this.numStates;
  }

  getStartState() {
    if (this.startState == IRGraph.NO_STATE) {
      throw new Error('IndexError: graph has no start state');
    }
    return this.startState;
  }

  setStartState(state: StateId) {
    this.checkState(state, 'startState');
    this.startState = state;
  }

  /**
   * @throws StateLimitExceededError when the graph already holds
   *         maxStates states.
   */
  addState(accepting = false): StateId {
    if (this.numStates >= this.maxStates) {
      throw new StateLimitExceededError(this.maxStates);
    }
    this.transitions.push([]);
    this.accepting.push(accepting);
    this.tags.push([]);
    return this.numStates - 1;
  }

  isAcceptingState(state: StateId) {
    this.checkState(state, 'state');
    return this.accepting[state];
  }

  setAccepting(state: StateId, accepting: boolean) {
    this.checkState(state, 'state');
    this.accepting[state] = accepting;
    if (!accepting) {
      this.tags[state] = [];
    }
  }

  getAcceptTags(state: StateId): readonly number[] {
    this.checkState(state, 'state');
    return this.tags[state];
  }

  addAcceptTag(state: StateId, tag: number) {
    this.checkState(state, 'state');
    this.accepting[state] = true;
    const tags = this.tags[state];
    if (!tags.includes(tag)) {
      tags.push(tag);
      tags.sort((a, b) => a - b);
    }
  }

  getAcceptingStates(): StateId[] {
    const states: StateId[] = [];
    for (let si = 0; si < this.numStates; si++) {
      if (this.accepting[si]) {
        states.push(si);
      }
    }
    return states;
  }

  getTransitions(state: StateId): readonly Transition[] {
    this.checkState(state, 'state');
    return this.transitions[state];
  }

  /**
   * Add a labeled edge between states in the graph.
   *
   * @param label symbol range to transition on, or null for epsilon
   */
  addTransition(fromState: StateId, label: Label, toState: StateId) {
    this.checkState(fromState, 'fromState');
    this.checkState(toState, 'toState');
    this.transitions[fromState].push({ label, target: toState });
  }

  addEpsilon(fromState: StateId, toState: StateId) {
    this.addTransition(fromState, null, toState);
  }

  private checkState(state: StateId, name: string) {
    if (!this.hasState(state)) {
      throw new Error(
        `IndexError: ${name} ${state} is not valid. Must be < ${this.numStates}`
      );
    }
  }

  toDebugStr(): string {
    return graphDebugStr(this);
  }
}

/**
 * Render a graph as a table with one row per state. Start states are
 * prefixed with `>`, accepting states with `*`.
 */
export function graphDebugStr(graph: ConstGraph): string {
  const start = graph.numStates > 0 ? graph.getStartState() : IRGraph.NO_STATE;
  const stateLabel = (s: StateId) => {
    let out = 's' + s;
    if (graph.isAcceptingState(s)) {
      out = '*' + out;
    }
    return out;
  };

  const table = new Table();
  for (let si = 0; si < graph.numStates; si++) {
    const tags = graph.getAcceptTags(si);
    let head = stateLabel(si);
    if (si == start) {
      head = '>' + head;
    }
    if (tags.length > 0) {
      head += `{${tags.join(',')}}`;
    }
    table.addRow([
      head + ':',
      ...graph
        .getTransitions(si)
        .map(
          ({ label, target }) =>
            `${label == null ? 'ε' : formatRange(label)}→${stateLabel(target)}`
        ),
    ]);
  }
  return table.toDebugStr();
}
