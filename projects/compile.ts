import type { Result } from 'neverthrow';
import { resolveOptions } from './config.js';
import type { AutomataError } from './errors.js';
import type { ConstGraph, IRGraph } from './ir-graph/graph.js';
import {
  buildCombinedNFA,
  buildNFA,
  type BuildOptions,
} from './nfa-builder/builder.js';
import { toPattern, type SyntaxNode } from './nfa-builder/syntax.js';
import { type DFAFromNFA, determinize } from './nfa-to-dfa/determinize.js';
import { minimize } from './nfa-to-dfa/minimize.js';
import { colors, log } from './utils/debug.js';

/**
 * Every intermediate form of one compilation, kept so they can be
 * inspected separately.
 */
export interface CompiledPattern {
  nfa: IRGraph;
  dfa: DFAFromNFA;
  minimal: IRGraph;
}

function logStage(stage: string, graph: ConstGraph) {
  log(`${colors.blue(stage)}: ${graph.numStates} states`);
}

function runStages(
  label: string,
  buildStage: (options: BuildOptions) => Result<IRGraph, AutomataError>,
  options: BuildOptions
): Result<CompiledPattern, AutomataError> {
  const resolved = { ...options, ...resolveOptions(options) };
  log(`compiling ${colors.bold(label)}`);
  return buildStage(resolved)
    .andThen((nfa) => {
      logStage('nfa', nfa);
      return determinize(nfa, resolved).andThen((dfa) => {
        logStage('dfa', dfa);
        return minimize(dfa, resolved).map((minimal) => {
          logStage('minimal', minimal);
          return { nfa, dfa, minimal };
        });
      });
    })
    .mapErr((e) => {
      log(colors.red(`failed to compile ${label}: ${e.message}`));
      return e;
    });
}

/**
 * Build, determinize and minimize a syntax tree.
 */
export function compile(
  tree: SyntaxNode,
  options: BuildOptions = {}
): Result<CompiledPattern, AutomataError> {
  return runStages(
    toPattern(tree),
    (resolved) => buildNFA(tree, resolved),
    options
  );
}

/**
 * Compile several patterns into one automaton whose accepting states are
 * tagged with the index of the pattern(s) they accept.
 */
export function compileAll(
  trees: readonly SyntaxNode[],
  options: BuildOptions = {}
): Result<CompiledPattern, AutomataError> {
  return runStages(
    trees.map(toPattern).join(' , '),
    (resolved) => buildCombinedNFA(trees, resolved),
    options
  );
}
