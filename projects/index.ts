export * from './alphabet/ranges.js';
export * from './alphabet/partition.js';
export * from './errors.js';
export * from './config.js';
export * from './ir-graph/graph.js';
export * from './ir-graph/traversal.js';
export * from './nfa-builder/syntax.js';
export * from './nfa-builder/builder.js';
export * from './nfa-to-dfa/determinize.js';
export * from './nfa-to-dfa/minimize.js';
export * from './algebra/combine.js';
export * from './algebra/queries.js';
export * from './simulation/automaton.js';
export * from './compile.js';
export { codePoints } from './utils/iter.js';
export { logger, useColors } from './utils/debug.js';
