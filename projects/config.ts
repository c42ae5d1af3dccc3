import { log } from './utils/debug.js';

export interface AutomataOptions {
  /**
   * Ceiling on the number of states any single graph may hold while it is
   * being built. Exceeding it aborts the stage with a StateLimitExceeded
   * error.
   */
  maxStates?: number;
}

export type ResolvedOptions = Required<AutomataOptions>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  maxStates: Infinity,
};

export const MAX_STATES_ENV = 'REGEX_IR_MAX_STATES';

/**
 * Read option overrides from environment variables.
 */
export function optionsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): AutomataOptions {
  const raw = env[MAX_STATES_ENV];
  if (raw === undefined || raw === '') {
    return {};
  }
  const maxStates = Number(raw);
  if (!Number.isInteger(maxStates) || maxStates <= 0) {
    log(`ignoring ${MAX_STATES_ENV}=${raw}: expected a positive integer`);
    return {};
  }
  return { maxStates };
}

export function resolveOptions(
  options: AutomataOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedOptions {
  return { ...DEFAULT_OPTIONS, ...optionsFromEnv(env), ...definedOnly(options) };
}

function definedOnly(options: AutomataOptions): AutomataOptions {
  return options.maxStates === undefined ? {} : { maxStates: options.maxStates };
}
