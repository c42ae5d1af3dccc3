import { err, ok, Result } from 'neverthrow';

export type AutomataErrorKind =
  | 'InvalidRange'
  | 'InvalidRepetitionBound'
  | 'StateLimitExceeded'
  | 'NotDeterministic';

/**
 * Base class for every error the pipeline reports as a result value.
 */
export abstract class AutomataError extends Error {
  abstract readonly kind: AutomataErrorKind;
}

export class InvalidRangeError extends AutomataError {
  readonly kind = 'InvalidRange';
  readonly low: number;
  readonly high: number;

  constructor(low: number, high: number) {
    super(`InvalidRange: [${low},${high}] is not a valid symbol range`);
    this.name = 'InvalidRangeError';
    this.low = low;
    this.high = high;
  }
}

export class InvalidRepetitionBoundError extends AutomataError {
  readonly kind = 'InvalidRepetitionBound';
  readonly min: number;
  readonly max: number | null;

  constructor(min: number, max: number | null) {
    super(
      `InvalidRepetitionBound: {${min},${max ?? ''}} is not a valid repetition`
    );
    this.name = 'InvalidRepetitionBoundError';
    this.min = min;
    this.max = max;
  }
}

export class StateLimitExceededError extends AutomataError {
  readonly kind = 'StateLimitExceeded';
  readonly limit: number;

  constructor(limit: number) {
    super(`StateLimitExceeded: automaton grew beyond ${limit} states`);
    this.name = 'StateLimitExceededError';
    this.limit = limit;
  }
}

export class NotDeterministicError extends AutomataError {
  readonly kind = 'NotDeterministic';
  readonly state: number;

  constructor(state: number, reason: string) {
    super(`NotDeterministic: state s${state} ${reason}`);
    this.name = 'NotDeterministicError';
    this.state = state;
  }
}

/**
 * Narrow an unknown thrown value to one of the pipeline's own errors.
 */
export function isAutomataError(e: unknown): e is AutomataError {
  return e instanceof AutomataError;
}

/**
 * Run a construction step that reports bad input by throwing an
 * AutomataError, and return its outcome as a Result. Anything else thrown
 * is a bug and propagates.
 */
export function resultOf<T>(step: () => T): Result<T, AutomataError> {
  try {
    return ok(step());
  } catch (e) {
    if (isAutomataError(e)) {
      return err(e);
    }
    throw e;
  }
}
