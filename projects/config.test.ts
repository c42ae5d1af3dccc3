import {
  DEFAULT_OPTIONS,
  MAX_STATES_ENV,
  optionsFromEnv,
  resolveOptions,
} from './config.js';
import { logger } from './utils/debug.js';

describe('optionsFromEnv', () => {
  test('reads the state ceiling', () => {
    expect(optionsFromEnv({ [MAX_STATES_ENV]: '500' })).toEqual({
      maxStates: 500,
    });
  });

  test('unset or empty gives no overrides', () => {
    expect(optionsFromEnv({})).toEqual({});
    expect(optionsFromEnv({ [MAX_STATES_ENV]: '' })).toEqual({});
  });

  test('ignores values that are not positive integers', () => {
    const logs: string[] = [];
    const options = logger.capture(
      () => optionsFromEnv({ [MAX_STATES_ENV]: 'lots' }),
      logs
    );
    expect(options).toEqual({});
    expect(logs).toEqual([
      'ignoring REGEX_IR_MAX_STATES=lots: expected a positive integer',
    ]);
    expect(optionsFromEnv({ [MAX_STATES_ENV]: '-3' })).toEqual({});
  });
});

describe('resolveOptions', () => {
  test('defaults', () => {
    expect(resolveOptions({}, {})).toEqual(DEFAULT_OPTIONS);
    expect(DEFAULT_OPTIONS.maxStates).toBe(Infinity);
  });

  test('explicit options win over the environment', () => {
    expect(resolveOptions({ maxStates: 10 }, { [MAX_STATES_ENV]: '20' })).toEqual(
      { maxStates: 10 }
    );
    expect(resolveOptions({}, { [MAX_STATES_ENV]: '20' })).toEqual({
      maxStates: 20,
    });
    expect(
      resolveOptions({ maxStates: undefined }, { [MAX_STATES_ENV]: '20' })
    ).toEqual({ maxStates: 20 });
  });
});
