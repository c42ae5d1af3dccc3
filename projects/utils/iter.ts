/**
 * Iterate over the unicode code points of a string.
 */
export function* codePoints(s: string): Generator<number> {
  for (const char of s) {
    const code = char.codePointAt(0);
    if (code !== undefined) {
      yield code;
    }
  }
}

