import { err, ok, Result } from 'neverthrow';
import { InvalidRangeError } from '../errors.js';

/**
 * An inclusive range of symbols. Symbols are non-negative integers; for
 * text they are unicode code points.
 */
export type SymbolRange = { readonly low: number; readonly high: number };

export const MAX_SYMBOL = 0x10ffff;

/**
 * Every symbol the automata can be asked about.
 */
export const ANY_SYMBOL: readonly SymbolRange[] = [{ low: 0, high: MAX_SYMBOL }];

/**
 * Unicode scalar values: every code point except the surrogates.
 */
export const UNICODE_SCALARS: readonly SymbolRange[] = [
  { low: 0, high: 0xd7ff },
  { low: 0xe000, high: MAX_SYMBOL },
];

export function isValidRange(low: number, high: number): boolean {
  return (
    Number.isInteger(low) &&
    Number.isInteger(high) &&
    low >= 0 &&
    low <= high
  );
}

export function symbolRange(
  low: number,
  high: number
): Result<SymbolRange, InvalidRangeError> {
  if (!isValidRange(low, high)) {
    return err(new InvalidRangeError(low, high));
  }
  return ok({ low, high });
}

export function singleSymbol(symbol: number): SymbolRange {
  return { low: symbol, high: symbol };
}

export function rangeContains(range: SymbolRange, symbol: number): boolean {
  return range.low <= symbol && symbol <= range.high;
}

export function rangesContain(
  ranges: Iterable<SymbolRange>,
  symbol: number
): boolean {
  for (const range of ranges) {
    if (rangeContains(range, symbol)) {
      return true;
    }
  }
  return false;
}

export function compareRanges(a: SymbolRange, b: SymbolRange): number {
  return a.low - b.low || a.high - b.high;
}

export function rangesOverlap(a: SymbolRange, b: SymbolRange): boolean {
  return a.low <= b.high && b.low <= a.high;
}

export function formatSymbol(symbol: number): string {
  if (symbol > 0x20 && symbol < 0x7f) {
    const char = String.fromCodePoint(symbol);
    return '-,\\[]'.includes(char) ? `\\${char}` : char;
  }
  return `\\u{${symbol.toString(16)}}`;
}

export function formatRange(range: SymbolRange): string {
  if (range.low == range.high) {
    return formatSymbol(range.low);
  }
  return `${formatSymbol(range.low)}-${formatSymbol(range.high)}`;
}
