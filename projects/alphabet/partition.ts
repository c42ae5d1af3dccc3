import { err, ok, Result } from 'neverthrow';
import { InvalidRangeError } from '../errors.js';
import { compareRanges, isValidRange, type SymbolRange } from './ranges.js';

/**
 * Split a collection of possibly overlapping ranges into the coarsest set
 * of disjoint ranges such that each input range is a union of output
 * ranges, and two symbols share an output range iff every input range
 * contains both or neither of them.
 *
 * Adjacent inputs such as `[a,b]` and `[b+1,c]` stay separate; use
 * {@link coalesceRanges} to merge them.
 */
export function partitionRanges(
  ranges: Iterable<SymbolRange>
): Result<SymbolRange[], InvalidRangeError> {
  const checked: SymbolRange[] = [];
  for (const range of ranges) {
    if (!isValidRange(range.low, range.high)) {
      return err(new InvalidRangeError(range.low, range.high));
    }
    checked.push(range);
  }
  return ok(disjointRanges(checked));
}

/**
 * {@link partitionRanges} over ranges that are already known to be valid.
 *
 * Breakpoints are every `low` and `high + 1`. The output holds the
 * intervals between consecutive breakpoints that some input covers.
 */
export function disjointRanges(ranges: Iterable<SymbolRange>): SymbolRange[] {
  const deltas: Map<number, number> = new Map();
  for (const { low, high } of ranges) {
    deltas.set(low, (deltas.get(low) ?? 0) + 1);
    deltas.set(high + 1, (deltas.get(high + 1) ?? 0) - 1);
  }
  const breakpoints = [...deltas.keys()].sort((a, b) => a - b);

  const out: SymbolRange[] = [];
  let coverage = 0;
  for (let i = 0; i < breakpoints.length - 1; i++) {
    coverage += deltas.get(breakpoints[i]) ?? 0;
    if (coverage > 0) {
      out.push({ low: breakpoints[i], high: breakpoints[i + 1] - 1 });
    }
  }
  return out;
}

/**
 * Merge overlapping and adjacent ranges into sorted, maximal ranges.
 */
export function coalesceRanges(ranges: Iterable<SymbolRange>): SymbolRange[] {
  const sorted = [...ranges].sort(compareRanges);
  const out: { low: number; high: number }[] = [];
  for (const range of sorted) {
    const last = out[out.length - 1];
    if (last && range.low <= last.high + 1) {
      last.high = Math.max(last.high, range.high);
    } else {
      out.push({ low: range.low, high: range.high });
    }
  }
  return out;
}

export function intersectRanges(
  a: Iterable<SymbolRange>,
  b: Iterable<SymbolRange>
): SymbolRange[] {
  const left = coalesceRanges(a);
  const right = coalesceRanges(b);
  const out: SymbolRange[] = [];
  let i = 0;
  let j = 0;
  while (i < left.length && j < right.length) {
    const low = Math.max(left[i].low, right[j].low);
    const high = Math.min(left[i].high, right[j].high);
    if (low <= high) {
      out.push({ low, high });
    }
    if (left[i].high < right[j].high) {
      i++;
    } else {
      j++;
    }
  }
  return out;
}

/**
 * The symbols of `a` that are not in `b`.
 */
export function subtractRanges(
  a: Iterable<SymbolRange>,
  b: Iterable<SymbolRange>
): SymbolRange[] {
  const removed = coalesceRanges(b);
  const out: SymbolRange[] = [];
  for (const range of coalesceRanges(a)) {
    let low = range.low;
    for (const cut of removed) {
      if (cut.high < low || cut.low > range.high) {
        continue;
      }
      if (cut.low > low) {
        out.push({ low, high: cut.low - 1 });
      }
      low = cut.high + 1;
    }
    if (low <= range.high) {
      out.push({ low, high: range.high });
    }
  }
  return out;
}

/**
 * The symbols of `domain` that none of `ranges` contain.
 */
export function complementRanges(
  ranges: Iterable<SymbolRange>,
  domain: Iterable<SymbolRange>
): SymbolRange[] {
  return subtractRanges(domain, ranges);
}
