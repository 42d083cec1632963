import type { SequenceNumber } from "./types";

const NUMERIC = /^\d+$/;

/**
 * Order two sequence numbers.
 *
 * Decimal sequence numbers compare numerically, whatever their length
 * (sources hand out values well past 2^64). Anything else falls back to
 * length, then lexicographic order.
 */
export function compareSequenceNumbers(a: SequenceNumber, b: SequenceNumber): number {
  if (a === b) return 0;
  if (NUMERIC.test(a) && NUMERIC.test(b)) {
    const left = BigInt(a);
    const right = BigInt(b);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }
  if (a.length !== b.length) return a.length < b.length ? -1 : 1;
  return a < b ? -1 : 1;
}

export function isAfter(a: SequenceNumber, b: SequenceNumber): boolean {
  return compareSequenceNumbers(a, b) > 0;
}
