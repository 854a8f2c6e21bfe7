import type { AddressCandidate } from "./types.js";

const DIGIT_RUN_RE = /\d+/g;

export function addressText(candidate: AddressCandidate): string {
  return candidate.lines.join(" ");
}

function digitRuns(text: string): string[] {
  return (text.match(DIGIT_RUN_RE) || []).map((run) => run.replace(/^0+(?=\d)/, ""));
}

// Digit runs compared as numbers without going through Number, so long runs keep their order.
function compareDigitRuns(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Orders two address texts by the numbers embedded in them, position by
 * position, so "3b" comes after "1" and "Flat 2a" but before "10". A text
 * that still has a number where the other has run out sorts first. When
 * every number ties the plain texts decide.
 */
export function naturalCompare(a: string, b: string): number {
  const na = digitRuns(a);
  const nb = digitRuns(b);
  const len = Math.max(na.length, nb.length);
  for (let i = 0; i < len; i++) {
    const x = na[i];
    const y = nb[i];
    if (x === undefined) return 1;
    if (y === undefined) return -1;
    const c = compareDigitRuns(x, y);
    if (c !== 0) return c;
  }
  return compareText(a, b);
}

export function compareCandidates(a: AddressCandidate, b: AddressCandidate): number {
  return naturalCompare(addressText(a), addressText(b)) || compareText(a.id, b.id);
}

export function rankAddresses(candidates: readonly AddressCandidate[]): AddressCandidate[] {
  return [...candidates].sort(compareCandidates);
}
