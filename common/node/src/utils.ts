/**
 * Shared helpers for identifier sets.
 */

import type { WireId } from "@qosd/core";

/** Sorted copy of a wire identifier list (numeric order). */
export function sortWireIds(ids: readonly WireId[]): WireId[] {
  return [...ids].sort((a, b) => a - b);
}

/**
 * Whether `reported` contains exactly the identifiers of `expectedSorted`.
 * `expectedSorted` must already be sorted; duplicates count.
 */
export function matchesSortedIds(expectedSorted: readonly WireId[], reported: readonly WireId[]): boolean {
  if (expectedSorted.length !== reported.length) return false;
  const sorted = sortWireIds(reported);
  return sorted.every((id, i) => id === expectedSorted[i]);
}
