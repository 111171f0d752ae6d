import assert from "assert/strict";
import { GREEDY_STEP_SAMPLE, SELECTION_SORT_SAMPLE } from "@textbook/config";
import { isSorted, selectionSort, selectionStep } from "@textbook/sorting";
import type { DemoContext } from "../context";
import { formatList } from "../format";

export function runSelectionSortDemo({ print, logger }: DemoContext): void {
  print("Selection Sort (greedy) demo");

  const example = [...SELECTION_SORT_SAMPLE];
  print(`Before: ${formatList(example)}`);
  const sorted = selectionSort(example);
  print(`After: ${formatList(sorted)}`);

  assert.deepEqual(sorted, [...example].sort((a, b) => a - b), "selectionSort result differs from Array.prototype.sort");
  assert.ok(isSorted(sorted), "selectionSort output is not in non-decreasing order");
  assert.deepEqual(selectionSort([]), [], "empty list should sort to empty list");
  assert.deepEqual(selectionSort([1]), [1], "single-element list should remain the same");
  assert.deepEqual(selectionSort([2, 1]), [1, 2], "two-element list must be sorted");

  // One greedy choice: the smallest element moves to index 0
  const partial = selectionStep(GREEDY_STEP_SAMPLE, 0);
  print(`After one greedy choice step: ${formatList(partial)}`);
  logger.debug({ size: example.length }, "selection sort verified");

  print("All demo assertions passed.");
}
