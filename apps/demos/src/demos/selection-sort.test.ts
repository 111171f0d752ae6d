import { describe, it, expect } from "vitest";
import { createTestContext } from "../test-utils/context";
import { runSelectionSortDemo } from "./selection-sort";

describe("runSelectionSortDemo", () => {
  it("shows the sorted sample and one greedy step", () => {
    const { ctx, lines } = createTestContext();
    runSelectionSortDemo(ctx);

    expect(lines).toEqual([
      "Selection Sort (greedy) demo",
      "Before: [64, 25, 12, 22, 11]",
      "After: [11, 12, 22, 25, 64]",
      "After one greedy choice step: [1, 3, 4, 2]",
      "All demo assertions passed."
    ]);
  });
});
