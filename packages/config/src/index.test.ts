import { describe, it, expect } from "vitest";
import {
  getKnownQueensCount,
  MST_SAMPLE_EDGES,
  KRUSKAL_TRACE_EDGES,
  RESTAURANT_RESPONSES,
  GRID_SCENARIO
} from "./index";

describe("getKnownQueensCount", () => {
  it("returns the classic counts for 4 and 8", () => {
    expect(getKnownQueensCount(4)).toBe(2);
    expect(getKnownQueensCount(8)).toBe(92);
  });

  it("returns 0 for boards with no solutions", () => {
    expect(getKnownQueensCount(2)).toBe(0);
    expect(getKnownQueensCount(3)).toBe(0);
  });

  it("returns null for sizes outside the table", () => {
    expect(getKnownQueensCount(12)).toBeNull();
  });
});

describe("RESTAURANT_RESPONSES", () => {
  it("checks hello before hi", () => {
    const keywords = RESTAURANT_RESPONSES.map((entry) => entry.keyword);
    expect(keywords.indexOf("hello")).toBeLessThan(keywords.indexOf("hi"));
  });
});

describe("sample datasets", () => {
  it("lists the same weighted edges in both MST samples", () => {
    const normalize = (edges: [string, string, number][]) =>
      edges
        .map(([a, b, w]) => `${[a, b].sort().join("-")}:${w}`)
        .sort();
    expect(normalize(KRUSKAL_TRACE_EDGES)).toEqual(normalize(MST_SAMPLE_EDGES));
  });

  it("keeps the grid start and goal off the walls", () => {
    const wallKeys = GRID_SCENARIO.walls.map(([x, y]) => `${x},${y}`);
    expect(wallKeys).not.toContain(GRID_SCENARIO.start.join(","));
    expect(wallKeys).not.toContain(GRID_SCENARIO.goal.join(","));
  });
});
