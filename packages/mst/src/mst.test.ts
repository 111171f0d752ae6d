import { describe, expect, it } from "vitest";
import { MST_SAMPLE_EDGES, PRIM_SAMPLE_EDGES } from "@textbook/config";
import {
  buildWeightedAdjacency,
  collectNodes,
  listUndirectedEdges,
  spannedNodes,
  toWeightedEdges,
} from "./adjacency.js";
import { formatEdge, formatEdgeTuple, formatMst } from "./format.js";
import { kruskalMst, kruskalSteps, sortEdgesByWeight } from "./kruskal.js";
import { primFull, primMst } from "./prim.js";
import type { WeightedEdge } from "./types.js";

const edge = (src: string, dst: string, weight: number): WeightedEdge => ({ src, dst, weight });

const sampleEdges = toWeightedEdges(MST_SAMPLE_EDGES);
const sampleNodes = collectNodes(sampleEdges);

describe("collectNodes", () => {
  it("lists every endpoint once, sorted", () => {
    expect(sampleNodes).toEqual(["A", "B", "C", "D", "E", "F", "G", "H", "I"]);
  });
});

describe("sortEdgesByWeight", () => {
  it("keeps input order between equal weights", () => {
    const sorted = sortEdgesByWeight([edge("a", "b", 2), edge("c", "d", 1), edge("e", "f", 2)]);
    expect(sorted).toEqual([edge("c", "d", 1), edge("a", "b", 2), edge("e", "f", 2)]);
  });

  it("does not mutate the input", () => {
    const input = [edge("a", "b", 2), edge("c", "d", 1)];
    sortEdgesByWeight(input);
    expect(input[0]).toEqual(edge("a", "b", 2));
  });
});

describe("kruskalMst", () => {
  it("builds the minimum spanning tree of the sample graph", () => {
    const result = kruskalMst(sampleEdges, sampleNodes);
    expect(result.totalWeight).toBe(37);
    expect(result.edges).toEqual([
      edge("H", "G", 1),
      edge("I", "C", 2),
      edge("G", "F", 2),
      edge("A", "B", 4),
      edge("C", "F", 4),
      edge("C", "D", 7),
      edge("A", "H", 8),
      edge("D", "E", 9),
    ]);
  });

  it("returns |V| - 1 edges spanning every vertex", () => {
    const result = kruskalMst(sampleEdges, sampleNodes);
    expect(result.edges).toHaveLength(sampleNodes.length - 1);
    expect(spannedNodes(result.edges)).toEqual(new Set(sampleNodes));
  });

  it("reports sorted edges and every accepted step", () => {
    const sortedSeen: WeightedEdge[][] = [];
    const totals: number[] = [];
    kruskalMst(sampleEdges, sampleNodes, {
      onSorted: (sorted) => sortedSeen.push(sorted),
      onAccept: (step) => totals.push(step.totalWeight),
    });
    expect(sortedSeen).toHaveLength(1);
    expect(sortedSeen[0][0]).toEqual(edge("H", "G", 1));
    expect(totals).toEqual([1, 3, 5, 9, 13, 20, 28, 37]);
  });

  it("returns a spanning forest for a disconnected graph", () => {
    const result = kruskalMst([edge("a", "b", 3), edge("c", "d", 1)], ["a", "b", "c", "d"]);
    expect(result.edges).toEqual([edge("c", "d", 1), edge("a", "b", 3)]);
    expect(result.totalWeight).toBe(4);
  });

  it("returns an empty tree for a single vertex", () => {
    expect(kruskalMst([], ["solo"])).toEqual({ edges: [], totalWeight: 0 });
  });

  it("rejects edges with unknown endpoints", () => {
    expect(() => kruskalMst([edge("a", "z", 1)], ["a", "b"])).toThrow(
      "Edge a-z references unknown node 'z'"
    );
  });
});

describe("kruskalSteps", () => {
  it("yields steps lazily", () => {
    const steps = kruskalSteps(sampleEdges, sampleNodes);
    expect(steps.next().value).toEqual({ edge: edge("H", "G", 1), totalWeight: 1 });
    expect(steps.next().value).toEqual({ edge: edge("I", "C", 2), totalWeight: 3 });
  });

  it("validates endpoints before the first step", () => {
    expect(() => kruskalSteps([edge("x", "y", 1)], [])).toThrow("Edge x-y references unknown node 'x'");
  });
});

describe("primMst", () => {
  it("agrees with Kruskal on the sample graph", () => {
    const result = primMst(buildWeightedAdjacency(sampleEdges), { start: "A" });
    expect(result.totalWeight).toBe(37);
    expect(result.edges).toEqual([
      edge("A", "B", 4),
      edge("A", "H", 8),
      edge("H", "G", 1),
      edge("G", "F", 2),
      edge("F", "C", 4),
      edge("C", "I", 2),
      edge("C", "D", 7),
      edge("D", "E", 9),
    ]);
  });

  it("grows the tree from node 1 of the small graph", () => {
    const adj = buildWeightedAdjacency(toWeightedEdges(PRIM_SAMPLE_EDGES));
    const result = primMst(adj, { start: "1" });
    expect(result.edges).toEqual([
      edge("1", "3", 2),
      edge("3", "2", 1),
      edge("2", "4", 3),
      edge("4", "5", 2),
      edge("5", "6", 4),
    ]);
    expect(result.totalWeight).toBe(12);
  });

  it("starts from the first vertex when no start is given", () => {
    const adj = buildWeightedAdjacency(toWeightedEdges(PRIM_SAMPLE_EDGES));
    expect(primMst(adj)).toEqual(primMst(adj, { start: "1" }));
  });

  it("covers only the component of the start node", () => {
    const adj = buildWeightedAdjacency([edge("a", "b", 1), edge("c", "d", 2)]);
    expect(primMst(adj, { start: "c" })).toEqual({ edges: [edge("c", "d", 2)], totalWeight: 2 });
  });

  it("returns nothing when the start was already visited", () => {
    const adj = buildWeightedAdjacency([edge("a", "b", 1)]);
    expect(primMst(adj, { start: "a", visited: new Set(["a"]) })).toEqual({ edges: [], totalWeight: 0 });
  });

  it("returns an empty tree for an empty graph", () => {
    expect(primMst(new Map())).toEqual({ edges: [], totalWeight: 0 });
  });

  it("rejects an unknown start", () => {
    const adj = buildWeightedAdjacency([edge("a", "b", 1)]);
    expect(() => primMst(adj, { start: "z" })).toThrow("Unknown start node 'z'");
  });
});

describe("primFull", () => {
  it("builds a minimum spanning forest across components", () => {
    const adj = buildWeightedAdjacency([
      edge("a", "b", 5),
      edge("b", "c", 1),
      edge("a", "c", 2),
      edge("x", "y", 3),
    ]);
    const result = primFull(adj);
    expect(result.edges).toEqual([edge("a", "c", 2), edge("c", "b", 1), edge("x", "y", 3)]);
    expect(result.totalWeight).toBe(6);
  });

  it("matches the Kruskal total on a connected graph", () => {
    const adj = buildWeightedAdjacency(sampleEdges);
    expect(primFull(adj).totalWeight).toBe(kruskalMst(sampleEdges, sampleNodes).totalWeight);
  });
});

describe("adjacency helpers", () => {
  it("lists each undirected edge once", () => {
    const adj = buildWeightedAdjacency(toWeightedEdges(PRIM_SAMPLE_EDGES));
    expect(listUndirectedEdges(adj)).toEqual(toWeightedEdges(PRIM_SAMPLE_EDGES));
  });

  it("records both directions", () => {
    const adj = buildWeightedAdjacency([edge("a", "b", 7)]);
    expect(adj.get("a")).toEqual([{ node: "b", weight: 7 }]);
    expect(adj.get("b")).toEqual([{ node: "a", weight: 7 }]);
  });
});

describe("formatting", () => {
  it("formats edges in both styles", () => {
    expect(formatEdge(edge("A", "B", 4))).toBe("A --(4)--> B");
    expect(formatEdge(edge("1", "3", 2), "weight")).toBe("1 -- 2 --> 3");
    expect(formatEdgeTuple(edge("A", "B", 4))).toBe("(A, B, 4)");
  });

  it("indents one edge per line", () => {
    expect(formatMst([edge("1", "3", 2), edge("3", "2", 1)])).toBe("  1 -- 2 --> 3\n  3 -- 1 --> 2");
  });
});
