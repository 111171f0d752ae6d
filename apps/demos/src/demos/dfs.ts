import assert from "assert/strict";
import { DFS_ISOLATED_NODE, DFS_SAMPLE_EDGES } from "@textbook/config";
import { addVertex, buildUndirectedGraph, dfsFull, dfsIterative, dfsRecursive } from "@textbook/graph";
import type { DemoContext } from "../context";
import { formatAdjacency, formatList } from "../format";

export function runDfsDemo({ print, logger }: DemoContext): void {
  // Two components: G is isolated
  const graph = addVertex(buildUndirectedGraph(DFS_SAMPLE_EDGES), DFS_ISOLATED_NODE);

  print("Adjacency list:");
  formatAdjacency(graph).forEach((line) => print(line));

  print();
  print("DFS from 'A' (component of A):");
  const fromA = dfsRecursive(graph, "A");
  print(formatList(fromA));

  print();
  print("Full DFS covering all vertices:");
  const fullOrder = dfsFull(graph);
  print(formatList(fullOrder));

  assert.deepEqual(new Set(fullOrder), new Set(graph.keys()), "DFS did not visit all vertices");
  assert.equal(fullOrder.length, graph.size, "Visited count doesn't match vertex count");
  assert.deepEqual(dfsIterative(graph, "A"), fromA, "Stack-based DFS order differs from recursive DFS");
  logger.debug({ visited: fullOrder.length }, "dfs verified");

  print();
  print("Assertions passed: all vertices visited.");
}
