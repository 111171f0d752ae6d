import assert from "assert/strict";
import { BFS_ISOLATED_NODE, BFS_SAMPLE_EDGES } from "@textbook/config";
import { addVertex, bfsFull, bfsQueue, bfsRecursive, buildUndirectedGraph } from "@textbook/graph";
import type { DemoContext } from "../context";
import { formatAdjacency, formatList } from "../format";

export function runBfsDemo({ print, logger }: DemoContext): void {
  // Graph with a cycle (2-5-6-3) and an isolated node
  const graph = addVertex(buildUndirectedGraph(BFS_SAMPLE_EDGES), BFS_ISOLATED_NODE);

  print("Adjacency list:");
  formatAdjacency(graph).forEach((line) => print(line));

  print();
  print("BFS from '1' (component of 1):");
  const fromOne = bfsRecursive(graph, "1");
  print(formatList(fromOne));

  print();
  print("Full BFS covering all vertices:");
  const fullOrder = bfsFull(graph);
  print(formatList(fullOrder));

  assert.deepEqual(new Set(fullOrder), new Set(graph.keys()), "BFS did not visit all vertices");
  assert.equal(fullOrder.length, graph.size, "Visited count doesn't match vertex count");
  assert.deepEqual(bfsQueue(graph, "1"), fromOne, "Queue-based BFS order differs from level recursion");
  logger.debug({ visited: fullOrder.length }, "bfs verified");

  print();
  print("Assertions passed: all vertices visited by BFS.");
}
