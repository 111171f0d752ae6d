import type { AdjacencyList, UndirectedEdge } from "./types.js";

/**
 * Build an undirected adjacency list from an edge list.
 * Neighbour lists keep the order the edges were given in.
 */
export function buildUndirectedGraph(edges: UndirectedEdge[]): AdjacencyList {
  const graph: AdjacencyList = new Map();
  for (const [a, b] of edges) {
    addNeighbor(graph, a, b);
    addNeighbor(graph, b, a);
  }
  return graph;
}

/**
 * Ensure a vertex exists, e.g. to add an isolated node.
 */
export function addVertex(graph: AdjacencyList, node: string): AdjacencyList {
  if (!graph.has(node)) {
    graph.set(node, []);
  }
  return graph;
}

export function neighborsOf(graph: AdjacencyList, node: string): string[] {
  return graph.get(node) ?? [];
}

function addNeighbor(graph: AdjacencyList, from: string, to: string) {
  const list = graph.get(from);
  if (list) {
    list.push(to);
  } else {
    graph.set(from, [to]);
  }
}
