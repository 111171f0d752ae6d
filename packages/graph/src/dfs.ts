import { neighborsOf } from "./adjacency.js";
import type { AdjacencyList, TraversalOrder } from "./types.js";

/**
 * Recursive depth-first search from `start`.
 *
 * `visited` and `order` may be passed in so several calls share state (see
 * dfsFull). Returns the visit order for the component containing `start`.
 */
export function dfsRecursive(
  graph: AdjacencyList,
  start: string,
  visited: Set<string> = new Set(),
  order: TraversalOrder = []
): TraversalOrder {
  visited.add(start);
  order.push(start);

  for (const neighbor of neighborsOf(graph, start)) {
    if (!visited.has(neighbor)) {
      dfsRecursive(graph, neighbor, visited, order);
    }
  }

  return order;
}

/**
 * Depth-first search with an explicit stack. Produces the same order as
 * dfsRecursive, without growing the call stack on long paths.
 */
export function dfsIterative(graph: AdjacencyList, start: string): TraversalOrder {
  const visited = new Set<string>();
  const order: TraversalOrder = [];
  const stack: string[] = [start];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || visited.has(node)) continue;

    visited.add(node);
    order.push(node);

    // Push in reverse so the first neighbour is explored first
    const neighbors = neighborsOf(graph, node);
    for (let i = neighbors.length - 1; i >= 0; i--) {
      if (!visited.has(neighbors[i])) {
        stack.push(neighbors[i]);
      }
    }
  }

  return order;
}

/**
 * Run DFS from every unvisited vertex so disconnected graphs are fully covered.
 * Components are entered in the iteration order of the adjacency map.
 */
export function dfsFull(graph: AdjacencyList): TraversalOrder {
  const visited = new Set<string>();
  const order: TraversalOrder = [];

  for (const node of graph.keys()) {
    if (!visited.has(node)) {
      dfsRecursive(graph, node, visited, order);
    }
  }

  return order;
}
