import { neighborsOf } from "./adjacency.js";
import type { AdjacencyList, TraversalOrder } from "./types.js";

/**
 * Expand one frontier, then recurse on the next one. Nodes are marked visited
 * as soon as they are discovered.
 */
function visitLevels(
  graph: AdjacencyList,
  frontier: string[],
  visited: Set<string>,
  order: TraversalOrder
): void {
  const nextLevel: string[] = [];
  for (const node of frontier) {
    for (const neighbor of neighborsOf(graph, node)) {
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        order.push(neighbor);
        nextLevel.push(neighbor);
      }
    }
  }
  if (nextLevel.length > 0) {
    visitLevels(graph, nextLevel, visited, order);
  }
}

/**
 * Level-order breadth-first search from `start`, one recursive call per level.
 */
export function bfsRecursive(graph: AdjacencyList, start: string): TraversalOrder {
  const visited = new Set<string>([start]);
  const order: TraversalOrder = [start];
  visitLevels(graph, [start], visited, order);
  return order;
}

/**
 * Breadth-first search with an explicit FIFO queue.
 */
export function bfsQueue(graph: AdjacencyList, start: string): TraversalOrder {
  const visited = new Set<string>([start]);
  const order: TraversalOrder = [];
  const queue: string[] = [start];
  let head = 0;

  while (head < queue.length) {
    const node = queue[head++];
    order.push(node);
    for (const neighbor of neighborsOf(graph, node)) {
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        queue.push(neighbor);
      }
    }
  }

  return order;
}

/**
 * Run BFS from every unvisited vertex, sharing visited state across components.
 */
export function bfsFull(graph: AdjacencyList): TraversalOrder {
  const visited = new Set<string>();
  const order: TraversalOrder = [];

  for (const node of graph.keys()) {
    if (visited.has(node)) continue;
    visited.add(node);
    order.push(node);
    visitLevels(graph, [node], visited, order);
  }

  return order;
}
