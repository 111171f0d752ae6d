import { MinHeap } from "@textbook/graph";
import type { Graph, GraphEdge, Heuristic, PathResult } from "./types.js";

type OpenEntry = {
  node: string;
  f: number;
  seq: number;
};

/**
 * Cost of traversing an edge. Unweighted edges cost 1.
 */
export function edgeCost(edge: GraphEdge): number {
  const cost = edge.cost ?? 1;
  if (!Number.isFinite(cost) || cost < 0) {
    throw new Error(`Edge cost must be a non-negative number but received '${String(edge.cost)}'`);
  }
  return cost;
}

/**
 * Walk the cameFrom chain back from `current` and return the path start-first.
 */
export function reconstructPath(cameFrom: Map<string, string>, current: string): string[] {
  const path = [current];
  let cursor = current;
  let parent = cameFrom.get(cursor);
  while (parent !== undefined) {
    path.push(parent);
    cursor = parent;
    parent = cameFrom.get(cursor);
  }
  return path.reverse();
}

/**
 * A* search from `start` to `goal`.
 *
 * The open set is a min-heap on f = g + h with ties broken by insertion order.
 * Returns null when the goal cannot be reached. With an admissible heuristic
 * the returned cost is optimal.
 */
export function findPath(
  graph: Graph,
  start: string,
  goal: string,
  heuristic: Heuristic
): PathResult | null {
  if (start === goal) {
    return { nodes: [start], totalCost: 0 };
  }

  const openSet = new MinHeap<OpenEntry>((a, b) => a.f - b.f || a.seq - b.seq);
  const cameFrom = new Map<string, string>();
  const gScore = new Map<string, number>([[start, 0]]);
  const closed = new Set<string>();
  let seq = 0;

  openSet.push({ node: start, f: heuristic(start, goal), seq: seq++ });

  while (!openSet.isEmpty()) {
    const entry = openSet.pop();
    if (!entry) break;
    const current = entry.node;

    if (current === goal) {
      return {
        nodes: reconstructPath(cameFrom, current),
        totalCost: gScore.get(current) ?? 0,
      };
    }

    // Stale heap entries for already-expanded nodes
    if (closed.has(current)) continue;
    closed.add(current);

    const currentG = gScore.get(current) ?? Infinity;
    for (const edge of graph.get(current) ?? []) {
      if (closed.has(edge.to)) continue;

      const tentativeG = currentG + edgeCost(edge);
      if (tentativeG < (gScore.get(edge.to) ?? Infinity)) {
        cameFrom.set(edge.to, current);
        gScore.set(edge.to, tentativeG);
        openSet.push({ node: edge.to, f: tentativeG + heuristic(edge.to, goal), seq: seq++ });
      }
    }
  }

  return null; // No path found
}

/**
 * Sum of edge costs along a node path, or null if two consecutive nodes are not
 * connected.
 */
export function pathCost(graph: Graph, nodes: string[]): number | null {
  let total = 0;
  for (let i = 0; i < nodes.length - 1; i++) {
    const edge = (graph.get(nodes[i]) ?? []).find((e) => e.to === nodes[i + 1]);
    if (!edge) return null;
    total += edgeCost(edge);
  }
  return total;
}
