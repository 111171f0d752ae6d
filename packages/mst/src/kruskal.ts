import { UnionFind } from "./union-find.js";
import type { MstResult, WeightedEdge } from "./types.js";

export type KruskalStep = {
  edge: WeightedEdge;
  /** Tree weight after accepting `edge`. */
  totalWeight: number;
};

export type KruskalHooks = {
  /** Called once with the edges in the order they will be considered. */
  onSorted?: (sorted: WeightedEdge[]) => void;
  onAccept?: (step: KruskalStep) => void;
};

/**
 * Edges ordered by weight ascending. The sort is stable, so equal weights keep
 * their input order.
 */
export function sortEdgesByWeight(edges: WeightedEdge[]): WeightedEdge[] {
  return [...edges].sort((a, b) => a.weight - b.weight);
}

/**
 * Kruskal's algorithm as a sequence of accepted edges. Edges are taken
 * cheapest first; one is kept when its endpoints are still in different sets.
 * Iteration stops once |V| - 1 edges are accepted.
 *
 * Endpoints are checked against `nodes` before the first step is produced.
 */
export function kruskalSteps(edges: WeightedEdge[], nodes: string[]): Generator<KruskalStep, void, undefined> {
  const sets = new UnionFind(nodes);
  for (const edge of edges) {
    for (const endpoint of [edge.src, edge.dst]) {
      if (!sets.has(endpoint)) {
        throw new Error(`Edge ${edge.src}-${edge.dst} references unknown node '${endpoint}'`);
      }
    }
  }
  return acceptEdges(sortEdgesByWeight(edges), sets, nodes.length - 1);
}

function* acceptEdges(
  sorted: WeightedEdge[],
  sets: UnionFind<string>,
  limit: number
): Generator<KruskalStep, void, undefined> {
  let accepted = 0;
  let totalWeight = 0;
  for (const edge of sorted) {
    if (accepted >= limit) return;
    if (sets.union(edge.src, edge.dst)) {
      accepted++;
      totalWeight += edge.weight;
      yield { edge, totalWeight };
    }
  }
}

/**
 * Minimum spanning tree by Kruskal's algorithm. On a disconnected graph the
 * result is a minimum spanning forest.
 */
export function kruskalMst(edges: WeightedEdge[], nodes: string[], hooks: KruskalHooks = {}): MstResult {
  const steps = kruskalSteps(edges, nodes);
  hooks.onSorted?.(sortEdgesByWeight(edges));

  const tree: WeightedEdge[] = [];
  let totalWeight = 0;
  for (const step of steps) {
    tree.push(step.edge);
    totalWeight = step.totalWeight;
    hooks.onAccept?.(step);
  }

  return { edges: tree, totalWeight };
}
