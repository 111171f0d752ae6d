import { MinHeap } from "@textbook/graph";
import type { MstResult, WeightedAdjacency, WeightedEdge } from "./types.js";

export type PrimOptions = {
  /** Root of the tree. Defaults to the first vertex of the adjacency map. */
  start?: string;
  /**
   * Vertices already claimed by other trees. Newly reached vertices are added
   * to it, which lets primFull grow one tree per component.
   */
  visited?: Set<string>;
};

type Frontier = WeightedEdge & { seq: number };

/**
 * Prim's algorithm: grow a tree from `start`, always taking the cheapest edge
 * from the tree to a vertex outside it. Only the component of `start` is
 * covered.
 */
export function primMst(adj: WeightedAdjacency, options: PrimOptions = {}): MstResult {
  const first = adj.keys().next();
  if (first.done) {
    return { edges: [], totalWeight: 0 };
  }

  const start = options.start ?? first.value;
  if (!adj.has(start)) {
    throw new Error(`Unknown start node '${start}'`);
  }

  const visited = options.visited ?? new Set<string>();
  if (visited.has(start)) {
    return { edges: [], totalWeight: 0 };
  }

  let seq = 0;
  const heap = new MinHeap<Frontier>((a, b) => a.weight - b.weight || a.seq - b.seq);
  const tree: WeightedEdge[] = [];
  let totalWeight = 0;

  const expand = (node: string) => {
    visited.add(node);
    for (const { node: neighbor, weight } of adj.get(node) ?? []) {
      if (!visited.has(neighbor)) {
        heap.push({ src: node, dst: neighbor, weight, seq: seq++ });
      }
    }
  };

  expand(start);

  while (!heap.isEmpty()) {
    const next = heap.pop();
    if (!next || visited.has(next.dst)) continue;

    tree.push({ src: next.src, dst: next.dst, weight: next.weight });
    totalWeight += next.weight;
    expand(next.dst);
  }

  return { edges: tree, totalWeight };
}

/**
 * Minimum spanning forest: run Prim from every vertex not yet covered, in
 * adjacency order.
 */
export function primFull(adj: WeightedAdjacency): MstResult {
  const visited = new Set<string>();
  const edges: WeightedEdge[] = [];
  let totalWeight = 0;

  for (const node of adj.keys()) {
    if (visited.has(node)) continue;
    const component = primMst(adj, { start: node, visited });
    edges.push(...component.edges);
    totalWeight += component.totalWeight;
  }

  return { edges, totalWeight };
}
