import type { WeightedAdjacency, WeightedEdge } from "./types.js";

export function toWeightedEdges(tuples: [string, string, number][]): WeightedEdge[] {
  return tuples.map(([src, dst, weight]) => ({ src, dst, weight }));
}

/**
 * Undirected adjacency from an edge list; each edge is listed under both ends.
 */
export function buildWeightedAdjacency(edges: WeightedEdge[]): WeightedAdjacency {
  const adj: WeightedAdjacency = new Map();
  const link = (from: string, to: string, weight: number) => {
    const list = adj.get(from);
    if (list) {
      list.push({ node: to, weight });
    } else {
      adj.set(from, [{ node: to, weight }]);
    }
  };
  for (const { src, dst, weight } of edges) {
    link(src, dst, weight);
    link(dst, src, weight);
  }
  return adj;
}

/**
 * Distinct vertices named by an edge list, sorted.
 */
export function collectNodes(edges: WeightedEdge[]): string[] {
  const nodes = new Set<string>();
  for (const { src, dst } of edges) {
    nodes.add(src);
    nodes.add(dst);
  }
  return [...nodes].sort();
}

/**
 * Vertices touched by a set of tree edges.
 */
export function spannedNodes(edges: WeightedEdge[]): Set<string> {
  const nodes = new Set<string>();
  for (const { src, dst } of edges) {
    nodes.add(src);
    nodes.add(dst);
  }
  return nodes;
}

/**
 * Each undirected edge once, in adjacency order, keeping the first direction
 * seen.
 */
export function listUndirectedEdges(adj: WeightedAdjacency): WeightedEdge[] {
  const seen = new Set<string>();
  const edges: WeightedEdge[] = [];
  for (const [src, neighbors] of adj) {
    for (const { node: dst, weight } of neighbors) {
      const key = [src, dst].sort().join("\u0000") + `\u0000${weight}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push({ src, dst, weight });
    }
  }
  return edges;
}
