import type { WeightedEdge } from "./types.js";

export type EdgeStyle = "arrow" | "weight";

/**
 * "arrow": `A --(4)--> B`; "weight": `A -- 4 --> B`.
 */
export function formatEdge(edge: WeightedEdge, style: EdgeStyle = "arrow"): string {
  return style === "arrow"
    ? `${edge.src} --(${edge.weight})--> ${edge.dst}`
    : `${edge.src} -- ${edge.weight} --> ${edge.dst}`;
}

export function formatMst(edges: WeightedEdge[], style: EdgeStyle = "weight"): string {
  return edges.map((edge) => `  ${formatEdge(edge, style)}`).join("\n");
}

/**
 * Tuple-like rendering: `(A, B, 4)`.
 */
export function formatEdgeTuple(edge: WeightedEdge): string {
  return `(${edge.src}, ${edge.dst}, ${edge.weight})`;
}
