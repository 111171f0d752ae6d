export type { WeightedEdge, WeightedNeighbor, WeightedAdjacency, MstResult } from "./types.js";
export type { KruskalHooks, KruskalStep } from "./kruskal.js";
export type { PrimOptions } from "./prim.js";
export type { EdgeStyle } from "./format.js";

export { UnionFind } from "./union-find.js";
export { kruskalMst, kruskalSteps, sortEdgesByWeight } from "./kruskal.js";
export { primMst, primFull } from "./prim.js";
export {
  buildWeightedAdjacency,
  collectNodes,
  listUndirectedEdges,
  spannedNodes,
  toWeightedEdges,
} from "./adjacency.js";
export { formatEdge, formatEdgeTuple, formatMst } from "./format.js";
