export type { AdjacencyList, UndirectedEdge, TraversalOrder } from "./types.js";
export type { Comparator } from "./min-heap.js";

export { buildUndirectedGraph, addVertex, neighborsOf } from "./adjacency.js";
export { dfsRecursive, dfsIterative, dfsFull } from "./dfs.js";
export { bfsRecursive, bfsQueue, bfsFull } from "./bfs.js";
export { MinHeap } from "./min-heap.js";
