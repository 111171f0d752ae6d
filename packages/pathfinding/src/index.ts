export type {
  Point,
  GraphEdge,
  Graph,
  Heuristic,
  PathResult,
  GridPathResult,
} from "./types.js";

export {
  edgeCost,
  findPath,
  pathCost,
  reconstructPath,
} from "./astar.js";

export {
  buildGridGraph,
  cellKey,
  findGridPath,
  manhattan,
  manhattanHeuristic,
  parseCellKey,
  renderGrid,
} from "./grid.js";
