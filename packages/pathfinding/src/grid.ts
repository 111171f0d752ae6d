import { GRID_DIRECTIONS } from "@textbook/config";
import { findPath } from "./astar.js";
import type { Graph, GraphEdge, GridPathResult, Heuristic, Point } from "./types.js";

export function cellKey([x, y]: Point): string {
  return `${x},${y}`;
}

export function parseCellKey(key: string): Point {
  const parts = key.split(",");
  if (parts.length !== 2 || parts.some((part) => part.trim() === "")) {
    throw new Error(`Invalid cell key '${key}'`);
  }
  const x = Number(parts[0]);
  const y = Number(parts[1]);
  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    throw new Error(`Invalid cell key '${key}'`);
  }
  return [x, y];
}

/**
 * Manhattan distance between two cells. Admissible on a 4-connected grid with
 * unit step cost.
 */
export function manhattan(a: Point, b: Point): number {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
}

export const manhattanHeuristic: Heuristic = (node, goal) =>
  manhattan(parseCellKey(node), parseCellKey(goal));

/**
 * Create a 4-connected grid graph (right, left, down, up). Wall cells are left
 * out entirely and never appear as neighbours.
 */
export function buildGridGraph(width: number, height: number, walls: Point[] = []): Graph {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new Error(`Grid size must be non-negative integers, got ${width}x${height}`);
  }

  const wallSet = new Set(walls.map(cellKey));
  const graph: Graph = new Map();

  for (let x = 0; x < width; x++) {
    for (let y = 0; y < height; y++) {
      const key = cellKey([x, y]);
      if (wallSet.has(key)) continue;

      const edges: GraphEdge[] = [];
      for (const [dx, dy] of GRID_DIRECTIONS) {
        const nx = x + dx;
        const ny = y + dy;
        const neighborKey = cellKey([nx, ny]);
        if (nx >= 0 && nx < width && ny >= 0 && ny < height && !wallSet.has(neighborKey)) {
          edges.push({ to: neighborKey });
        }
      }
      graph.set(key, edges);
    }
  }

  return graph;
}

/**
 * Find a shortest grid path between two cells using A* with the Manhattan
 * heuristic. Returns null when either endpoint is a wall or off the grid, or
 * when the goal is unreachable.
 */
export function findGridPath(
  width: number,
  height: number,
  start: Point,
  goal: Point,
  walls: Point[] = []
): GridPathResult | null {
  const graph = buildGridGraph(width, height, walls);
  const startKey = cellKey(start);
  const goalKey = cellKey(goal);
  if (!graph.has(startKey) || !graph.has(goalKey)) {
    return null;
  }

  const result = findPath(graph, startKey, goalKey, manhattanHeuristic);
  if (!result) {
    return null;
  }

  return {
    cells: result.nodes.map(parseCellKey),
    totalCost: result.totalCost,
  };
}

/**
 * Draw the grid one row per line: "#" walls, "S" start, "G" goal, "*" other
 * path cells and "." open cells.
 */
export function renderGrid(width: number, height: number, walls: Point[] = [], path: Point[] = []): string {
  const wallSet = new Set(walls.map(cellKey));
  const pathSet = new Set(path.map(cellKey));
  const startKey = path.length > 0 ? cellKey(path[0]) : null;
  const goalKey = path.length > 0 ? cellKey(path[path.length - 1]) : null;

  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    let row = "";
    for (let x = 0; x < width; x++) {
      const key = cellKey([x, y]);
      if (wallSet.has(key)) row += "#";
      else if (key === startKey) row += "S";
      else if (key === goalKey) row += "G";
      else if (pathSet.has(key)) row += "*";
      else row += ".";
    }
    rows.push(row);
  }
  return rows.join("\n");
}
