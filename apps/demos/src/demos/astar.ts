import assert from "assert/strict";
import { GRID_SCENARIO } from "@textbook/config";
import { buildGridGraph, cellKey, findGridPath, manhattan, pathCost, renderGrid } from "@textbook/pathfinding";
import type { DemoContext } from "../context";
import { formatPoint, formatPoints } from "../format";

export function runAStarDemo({ print, logger }: DemoContext): void {
  const { width, height, walls, start, goal } = GRID_SCENARIO;

  print(`Grid size: ${width} x ${height}`);
  print(`Start: ${formatPoint(start)} Goal: ${formatPoint(goal)}`);
  print(`Walls: ${formatPoints(walls)}`);

  const result = findGridPath(width, height, start, goal, walls);
  if (!result) {
    print("No path found");
    throw new Error(`No path from ${formatPoint(start)} to ${formatPoint(goal)}`);
  }

  const path = result.cells;
  print(`Found path length: ${path.length - 1}`);
  print(formatPoints(path));
  print();
  print("Map:");
  print(renderGrid(width, height, walls, path));

  assert.deepEqual(path[0], start, "Path does not start at start");
  assert.deepEqual(path[path.length - 1], goal, "Path does not end at goal");
  for (let i = 0; i < path.length - 1; i++) {
    const distance = manhattan(path[i], path[i + 1]);
    assert.equal(
      distance,
      1,
      `Non-adjacent steps in path: ${formatPoint(path[i])} -> ${formatPoint(path[i + 1])}`
    );
  }
  assert.ok(result.totalCost >= manhattan(start, goal), "Path is shorter than the Manhattan lower bound");
  // Re-walk the path over the grid graph; every step must be a real edge
  const walked = pathCost(buildGridGraph(width, height, walls), path.map(cellKey));
  assert.equal(walked, result.totalCost, "Path cost does not match the grid edges");
  logger.debug({ cost: result.totalCost }, "astar verified");

  print();
  print("A* demo assertions passed.");
}
