export type Point = [number, number]; // [x, y] grid cell

export type GraphEdge = {
  to: string;
  cost?: number; // defaults to 1
};

export type Graph = Map<string, GraphEdge[]>; // node key -> outgoing edges

export type Heuristic = (node: string, goal: string) => number;

export type PathResult = {
  nodes: string[];
  totalCost: number;
};

export type GridPathResult = {
  cells: Point[];
  totalCost: number;
};
