export type AdjacencyList = Map<string, string[]>; // node -> neighbours in insertion order

export type UndirectedEdge = [string, string];

export type TraversalOrder = string[];
