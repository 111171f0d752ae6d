export type WeightedEdge = {
  src: string;
  dst: string;
  weight: number;
};

export type WeightedNeighbor = {
  node: string;
  weight: number;
};

export type WeightedAdjacency = Map<string, WeightedNeighbor[]>;

export type MstResult = {
  edges: WeightedEdge[];
  totalWeight: number;
};
