import assert from "assert/strict";
import { PRIM_SAMPLE_EDGES, PRIM_SAMPLE_START } from "@textbook/config";
import {
  buildWeightedAdjacency,
  formatEdge,
  formatMst,
  listUndirectedEdges,
  primMst,
  spannedNodes,
  toWeightedEdges,
} from "@textbook/mst";
import type { DemoContext } from "../context";
import { formatList } from "../format";

export function runPrimDemo({ print, logger }: DemoContext): void {
  print("Prim's MST Algorithm Demo");
  print("-".repeat(30));

  const adj = buildWeightedAdjacency(toWeightedEdges(PRIM_SAMPLE_EDGES));
  const vertices = [...adj.keys()].sort();
  print(`Graph vertices: ${formatList(vertices)}`);
  print();
  print("Graph edges:");
  listUndirectedEdges(adj).forEach((edge) => print(`  ${formatEdge(edge, "weight")}`));

  print();
  print("Computing MST using Prim's algorithm...");
  const { edges, totalWeight } = primMst(adj, { start: PRIM_SAMPLE_START });

  print();
  print("Minimum Spanning Tree edges:");
  print(formatMst(edges));
  print();
  print(`Total MST weight: ${totalWeight}`);

  assert.equal(edges.length, vertices.length - 1, "MST should have |V|-1 edges");
  assert.deepEqual(spannedNodes(edges), new Set(vertices), "MST should span all vertices");
  logger.debug({ totalWeight }, "prim verified");

  print();
  print("All assertions passed!");
}
