import assert from "assert/strict";
import { MST_SAMPLE_EDGES } from "@textbook/config";
import {
  buildWeightedAdjacency,
  collectNodes,
  formatEdgeTuple,
  kruskalMst,
  primMst,
  toWeightedEdges,
} from "@textbook/mst";
import type { DemoContext } from "../context";
import { formatList } from "../format";

/**
 * Kruskal and Prim on the same graph; both trees must weigh the same.
 */
export function runMstDemo({ print, logger }: DemoContext): void {
  const edges = toWeightedEdges(MST_SAMPLE_EDGES);
  const nodes = collectNodes(edges);

  print(`Nodes: ${formatList(nodes)}`);
  print("Edges:");
  edges.forEach((edge) => print(`  ${formatEdgeTuple(edge)}`));

  const kruskal = kruskalMst(edges, nodes);
  print();
  print("Kruskal MST edges (u,v,w):");
  kruskal.edges.forEach((edge) => print(`  ${formatEdgeTuple(edge)}`));
  print(`Kruskal total weight: ${kruskal.totalWeight}`);

  const prim = primMst(buildWeightedAdjacency(edges), { start: nodes[0] });
  print();
  print("Prim MST edges (u,v,w):");
  prim.edges.forEach((edge) => print(`  ${formatEdgeTuple(edge)}`));
  print(`Prim total weight: ${prim.totalWeight}`);

  assert.ok(Math.abs(kruskal.totalWeight - prim.totalWeight) < 1e-9, "Kruskal and Prim produced different totals");
  assert.equal(kruskal.edges.length, nodes.length - 1, "Kruskal MST edge count incorrect");
  assert.equal(prim.edges.length, nodes.length - 1, "Prim MST edge count incorrect");
  logger.debug({ totalWeight: kruskal.totalWeight }, "mst totals match");

  print();
  print("Demo assertions passed: MST totals match and edge counts OK.");
}
