import assert from "assert/strict";
import { KRUSKAL_TRACE_EDGES } from "@textbook/config";
import {
  collectNodes,
  formatEdge,
  kruskalSteps,
  sortEdgesByWeight,
  spannedNodes,
  toWeightedEdges,
  type WeightedEdge,
} from "@textbook/mst";
import type { DemoContext } from "../context";
import { formatList } from "../format";

/**
 * Kruskal's algorithm with every greedy choice printed as it is made.
 */
export async function runKruskalDemo({ print, logger, sleep, config }: DemoContext): Promise<void> {
  print("Kruskal's MST Algorithm Demo");
  print("=".repeat(40));

  const edges = toWeightedEdges(KRUSKAL_TRACE_EDGES);
  const nodes = collectNodes(edges);

  print("Graph:");
  print(`  Vertices: ${formatList(nodes)}`);
  print();
  print("  Edges:");
  edges.forEach((edge) => print(`    ${formatEdge(edge)}`));

  print();
  print("Sorted edges by weight:");
  sortEdgesByWeight(edges).forEach((edge) => print(`  ${formatEdge(edge)}`));

  print();
  print("Building MST:");
  print("  (Each step shows the greedy choice made)");
  print();

  const tree: WeightedEdge[] = [];
  let total = 0;
  for (const step of kruskalSteps(edges, nodes)) {
    tree.push(step.edge);
    total = step.totalWeight;
    print(`  Added: ${formatEdge(step.edge)}`);
    print(`  Current MST weight: ${total}`);
    logger.debug({ edge: formatEdge(step.edge), totalWeight: total }, "edge accepted");
    await sleep(config.KRUSKAL_STEP_DELAY_MS);
  }

  print();
  print("Final Results:");
  print("-".repeat(20));
  print("MST edges:");
  tree.forEach((edge) => print(`  ${formatEdge(edge)}`));
  print();
  print(`Total MST weight: ${total}`);

  assert.equal(tree.length, nodes.length - 1, "MST should have |V|-1 edges");
  assert.deepEqual(spannedNodes(tree), new Set(nodes), "MST should include all nodes");

  print();
  print("All assertions passed: MST properties verified!");
}
