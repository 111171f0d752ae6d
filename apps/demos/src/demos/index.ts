import { z } from "zod";
import type { DemoContext } from "../context";
import { runAStarDemo } from "./astar";
import { runBfsDemo } from "./bfs";
import { runChatbotDemo } from "./chatbot";
import { runDfsDemo } from "./dfs";
import { runKruskalDemo } from "./kruskal";
import { runMstDemo } from "./mst";
import { runNQueensDemo } from "./nqueens";
import { runPrimDemo } from "./prim";
import { runSelectionSortDemo } from "./selection-sort";

export const DEMO_NAMES = [
  "dfs",
  "bfs",
  "astar",
  "nqueens",
  "selection-sort",
  "mst",
  "prim",
  "kruskal",
  "chatbot"
] as const;

export type DemoName = (typeof DEMO_NAMES)[number];

export type DemoRunner = (ctx: DemoContext) => void | Promise<void>;

export const DEMOS: Record<DemoName, DemoRunner> = {
  dfs: runDfsDemo,
  bfs: runBfsDemo,
  astar: runAStarDemo,
  nqueens: runNQueensDemo,
  "selection-sort": runSelectionSortDemo,
  mst: runMstDemo,
  prim: runPrimDemo,
  kruskal: runKruskalDemo,
  chatbot: runChatbotDemo
};

const demoNameSchema = z.enum(DEMO_NAMES);

export function parseDemoName(value: string | undefined): DemoName {
  const result = demoNameSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Unknown demo '${value ?? ""}'. Expected one of: ${DEMO_NAMES.join(", ")}`);
  }
  return result.data;
}

/**
 * Run one demo, logging how long it took. Failures are logged and rethrown.
 */
export async function runDemo(name: DemoName, ctx: DemoContext): Promise<void> {
  const startedAt = Date.now();
  ctx.logger.info({ demo: name }, "demo started");
  try {
    await DEMOS[name](ctx);
  } catch (error) {
    ctx.logger.error({ err: error, demo: name }, "demo failed");
    throw error;
  }
  ctx.logger.info({ demo: name, durationMs: Date.now() - startedAt }, "demo complete");
}
