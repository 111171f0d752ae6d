import { Readable, Writable } from "stream";
import { vi } from "vitest";
import type { Config } from "../config";
import type { DemoContext } from "../context";

export const TEST_CONFIG: Config = {
  LOG_LEVEL: "silent",
  KRUSKAL_STEP_DELAY_MS: 0,
  NQUEENS_SIZES: [4, 8]
};

export type CapturedContext = {
  ctx: DemoContext;
  /** Every printed line, with multi-line strings split. */
  lines: string[];
  /** Everything written to the output stream (prompts). */
  written: () => string;
};

/**
 * Demo context that records output instead of writing to the console.
 */
export function createTestContext(overrides: Partial<DemoContext> & { inputLines?: string[] } = {}): CapturedContext {
  const { inputLines = [], ...rest } = overrides;
  const lines: string[] = [];
  const chunks: string[] = [];

  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });

  const ctx: DemoContext = {
    config: TEST_CONFIG,
    logger: { info: vi.fn(), debug: vi.fn(), error: vi.fn(), fatal: vi.fn() },
    print: (line = "") => {
      lines.push(...line.split("\n"));
    },
    sleep: vi.fn().mockResolvedValue(undefined),
    input: Readable.from(inputLines.map((line) => `${line}\n`)),
    output,
    ...rest
  };

  return { ctx, lines, written: () => chunks.join("") };
}
