import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "./cli";
import { resetConfig } from "./config";
import { DEMOS } from "./demos";
import { createTestContext } from "./test-utils/context";

function createMockLogger() {
  return { info: vi.fn(), debug: vi.fn(), error: vi.fn(), fatal: vi.fn() };
}

describe("runCli", () => {
  const savedLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    if (savedLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLevel;
    }
    resetConfig();
    vi.restoreAllMocks();
  });

  it("runs the named demo and exits with 0", async () => {
    const logger = createMockLogger();
    let printed: string[] = [];
    const code = await runCli(["selection-sort"], {
      createLogger: () => logger,
      createContext: (config, log) => {
        const captured = createTestContext({ config, logger: log });
        printed = captured.lines;
        return captured.ctx;
      }
    });

    expect(code).toBe(0);
    expect(printed[0]).toBe("Selection Sort (greedy) demo");
    expect(logger.fatal).not.toHaveBeenCalled();
  });

  it("logs an unknown demo name as fatal", async () => {
    const logger = createMockLogger();
    const createLogger = vi.fn(() => logger);
    const code = await runCli(["nope"], { createLogger });

    expect(code).toBe(1);
    expect(createLogger).toHaveBeenCalledWith("silent");
    expect(logger.fatal).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: expect.stringContaining("Unknown demo 'nope'") }) },
      "demos failed"
    );
  });

  it("logs invalid configuration as fatal with the default level", async () => {
    process.env.LOG_LEVEL = "bad";
    const logger = createMockLogger();
    const createLogger = vi.fn(() => logger);
    const code = await runCli(["dfs"], { createLogger });

    expect(code).toBe(1);
    expect(createLogger).toHaveBeenCalledTimes(1);
    expect(createLogger).toHaveBeenCalledWith();
    expect(logger.fatal).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: expect.stringContaining("Configuration validation failed") }) },
      "demos failed"
    );
  });

  it("logs a failing demo as an error and then as fatal", async () => {
    const failure = new Error("boom");
    vi.spyOn(DEMOS, "dfs").mockImplementation(() => {
      throw failure;
    });
    const logger = createMockLogger();
    const code = await runCli(["dfs"], {
      createLogger: () => logger,
      createContext: (config, log) => createTestContext({ config, logger: log }).ctx
    });

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith({ err: failure, demo: "dfs" }, "demo failed");
    expect(logger.fatal).toHaveBeenCalledWith({ err: failure }, "demos failed");
  });
});
