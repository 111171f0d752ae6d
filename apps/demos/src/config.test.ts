import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { DEFAULT_QUEENS_SIZES } from "@textbook/config";
import { getConfig, resetConfig } from "./config";

const KEYS = ["LOG_LEVEL", "KRUSKAL_STEP_DELAY_MS", "NQUEENS_SIZES"] as const;

describe("getConfig", () => {
  const saved: Partial<Record<(typeof KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetConfig();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetConfig();
  });

  it("applies defaults", () => {
    expect(getConfig()).toEqual({
      LOG_LEVEL: "info",
      KRUSKAL_STEP_DELAY_MS: 500,
      NQUEENS_SIZES: [4, 8]
    });
  });

  it("takes the board sizes default from the shared constant", () => {
    expect(getConfig().NQUEENS_SIZES).toEqual(DEFAULT_QUEENS_SIZES);
  });

  it("coerces values from the environment", () => {
    process.env.LOG_LEVEL = "debug";
    process.env.KRUSKAL_STEP_DELAY_MS = "25";
    process.env.NQUEENS_SIZES = " 5, 6 ,";
    expect(getConfig()).toEqual({
      LOG_LEVEL: "debug",
      KRUSKAL_STEP_DELAY_MS: 25,
      NQUEENS_SIZES: [5, 6]
    });
  });

  it("rejects invalid board sizes", () => {
    process.env.NQUEENS_SIZES = "4,abc";
    expect(() => getConfig()).toThrow("Configuration validation failed");
  });

  it("rejects a negative delay", () => {
    process.env.KRUSKAL_STEP_DELAY_MS = "-1";
    expect(() => getConfig()).toThrow(/KRUSKAL_STEP_DELAY_MS/);
  });

  it("caches until reset", () => {
    const first = getConfig();
    process.env.LOG_LEVEL = "warn";
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().LOG_LEVEL).toBe("warn");
  });
});
