import { DEFAULT_QUEENS_SIZES } from "@textbook/config";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const configSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  // Pause between accepted edges in the traced Kruskal demo
  KRUSKAL_STEP_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  // Board sizes solved by the n-queens demo, e.g. "4,8"
  NQUEENS_SIZES: z
    .string()
    .default(DEFAULT_QUEENS_SIZES.join(","))
    .transform((value) =>
      value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map(Number)
    )
    .pipe(z.array(z.number().int().positive().max(12)).min(1, "NQUEENS_SIZES must list at least one size"))
});

export type Config = z.infer<typeof configSchema>;

export type LogLevel = Config["LOG_LEVEL"];

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

// For testing: reset cached config
export function resetConfig(): void {
  cachedConfig = null;
}
