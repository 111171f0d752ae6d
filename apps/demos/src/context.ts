import type { Config } from "./config";
import type { Logger } from "./logger";

export type DemoContext = {
  config: Config;
  logger: Logger;
  /** Write one line of demo output. */
  print: (line?: string) => void;
  sleep: (ms: number) => Promise<void>;
  /** Interactive demos read user lines from here. */
  input: NodeJS.ReadableStream;
  /** Prompts for interactive demos. */
  output: NodeJS.WritableStream;
};

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createConsoleContext(config: Config, logger: Logger): DemoContext {
  return {
    config,
    logger,
    print: (line = "") => console.log(line),
    sleep: delay,
    input: process.stdin,
    output: process.stdout
  };
}
