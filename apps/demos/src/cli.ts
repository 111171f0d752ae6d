import { getConfig, type Config, type LogLevel } from "./config";
import { createConsoleContext, type DemoContext } from "./context";
import { parseDemoName, runDemo } from "./demos";
import { createLogger, type Logger } from "./logger";

export type CliDeps = {
  createLogger?: (level?: LogLevel) => Logger;
  createContext?: (config: Config, logger: Logger) => DemoContext;
};

/**
 * Run the demo named by the first argument and resolve to the process exit
 * code. Any failure, bad configuration included, is logged as fatal.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const makeLogger = deps.createLogger ?? createLogger;
  const makeContext = deps.createContext ?? createConsoleContext;
  let logger: Logger | null = null;

  try {
    const config = getConfig();
    logger = makeLogger(config.LOG_LEVEL);
    const name = parseDemoName(args[0]);
    await runDemo(name, makeContext(config, logger));
    return 0;
  } catch (error) {
    // No configured level yet when config parsing is what failed
    (logger ?? makeLogger()).fatal({ err: error }, "demos failed");
    return 1;
  }
}
