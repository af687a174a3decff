import { type AppConfig, loadConfig } from "./config";
import { describeError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export type StartupOptions = {
  readonly exit?: (code: number) => never;
  readonly logger?: Logger;
};

/** Loads the config or ends the process with code 1, before anything touches the network. */
export const loadConfigOrExit = (path: string, options: StartupOptions = {}): AppConfig => {
  const exit = options.exit ?? ((code: number): never => process.exit(code));
  const logger = options.logger ?? defaultLogger;
  try {
    return loadConfig(path);
  } catch (error) {
    logger.error("💥 Failed to load config", { path, ...describeError(error) });
    return exit(1);
  }
};
