/**
 * Command line entry point
 *
 *   tsx src/cli.ts          run until SIGINT/SIGTERM
 *   tsx src/cli.ts --once   run a single cycle and exit
 */

import { loadConfig, logConfig, validateConfig, type AppConfig } from "../config/env";
import { ConfigError, getErrorMessage } from "./pipeline/errors";
import { buildServices, setupGracefulShutdown } from "./services/startup";
import { serviceLoggers } from "./utils/logger";

const logger = serviceLoggers.startup;

export interface CliOptions {
  once: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  return { once: argv.includes("--once") };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseCliArgs(argv);

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal(error.message, { keys: error.keys });
      return 1;
    }
    throw error;
  }

  logConfig(config);
  for (const warning of validateConfig(config).warnings) {
    logger.warn(warning);
  }

  const { poller } = buildServices(config);

  if (options.once) {
    const summary = await poller.runOnce();
    logger.info("Single cycle finished", { ...summary });
    return 0;
  }

  const removeHandlers = setupGracefulShutdown(poller);
  try {
    await poller.start();
  } finally {
    removeHandlers();
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal("Unexpected failure", { error: getErrorMessage(error) });
    process.exitCode = 1;
  });
