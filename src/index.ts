#!/usr/bin/env node
import { CommanderError } from "commander";
import { Authorizer, createConsolePrompt } from "./auth";
import { SystemBrowserLauncher } from "./browser-launcher";
import { ARGUMENT_ERROR_EXIT_CODE, type CliOptions, parseCliArguments } from "./cli";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { formatSummary, runSync } from "./sync-service";

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArguments(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode === 0 ? 0 : ARGUMENT_ERROR_EXIT_CODE);
    }

    throw error;
  }

  const config = await loadConfig({ configPath: options.configPath });
  logger.info(
    `Loaded config: sources=${config.sources.size} destinations=${config.destinations.size} dataDir=${config.dataDir}`
  );

  const authorizer = new Authorizer(config, {
    browser: new SystemBrowserLauncher(config.browser),
    prompt: createConsolePrompt()
  });

  logger.info(`Stage: authorizing accounts (mode=${options.mode}).`);
  const accounts = await authorizer.authorizeAccounts(options.mode);

  const summary = await runSync(accounts, config, options.mode);
  logger.info(formatSummary(summary));
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`Sync failed: ${message}`);
  process.exitCode = 1;
});
