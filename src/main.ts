#!/usr/bin/env node
import { InputValidator } from './application/services/InputValidator';
import { errorMessage } from './domain/errors/AppErrors';
import { CLIInputParser } from './infrastructure/cli/CLIInputParser';
import { ConfigFactory } from './infrastructure/config/ConfigFactory';
import { CompositionRoot } from './infrastructure/di/CompositionRoot';
import { getLogger } from './infrastructure/logging/Logger';
import { initGracefulShutdown } from './infrastructure/shutdown/GracefulShutdown';

/**
 * Main entry point for the browser task agent.
 */
async function main(): Promise<number> {
  const options = CLIInputParser.parse(process.argv.slice(2));
  const logger = getLogger('Main');

  if (options.help) {
    // eslint-disable-next-line no-console
    console.log(CLIInputParser.getHelpText());
    return 0;
  }
  if (options.errors.length > 0) {
    // eslint-disable-next-line no-console
    console.error(`${options.errors.join('\n')}\n${CLIInputParser.getHelpText()}`);
    return 2;
  }

  const config = ConfigFactory.create({
    provider: options.provider,
    maxSteps: options.maxSteps,
    headless: options.headless,
    storageStatePath: options.storageStatePath,
    saveStatePath: options.saveStatePath,
  });

  const shutdown = initGracefulShutdown();
  const container = await CompositionRoot.initialize(config);
  const { driver, cli, taskRunner } = container;

  // Runs last: registered first
  shutdown.registerHandler(async () => {
    cli.close();
    await driver.close();
  });
  const savePath = config.browser.saveStatePath;
  if (savePath) {
    shutdown.registerHandler(async () => {
      const saved = await driver.saveState(savePath);
      if (saved.success) {
        logger.info(`Storage state saved to ${savePath}`);
      } else {
        logger.warn(`Could not save storage state: ${saved.error ?? 'unknown error'}`);
      }
    });
  }

  try {
    const task = InputValidator.sanitizeTask(
      options.task ?? (await cli.ask('What should the agent do?', shutdown.signal))
    );
    const result = await taskRunner.run(task, config.agent.maxSteps, shutdown.signal);

    if (result.error) {
      logger.error(`Task failed after ${result.steps} steps: ${result.error.message}`);
      return 1;
    }
    cli.say(`\n${result.finalMessage ?? ''}`);
    return 0;
  } finally {
    await shutdown.runHandlers();
  }
}

main()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    getLogger('Main').error(errorMessage(error));
    process.exit(1);
  });
