#!/usr/bin/env node

import { Command } from 'commander';
import { ConfigError, getEnv } from './config.js';
import { logger } from './utils/logger.js';
import { ConsolePrompter } from './utils/prompt.js';
import { runBot } from './bot.js';

const program = new Command();

program
  .name('easy-apply-assistant')
  .description('Walks LinkedIn Easy Apply in your own Chrome and stops at Submit')
  .version('1.0.0')
  .addHelpText(
    'after',
    '\nStart Chrome with --remote-debugging-port=9222, open LinkedIn Jobs, then run this.\n' +
      'Settings come from the YAML file named by CONFIG_PATH (default: config.yaml).'
  )
  .action(main);

async function main(): Promise<void> {
  const controller = new AbortController();

  const handleShutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn('Forced shutdown - exiting immediately');
      process.exit(1);
    }
    logger.warn(`${signal} received, finishing up...`);
    controller.abort();
  };
  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  try {
    const { CONFIG_PATH } = getEnv();
    await runBot({
      configPath: CONFIG_PATH,
      prompter: new ConsolePrompter(controller.signal),
      signal: controller.signal,
    });
    process.exit(0);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error(`Run failed: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
    }
    process.exit(1);
  }
}

program.parseAsync().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
