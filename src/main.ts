/**
 * Main entry point for the Steam → Discord notifier
 */

import { config as loadEnv } from 'dotenv';
import { loadConfigSafe } from './config/index.js';
import { createSupervisor, runTestMode } from './app.js';
import { createLogger } from './utils/logger.js';

/**
 * Main application
 */
async function main(): Promise<void> {
  loadEnv();

  const args = process.argv.slice(2);
  const isTestMode = args.includes('--test');

  // Load configuration
  const { config, error } = loadConfigSafe();
  if (error || !config) {
    console.error(`Configuration error: ${error}`);
    process.exit(1);
  }

  const logger = createLogger(config.logging.level, config.logging.file);
  logger.info('Starting Steam → Discord notifier...');

  // Test notification mode
  if (isTestMode) {
    process.exit(await runTestMode(config, logger));
  }

  const supervisor = createSupervisor(config, logger);

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down...`);
    await supervisor.shutdown();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((err) => {
      logger.error('Shutdown failed', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await supervisor.start();

  logger.info(`Notifier running. Poll interval: ${config.scheduler.pollSeconds} seconds`);
  if (config.filters.onlyOnline || config.filters.onlyGames.size > 0) {
    logger.info(
      `Filters: onlyOnline=${config.filters.onlyOnline}, onlyGames=${[...config.filters.onlyGames].join(', ') || 'none'}`
    );
  }
}

// Run main
main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
