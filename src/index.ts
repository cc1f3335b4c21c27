import { createApp } from './app.js';
import { config } from './config.js';
import { errorMessage } from './core/errors.js';
import { logger } from './lib/logger.js';

const app = createApp(config);

async function main(): Promise<void> {
  await app.start();
}

async function shutdown(): Promise<void> {
  logger.info('Shutting down...');
  try {
    await app.stop();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  void shutdown();
});
process.on('SIGTERM', () => {
  void shutdown();
});

main().catch((error) => {
  logger.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
