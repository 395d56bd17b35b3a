/**
 * Postwatch — Monitor
 *
 * Long-running service: periodic checks, background delivery and the
 * status server.
 *
 * Usage:
 *   npm start
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { ConfigError, toErrorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';
import { createPostwatch } from '../src/app';
import { createStatusApp, startStatusServer, closeServer } from '../src/server/status';

async function main(): Promise<void> {
  const config = loadConfig();
  const postwatch = createPostwatch(config);
  const { scheduler, queue, pool } = postwatch;

  await postwatch.prepare();

  const app = createStatusApp({
    sources: { scheduler, pool, queue },
    screenshotsDir: config.storage.screenshotsDir,
  });
  const server = await startStatusServer(app, config.server.port);

  queue.start();
  scheduler.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    try {
      await scheduler.stop();
      await queue.stop();
      await postwatch.persist();
      await postwatch.archive.flush();
      await closeServer(server);
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error: toErrorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch(error => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    logger.error('Monitor failed to start', { error: toErrorMessage(error) });
  }
  process.exit(1);
});
