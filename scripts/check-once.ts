/**
 * Postwatch — One-shot check
 *
 * Runs a single cycle, delivers everything it found (waiting out retries)
 * and exits.
 *
 * Usage:
 *   npm run check-once                 # Deliver to configured channels
 *   npm run check-once -- --dry-run    # Print notifications instead
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { ConfigError, toErrorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';
import { createPostwatch } from '../src/app';

async function checkOnce(): Promise<void> {
  const dryRun = process.argv.slice(2).includes('--dry-run');

  try {
    const config = loadConfig();
    const postwatch = createPostwatch(config, {
      channels: dryRun ? [{ kind: 'console', name: 'console' }] : undefined,
      persistState: !dryRun,
    });

    await postwatch.prepare();
    const report = await postwatch.scheduler.runCycle();
    await postwatch.queue.flush({ waitForRetries: true });
    await postwatch.archive.flush();

    const stats = postwatch.queue.stats();
    console.log('\n' + '='.repeat(60));
    console.log(`Accounts: ${report.accounts.length} (${report.totals.failedAccounts} failed)`);
    console.log(`Posts fetched: ${report.totals.fetched}, new: ${report.totals.new}, forwarded: ${report.totals.forwarded}`);
    console.log(`Deliveries: ${stats.delivered} delivered, ${stats.failed} failed${dryRun ? ' (dry run)' : ''}`);
    console.log('='.repeat(60) + '\n');

    if (report.totals.failedAccounts > 0 || stats.failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      logger.error('Check failed', { error: toErrorMessage(error) });
    }
    process.exit(1);
  }
}

checkOnce();
