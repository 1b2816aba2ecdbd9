import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

import chalk from 'chalk';
import { config } from '../config';
import { db } from '../db/connection';
import { QuestDBSnapshotStore } from '../db/snapshot-store';
import { BinanceOptionsClient } from '../services/binance-options-client';
import { healthMonitor } from '../services/health-monitor';
import { OptionSnapshotFeed } from '../services/option-snapshot-feed';
import { formatDailyTimeUtc } from '@optiontape/shared';

let shuttingDown = false;

async function shutdown(feed: OptionSnapshotFeed, exitCode: number): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  console.log(chalk.yellow('\nShutting down option snapshot feed...'));
  healthMonitor.stopMonitoring();
  await feed.stop();

  console.log(chalk.yellow('Disconnecting from database...'));
  await db.disconnect();

  console.log(chalk.green('Shutdown complete'));
  process.exit(exitCode);
}

function installSignalHandlers(feed: OptionSnapshotFeed): void {
  process.on('SIGUSR1', () => {
    console.log(chalk.cyan('\n=== HEALTH STATUS ==='));
    console.log(healthMonitor.getHealthSummary());
    console.log(chalk.cyan('===================\n'));
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(feed, 0).catch(error => {
        console.error(chalk.red('Error during shutdown:'), error);
        process.exit(1);
      });
    });
  }

  process.on('uncaughtException', error => {
    console.error(chalk.red('Uncaught Exception:'), error);
    console.log(chalk.yellow('Attempting graceful shutdown...'));
    shutdown(feed, 1).catch(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason, promise) => {
    console.error(chalk.red('Unhandled Rejection at:'), promise, chalk.red('reason:'), reason);
  });
}

async function main() {
  console.log(chalk.blue('Connecting to database...'));
  await db.connect();
  console.log(chalk.green('Database connected successfully'));

  const feed = new OptionSnapshotFeed({
    store: new QuestDBSnapshotStore(db),
    source: new BinanceOptionsClient(),
  });

  installSignalHandlers(feed);

  console.log(chalk.blue(`Loading option universe for ${config.universe.underlyings.join(', ')}...`));
  await feed.start();

  healthMonitor.setServices(feed, db);
  healthMonitor.startMonitoring(60000);

  const status = feed.getHealthStatus();
  console.log(chalk.green(`Streaming ${status.universeSize} option symbols in ${status.quoteGroups.length} groups`));
  console.log(
    chalk.green(
      `Snapshots every ${config.schedule.snapshotIntervalMs / 1000}s starting at #${status.snapshotIndex + 1}, ` +
        `metadata refresh daily at ${formatDailyTimeUtc(config.schedule.metadataRefreshTime)}`
    )
  );

  await feed.wait();
}

main().catch(error => {
  console.error(chalk.red('Failed to start option snapshot feed:'), error);
  db.disconnect().finally(() => {
    process.exit(1);
  });
});
