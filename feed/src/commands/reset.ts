#!/usr/bin/env tsx

import { db } from '../db/connection';
import { ALL_TABLES } from '../db/tables';
import chalk from 'chalk';

async function main() {
  console.log(chalk.red('WARNING: This will delete ALL option snapshots in QuestDB!'));
  console.log(chalk.yellow('This action cannot be undone.'));

  try {
    await db.connect();
    await db.dropTables([...ALL_TABLES]);
    console.log(chalk.green('All snapshot tables have been dropped'));
  } catch (error) {
    console.error(chalk.red('Failed to reset data:'), error);
    process.exitCode = 1;
  } finally {
    await db.disconnect();
  }
}

main().catch(error => {
  console.error(chalk.red('Unhandled error:'), error);
  process.exit(1);
});
