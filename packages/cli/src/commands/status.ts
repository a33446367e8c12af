/**
 * Status command - Show applied and pending migrations
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import type { MigrationRegistry } from '@daybook/core';
import { openSession, reportError } from '../utils/session.ts';
import type { DatabaseOptions } from '../utils/session.ts';

interface StatusOptions extends DatabaseOptions {
   json?: boolean;
}

export function createStatusCommand(registry: MigrationRegistry): Command {
   return new Command('status')
      .description('Show applied and pending migrations')
      .option('-d, --database <path>', 'Database file (default: $DAYBOOK_DATABASE or $DAYBOOK_HOME/daybook.db)')
      .option('--json', 'Output as JSON')
      .action((options: StatusOptions) => {
         try {
            const { config, db, runner } = openSession(registry, options);

            try {
               const status = runner.status(db);

               if (options.json) {
                  console.log(JSON.stringify({ database: config.databasePath, table: config.tableName, ...status }, null, 2));
                  return;
               }

               console.log(chalk.bold('\n📋 Migration Status\n'));
               console.log(`  ${chalk.dim('Database:')}  ${config.databasePath}`);
               console.log(`  ${chalk.dim('Table:')}     ${config.tableName}`);
               console.log(`  ${chalk.dim('Version:')}   v${status.currentVersion} of v${status.latestVersion}`);

               console.log(chalk.bold('\n  Applied:'));

               if (status.applied.length === 0) {
                  console.log(chalk.dim('    (none)'));
               }

               for (const record of status.applied) {
                  console.log(`    ${chalk.green('✓')} v${record.version}  ${record.description}  ${chalk.dim(record.appliedAt)}`);
               }

               console.log(chalk.bold('\n  Pending:'));

               if (status.pending.length === 0) {
                  console.log(chalk.dim('    (none)'));
               }

               for (const migration of status.pending) {
                  const note = migration.reversible ? '' : chalk.dim(' (no down)');

                  console.log(`    ${chalk.yellow('○')} v${migration.version}  ${migration.description}${note}`);
               }

               if (status.unknown.length > 0) {
                  console.log(chalk.red('\n  Applied but not registered:'));

                  for (const version of status.unknown) {
                     console.log(`    ${chalk.red('?')} v${version}`);
                  }
               }

               console.log('');
            } finally {
               db.close();
            }
         } catch(error) {
            reportError(error);
         }
      });
}
