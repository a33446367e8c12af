/**
 * Migrate command - Apply pending migrations to the database
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { MigrationRegistry } from '@daybook/core';
import {
   createProgressReporter,
   openSession,
   parseVersion,
   plural,
   reportError,
   watchInterrupt,
} from '../utils/session.ts';
import type { DatabaseOptions } from '../utils/session.ts';

interface MigrateOptions extends DatabaseOptions {
   to?: number;
   json?: boolean;
}

export function createMigrateCommand(registry: MigrationRegistry): Command {
   return new Command('migrate')
      .description('Apply pending migrations')
      .option('--to <version>', 'Stop after this version (default: latest)', parseVersion)
      .option('-d, --database <path>', 'Database file (default: $DAYBOOK_DATABASE or $DAYBOOK_HOME/daybook.db)')
      .option('--json', 'Output the result as JSON')
      .action(async (options: MigrateOptions) => {
         const spinner = ora({ isSilent: !!options.json }),
               interrupt = watchInterrupt();

         try {
            const { config, db, runner } = openSession(registry, options, createProgressReporter(spinner));

            try {
               runner.ensureBookkeepingStore(db);

               const result = await runner.migrateUp(db, {
                  targetVersion: options.to,
                  signal: interrupt.signal,
               });

               if (options.json) {
                  console.log(JSON.stringify({ database: config.databasePath, ...result }, null, 2));
               } else if (result.applied.length > 0) {
                  console.log(chalk.green(`\n✓ Applied ${plural(result.applied.length, 'migration')}`)
                     + chalk.dim(` (now at v${result.currentVersion})`));
               } else {
                  console.log(chalk.green('\n✓ Database is up to date') + chalk.dim(` (v${result.currentVersion})`));
               }

               if (!options.json && result.skipped.length > 0) {
                  const versions = result.skipped.map((version) => {
                     return `v${version}`;
                  });

                  console.log(chalk.dim(`  Skipped (applied by another runner): ${versions.join(', ')}`));
               }

               if (result.aborted) {
                  if (!options.json) {
                     console.log(chalk.yellow('\n⚠ Interrupted; the remaining migrations were not applied'));
                  }

                  process.exitCode = 130;
               }
            } finally {
               db.close();
            }
         } catch(error) {
            reportError(error, spinner);
         } finally {
            interrupt.dispose();
         }
      });
}
