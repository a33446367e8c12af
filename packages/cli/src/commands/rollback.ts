/**
 * Rollback command - Revert applied migrations down to a target version
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

interface RollbackOptions extends DatabaseOptions {
   to: number;
   json?: boolean;
}

export function createRollbackCommand(registry: MigrationRegistry): Command {
   return new Command('rollback')
      .description('Revert applied migrations above a version, newest first')
      .requiredOption('--to <version>', 'Version to roll back to (0 reverts everything)', parseVersion)
      .option('-d, --database <path>', 'Database file (default: $DAYBOOK_DATABASE or $DAYBOOK_HOME/daybook.db)')
      .option('--json', 'Output the result as JSON')
      .action(async (options: RollbackOptions) => {
         const spinner = ora({ isSilent: !!options.json }),
               interrupt = watchInterrupt();

         try {
            const { config, db, runner } = openSession(registry, options, createProgressReporter(spinner));

            try {
               const result = await runner.migrateDown(db, options.to, { signal: interrupt.signal });

               if (options.json) {
                  console.log(JSON.stringify({ database: config.databasePath, ...result }, null, 2));
               } else if (result.reverted.length > 0) {
                  console.log(chalk.green(`\n✓ Rolled back ${plural(result.reverted.length, 'migration')}`)
                     + chalk.dim(` (now at v${result.currentVersion})`));
               } else {
                  console.log(chalk.green('\n✓ Nothing to roll back') + chalk.dim(` (v${result.currentVersion})`));
               }

               if (result.aborted) {
                  if (!options.json) {
                     console.log(chalk.yellow('\n⚠ Interrupted; the remaining migrations were not reverted'));
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
