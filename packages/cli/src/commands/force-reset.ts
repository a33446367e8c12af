/**
 * Force-reset command - Forget that a migration was applied, without running down()
 *
 * For recovering from a migration that was recorded but whose effects were undone by
 * hand. The removal is kept in the audit table together with the reason.
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { MigrationRegistry } from '@daybook/core';
import { createProgressReporter, openSession, parseVersion, reportError } from '../utils/session.ts';
import type { DatabaseOptions } from '../utils/session.ts';

interface ForceResetOptions extends DatabaseOptions {
   reason: string;
}

export function createForceResetCommand(registry: MigrationRegistry): Command {
   return new Command('force-reset')
      .description('Remove the record of an applied migration so it runs again')
      .argument('<version>', 'Version whose record to remove', parseVersion)
      .requiredOption('--reason <text>', 'Why the record is being removed (stored in the audit trail)')
      .option('-d, --database <path>', 'Database file (default: $DAYBOOK_DATABASE or $DAYBOOK_HOME/daybook.db)')
      .action(async (version: number, options: ForceResetOptions) => {
         const spinner = ora();

         try {
            const { db, runner } = openSession(registry, options, createProgressReporter(spinner));

            try {
               const removed = await runner.forceReset(db, version, { reason: options.reason });

               if (removed) {
                  console.log(chalk.yellow(`\n⚠ Cleared the record for v${version}; it will run again on the next migrate`));
               } else {
                  console.log(chalk.dim(`\nv${version} is not recorded as applied; nothing to reset`));
               }
            } finally {
               db.close();
            }
         } catch(error) {
            reportError(error, spinner);
         }
      });
}
