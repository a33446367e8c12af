/**
 * Config command - Display the resolved migration configuration
 */

/* eslint-disable no-console, no-process-env */

import { Command } from 'commander';
import chalk from 'chalk';
import { getDaybookHome, loadMigrationConfig, VERSION } from '@daybook/core';
import { reportError } from '../utils/session.ts';

interface ConfigOptions {
   json?: boolean;
}

const ENV_VARS = [
   'DAYBOOK_HOME',
   'DAYBOOK_DATABASE',
   'DAYBOOK_MIGRATIONS_TABLE',
   'DAYBOOK_LOCK_TIMEOUT_MS',
   'DAYBOOK_BUSY_TIMEOUT_MS',
];

export function createConfigCommand(): Command {
   return new Command('config')
      .description('Display current Daybook configuration and paths')
      .option('--json', 'Output as JSON')
      .action((options: ConfigOptions) => {
         try {
            const home = getDaybookHome(),
                  migration = loadMigrationConfig();

            const environment = Object.fromEntries(ENV_VARS.map((name) => {
               return [ name, process.env[name] || null ];
            }));

            const config = {
               version: VERSION,
               paths: {
                  home,
                  database: migration.databasePath,
               },
               migrations: {
                  table: migration.tableName,
                  lockTimeoutMs: migration.lockTimeoutMs,
                  busyTimeoutMs: migration.busyTimeoutMs,
               },
               environment,
            };

            if (options.json) {
               console.log(JSON.stringify(config, null, 2));
               return;
            }

            console.log(chalk.bold('\n⚙️  Daybook Configuration\n'));
            console.log(`  ${chalk.dim('Version:')}  ${VERSION}`);

            console.log(chalk.bold('\n  Paths:'));
            console.log(`    ${chalk.dim('Home:')}      ${home}${process.env.DAYBOOK_HOME ? chalk.yellow(' (from DAYBOOK_HOME)') : ''}`);
            // eslint-disable-next-line max-len
            console.log(`    ${chalk.dim('Database:')}  ${migration.databasePath}${process.env.DAYBOOK_DATABASE ? chalk.yellow(' (from DAYBOOK_DATABASE)') : ''}`);

            console.log(chalk.bold('\n  Migrations:'));
            console.log(`    ${chalk.dim('Table:')}         ${migration.tableName}`);
            console.log(`    ${chalk.dim('Lock timeout:')}  ${migration.lockTimeoutMs}ms`);
            console.log(`    ${chalk.dim('Busy timeout:')}  ${migration.busyTimeoutMs}ms`);

            console.log(chalk.bold('\n  Environment Variables:'));

            const set = ENV_VARS.filter((name) => {
               return !!process.env[name];
            });

            if (set.length > 0) {
               for (const name of set) {
                  console.log(`    ${chalk.green(name)}=${process.env[name]}`);
               }
            } else {
               console.log(chalk.dim('    (none set, using defaults)'));
            }

            console.log('');
         } catch(error) {
            reportError(error);
         }
      });
}
