/**
 * @daybook/cli - Command-line interface for Daybook schema migrations
 */

import { Command } from 'commander';
import { VERSION } from '@daybook/core';
import type { MigrationRegistry } from '@daybook/core';
import { createJournalRegistry } from './schema/index.ts';
import { createMigrateCommand } from './commands/migrate.ts';
import { createRollbackCommand } from './commands/rollback.ts';
import { createStatusCommand } from './commands/status.ts';
import { createForceResetCommand } from './commands/force-reset.ts';
import { createConfigCommand } from './commands/config.ts';

export interface ProgramOptions {

   /** Migrations to run (default: the journal schema) */
   registry?: MigrationRegistry;
}

export function createProgram(options: ProgramOptions = {}): Command {
   const registry = options.registry ?? createJournalRegistry(),
         program = new Command();

   program
      .name('daybook')
      .description('Apply, roll back and inspect Daybook database migrations')
      .version(VERSION, '-V, --cli-version', 'Output the CLI version');

   // Register commands
   program.addCommand(createMigrateCommand(registry));
   program.addCommand(createRollbackCommand(registry));
   program.addCommand(createStatusCommand(registry));
   program.addCommand(createForceResetCommand(registry));
   program.addCommand(createConfigCommand());

   return program;
}

export { createJournalRegistry, journalMigrations, APPROVAL_STATUSES } from './schema/index.ts';
export type { ApprovalStatus } from './schema/index.ts';
