/**
 * Shared plumbing for commands that touch the database: option parsing, opening a
 * runner against the configured database, rendering progress and reporting errors.
 */

/* eslint-disable no-console */

import * as path from 'path';
import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { Ora } from 'ora';
import type Database from 'better-sqlite3';
import {
   loadMigrationConfig,
   openDatabase,
   LockTimeoutError,
   MigrationRunner,
   NoRevertDefinedError,
} from '@daybook/core';
import type { MigrationConfig, MigrationProgressCallback, MigrationRegistry } from '@daybook/core';

export interface DatabaseOptions {
   database?: string;
}

export interface RunnerSession {
   config: MigrationConfig;
   db: Database.Database;
   runner: MigrationRunner;
}

/**
 * Commander argument parser for a schema version (0 means "before any migration").
 */
export function parseVersion(value: string): number {
   const version = Number(value);

   if (!/^\d+$/.test(value) || !Number.isSafeInteger(version)) {
      throw new InvalidArgumentError('Must be a non-negative integer.');
   }

   return version;
}

/**
 * Resolve configuration (with `--database` taking precedence over the environment),
 * open the database and build a runner for `registry`.
 */
export function openSession(
   registry: MigrationRegistry,
   options: DatabaseOptions,
   onProgress?: MigrationProgressCallback
): RunnerSession {
   const config = loadMigrationConfig();

   if (options.database) {
      config.databasePath = path.resolve(options.database);
   }

   const db = openDatabase(config.databasePath, { busyTimeoutMs: config.busyTimeoutMs });

   const runner = new MigrationRunner(registry, {
      tableName: config.tableName,
      lock: { timeoutMs: config.lockTimeoutMs },
      onProgress,
   });

   return { config, db, runner };
}

/**
 * Render runner progress events on a spinner.
 */
export function createProgressReporter(spinner: Ora): MigrationProgressCallback {
   return (progress) => {
      const counter = progress.index !== undefined && progress.total !== undefined
         ? `${chalk.dim(`[${progress.index}/${progress.total}]`)} `
         : '';

      switch (progress.phase) {
         case 'lock-wait':
            spinner.start(progress.message);
            break;
         case 'applying':
         case 'reverting':
            spinner.start(`${counter}${progress.message}`);
            break;
         case 'applied':
         case 'reverted':
            if (spinner.isSpinning) {
               spinner.succeed();
            }
            break;
         case 'skipped':
            spinner.info(`${counter}${progress.message}`);
            break;
         case 'force-reset':
         case 'lock-release-failed':
            spinner.warn(progress.message);
            break;
         default:
            break;
      }
   };
}

/**
 * Subscribe to Ctrl+C for the duration of a run. The first interrupt aborts between
 * migrations; a second one falls through to Node's default handler.
 */
export function watchInterrupt(): { signal: AbortSignal; dispose: () => void } {
   const controller = new AbortController();

   const onInterrupt = (): void => {
      controller.abort();
   };

   process.once('SIGINT', onInterrupt);

   return {
      signal: controller.signal,
      dispose: () => {
         process.off('SIGINT', onInterrupt);
      },
   };
}

/**
 * Print an error (with a hint where one helps) and mark the process as failed.
 */
export function reportError(error: unknown, spinner?: Ora): void {
   if (spinner?.isSpinning) {
      spinner.fail();
   }

   console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));

   if (error instanceof NoRevertDefinedError) {
      console.error(chalk.dim('  Use "daybook force-reset <version>" to clear a record without running down()'));
   } else if (error instanceof LockTimeoutError) {
      console.error(chalk.dim('  Another migration run holds the lock; retry once it finishes'));
   }

   process.exitCode = 1;
}

export function plural(count: number, noun: string): string {
   return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
