/**
 * Configuration - Database location and migration runner settings
 *
 * Determines default paths for Daybook data based on platform conventions and
 * environment variables.
 *
 * Environment variables:
 *   DAYBOOK_HOME - Override the base directory for all Daybook data
 *   DAYBOOK_DATABASE - Path to the SQLite database (default: $DAYBOOK_HOME/daybook.db)
 *   DAYBOOK_MIGRATIONS_TABLE - Bookkeeping table name (default: schema_migrations)
 *   DAYBOOK_LOCK_TIMEOUT_MS - How long to wait for another migration run (default: 30000)
 *   DAYBOOK_BUSY_TIMEOUT_MS - SQLite busy timeout (default: 5000)
 *
 * Platform defaults (when DAYBOOK_HOME is not set):
 *   macOS:   ~/Library/Application Support/daybook
 *   Windows: %APPDATA%\daybook
 *   Linux:   $XDG_DATA_HOME/daybook (defaults to ~/.local/share/daybook)
 */

import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { DEFAULT_BUSY_TIMEOUT_MS } from './database.ts';
import { DEFAULT_TABLE_NAME } from './migrations/bookkeeping.ts';
import { DEFAULT_LOCK_TIMEOUT_MS } from './migrations/lock.ts';

type Env = Record<string, string | undefined>;

/**
 * Get the base Daybook home directory.
 *
 * Checks DAYBOOK_HOME first, then falls back to platform-specific defaults.
 */
// eslint-disable-next-line no-process-env
export function getDaybookHome(env: Env = process.env): string {
   if (env.DAYBOOK_HOME) {
      return env.DAYBOOK_HOME;
   }

   const platform = os.platform();

   if (platform === 'darwin') {
      return path.join(os.homedir(), 'Library', 'Application Support', 'daybook');
   } else if (platform === 'win32') {
      const appData = env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');

      return path.join(appData, 'daybook');
   }

   const xdgDataHome = env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');

   return path.join(xdgDataHome, 'daybook');
}

/**
 * Get the database path: DAYBOOK_DATABASE, or daybook.db inside the home directory.
 */
// eslint-disable-next-line no-process-env
export function getDefaultDatabasePath(env: Env = process.env): string {
   if (env.DAYBOOK_DATABASE) {
      return path.resolve(env.DAYBOOK_DATABASE);
   }

   return path.join(getDaybookHome(env), 'daybook.db');
}

function nonNegativeInt(name: string) {
   return z.string().optional().transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
         return undefined;
      }

      const parsed = Number(value);

      if (!Number.isSafeInteger(parsed) || parsed < 0) {
         ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a non-negative integer, got "${value}"` });
         return z.NEVER;
      }

      return parsed;
   });
}

const envSchema = z.object({
   DAYBOOK_MIGRATIONS_TABLE: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'DAYBOOK_MIGRATIONS_TABLE must be a plain SQL identifier')
      .optional(),
   DAYBOOK_LOCK_TIMEOUT_MS: nonNegativeInt('DAYBOOK_LOCK_TIMEOUT_MS'),
   DAYBOOK_BUSY_TIMEOUT_MS: nonNegativeInt('DAYBOOK_BUSY_TIMEOUT_MS'),
});

/**
 * Resolved settings for a migration run.
 */
export interface MigrationConfig {
   databasePath: string;
   tableName: string;
   lockTimeoutMs: number;
   busyTimeoutMs: number;
}

/**
 * Read migration settings from the environment.
 *
 * @throws Error naming the offending variable if a value is invalid
 */
// eslint-disable-next-line no-process-env
export function loadMigrationConfig(env: Env = process.env): MigrationConfig {
   const parsed = envSchema.safeParse(env);

   if (!parsed.success) {
      throw new Error(`Invalid configuration: ${parsed.error.issues.map((issue) => {
         return issue.message;
      }).join('; ')}`);
   }

   return {
      databasePath: getDefaultDatabasePath(env),
      tableName: parsed.data.DAYBOOK_MIGRATIONS_TABLE ?? DEFAULT_TABLE_NAME,
      lockTimeoutMs: parsed.data.DAYBOOK_LOCK_TIMEOUT_MS ?? DEFAULT_LOCK_TIMEOUT_MS,
      busyTimeoutMs: parsed.data.DAYBOOK_BUSY_TIMEOUT_MS ?? DEFAULT_BUSY_TIMEOUT_MS,
   };
}
