/**
 * Database connection helpers for better-sqlite3.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { ConnectionError } from './migrations/types.ts';

export interface OpenDatabaseOptions {

   /** How long a write waits for another connection's lock, in ms (default: 5000) */
   busyTimeoutMs?: number;

   /** Open without write access; the file must already exist */
   readonly?: boolean;
}

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

// SQLite result codes that mean the file itself is unusable, not that a statement was wrong
const CONNECTION_ERROR_CODES = [
   'SQLITE_CANTOPEN',
   'SQLITE_NOTADB',
   'SQLITE_IOERR',
   'SQLITE_CORRUPT',
   'SQLITE_READONLY',
];

function sqliteCode(error: unknown): string | undefined {
   if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
      return error.code;
   }

   return undefined;
}

/**
 * Whether an error raised by better-sqlite3 means the database cannot be reached.
 */
export function isConnectionFailure(error: unknown): boolean {
   const code = sqliteCode(error);

   if (code === undefined) {
      return false;
   }

   return CONNECTION_ERROR_CODES.some((prefix) => {
      return code === prefix || code.startsWith(`${prefix}_`);
   });
}

/**
 * Whether an error means another connection holds SQLite's write lock and the busy
 * timeout ran out.
 */
export function isBusy(error: unknown): boolean {
   const code = sqliteCode(error);

   return code === 'SQLITE_BUSY' || code?.startsWith('SQLITE_BUSY_') === true;
}

/**
 * Throw a ConnectionError if the handle has been closed.
 */
export function assertOpen(db: Database.Database): void {
   if (!db.open) {
      throw new ConnectionError(`Database ${db.name} is not open`);
   }
}

/**
 * Wrap a connection-level failure in ConnectionError; any other error is returned as is.
 */
export function asConnectionError(db: Database.Database, error: unknown): unknown {
   if (!isConnectionFailure(error)) {
      return error;
   }

   return new ConnectionError(
      `Cannot access database ${db.name}: ${error instanceof Error ? error.message : String(error)}`,
      error
   );
}

/**
 * Run `fn`, converting connection-level failures into ConnectionError. Any other error
 * is rethrown unchanged.
 */
export function withConnection<T>(db: Database.Database, fn: () => T): T {
   assertOpen(db);

   try {
      return fn();
   } catch(error) {
      throw asConnectionError(db, error);
   }
}

/**
 * Open (and create, unless read-only) a SQLite database configured for migrations:
 * WAL journal, a busy timeout so concurrent writers queue instead of failing, and
 * foreign keys enforced.
 *
 * @throws ConnectionError if the file cannot be opened or is not a database
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Database.Database {
   const readonly = options.readonly ?? false;

   let db: Database.Database | undefined;

   try {
      if (!readonly && dbPath !== ':memory:') {
         fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }

      db = new Database(dbPath, { readonly, fileMustExist: readonly });
      db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);

      if (!readonly) {
         db.pragma('journal_mode = WAL');
      }

      db.pragma('foreign_keys = ON');

      return db;
   } catch(error) {
      db?.close();

      throw new ConnectionError(
         `Cannot open database ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
         error
      );
   }
}
