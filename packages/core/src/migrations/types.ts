/**
 * Migration types and interfaces for schema versioning.
 */

import type Database from 'better-sqlite3';

/**
 * A versioned schema change with a forward and an optional reverse procedure.
 */
export interface Migration {

   /** Unique, positive version. Units are applied in ascending version order. */
   version: number;

   /** Human-readable description of what this migration does */
   description: string;

   /**
    * Apply the change. Runs inside an open transaction that also records the version,
    * so it must not issue BEGIN/COMMIT itself. Must be synchronous: a returned promise
    * fails the migration.
    */
   up(db: Database.Database): void;

   /**
    * Undo the change. Migrations without `down` are forward-only and block any rollback
    * that would need to revert them.
    */
   down?(db: Database.Database): void;
}

/**
 * A row of the bookkeeping table: one successfully applied migration.
 */
export interface AppliedMigrationRecord {
   version: number;
   description: string;

   /** ISO-8601 timestamp of the commit that applied the migration */
   appliedAt: string;
}

export type AuditAction = 'apply' | 'revert' | 'force-reset';

/**
 * One entry of the bookkeeping audit trail.
 */
export interface MigrationAuditEntry {
   id: number;
   action: AuditAction;
   version: number;
   reason: string | null;
   holder: string;
   performedAt: string;
}

export type MigrationDirection = 'up' | 'down';

export type MigrationPhase =
   | 'lock-wait'
   | 'lock-release-failed'
   | 'applying'
   | 'applied'
   | 'skipped'
   | 'reverting'
   | 'reverted'
   | 'force-reset';

/**
 * Progress event emitted by the runner.
 */
export interface MigrationProgress {

   /** Current phase */
   phase: MigrationPhase;

   /** Version the event refers to (absent for lock events) */
   version?: number;

   /** Position of the unit in this run, starting at 1 */
   index?: number;

   /** Number of units this run intends to process */
   total?: number;

   /** Human-readable message */
   message: string;
}

export type MigrationProgressCallback = (progress: MigrationProgress) => void;

/**
 * Result of `migrateUp`.
 */
export interface MigrateUpResult {

   /** Versions applied by this run, ascending */
   applied: number[];

   /** Versions another runner committed first; treated as done */
   skipped: number[];

   /** True if the signal aborted the run between two units */
   aborted: boolean;

   /** Highest applied version after the run, 0 if none */
   currentVersion: number;
}

/**
 * Result of `migrateDown`.
 */
export interface MigrateDownResult {

   /** Versions reverted by this run, descending */
   reverted: number[];

   /** Versions another runner reverted first */
   skipped: number[];

   aborted: boolean;
   currentVersion: number;
}

/**
 * Snapshot of the database against the registry.
 */
export interface MigrationStatus {
   currentVersion: number;
   latestVersion: number;
   applied: AppliedMigrationRecord[];
   pending: Array<Pick<Migration, 'version' | 'description'> & { reversible: boolean }>;

   /** Applied versions that no registered migration matches */
   unknown: number[];
}

/**
 * Base class for every error raised by the migration framework.
 */
export class MigrationError extends Error {

   public readonly name: string = 'MigrationError';

}

/**
 * Thrown when migration definitions are malformed or share a version.
 */
export class RegistryError extends MigrationError {

   public readonly name = 'RegistryError';

   public constructor(
      message: string,
      public readonly version?: number
   ) {
      super(message);
   }

}

/**
 * Thrown when the database cannot be reached: closed handle, missing or unreadable
 * file, I/O failure.
 */
export class ConnectionError extends MigrationError {

   public readonly name = 'ConnectionError';

   public constructor(message: string, cause?: unknown) {
      super(message, { cause });
   }

}

/**
 * Thrown when a migration's `up` or `down`, or the commit around it, fails. The unit's
 * transaction has been rolled back and the run has stopped.
 */
export class MigrationFailedError extends MigrationError {

   public readonly name = 'MigrationFailedError';

   public constructor(
      public readonly version: number,
      public readonly direction: MigrationDirection,
      cause: unknown
   ) {
      super(
         `Migration v${version} failed while ${direction === 'up' ? 'applying' : 'reverting'}: ` +
         `${cause instanceof Error ? cause.message : String(cause)}`,
         { cause }
      );
   }

}

/**
 * Thrown before any change when a rollback would have to revert a migration that has
 * no `down` (or is no longer registered).
 */
export class NoRevertDefinedError extends MigrationError {

   public readonly name = 'NoRevertDefinedError';

   public constructor(public readonly version: number, registered = true) {
      super(
         registered
            ? `Cannot roll back: migration v${version} does not define down()`
            : `Cannot roll back: applied migration v${version} is not registered`
      );
   }

}

/**
 * Thrown when another runner holds the migration lock for longer than the timeout.
 */
export class LockTimeoutError extends MigrationError {

   public readonly name = 'LockTimeoutError';

   public constructor(
      public readonly resource: string,
      public readonly holder: string,
      timeoutMs: number
   ) {
      super(`Timed out after ${timeoutMs}ms waiting for migration lock "${resource}" held by ${holder}`);
   }

}
