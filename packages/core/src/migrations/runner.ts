/**
 * MigrationRunner - Reconciles the bookkeeping table with the registry and moves the
 * database to a target version, one transaction per migration.
 */

import type Database from 'better-sqlite3';
import { asConnectionError, assertOpen, withConnection } from '../database.ts';
import { DEFAULT_TABLE_NAME, MigrationBookkeeping } from './bookkeeping.ts';
import { createHolderId, MigrationLock } from './lock.ts';
import type { LockHandle, MigrationLockOptions } from './lock.ts';
import type { MigrationRegistry } from './registry.ts';
import type {
   AppliedMigrationRecord,
   MigrateDownResult,
   MigrateUpResult,
   Migration,
   MigrationAuditEntry,
   MigrationDirection,
   MigrationProgressCallback,
   MigrationStatus,
} from './types.ts';
import { MigrationFailedError, NoRevertDefinedError } from './types.ts';

/**
 * Options for constructing a runner.
 */
export interface MigrationRunnerOptions {

   /** Bookkeeping table name (default: 'schema_migrations') */
   tableName?: string;

   /** Run lock settings */
   lock?: MigrationLockOptions;

   /** Receives progress events; the runner itself never prints */
   onProgress?: MigrationProgressCallback;
}

export interface MigrateUpOptions {

   /** Apply pending migrations up to and including this version (default: latest) */
   targetVersion?: number;

   /** Checked between migrations; never interrupts one in progress */
   signal?: AbortSignal;
}

export interface MigrateDownOptions {
   signal?: AbortSignal;
}

export interface ForceResetOptions {

   /** Why the record is being removed; stored in the audit trail */
   reason?: string;
}

type UnitOutcome = 'done' | 'skipped';

/**
 * Thrown inside a unit transaction to roll it back after losing the claim on a version.
 */
class ClaimLostSignal extends Error {

   public readonly name = 'ClaimLostSignal';

}

function assertVersionBound(value: number, label: string): void {
   if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Invalid ${label} ${value}: must be an integer >= 0`);
   }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
   return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Reject an async up()/down(): its work would continue after the unit's transaction
 * has committed.
 */
function assertSynchronous(returned: unknown, method: MigrationDirection): void {
   if (!isThenable(returned)) {
      return;
   }

   // The unit is rolled back below; the promise's own outcome no longer matters
   void Promise.resolve(returned).catch(() => {
      return undefined;
   });

   throw new TypeError(`${method}() returned a promise; migrations must be synchronous`);
}

function maxVersion(versions: Iterable<number>): number {
   let max = 0;

   for (const version of versions) {
      max = Math.max(max, version);
   }

   return max;
}

/**
 * Applies and reverts migrations from a registry.
 *
 * Every operation takes the database handle explicitly. `migrateUp`, `migrateDown` and
 * `forceReset` hold the run lock for their whole duration; each migration runs in its
 * own IMMEDIATE transaction together with its bookkeeping row, so a migration is either
 * fully applied and recorded or not at all.
 */
export class MigrationRunner {

   private readonly _registry: MigrationRegistry;
   private readonly _bookkeeping: MigrationBookkeeping;
   private readonly _lock: MigrationLock;
   private readonly _progress: MigrationProgressCallback;

   public constructor(registry: MigrationRegistry, options: MigrationRunnerOptions = {}) {
      const tableName = options.tableName ?? DEFAULT_TABLE_NAME;

      this._registry = registry;
      this._bookkeeping = new MigrationBookkeeping(tableName);
      this._lock = new MigrationLock(`${tableName}_lock`, tableName, options.lock);
      this._progress = options.onProgress ?? ((): void => {});
   }

   public get registry(): MigrationRegistry {
      return this._registry;
   }

   public get tableName(): string {
      return this._bookkeeping.tableName;
   }

   /**
    * Create the bookkeeping, audit and lock tables if they are missing. Safe to call on
    * every run.
    *
    * @throws ConnectionError if the database cannot be reached
    */
   public ensureBookkeepingStore(db: Database.Database): void {
      withConnection(db, () => {
         const create = db.transaction(() => {
            this._bookkeeping.ensure(db);
            this._lock.ensure(db);
         });

         create.immediate();
      });
   }

   /**
    * @throws ConnectionError if the database cannot be reached
    */
   public appliedVersions(db: Database.Database): Set<number> {
      return withConnection(db, () => {
         this._bookkeeping.ensure(db);

         return this._bookkeeping.appliedVersions(db);
      });
   }

   public appliedRecords(db: Database.Database): AppliedMigrationRecord[] {
      return withConnection(db, () => {
         this._bookkeeping.ensure(db);

         return this._bookkeeping.records(db);
      });
   }

   public auditLog(db: Database.Database): MigrationAuditEntry[] {
      return withConnection(db, () => {
         this._bookkeeping.ensure(db);

         return this._bookkeeping.auditLog(db);
      });
   }

   /**
    * Registered migrations that are not recorded as applied, ascending by version.
    */
   public pending(db: Database.Database): Readonly<Migration>[] {
      const applied = this.appliedVersions(db);

      return this._registry.listAll().filter((migration) => {
         return !applied.has(migration.version);
      });
   }

   /**
    * Apply pending migrations in ascending order, up to `targetVersion`.
    *
    * Stops at the first failure: the failing migration is rolled back, earlier ones stay
    * committed and later ones are not attempted.
    *
    * @throws MigrationFailedError if a migration or its commit fails
    * @throws LockTimeoutError if another run holds the lock too long
    * @throws ConnectionError if the database cannot be reached
    */
   public async migrateUp(db: Database.Database, options: MigrateUpOptions = {}): Promise<MigrateUpResult> {
      const targetVersion = options.targetVersion ?? this._registry.latestVersion;

      assertVersionBound(targetVersion, 'target version');

      return this._withLock(db, async (lock) => {
         const pending = this.pending(db).filter((migration) => {
            return migration.version <= targetVersion;
         });

         const applied: number[] = [],
               skipped: number[] = [];

         let aborted = false;

         for (const [ index, migration ] of pending.entries()) {
            if (options.signal?.aborted) {
               aborted = true;
               break;
            }

            this._progress({
               phase: 'applying',
               version: migration.version,
               index: index + 1,
               total: pending.length,
               message: `Applying v${migration.version}: ${migration.description}`,
            });

            const outcome = this._applyOne(db, migration, lock.holder);

            if (outcome === 'done') {
               applied.push(migration.version);
               this._progress({
                  phase: 'applied',
                  version: migration.version,
                  index: index + 1,
                  total: pending.length,
                  message: `Applied v${migration.version}`,
               });
            } else {
               skipped.push(migration.version);
               this._progress({
                  phase: 'skipped',
                  version: migration.version,
                  index: index + 1,
                  total: pending.length,
                  message: `v${migration.version} was already applied by another runner`,
               });
            }

            lock.renew();
         }

         return {
            applied,
            skipped,
            aborted,
            currentVersion: maxVersion(this.appliedVersions(db)),
         };
      });
   }

   /**
    * Revert every applied migration above `toVersion`, highest first.
    *
    * All of them are checked for a `down` before anything is reverted.
    *
    * @throws NoRevertDefinedError if a migration to revert has no down() or is unknown
    * @throws MigrationFailedError if a down() or its commit fails
    */
   public async migrateDown(
      db: Database.Database,
      toVersion: number,
      options: MigrateDownOptions = {}
   ): Promise<MigrateDownResult> {
      assertVersionBound(toVersion, 'rollback target');

      return this._withLock(db, async (lock) => {
         const toRevert = [ ...this.appliedVersions(db) ]
            .filter((version) => {
               return version > toVersion;
            })
            .sort((a, b) => {
               return b - a;
            });

         const plan = toRevert.map((version) => {
            const migration = this._registry.get(version);

            if (!migration) {
               throw new NoRevertDefinedError(version, false);
            }

            if (!migration.down) {
               throw new NoRevertDefinedError(version);
            }

            return migration;
         });

         const reverted: number[] = [],
               skipped: number[] = [];

         let aborted = false;

         for (const [ index, migration ] of plan.entries()) {
            if (options.signal?.aborted) {
               aborted = true;
               break;
            }

            this._progress({
               phase: 'reverting',
               version: migration.version,
               index: index + 1,
               total: plan.length,
               message: `Reverting v${migration.version}: ${migration.description}`,
            });

            const outcome = this._revertOne(db, migration, lock.holder);

            if (outcome === 'done') {
               reverted.push(migration.version);
               this._progress({
                  phase: 'reverted',
                  version: migration.version,
                  index: index + 1,
                  total: plan.length,
                  message: `Reverted v${migration.version}`,
               });
            } else {
               skipped.push(migration.version);
            }

            lock.renew();
         }

         return {
            reverted,
            skipped,
            aborted,
            currentVersion: maxVersion(this.appliedVersions(db)),
         };
      });
   }

   /**
    * Remove the bookkeeping record for `version` without running its down(), so the
    * migration runs again on the next `migrateUp`. The removal is written to the audit
    * trail.
    *
    * @returns false if the version was not recorded
    */
   public async forceReset(
      db: Database.Database,
      version: number,
      options: ForceResetOptions = {}
   ): Promise<boolean> {
      assertVersionBound(version, 'version');

      return this._withLock(db, async (lock) => {
         const reset = db.transaction((): boolean => {
            return this._bookkeeping.release(db, version, lock.holder, 'force-reset', options.reason ?? null);
         });

         const removed = withConnection(db, () => {
            return reset.immediate();
         });

         if (removed) {
            this._progress({
               phase: 'force-reset',
               version,
               message: `Removed bookkeeping record for v${version}; it will be applied again`,
            });
         }

         return removed;
      });
   }

   public status(db: Database.Database): MigrationStatus {
      const applied = this.appliedRecords(db),
            appliedVersions = new Set(applied.map((record) => {
               return record.version;
            }));

      return {
         currentVersion: maxVersion(appliedVersions),
         latestVersion: this._registry.latestVersion,
         applied,
         pending: this._registry.listAll()
            .filter((migration) => {
               return !appliedVersions.has(migration.version);
            })
            .map((migration) => {
               return {
                  version: migration.version,
                  description: migration.description,
                  reversible: migration.down !== undefined,
               };
            }),
         unknown: [ ...appliedVersions ].filter((version) => {
            return !this._registry.has(version);
         }),
      };
   }

   private async _withLock<T>(db: Database.Database, task: (lock: LockHandle) => Promise<T>): Promise<T> {
      assertOpen(db);

      let lock: LockHandle,
          result: T;

      try {
         lock = await this._lock.acquire(db, createHolderId(), (holder) => {
            this._progress({
               phase: 'lock-wait',
               message: `Waiting for migration lock held by ${holder}`,
            });
         });
      } catch(error) {
         throw asConnectionError(db, error);
      }

      try {
         this.ensureBookkeepingStore(db);
         result = await task(lock);
      } catch(error) {
         this._releaseAfterFailure(lock);
         throw error;
      }

      lock.release();

      return result;
   }

   /**
    * Release the lock while another error is already propagating. A failed release is
    * reported as progress so it cannot replace that error; the lock expires on its own
    * once its TTL passes.
    */
   private _releaseAfterFailure(lock: LockHandle): void {
      try {
         lock.release();
      } catch(releaseError) {
         this._progress({
            phase: 'lock-release-failed',
            message: `Could not release migration lock held by ${lock.holder}: ${
               releaseError instanceof Error ? releaseError.message : String(releaseError)
            }`,
         });
      }
   }

   private _applyOne(db: Database.Database, migration: Readonly<Migration>, holder: string): UnitOutcome {
      const apply = db.transaction((): UnitOutcome => {
         if (this._bookkeeping.has(db, migration.version)) {
            return 'skipped';
         }

         assertSynchronous(migration.up(db), 'up');

         if (!this._bookkeeping.claim(db, migration, holder)) {
            throw new ClaimLostSignal();
         }

         return 'done';
      });

      try {
         return apply.immediate();
      } catch(error) {
         if (error instanceof ClaimLostSignal) {
            return 'skipped';
         }

         throw new MigrationFailedError(migration.version, 'up', error);
      }
   }

   private _revertOne(db: Database.Database, migration: Readonly<Migration>, holder: string): UnitOutcome {
      const revert = db.transaction((): UnitOutcome => {
         if (!this._bookkeeping.has(db, migration.version)) {
            return 'skipped';
         }

         assertSynchronous(migration.down?.(db), 'down');
         this._bookkeeping.release(db, migration.version, holder, 'revert');

         return 'done';
      });

      try {
         return revert.immediate();
      } catch(error) {
         throw new MigrationFailedError(migration.version, 'down', error);
      }
   }

}
