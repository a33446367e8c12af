/**
 * Run lock - serializes migration runs across processes sharing one database file.
 *
 * SQLite has no advisory locks, so the lock is a row in `<table>_lock`. Claiming and
 * inspecting it happens in an IMMEDIATE transaction, which takes SQLite's write lock
 * and makes the check-then-insert atomic between connections.
 */

import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import type Database from 'better-sqlite3';
import { isBusy } from '../database.ts';
import { assertIdentifier } from './bookkeeping.ts';
import { LockTimeoutError } from './types.ts';

export interface MigrationLockOptions {

   /** Give up waiting after this many ms (default: 30000) */
   timeoutMs?: number;

   /** Delay between attempts while another runner holds the lock (default: 250) */
   pollIntervalMs?: number;

   /** A lock not renewed for this long is considered abandoned (default: 10 minutes) */
   ttlMs?: number;
}

export const DEFAULT_LOCK_TIMEOUT_MS = 30_000;

const DEFAULT_POLL_INTERVAL_MS = 250,
      DEFAULT_TTL_MS = 10 * 60 * 1000;

// Reported as the holder while another connection's write transaction keeps us out
const BUSY_HOLDER = 'another connection (database is busy)';

interface LockRow {
   holder: string;
}

/**
 * A held lock. Release it in a `finally` block.
 */
export interface LockHandle {
   readonly holder: string;
   renew(): void;
   release(): void;
}

/**
 * Create a unique holder id for one migration run.
 */
export function createHolderId(): string {
   return `${process.pid}:${randomUUID()}`;
}

export class MigrationLock {

   public readonly tableName: string;
   public readonly resource: string;

   private readonly _timeoutMs: number;
   private readonly _pollIntervalMs: number;
   private readonly _ttlMs: number;

   public constructor(tableName: string, resource: string, options: MigrationLockOptions = {}) {
      assertIdentifier(tableName);
      this.tableName = tableName;
      this.resource = resource;
      this._timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
      this._pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
      this._ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
   }

   public ensure(db: Database.Database): void {
      db.exec(`
         CREATE TABLE IF NOT EXISTS ${this.tableName} (
            resource TEXT PRIMARY KEY,
            holder TEXT NOT NULL,
            acquired_at INTEGER NOT NULL,
            expires_at INTEGER NOT NULL
         )
      `);
   }

   /**
    * Current holder of the lock, or undefined if it is free or expired.
    */
   public holder(db: Database.Database): string | undefined {
      const row = db
         .prepare(`SELECT holder FROM ${this.tableName} WHERE resource = ? AND expires_at > ?`)
         .get(this.resource, Date.now()) as LockRow | undefined;

      return row?.holder;
   }

   /**
    * Wait for the lock and take it, creating the lock table if needed.
    *
    * @param onWait - Called once, the first time the lock is found held by someone else
    * @throws LockTimeoutError if the lock is still held after the timeout
    */
   public async acquire(
      db: Database.Database,
      holder: string = createHolderId(),
      onWait?: (currentHolder: string) => void
   ): Promise<LockHandle> {
      const deadline = Date.now() + this._timeoutMs;

      let waited = false;

      for (;;) {
         const current = this._tryAcquire(db, holder);

         if (current === holder) {
            return this._handle(db, holder);
         }

         if (!waited) {
            waited = true;
            onWait?.(current);
         }

         if (Date.now() >= deadline) {
            throw new LockTimeoutError(this.resource, current, this._timeoutMs);
         }

         await sleep(Math.min(this._pollIntervalMs, Math.max(deadline - Date.now(), 0)));
      }
   }

   /**
    * Returns whoever holds the lock after the attempt. A write lock held by another
    * connection past the busy timeout counts as the lock being held.
    */
   private _tryAcquire(db: Database.Database, holder: string): string {
      const attempt = db.transaction((): string => {
         const now = Date.now();

         this.ensure(db);

         db.prepare(`DELETE FROM ${this.tableName} WHERE resource = ? AND expires_at <= ?`)
            .run(this.resource, now);

         db.prepare(`
            INSERT INTO ${this.tableName} (resource, holder, acquired_at, expires_at)
            VALUES (?, ?, ?, ?)
            ON CONFLICT (resource) DO NOTHING
         `).run(this.resource, holder, now, now + this._ttlMs);

         const row = db
            .prepare(`SELECT holder FROM ${this.tableName} WHERE resource = ?`)
            .get(this.resource) as LockRow;

         return row.holder;
      });

      try {
         return attempt.immediate();
      } catch(error) {
         if (isBusy(error)) {
            return BUSY_HOLDER;
         }

         throw error;
      }
   }

   private _handle(db: Database.Database, holder: string): LockHandle {
      return {
         holder,
         renew: (): void => {
            db.prepare(`UPDATE ${this.tableName} SET expires_at = ? WHERE resource = ? AND holder = ?`)
               .run(Date.now() + this._ttlMs, this.resource, holder);
         },
         release: (): void => {
            if (!db.open) {
               return;
            }

            db.prepare(`DELETE FROM ${this.tableName} WHERE resource = ? AND holder = ?`)
               .run(this.resource, holder);
         },
      };
   }

}
