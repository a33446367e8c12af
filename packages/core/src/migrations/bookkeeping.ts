/**
 * Bookkeeping store - the table that records which migration versions are applied,
 * plus its audit trail.
 */

import type Database from 'better-sqlite3';
import type { AppliedMigrationRecord, AuditAction, Migration, MigrationAuditEntry } from './types.ts';

export const DEFAULT_TABLE_NAME = 'schema_migrations';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface RecordRow {
   version: number;
   description: string;
   applied_at: string;
}

interface AuditRow {
   id: number;
   action: AuditAction;
   version: number;
   reason: string | null;
   holder: string;
   performed_at: string;
}

/**
 * Throws if `name` cannot be used unquoted as a table name.
 */
export function assertIdentifier(name: string): void {
   if (!IDENTIFIER_PATTERN.test(name)) {
      throw new Error(`Invalid table name "${name}": use letters, digits and underscores only`);
   }
}

/**
 * Reads and writes the `schema_migrations` table. Mutating methods must run inside the
 * runner's per-migration transaction; nothing else writes to this table.
 */
export class MigrationBookkeeping {

   public readonly tableName: string;
   public readonly auditTableName: string;

   public constructor(tableName: string = DEFAULT_TABLE_NAME) {
      assertIdentifier(tableName);
      this.tableName = tableName;
      this.auditTableName = `${tableName}_audit`;
   }

   /**
    * Create the bookkeeping and audit tables if they do not exist.
    */
   public ensure(db: Database.Database): void {
      db.exec(`
         CREATE TABLE IF NOT EXISTS ${this.tableName} (
            version INTEGER PRIMARY KEY,
            description TEXT NOT NULL,
            applied_at TEXT NOT NULL
         )
      `);

      db.exec(`
         CREATE TABLE IF NOT EXISTS ${this.auditTableName} (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            action TEXT NOT NULL CHECK (action IN ('apply', 'revert', 'force-reset')),
            version INTEGER NOT NULL,
            reason TEXT,
            holder TEXT NOT NULL,
            performed_at TEXT NOT NULL
         )
      `);
   }

   public appliedVersions(db: Database.Database): Set<number> {
      const rows = db
         .prepare(`SELECT version FROM ${this.tableName}`)
         .pluck()
         .all() as number[];

      return new Set(rows);
   }

   public records(db: Database.Database): AppliedMigrationRecord[] {
      const rows = db
         .prepare(`SELECT version, description, applied_at FROM ${this.tableName} ORDER BY version ASC`)
         .all() as RecordRow[];

      return rows.map((row) => {
         return { version: row.version, description: row.description, appliedAt: row.applied_at };
      });
   }

   public has(db: Database.Database, version: number): boolean {
      const row = db
         .prepare(`SELECT 1 FROM ${this.tableName} WHERE version = ?`)
         .get(version);

      return row !== undefined;
   }

   /**
    * Record `migration` as applied. Returns false, without writing anything, if the
    * version is already recorded.
    */
   public claim(db: Database.Database, migration: Pick<Migration, 'version' | 'description'>, holder: string): boolean {
      const now = new Date().toISOString();

      const result = db
         .prepare(`
            INSERT INTO ${this.tableName} (version, description, applied_at)
            VALUES (?, ?, ?)
            ON CONFLICT (version) DO NOTHING
         `)
         .run(migration.version, migration.description, now);

      if (result.changes === 0) {
         return false;
      }

      this._audit(db, 'apply', migration.version, holder, null, now);

      return true;
   }

   /**
    * Delete the record for `version`. Returns false if there was none.
    */
   public release(
      db: Database.Database,
      version: number,
      holder: string,
      action: Exclude<AuditAction, 'apply'>,
      reason: string | null = null
   ): boolean {
      const result = db
         .prepare(`DELETE FROM ${this.tableName} WHERE version = ?`)
         .run(version);

      if (result.changes === 0) {
         return false;
      }

      this._audit(db, action, version, holder, reason, new Date().toISOString());

      return true;
   }

   /**
    * Audit entries in the order they were written.
    */
   public auditLog(db: Database.Database): MigrationAuditEntry[] {
      const rows = db
         .prepare(`
            SELECT id, action, version, reason, holder, performed_at
            FROM ${this.auditTableName}
            ORDER BY id ASC
         `)
         .all() as AuditRow[];

      return rows.map((row) => {
         return {
            id: row.id,
            action: row.action,
            version: row.version,
            reason: row.reason,
            holder: row.holder,
            performedAt: row.performed_at,
         };
      });
   }

   private _audit(
      db: Database.Database,
      action: AuditAction,
      version: number,
      holder: string,
      reason: string | null,
      performedAt: string
   ): void {
      db.prepare(`
         INSERT INTO ${this.auditTableName} (action, version, reason, holder, performed_at)
         VALUES (?, ?, ?, ?, ?)
      `).run(action, version, reason, holder, performedAt);
   }

}
