/**
 * Tests for the journal schema migrations
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type Database from 'better-sqlite3';
import { MigrationRunner, openDatabase } from '@daybook/core';
import { createJournalRegistry, journalMigrations } from '../schema/index.ts';

interface ColumnInfo {
   name: string;
   type: string;
   notnull: number;
   dflt_value: string | null;
}

function columns(db: Database.Database): Map<string, ColumnInfo> {
   const rows = db.prepare('PRAGMA table_info(users)').all() as ColumnInfo[];

   return new Map(rows.map((row) => {
      return [ row.name, row ];
   }));
}

function indexes(db: Database.Database): string[] {
   const rows = db.prepare('PRAGMA index_list(users)').all() as Array<{ name: string; origin: string }>;

   return rows
      .filter((row) => {
         return row.origin === 'c';
      })
      .map((row) => {
         return row.name;
      })
      .sort();
}

function addUser(db: Database.Database, email: string): void {
   db.prepare('INSERT INTO users (email) VALUES (?)').run(email);
}

function approvalOf(db: Database.Database, email: string): unknown {
   return db.prepare('SELECT approved FROM users WHERE email = ?').pluck().get(email);
}

describe('journal schema', () => {
   let tempDir: string,
       db: Database.Database,
       runner: MigrationRunner;

   beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'daybook-schema-test-'));
      db = openDatabase(path.join(tempDir, 'journal.db'));
      runner = new MigrationRunner(createJournalRegistry());
   });

   afterEach(async () => {
      db.close();
      await fs.rm(tempDir, { recursive: true, force: true });
   });

   it('registers every migration with a down()', () => {
      expect(journalMigrations.map((migration) => {
         return migration.version;
      })).toEqual([ 1, 2, 3, 4 ]);

      for (const migration of journalMigrations) {
         expect(typeof migration.down).toBe('function');
      }
   });

   it('creates the users table', async () => {
      await runner.migrateUp(db, { targetVersion: 1 });

      expect([ ...columns(db).keys() ]).toEqual([
         'id',
         'email',
         'first_name',
         'last_name',
         'one_time_code',
         'one_time_code_expiry',
         'created_at',
         'updated_at',
      ]);
      expect(indexes(db)).toEqual([ 'idx_users_email', 'idx_users_one_time_code' ]);
   });

   it('adds phone_number and the approved flag', async () => {
      await runner.migrateUp(db, { targetVersion: 3 });
      addUser(db, 'ada@example.com');

      const cols = columns(db);

      expect(cols.get('phone_number')?.type).toBe('TEXT');
      expect(cols.get('approved')?.type).toBe('INTEGER');
      expect(approvalOf(db, 'ada@example.com')).toBe(0);
      expect(indexes(db)).toEqual([
         'idx_users_approved',
         'idx_users_email',
         'idx_users_one_time_code',
         'idx_users_phone_number',
      ]);
   });

   it('turns the approved flag into a pending status', async () => {
      await runner.migrateUp(db, { targetVersion: 3 });
      addUser(db, 'ada@example.com');
      db.prepare('UPDATE users SET approved = 1 WHERE email = ?').run('ada@example.com');

      await runner.migrateUp(db);

      expect(columns(db).get('approved')?.type).toBe('TEXT');
      expect(approvalOf(db, 'ada@example.com')).toBe('PENDING_APPROVAL');

      addUser(db, 'grace@example.com');
      expect(approvalOf(db, 'grace@example.com')).toBe('PENDING_APPROVAL');
      expect(indexes(db)).toContain('idx_users_approved');
   });

   it('rejects an unknown approval status', async () => {
      await runner.migrateUp(db);
      addUser(db, 'ada@example.com');

      expect(() => {
         db.prepare('UPDATE users SET approved = ? WHERE email = ?').run('MAYBE', 'ada@example.com');
      }).toThrow(/CHECK constraint failed/);

      db.prepare('UPDATE users SET approved = ? WHERE email = ?').run('REJECTED', 'ada@example.com');
      expect(approvalOf(db, 'ada@example.com')).toBe('REJECTED');
   });

   it('maps APPROVED back to 1 and everything else to 0', async () => {
      await runner.migrateUp(db);
      addUser(db, 'ada@example.com');
      addUser(db, 'grace@example.com');
      addUser(db, 'edsger@example.com');
      db.prepare('UPDATE users SET approved = ? WHERE email = ?').run('APPROVED', 'ada@example.com');
      db.prepare('UPDATE users SET approved = ? WHERE email = ?').run('REJECTED', 'edsger@example.com');

      await runner.migrateDown(db, 3);

      expect(columns(db).get('approved')?.type).toBe('INTEGER');
      expect(approvalOf(db, 'ada@example.com')).toBe(1);
      expect(approvalOf(db, 'grace@example.com')).toBe(0);
      expect(approvalOf(db, 'edsger@example.com')).toBe(0);
   });

   it('rolls all the way back to an empty database', async () => {
      await runner.migrateUp(db);
      addUser(db, 'ada@example.com');

      const result = await runner.migrateDown(db, 0);

      expect(result.reverted).toEqual([ 4, 3, 2, 1 ]);

      const table = db
         .prepare('SELECT name FROM sqlite_master WHERE type = \'table\' AND name = \'users\'')
         .pluck()
         .get();

      expect(table).toBeUndefined();
   });

   it('applies again after a full rollback', async () => {
      await runner.migrateUp(db);
      await runner.migrateDown(db, 0);

      const result = await runner.migrateUp(db);

      expect(result.applied).toEqual([ 1, 2, 3, 4 ]);
      expect(result.currentVersion).toBe(4);
   });
});
