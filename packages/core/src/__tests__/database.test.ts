/**
 * Tests for database helpers
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { isConnectionFailure, openDatabase, withConnection } from '../database.ts';
import { ConnectionError } from '../migrations/index.ts';

describe('database', () => {
   let tempDir: string;

   beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'daybook-db-test-'));
   });

   afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
   });

   describe('openDatabase', () => {
      it('creates missing parent directories and enables WAL', () => {
         const dbPath = path.join(tempDir, 'nested', 'dir', 'daybook.db');

         const db = openDatabase(dbPath, { busyTimeoutMs: 1234 });

         expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
         expect(db.pragma('busy_timeout', { simple: true })).toBe(1234);
         expect(db.pragma('foreign_keys', { simple: true })).toBe(1);

         db.close();
      });

      it('wraps a file that is not a database in ConnectionError', async () => {
         const dbPath = path.join(tempDir, 'notes.txt');

         await fs.writeFile(dbPath, 'x'.repeat(4096));

         expect(() => { return openDatabase(dbPath); }).toThrow(ConnectionError);
      });

      it('fails for a missing file in read-only mode', () => {
         expect(() => { return openDatabase(path.join(tempDir, 'missing.db'), { readonly: true }); })
            .toThrow(ConnectionError);
      });
   });

   describe('withConnection', () => {
      it('throws ConnectionError for a closed handle', () => {
         const db = openDatabase(path.join(tempDir, 'closed.db'));

         db.close();

         expect(() => {
            return withConnection(db, () => { return 1; });
         }).toThrow(ConnectionError);
      });

      it('passes statement errors through unchanged', () => {
         const db = openDatabase(path.join(tempDir, 'errors.db'));

         expect(() => {
            return withConnection(db, () => { return db.exec('SELECT * FROM missing_table'); });
         }).toThrow('no such table: missing_table');

         db.close();
      });
   });

   describe('isConnectionFailure', () => {
      it('recognises I/O and open failures by SQLite code', () => {
         const ioError = Object.assign(new Error('disk I/O error'), { code: 'SQLITE_IOERR_READ' }),
               openError = Object.assign(new Error('unable to open database file'), { code: 'SQLITE_CANTOPEN' }),
               constraint = Object.assign(new Error('UNIQUE constraint failed'), { code: 'SQLITE_CONSTRAINT_PRIMARYKEY' });

         expect(isConnectionFailure(ioError)).toBe(true);
         expect(isConnectionFailure(openError)).toBe(true);
         expect(isConnectionFailure(constraint)).toBe(false);
         expect(isConnectionFailure(new Error('plain'))).toBe(false);
      });
   });
});
