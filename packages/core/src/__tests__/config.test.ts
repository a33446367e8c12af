/**
 * Tests for configuration module
 */

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { getDaybookHome, getDefaultDatabasePath, loadMigrationConfig } from '../config.ts';

describe('config', () => {
   describe('getDaybookHome', () => {
      it('should use DAYBOOK_HOME when set', () => {
         expect(getDaybookHome({ DAYBOOK_HOME: '/custom/daybook' })).toBe('/custom/daybook');
      });

      it('should return a platform-specific default when DAYBOOK_HOME is not set', () => {
         const home = getDaybookHome({});

         expect(home).toBeTruthy();
         expect(path.basename(home)).toBe('daybook');
      });

      it.runIf(process.platform === 'linux')('should follow XDG_DATA_HOME on Linux', () => {
         expect(getDaybookHome({ XDG_DATA_HOME: '/xdg/data' })).toBe('/xdg/data/daybook');
      });
   });

   describe('getDefaultDatabasePath', () => {
      it('should place daybook.db in the home directory', () => {
         expect(getDefaultDatabasePath({ DAYBOOK_HOME: '/custom/daybook' })).toBe('/custom/daybook/daybook.db');
      });

      it('should prefer DAYBOOK_DATABASE, resolved to an absolute path', () => {
         const env = { DAYBOOK_HOME: '/custom/daybook', DAYBOOK_DATABASE: 'data/journal.db' };

         expect(getDefaultDatabasePath(env)).toBe(path.resolve('data/journal.db'));
      });
   });

   describe('loadMigrationConfig', () => {
      it('should apply defaults', () => {
         expect(loadMigrationConfig({ DAYBOOK_HOME: '/custom/daybook' })).toEqual({
            databasePath: '/custom/daybook/daybook.db',
            tableName: 'schema_migrations',
            lockTimeoutMs: 30000,
            busyTimeoutMs: 5000,
         });
      });

      it('should read overrides', () => {
         const config = loadMigrationConfig({
            DAYBOOK_DATABASE: '/srv/daybook.db',
            DAYBOOK_MIGRATIONS_TABLE: 'journal_versions',
            DAYBOOK_LOCK_TIMEOUT_MS: '500',
            DAYBOOK_BUSY_TIMEOUT_MS: '0',
         });

         expect(config).toEqual({
            databasePath: '/srv/daybook.db',
            tableName: 'journal_versions',
            lockTimeoutMs: 500,
            busyTimeoutMs: 0,
         });
      });

      it('should treat empty values as unset', () => {
         expect(loadMigrationConfig({ DAYBOOK_HOME: '/h', DAYBOOK_LOCK_TIMEOUT_MS: '' }).lockTimeoutMs).toBe(30000);
      });

      it('should reject a non-numeric timeout', () => {
         expect(() => { return loadMigrationConfig({ DAYBOOK_LOCK_TIMEOUT_MS: 'soon' }); })
            .toThrow('Invalid configuration: DAYBOOK_LOCK_TIMEOUT_MS must be a non-negative integer, got "soon"');
      });

      it('should reject a table name that is not an identifier', () => {
         expect(() => { return loadMigrationConfig({ DAYBOOK_MIGRATIONS_TABLE: 'schema-migrations; DROP' }); })
            .toThrow('DAYBOOK_MIGRATIONS_TABLE must be a plain SQL identifier');
      });
   });
});
