/**
 * Tests for the migration registry
 */

import { describe, it, expect } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../database.ts';
import { MigrationRegistry, RegistryError } from '../migrations/index.ts';
import type { Migration } from '../migrations/index.ts';

function unit(version: number, extra: Partial<Migration> = {}): Migration {
   return { version, description: `v${version}`, up: () => {}, ...extra };
}

/** Builds definitions the type system would reject, as they arrive from untyped code */
function malformed(definition: Record<string, unknown>): Migration {
   return definition as unknown as Migration;
}

describe('MigrationRegistry', () => {
   describe('listAll', () => {
      it('sorts ascending by version regardless of registration order', () => {
         const registry = new MigrationRegistry([ unit(10), unit(2), unit(7) ]);

         expect(registry.listAll().map((m) => { return m.version; })).toEqual([ 2, 7, 10 ]);
      });

      it('returns the same order on every call', () => {
         const registry = new MigrationRegistry([ unit(3), unit(1), unit(2) ]);

         expect(registry.listAll()).toBe(registry.listAll());
         expect(new MigrationRegistry([ unit(2), unit(3), unit(1) ]).listAll().map((m) => { return m.version; }))
            .toEqual(registry.listAll().map((m) => { return m.version; }));
      });

      it('returns frozen units', () => {
         const registry = new MigrationRegistry([ unit(1) ]);

         expect(Object.isFrozen(registry.listAll())).toBe(true);
         expect(Object.isFrozen(registry.listAll()[0])).toBe(true);
      });

      it('is unaffected by later changes to the definitions', () => {
         const definitions = [ unit(1) ];

         const registry = new MigrationRegistry(definitions);

         definitions.push(unit(2));
         definitions[0].description = 'changed';

         expect(registry.size).toBe(1);
         expect(registry.get(1)?.description).toBe('v1');
      });
   });

   describe('validation', () => {
      it('rejects duplicate versions', () => {
         expect(() => { return new MigrationRegistry([ unit(1), unit(2), unit(1) ]); })
            .toThrow(new RegistryError('Duplicate migration version 1'));
      });

      it('reports the duplicate version', () => {
         try {
            new MigrationRegistry([ unit(4), unit(4) ]);
            expect.unreachable();
         } catch(error) {
            expect(error).toBeInstanceOf(RegistryError);
            expect(error).toMatchObject({ version: 4 });
         }
      });

      it('rejects a migration without up()', () => {
         expect(() => { return new MigrationRegistry([ malformed({ version: 1, description: 'no up' }) ]); })
            .toThrow('Invalid migration v1: up() is missing');
      });

      it('rejects a down that is not a function', () => {
         expect(() => {
            return new MigrationRegistry([ malformed({ version: 1, description: 'x', up: () => {}, down: 'DROP TABLE t' }) ]);
         }).toThrow('Invalid migration v1: down must be a function when provided');
      });

      it.each([ 0, -1, 1.5, Number.NaN ])('rejects version %s', (version) => {
         expect(() => { return new MigrationRegistry([ unit(version) ]); })
            .toThrow(RegistryError);
      });

      it('rejects an empty description', () => {
         expect(() => { return new MigrationRegistry([ unit(1, { description: '  ' }) ]); })
            .toThrow('Invalid migration v1: description is required');
      });
   });

   describe('lookup', () => {
      it('finds a migration by version', () => {
         const registry = new MigrationRegistry([ unit(1), unit(2) ]);

         expect(registry.get(2)?.description).toBe('v2');
         expect(registry.has(2)).toBe(true);
      });

      it('returns undefined for an unknown version', () => {
         const registry = new MigrationRegistry([ unit(1) ]);

         expect(registry.get(99)).toBeUndefined();
         expect(registry.has(99)).toBe(false);
      });

      it('reports the latest version, or 0 when empty', () => {
         expect(new MigrationRegistry([ unit(3), unit(12) ]).latestVersion).toBe(12);
         expect(new MigrationRegistry([]).latestVersion).toBe(0);
      });
   });

   describe('class-based definitions', () => {
      class CreateNotes implements Migration {

         public readonly version = 1;
         public readonly description = 'Create notes';

         private readonly _table = 'notes';

         public up(db: Database.Database): void {
            db.exec(`CREATE TABLE ${this._table} (id INTEGER PRIMARY KEY)`);
         }

      }

      it('keeps `this` bound to the definition', () => {
         const db = openDatabase(':memory:'),
               [ migration ] = new MigrationRegistry([ new CreateNotes() ]).listAll();

         try {
            migration.up(db);

            expect(db.prepare('SELECT name FROM sqlite_master WHERE name = ?').pluck().get('notes')).toBe('notes');
         } finally {
            db.close();
         }
      });
   });
});
