/**
 * Migration registry - the validated, ordered set of known migrations.
 */

import type { Migration } from './types.ts';
import { RegistryError } from './types.ts';

function labelOf(definition: unknown, index: number): string {
   if (typeof definition === 'object' && definition !== null && 'version' in definition) {
      return `migration v${String(definition.version)}`;
   }

   return `migration at index ${index}`;
}

/**
 * Validate one definition and return a frozen copy of it.
 */
function freezeMigration(definition: Migration, index: number): Readonly<Migration> {
   const label = labelOf(definition, index);

   if (typeof definition !== 'object' || definition === null) {
      throw new RegistryError(`Invalid ${label}: expected an object`);
   }

   const { version, description, up, down } = definition;

   if (!Number.isSafeInteger(version) || version < 1) {
      throw new RegistryError(`Invalid ${label}: version must be a positive integer`);
   }

   if (typeof up !== 'function') {
      throw new RegistryError(`Invalid migration v${version}: up() is missing`, version);
   }

   if (down !== undefined && typeof down !== 'function') {
      throw new RegistryError(`Invalid migration v${version}: down must be a function when provided`, version);
   }

   if (typeof description !== 'string' || description.trim() === '') {
      throw new RegistryError(`Invalid migration v${version}: description is required`, version);
   }

   // Bound, so class-based definitions keep `this` after being copied
   return Object.freeze({
      version,
      description,
      up: up.bind(definition),
      down: down?.bind(definition),
   });
}

/**
 * Holds every registered migration, sorted ascending by version.
 *
 * Definitions come from an explicit list (see the CLI's schema registry) rather than
 * from scanning a directory, so ordering never depends on the file system.
 */
export class MigrationRegistry {

   private readonly _migrations: readonly Readonly<Migration>[];
   private readonly _byVersion: ReadonlyMap<number, Readonly<Migration>>;

   /**
    * @throws RegistryError if a definition is malformed or two share a version
    */
   public constructor(definitions: readonly Migration[]) {
      const frozen = definitions.map(freezeMigration),
            byVersion = new Map<number, Readonly<Migration>>();

      for (const migration of frozen) {
         if (byVersion.has(migration.version)) {
            throw new RegistryError(`Duplicate migration version ${migration.version}`, migration.version);
         }

         byVersion.set(migration.version, migration);
      }

      this._migrations = Object.freeze([ ...frozen ].sort((a, b) => {
         return a.version - b.version;
      }));
      this._byVersion = byVersion;
   }

   /**
    * All migrations, ascending by version.
    */
   public listAll(): readonly Readonly<Migration>[] {
      return this._migrations;
   }

   public get(version: number): Readonly<Migration> | undefined {
      return this._byVersion.get(version);
   }

   public has(version: number): boolean {
      return this._byVersion.has(version);
   }

   /**
    * Highest registered version, or 0 for an empty registry.
    */
   public get latestVersion(): number {
      const last = this._migrations[this._migrations.length - 1];

      return last ? last.version : 0;
   }

   public get size(): number {
      return this._migrations.length;
   }

}
