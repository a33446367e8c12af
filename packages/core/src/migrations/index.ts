/**
 * Migration framework exports.
 */

export type {
   AppliedMigrationRecord,
   AuditAction,
   Migration,
   MigrationAuditEntry,
   MigrationDirection,
   MigrationPhase,
   MigrationProgress,
   MigrationProgressCallback,
   MigrateDownResult,
   MigrateUpResult,
   MigrationStatus,
} from './types.ts';
export {
   ConnectionError,
   LockTimeoutError,
   MigrationError,
   MigrationFailedError,
   NoRevertDefinedError,
   RegistryError,
} from './types.ts';
export { MigrationRegistry } from './registry.ts';
export { MigrationBookkeeping, DEFAULT_TABLE_NAME } from './bookkeeping.ts';
export { MigrationLock, createHolderId, DEFAULT_LOCK_TIMEOUT_MS } from './lock.ts';
export type { LockHandle, MigrationLockOptions } from './lock.ts';
export { MigrationRunner } from './runner.ts';
export type {
   ForceResetOptions,
   MigrateDownOptions,
   MigrateUpOptions,
   MigrationRunnerOptions,
} from './runner.ts';
