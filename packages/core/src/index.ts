/**
 * @daybook/core - Schema migrations for the Daybook database
 *
 * This package provides the migration registry, the transactional migration runner
 * with its bookkeeping table and run lock, and helpers to open the database.
 */

export const VERSION = '0.1.0';

// ============================================================================
// Migrations
// ============================================================================

export {
   MigrationRegistry,
   MigrationRunner,
   MigrationBookkeeping,
   MigrationLock,
   createHolderId,
   DEFAULT_TABLE_NAME,
   DEFAULT_LOCK_TIMEOUT_MS,
   MigrationError,
   RegistryError,
   ConnectionError,
   MigrationFailedError,
   NoRevertDefinedError,
   LockTimeoutError,
} from './migrations/index.ts';
export type {
   Migration,
   AppliedMigrationRecord,
   AuditAction,
   MigrationAuditEntry,
   MigrationDirection,
   MigrationPhase,
   MigrationProgress,
   MigrationProgressCallback,
   MigrateUpResult,
   MigrateDownResult,
   MigrationStatus,
   LockHandle,
   MigrationLockOptions,
   MigrationRunnerOptions,
   MigrateUpOptions,
   MigrateDownOptions,
   ForceResetOptions,
} from './migrations/index.ts';

// ============================================================================
// Database
// ============================================================================

export {
   openDatabase,
   assertOpen,
   withConnection,
   isConnectionFailure,
   isBusy,
   asConnectionError,
   DEFAULT_BUSY_TIMEOUT_MS,
} from './database.ts';
export type { OpenDatabaseOptions } from './database.ts';

// ============================================================================
// Configuration
// ============================================================================

export {
   getDaybookHome,
   getDefaultDatabasePath,
   loadMigrationConfig,
} from './config.ts';
export type { MigrationConfig } from './config.ts';
