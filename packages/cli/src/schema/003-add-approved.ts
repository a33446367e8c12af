/**
 * Approval flag on users (v3)
 */

import type { Migration } from '@daybook/core';

export const migration003AddApproved: Migration = {
   version: 3,
   description: 'Add approved flag to users',
   up(db): void {
      db.exec('ALTER TABLE users ADD COLUMN approved INTEGER NOT NULL DEFAULT 0');
      db.exec('CREATE INDEX idx_users_approved ON users(approved)');
   },
   down(db): void {
      db.exec('DROP INDEX IF EXISTS idx_users_approved');
      db.exec('ALTER TABLE users DROP COLUMN approved');
   },
};
