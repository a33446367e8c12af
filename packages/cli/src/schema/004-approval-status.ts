/**
 * Approval status on users (v4)
 *
 * Replaces the 0/1 `approved` flag with a status string:
 * PENDING_APPROVAL (default), APPROVED or REJECTED. Every existing user starts as
 * PENDING_APPROVAL, whatever the old flag said. Reverting maps APPROVED to 1 and
 * everything else to 0.
 */

import type { Migration } from '@daybook/core';

export const APPROVAL_STATUSES = [ 'PENDING_APPROVAL', 'APPROVED', 'REJECTED' ] as const;

export type ApprovalStatus = typeof APPROVAL_STATUSES[number];

const allowed = APPROVAL_STATUSES.map((status) => { return `'${status}'`; }).join(', ');

export const migration004ApprovalStatus: Migration = {
   version: 4,
   description: 'Change users.approved to an approval status',
   up(db): void {
      db.exec(`
         ALTER TABLE users
         ADD COLUMN approved_status TEXT NOT NULL DEFAULT 'PENDING_APPROVAL'
         CHECK (approved_status IN (${allowed}))
      `);

      db.exec('DROP INDEX IF EXISTS idx_users_approved');
      db.exec('ALTER TABLE users DROP COLUMN approved');
      db.exec('ALTER TABLE users RENAME COLUMN approved_status TO approved');
      db.exec('CREATE INDEX idx_users_approved ON users(approved)');
   },
   down(db): void {
      db.exec('ALTER TABLE users ADD COLUMN approved_flag INTEGER NOT NULL DEFAULT 0');
      db.exec(`UPDATE users SET approved_flag = CASE WHEN approved = 'APPROVED' THEN 1 ELSE 0 END`);

      db.exec('DROP INDEX IF EXISTS idx_users_approved');
      db.exec('ALTER TABLE users DROP COLUMN approved');
      db.exec('ALTER TABLE users RENAME COLUMN approved_flag TO approved');
      db.exec('CREATE INDEX idx_users_approved ON users(approved)');
   },
};
